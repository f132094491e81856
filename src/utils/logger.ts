import * as fs from "fs";
import * as path from "path";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface LoggerOptions {
  level?: LogLevel;
  logDir?: string;
  toFile?: boolean;
  toConsole?: boolean;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

export class Logger {
  private readonly level: LogLevel;
  private readonly toConsole: boolean;
  private readonly logFilePath: string | null;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? "info";
    this.toConsole = options.toConsole ?? true;

    if (options.toFile === false) {
      this.logFilePath = null;
      return;
    }

    // Make sure the log directory exists
    const logsDir = options.logDir ?? path.join(process.cwd(), "logs");
    if (!fs.existsSync(logsDir)) {
      fs.mkdirSync(logsDir, { recursive: true });
    }

    // File name: log_YYYY-MM-DD_HH-mm-ss.log
    const timestamp = this.formatDateForFilename(new Date());
    this.logFilePath = path.join(logsDir, `log_${timestamp}.log`);

    this.write("info", `Logger initialized. Log file: ${this.logFilePath}`);
  }

  public get filePath(): string | null {
    return this.logFilePath;
  }

  private formatDateForFilename(date: Date): string {
    const pad = (n: number) => n.toString().padStart(2, "0");
    const yyyy = date.getFullYear();
    const MM = pad(date.getMonth() + 1);
    const dd = pad(date.getDate());
    const HH = pad(date.getHours());
    const mm = pad(date.getMinutes());
    const ss = pad(date.getSeconds());
    return `${yyyy}-${MM}-${dd}_${HH}-${mm}-${ss}`;
  }

  private formatMessage(level: LogLevel, message: string): string {
    const now = new Date().toISOString();
    return `[${now}] [${level.toUpperCase()}] ${message}`;
  }

  /**
   * Writes to the console and appends to the log file
   */
  private write(level: LogLevel, message: string) {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) return;

    const formatted = this.formatMessage(level, message);

    if (this.toConsole) {
      if (level === "error") console.error(formatted);
      else console.log(formatted);
    }

    if (!this.logFilePath) return;

    // Synchronous append so nothing is lost when the batch exits
    try {
      fs.appendFileSync(this.logFilePath, formatted + "\n");
    } catch (err) {
      console.error("Failed to write to log file:", err);
    }
  }

  public info(message: string) {
    this.write("info", message);
  }

  public warn(message: string) {
    this.write("warn", message);
  }

  public error(message: string, error?: unknown) {
    let msg = message;
    if (error) {
      msg += ` | Error: ${error instanceof Error ? error.message : String(error)}`;
      if (error instanceof Error && error.stack) {
        msg += `\nStack: ${error.stack}`;
      }
    }
    this.write("error", msg);
  }

  public debug(message: string) {
    this.write("debug", message);
  }
}

function createDefaultLogger(): Logger {
  const rawLevel = (process.env.LOG_LEVEL || "info").toLowerCase();
  return new Logger({
    level: isLogLevel(rawLevel) ? rawLevel : "info",
    logDir: process.env.LOG_DIR
      ? path.resolve(process.env.LOG_DIR)
      : undefined,
    toFile: process.env.LOG_TO_FILE !== "false",
  });
}

// Process-wide singleton
export const logger = createDefaultLogger();
