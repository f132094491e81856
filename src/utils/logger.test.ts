import * as fs from "fs";
import { describe, expect, it } from "vitest";
import { tempDir } from "../test/fakes";
import { Logger, isLogLevel } from "./logger";

function logLines(logger: Logger): string[] {
  const file = logger.filePath;
  if (file === null) return [];
  return fs.readFileSync(file, "utf-8").trimEnd().split("\n");
}

describe("Logger", () => {
  it("appends messages at or above its level to the log file", () => {
    const logger = new Logger({ level: "warn", logDir: tempDir(), toConsole: false });

    logger.info("skipped");
    logger.warn("careful");
    logger.error("boom", new Error("bad"));

    const lines = logLines(logger);
    expect(lines[0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[WARN\] careful$/);
    expect(lines[1]).toMatch(/\[ERROR\] boom \| Error: bad$/);
    expect(lines[2]).toBe("Stack: Error: bad");
  });

  it("names the log file after its start time", () => {
    const logger = new Logger({ logDir: tempDir(), toConsole: false });
    expect(logger.filePath).toMatch(/log_\d{4}-\d{2}-\d{2}_\d{2}-\d{2}-\d{2}\.log$/);
    expect(logLines(logger)[0]).toContain("[INFO] Logger initialized.");
  });

  it("writes no file when disabled", () => {
    expect(new Logger({ toFile: false, toConsole: false }).filePath).toBeNull();
  });

  it("recognizes level names", () => {
    expect(isLogLevel("debug")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
  });
});
