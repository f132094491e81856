import * as readline from "readline/promises";

/**
 * Line-based console the interactive menus talk to.
 */
export interface Terminal {
  ask(question: string): Promise<string>;
  print(line?: string): void;
  close(): void;
}

/**
 * Raised when the user enters "q" at any prompt.
 */
export class QuitRequested extends Error {
  constructor() {
    super("Quit requested");
    this.name = "QuitRequested";
  }
}

const ANSI = {
  cyan: "\x1b[36m",
  bold: "\x1b[1m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  reset: "\x1b[0m",
};

export type Tone = "header" | "error" | "success";

export function styled(text: string, tone: Tone, enabled: boolean): string {
  if (!enabled) return text;
  switch (tone) {
    case "header":
      return `${ANSI.bold}${ANSI.cyan}${text}${ANSI.reset}`;
    case "error":
      return `${ANSI.red}${text}${ANSI.reset}`;
    case "success":
      return `${ANSI.green}${text}${ANSI.reset}`;
  }
}

export class ConsoleTerminal implements Terminal {
  private rl: readline.Interface;

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    private output: NodeJS.WritableStream = process.stdout
  ) {
    this.rl = readline.createInterface({ input, output });
  }

  public async ask(question: string): Promise<string> {
    return this.rl.question(question);
  }

  public print(line: string = ""): void {
    this.output.write(line + "\n");
  }

  public close(): void {
    this.rl.close();
  }
}
