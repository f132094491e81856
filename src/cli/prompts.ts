import { QuitRequested, type Terminal, type Tone, styled } from "./terminal";

export interface PromptOptions {
  color?: boolean;
}

export class Prompts {
  private readonly color: boolean;

  constructor(
    private readonly term: Terminal,
    options: PromptOptions = {}
  ) {
    this.color = options.color ?? false;
  }

  public say(line: string = "", tone?: Tone): void {
    this.term.print(tone ? styled(line, tone, this.color) : line);
  }

  /**
   * Section header surrounded by one blank line on each side.
   */
  public header(text: string): void {
    this.term.print();
    this.say(text, "header");
    this.term.print();
  }

  private async read(message: string, defaultValue?: string): Promise<string> {
    const suffix = defaultValue !== undefined ? ` [${defaultValue}]` : "";
    const answer = (await this.term.ask(`${message}${suffix}: `)).trim();
    return answer === "" && defaultValue !== undefined ? defaultValue : answer;
  }

  /**
   * Free text; re-asks until something non-empty is entered.
   */
  public async text(message: string, defaultValue?: string): Promise<string> {
    this.term.print();
    for (;;) {
      const answer = await this.read(message, defaultValue);
      if (answer !== "") return answer;
    }
  }

  /**
   * Yes/no question, "no" unless answered with y/yes.
   */
  public async confirm(message: string): Promise<boolean> {
    const answer = (await this.term.ask(`${message} [y/N]: `)).trim().toLowerCase();
    return answer === "y" || answer === "yes";
  }

  /**
   * Numbered menu returning one option. "0" asks for a custom value when
   * allowed, "q" quits.
   */
  public async choice(
    message: string,
    options: string[],
    config: { allowCustom?: boolean } = {}
  ): Promise<string> {
    for (;;) {
      options.forEach((opt, i) => this.term.print(`  ${i + 1}) ${opt}`));
      if (config.allowCustom) this.term.print("  0) Enter another value");
      this.term.print("  q) Quit");
      this.term.print();

      const answer = await this.read(message, "1");
      if (answer.toLowerCase() === "q") throw new QuitRequested();

      if (/^\d+$/.test(answer)) {
        const idx = Number(answer);
        if (idx === 0 && config.allowCustom) return this.text("Enter value");
        if (idx >= 1 && idx <= options.length) return options[idx - 1];
      }
      this.say("Invalid selection, please try again.", "error");
    }
  }

  /**
   * Comma-separated multi selection. "a" selects everything, "0" adds a
   * custom entry, "q" quits.
   */
  public async multiChoice(
    message: string,
    options: string[],
    config: { customLabel?: string; customPrompt?: string } = {}
  ): Promise<string[]> {
    const customLabel = config.customLabel ?? "Add new pair";
    const customPrompt = config.customPrompt ?? "Enter new pair (e.g. BTC/EUR)";

    for (;;) {
      options.forEach((opt, i) => this.term.print(`  ${i + 1}) ${opt}`));
      this.term.print(`  0) ${customLabel}`);
      this.term.print("  a) Select all");
      this.term.print("  q) Quit");
      this.term.print();

      const answer = await this.read(message, "a");
      const lowered = answer.toLowerCase();
      if (lowered === "q") throw new QuitRequested();
      if (lowered === "a") return [...options];

      const indices: number[] = [];
      for (const part of answer.split(",")) {
        const p = part.trim();
        if (!/^\d+$/.test(p)) continue;
        const idx = Number(p);
        if (idx === 0 || idx <= options.length) indices.push(idx);
      }

      if (indices.length === 0) {
        this.say("Invalid selection, please try again.", "error");
        continue;
      }

      const result: string[] = [];
      for (const idx of indices) {
        result.push(idx === 0 ? await this.text(customPrompt) : options[idx - 1]);
      }
      return result;
    }
  }
}
