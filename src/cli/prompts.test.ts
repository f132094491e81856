import { describe, expect, it } from "vitest";
import { FakeTerminal } from "../test/fakes";
import { Prompts } from "./prompts";
import { QuitRequested, styled } from "./terminal";

describe("Prompts.text", () => {
  it("asks again until something is entered", async () => {
    const term = new FakeTerminal(["", "  ", " BTC/EUR "]);
    expect(await new Prompts(term).text("Pair")).toBe("BTC/EUR");
    expect(term.questions).toEqual(["Pair: ", "Pair: ", "Pair: "]);
  });

  it("takes the default on an empty answer", async () => {
    const term = new FakeTerminal([""]);
    expect(await new Prompts(term).text("Start date", "2020-01-01")).toBe("2020-01-01");
    expect(term.questions).toEqual(["Start date [2020-01-01]: "]);
  });
});

describe("Prompts.confirm", () => {
  it("accepts only y and yes", async () => {
    const prompts = new Prompts(new FakeTerminal(["y", "YES", "", "n", "sure"]));
    const answers: boolean[] = [];
    for (let i = 0; i < 5; i++) answers.push(await prompts.confirm("Continue?"));
    expect(answers).toEqual([true, true, false, false, false]);
  });
});

describe("Prompts.choice", () => {
  it("lists the options and returns the picked one", async () => {
    const term = new FakeTerminal(["2"]);
    expect(await new Prompts(term).choice("Exchange", ["binance", "kraken"])).toBe("kraken");
    expect(term.output).toEqual(["  1) binance", "  2) kraken", "  q) Quit", ""]);
    expect(term.questions).toEqual(["Exchange [1]: "]);
  });

  it("defaults to the first option", async () => {
    const term = new FakeTerminal([""]);
    expect(await new Prompts(term).choice("Exchange", ["binance", "kraken"])).toBe("binance");
  });

  it("re-asks after an invalid selection", async () => {
    const term = new FakeTerminal(["9", "x", "1"]);
    expect(await new Prompts(term).choice("Timeframe", ["1h"])).toBe("1h");
    expect(term.output.filter(line => line.startsWith("Invalid"))).toHaveLength(2);
    expect(term.questions).toHaveLength(3);
  });

  it("asks for a custom value on 0 when allowed", async () => {
    const term = new FakeTerminal(["0", "3d"]);
    const prompts = new Prompts(term);

    expect(await prompts.choice("Timeframe", ["1h"], { allowCustom: true })).toBe("3d");
    expect(term.output).toContain("  0) Enter another value");
    expect(term.questions[1]).toBe("Enter value: ");
  });

  it("rejects 0 when custom values are not allowed", async () => {
    const term = new FakeTerminal(["0", "1"]);
    expect(await new Prompts(term).choice("Timeframe", ["1h"])).toBe("1h");
    expect(term.output).toContain("Invalid selection, please try again.");
  });

  it("throws QuitRequested on q", async () => {
    const prompts = new Prompts(new FakeTerminal(["Q"]));
    await expect(prompts.choice("Exchange", ["binance"])).rejects.toBeInstanceOf(QuitRequested);
  });
});

describe("Prompts.multiChoice", () => {
  const pairs = ["BTC/EUR", "ETH/EUR", "SOL/EUR"];

  it("selects everything by default", async () => {
    const term = new FakeTerminal([""]);
    expect(await new Prompts(term).multiChoice("Pairs", pairs)).toEqual(pairs);
    expect(term.questions).toEqual(["Pairs [a]: "]);
  });

  it("parses comma separated indices and skips unknown ones", async () => {
    const term = new FakeTerminal(["3, 1,7,x"]);
    expect(await new Prompts(term).multiChoice("Pairs", pairs)).toEqual(["SOL/EUR", "BTC/EUR"]);
  });

  it("adds custom entries for 0", async () => {
    const term = new FakeTerminal(["1,0", "ADA/EUR"]);
    expect(await new Prompts(term).multiChoice("Pairs", pairs)).toEqual(["BTC/EUR", "ADA/EUR"]);
    expect(term.questions[1]).toBe("Enter new pair (e.g. BTC/EUR): ");
  });

  it("re-asks when nothing valid was selected", async () => {
    const term = new FakeTerminal(["9", "2"]);
    expect(await new Prompts(term).multiChoice("Pairs", pairs)).toEqual(["ETH/EUR"]);
    expect(term.output).toContain("Invalid selection, please try again.");
  });

  it("throws QuitRequested on q", async () => {
    const prompts = new Prompts(new FakeTerminal(["q"]));
    await expect(prompts.multiChoice("Pairs", pairs)).rejects.toBeInstanceOf(QuitRequested);
  });
});

describe("Prompts.header", () => {
  it("surrounds the title with blank lines", () => {
    const term = new FakeTerminal([]);
    new Prompts(term).header("Update");
    expect(term.output).toEqual(["", "Update", ""]);
  });

  it("colors the title when enabled", () => {
    const term = new FakeTerminal([]);
    new Prompts(term, { color: true }).header("Update");
    expect(term.output[1]).toBe(styled("Update", "header", true));
    expect(term.output[1]).toBe("\x1b[1m\x1b[36mUpdate\x1b[0m");
  });
});
