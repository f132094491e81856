import { describe, expect, it } from "vitest";
import type { PortfolioSnapshot } from "../types";
import { ContextBuilder } from "./context-builder";

const snapshot: PortfolioSnapshot = {
  timestamp: "2024-05-01T12:00:00.000Z",
  exchange: "kraken",
  quoteCurrency: "EUR",
  balances: { BTC: 0.5, DUST: 0.00001, EUR: 100 },
  tradeBalance: { equity: 15100, freeMargin: 100 },
  tickers: {
    "BTC/EUR": { symbol: "BTC/EUR", last: 30000, percentage: 1.25 },
  },
};

describe("ContextBuilder.buildPortfolioContext", () => {
  it("lists held assets with their prices and the totals", () => {
    expect(ContextBuilder.buildPortfolioContext(snapshot, 0.0001)).toBe(
      [
        "CURRENT PORTFOLIO:",
        "",
        "Asset: BTC",
        "Amount: 0.50000000",
        "Value: €15000.00",
        "Price: €30000.00",
        "24h Change: 1.25%",
        "",
        "Asset: EUR",
        "Amount: 100.00000000",
        "",
        "TOTAL VALUE: €15100.00",
        "AVAILABLE CAPITAL: €100.00",
        "",
        "As of: 2024-05-01T12:00:00.000Z",
        "",
      ].join("\n")
    );
  });

  it("leaves out the 24h line when the change is unknown", () => {
    const text = ContextBuilder.buildPortfolioContext(
      { ...snapshot, tickers: { "BTC/EUR": { symbol: "BTC/EUR", last: 30000 } } },
      0.0001
    );
    expect(text).toContain("Price: €30000.00\n\nAsset: EUR");
  });

  it("says so when nothing is held", () => {
    const text = ContextBuilder.buildPortfolioContext({ ...snapshot, balances: { DUST: 0.00001 } }, 0.0001);
    expect(text).toContain("CURRENT PORTFOLIO:\n\nNo assets with a sufficient amount found.\n\nTOTAL VALUE");
  });

  it("writes unknown currencies as a suffix", () => {
    const text = ContextBuilder.buildPortfolioContext(
      { ...snapshot, quoteCurrency: "CHF", balances: {}, tickers: {} },
      0.0001
    );
    expect(text).toContain("TOTAL VALUE: 15100.00 CHF\nAVAILABLE CAPITAL: 100.00 CHF\n");
  });
});

describe("ContextBuilder.fillTemplate", () => {
  it("replaces every placeholder", () => {
    expect(ContextBuilder.fillTemplate("A {portfolio_data} B {portfolio_data}", "X")).toBe("A X B X");
  });

  it("leaves a template without placeholder as it is", () => {
    expect(ContextBuilder.fillTemplate("no slot", "X")).toBe("no slot");
  });
});
