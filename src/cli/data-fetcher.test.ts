import { beforeEach, describe, expect, it, vi } from "vitest";
import { OhlcvStore } from "../storage/ohlcv-store";
import {
  FakeTerminal,
  HistoryCandleSource,
  ScriptedCandleSource,
  candle,
  noSleep,
  tempDir,
} from "../test/fakes";
import type { TickerSource } from "../types";
import {
  DataFetcher,
  type DataFetcherOptions,
  type MarketExchange,
  fetchTopPairs,
  sinceForRange,
} from "./data-fetcher";
import { Prompts } from "./prompts";
import { QuitRequested } from "./terminal";

const options: DataFetcherOptions = {
  exchanges: ["binance", "kraken"],
  topPairsQuote: "EUR",
  since: "1970-01-01T00:00:01Z",
  limit: 1000,
  rateLimitMs: 0,
  retryDelayMs: 0,
  sleep: noSleep,
};

const btcHourly = { exchange: "kraken", pair: "BTC/EUR", timeframe: "1h" };
const ethHourly = { exchange: "kraken", pair: "ETH/EUR", timeframe: "1h" };
const btcDaily = { exchange: "kraken", pair: "BTC/EUR", timeframe: "1d" };

let store: OhlcvStore;

beforeEach(() => {
  store = new OhlcvStore(tempDir());
  store.save(btcHourly, [candle(1000)]);
  store.save(ethHourly, [candle(1000)]);
  store.save(btcDaily, [candle(1000)]);
});

function setup(answers: string[], source: MarketExchange, extra: Partial<DataFetcherOptions> = {}) {
  const term = new FakeTerminal(answers);
  const createExchange = vi.fn((_id: string) => source);
  const fetcher = new DataFetcher(store, new Prompts(term), createExchange, { ...options, ...extra });
  return { term, fetcher, createExchange };
}

describe("sinceForRange", () => {
  it("goes back the given number of days", () => {
    expect(sinceForRange(30, "2012-01-01T00:00:00Z", Date.UTC(2024, 2, 31, 12, 30, 15, 250))).toBe(
      "2024-03-01T12:30:15Z"
    );
  });

  it("uses the fallback without a day count", () => {
    expect(sinceForRange(undefined, "2012-01-01T00:00:00Z", 0)).toBe("2012-01-01T00:00:00Z");
  });
});

describe("fetchTopPairs", () => {
  it("ranks pairs of the quote currency by volume", async () => {
    const exchange: TickerSource = {
      fetchTickers: async () => ({
        "BTC/EUR": { symbol: "BTC/EUR", quoteVolume: 500 },
        "ETH/EUR": { symbol: "ETH/EUR", quoteVolume: 900 },
        "SOL/USDT": { symbol: "SOL/USDT", quoteVolume: 1000 },
        "XRP/EUR": { symbol: "XRP/EUR", baseVolume: 100 },
        "DOGE/EUR": { symbol: "DOGE/EUR" },
      }),
    };

    expect(await fetchTopPairs(exchange, "EUR")).toEqual(["ETH/EUR", "BTC/EUR", "XRP/EUR"]);
    expect(await fetchTopPairs(exchange, "EUR", 1)).toEqual(["ETH/EUR"]);
  });

  it("returns nothing when tickers cannot be loaded", async () => {
    const exchange: TickerSource = {
      fetchTickers: async () => {
        throw new Error("not supported");
      },
    };
    expect(await fetchTopPairs(exchange, "EUR")).toEqual([]);
  });
});

describe("DataFetcher.runDisplay", () => {
  it("prints the size and the chosen layout", async () => {
    const { term, fetcher } = setup(["1"], new HistoryCandleSource({}, 10_000));

    await fetcher.perform("display");

    expect(term.output).toContain("=== Exchange: kraken ===");
    expect(term.output).toContain("BTC/EUR 1h: 1970-01-01 to 1970-01-01 (1 candles)");
    expect(term.output.some(line => line.startsWith("Data directory size: "))).toBe(true);
  });
});

describe("DataFetcher.runUpdate", () => {
  it("updates the selected existing pairs only", async () => {
    const source = new HistoryCandleSource(
      { "BTC/EUR": [candle(1000), candle(2000)], "ETH/EUR": [candle(3000)] },
      10_000
    );
    const { fetcher, createExchange } = setup(["2", "2", "1"], source);

    await fetcher.perform("update");

    expect(createExchange).toHaveBeenCalledWith("kraken");
    expect(source.calls).toEqual([
      { pair: "BTC/EUR", since: 1001 },
      { pair: "BTC/EUR", since: 2001 },
    ]);
    expect(store.load(btcHourly).map(c => c.timestamp)).toEqual([1000, 2000]);
    expect(store.load(ethHourly)).toHaveLength(1);
  });

  it("skips timeframes without stored pairs", async () => {
    const source = new HistoryCandleSource({}, 10_000);
    const { term, fetcher } = setup(["2", "0", "5m"], source);

    await fetcher.perform("update");

    expect(term.output).toContain("No existing pairs found for this timeframe.");
    expect(source.calls).toEqual([]);
  });
});

describe("DataFetcher.runDownload", () => {
  it("downloads the entered pairs from the configured start", async () => {
    const source = new HistoryCandleSource(
      { "SOL/EUR": [candle(1000), candle(2000)], "ADA/EUR": [candle(5000)] },
      10_000
    );
    const { term, fetcher } = setup(["2", "4", "4", "sol/eur, ,ada/eur"], source);

    await fetcher.perform("download");

    expect(source.calls[0]).toEqual({ pair: "SOL/EUR", since: 1000 });
    expect(store.load({ exchange: "kraken", pair: "SOL/EUR", timeframe: "1h" })).toHaveLength(2);
    expect(store.load({ exchange: "kraken", pair: "ADA/EUR", timeframe: "1h" })).toHaveLength(1);
    expect(term.output).toContain("Data from: 1970-01-01");
  });

  it("shows the top pairs on binance and starts at the chosen range", async () => {
    const now = Date.UTC(2024, 0, 2);
    const source = new ScriptedCandleSource([], now, "binance");
    source.tickers = {
      "BTC/EUR": { symbol: "BTC/EUR", quoteVolume: 500 },
      "ETH/EUR": { symbol: "ETH/EUR", quoteVolume: 900 },
    };
    const { term, fetcher } = setup(["1", "1", "1", "sol/eur"], source, { now: () => now });

    await fetcher.perform("download");

    expect(term.output).toContain("Top 10 EUR pairs by 24h volume (binance)");
    expect(term.output).toContain("  1. ETH/EUR");
    expect(term.output).toContain("  2. BTC/EUR");
    expect(source.calls).toEqual([
      { pair: "SOL/EUR", timeframe: "1m", since: Date.UTC(2024, 0, 1), limit: 1000 },
    ]);
    expect(store.exists({ exchange: "binance", pair: "SOL/EUR", timeframe: "1m" })).toBe(false);
  });
});

describe("DataFetcher.runDelete", () => {
  it("deletes the selected pairs after confirmation", async () => {
    const { term, fetcher } = setup(["2", "2", "1", "y"], new HistoryCandleSource({}, 10_000));

    await fetcher.perform("delete");

    expect(store.exists(btcHourly)).toBe(false);
    expect(store.exists(ethHourly)).toBe(true);
    expect(store.exists(btcDaily)).toBe(true);
    expect(term.output).toContain(`Deleted: ${store.featherPath(btcHourly)}`);
    expect(term.output).toContain("1 file(s) deleted.");
  });

  it("keeps everything when not confirmed", async () => {
    const { term, fetcher } = setup(["2", "2", "a", "n"], new HistoryCandleSource({}, 10_000));

    await fetcher.perform("delete");

    expect(store.exists(btcHourly)).toBe(true);
    expect(store.exists(ethHourly)).toBe(true);
    expect(term.output).toContain("Aborted, no files deleted.");
  });

  it("stops when the exchange has no files", async () => {
    const { term, fetcher } = setup(["1"], new HistoryCandleSource({}, 10_000));

    await fetcher.perform("delete");

    expect(term.output).toContain("No files found for binance.");
  });
});

describe("DataFetcher.runAutoUpdate", () => {
  it("updates every stored series grouped by timeframe", async () => {
    const source = new HistoryCandleSource({ "BTC/EUR": [candle(1000), candle(2000), candle(3000)] }, 10_000);
    const { term, fetcher } = setup(["2", "y"], source);

    await fetcher.perform("auto");

    expect(term.output).toContain("Found: 2 timeframe(s) with 3 pair(s) in total");
    expect(term.output).toContain("  1d: 1 pair(s)");
    expect(term.output).toContain("  1h: 2 pair(s)");
    expect(term.output).toContain("3 of 3 pair(s) updated.");
    expect(store.load(btcDaily).map(c => c.timestamp)).toEqual([1000, 2000, 3000]);
    expect(store.load(btcHourly).map(c => c.timestamp)).toEqual([1000, 2000, 3000]);
    expect(store.load(ethHourly)).toHaveLength(1);
  });

  it("does nothing without confirmation", async () => {
    const source = new HistoryCandleSource({ "BTC/EUR": [candle(2000)] }, 10_000);
    const { fetcher } = setup(["2", "n"], source);

    await fetcher.perform("auto");

    expect(source.calls).toEqual([]);
  });
});

describe("DataFetcher.run", () => {
  it("ends with QuitRequested on q", async () => {
    const { fetcher } = setup(["q"], new HistoryCandleSource({}, 10_000));
    await expect(fetcher.run()).rejects.toBeInstanceOf(QuitRequested);
  });
});
