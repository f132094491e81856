import type { CandleSource, SeriesKey, TickerSource } from "../types";
import { updatePairs, type UpdateOptions } from "../market/ohlcv-sync";
import type { OhlcvStore } from "../storage/ohlcv-store";
import { errorMessage } from "../utils/errors";
import { logger } from "../utils/logger";
import { DISPLAY_LAYOUTS, sectionsFor, sizeLine } from "./display";
import type { Prompts } from "./prompts";

export type MarketExchange = CandleSource & TickerSource;
export type ExchangeFactory = (exchangeId: string) => MarketExchange;

export const COMMON_TIMEFRAMES = ["1m", "5m", "15m", "1h", "4h", "1d"];

const DAY_MS = 24 * 60 * 60 * 1000;

export const TIME_RANGES: { label: string; days?: number }[] = [
  { label: "1 day", days: 1 },
  { label: "1 month", days: 30 },
  { label: "1 year", days: 365 },
  { label: "Max (all available data)" },
];

export type MenuAction = "display" | "update" | "download" | "delete" | "auto";

export const MAIN_MENU: { label: string; action: MenuAction }[] = [
  { label: "Display", action: "display" },
  { label: "Update", action: "update" },
  { label: "Download", action: "download" },
  { label: "Delete", action: "delete" },
  { label: "Auto mode", action: "auto" },
];

export interface DataFetcherOptions extends UpdateOptions {
  exchanges: string[];
  topPairsQuote: string;
  now?: () => number;
}

/**
 * ISO start for a time-range choice; without `days` the configured default.
 */
export function sinceForRange(days: number | undefined, fallback: string, nowMs: number): string {
  if (days === undefined) return fallback;
  return new Date(nowMs - days * DAY_MS).toISOString().replace(/\.\d{3}Z$/, "Z");
}

/**
 * Top pairs in the given quote currency by 24h volume (quote volume when
 * the exchange reports it, base volume otherwise).
 */
export async function fetchTopPairs(
  exchange: TickerSource,
  quoteCurrency: string,
  limit: number = 10
): Promise<string[]> {
  try {
    const tickers = await exchange.fetchTickers();
    const ranked: [string, number][] = [];
    for (const [symbol, ticker] of Object.entries(tickers)) {
      if (!symbol.endsWith(`/${quoteCurrency}`)) continue;
      const volume = ticker.quoteVolume || ticker.baseVolume;
      if (volume) ranked.push([symbol, volume]);
    }
    ranked.sort((a, b) => b[1] - a[1]);
    return ranked.slice(0, limit).map(([symbol]) => symbol);
  } catch (error) {
    logger.error(`[DataFetcher] Loading top pairs failed: ${errorMessage(error)}`);
    return [];
  }
}

/**
 * Interactive OHLCV data manager. Every menu action runs to completion;
 * failures of single series are reported and skipped.
 */
export class DataFetcher {
  private readonly exchanges = new Map<string, MarketExchange>();
  private readonly now: () => number;

  constructor(
    private readonly store: OhlcvStore,
    private readonly prompts: Prompts,
    private readonly createExchange: ExchangeFactory,
    private readonly options: DataFetcherOptions
  ) {
    this.now = options.now ?? Date.now;
  }

  private exchange(id: string): MarketExchange {
    let exchange = this.exchanges.get(id);
    if (!exchange) {
      exchange = this.createExchange(id);
      this.exchanges.set(id, exchange);
    }
    return exchange;
  }

  /**
   * Runs the main menu until the user quits (QuitRequested propagates).
   */
  public async run(): Promise<void> {
    for (;;) {
      this.prompts.header("Main menu");
      const label = await this.prompts.choice(
        "Choose an option",
        MAIN_MENU.map(m => m.label)
      );
      const entry = MAIN_MENU.find(m => m.label === label);
      if (entry) await this.perform(entry.action);
    }
  }

  public async perform(action: MenuAction): Promise<void> {
    switch (action) {
      case "display":
        return this.runDisplay();
      case "update":
        return this.runUpdate();
      case "download":
        return this.runDownload();
      case "delete":
        return this.runDelete();
      case "auto":
        return this.runAutoUpdate();
    }
  }

  private async chooseExchange(title: string = "Choose exchange"): Promise<string> {
    this.prompts.header(title);
    return this.prompts.choice("Your choice", this.options.exchanges);
  }

  private async update(exchangeId: string, keys: SeriesKey[]): Promise<number> {
    const results = await updatePairs(
      this.exchange(exchangeId),
      this.store,
      keys,
      this.options
    );
    return results.filter(r => r.ok).length;
  }

  public async runDisplay(): Promise<void> {
    this.prompts.header("Display data");
    const label = await this.prompts.choice(
      "Choose a display format",
      DISPLAY_LAYOUTS.map(l => l.label)
    );
    const layout = DISPLAY_LAYOUTS.find(l => l.label === label)?.layout ?? "standard";

    this.prompts.say(sizeLine(this.store), "success");
    for (const section of sectionsFor(this.store, layout)) {
      this.prompts.header(section.title);
      for (const line of section.lines) this.prompts.say(line);
    }
  }

  /**
   * Updates existing series only, chosen by timeframe and pair.
   */
  public async runUpdate(): Promise<void> {
    const exchangeId = await this.chooseExchange();
    const series = this.store.listSeries(exchangeId);

    this.prompts.header("Available timeframes");
    const timeframes = await this.prompts.multiChoice(
      "Choose timeframe index(es) or 'a' for all",
      this.store.listTimeframes(exchangeId),
      { customLabel: "Add timeframe", customPrompt: "Enter timeframe (e.g. 1h)" }
    );

    for (const timeframe of timeframes) {
      this.prompts.header(`Timeframe: ${timeframe}`);
      const existing = series.filter(k => k.timeframe === timeframe).map(k => k.pair);
      if (existing.length === 0) {
        this.prompts.say("No existing pairs found for this timeframe.");
        continue;
      }

      const pairs = await this.prompts.multiChoice(
        "Choose pair index(es) or 'a' for all",
        existing
      );
      await this.update(
        exchangeId,
        pairs.map(pair => ({ exchange: exchangeId, pair, timeframe }))
      );
    }
  }

  /**
   * Downloads new pairs for one timeframe from a chosen start.
   */
  public async runDownload(): Promise<void> {
    const exchangeId = await this.chooseExchange();

    this.prompts.header("Choose timeframe");
    const timeframe = await this.prompts.choice("Choose a timeframe", COMMON_TIMEFRAMES, {
      allowCustom: true,
    });

    this.prompts.header("Choose time range");
    const rangeLabel = await this.prompts.choice(
      "Choose the range to download",
      TIME_RANGES.map(r => r.label)
    );
    const range = TIME_RANGES.find(r => r.label === rangeLabel);
    const since = sinceForRange(range?.days, this.options.since, this.now());

    if (exchangeId === "binance") {
      const quote = this.options.topPairsQuote;
      const topPairs = await fetchTopPairs(this.exchange(exchangeId), quote);
      if (topPairs.length > 0) {
        this.prompts.header(`Top 10 ${quote} pairs by 24h volume (${exchangeId})`);
        topPairs.forEach((pair, i) => this.prompts.say(`  ${i + 1}. ${pair}`));
      }
    }

    this.prompts.header("Enter pairs");
    this.prompts.say("Enter the pairs you want to download.");
    this.prompts.say("Examples: BTC/EUR, ETH/EUR, SOL/USD");
    const input = await this.prompts.text("Pairs (comma separated)");
    const pairs = input
      .split(",")
      .map(p => p.trim().toUpperCase())
      .filter(p => p !== "");

    if (pairs.length === 0) {
      this.prompts.say("No pairs given, aborting.", "error");
      return;
    }

    this.prompts.header(`Downloading ${pairs.length} pair(s) on timeframe ${timeframe}`);
    this.prompts.say(`Data from: ${since.slice(0, 10)}`);

    const results = await updatePairs(
      this.exchange(exchangeId),
      this.store,
      pairs.map(pair => ({ exchange: exchangeId, pair, timeframe })),
      { ...this.options, since }
    );
    const failed = results.filter(r => !r.ok).length;
    if (failed > 0) this.prompts.say(`${failed} download(s) failed, see log.`, "error");
  }

  /**
   * Deletes selected series of one timeframe after confirmation.
   */
  public async runDelete(): Promise<void> {
    const exchangeId = await this.chooseExchange();
    const series = this.store.listSeries(exchangeId);
    if (series.length === 0) {
      this.prompts.say(`No files found for ${exchangeId}.`, "error");
      return;
    }

    this.prompts.header("Available timeframes");
    const timeframe = await this.prompts.choice(
      "Choose a timeframe",
      this.store.listTimeframes(exchangeId)
    );
    const existing = series.filter(k => k.timeframe === timeframe).map(k => k.pair);

    this.prompts.header(`Pairs to delete for ${timeframe}`);
    const pairs = await this.prompts.multiChoice(
      "Choose pairs to delete or 'a' for all",
      existing
    );
    if (pairs.length === 0) {
      this.prompts.say("No pairs selected, aborting.", "error");
      return;
    }

    this.prompts.say();
    this.prompts.say("The following pairs will be deleted:", "error");
    for (const pair of pairs) this.prompts.say(`  - ${pair} (${timeframe})`);

    if (!(await this.prompts.confirm("Are you sure? This cannot be undone!"))) {
      this.prompts.say("Aborted, no files deleted.");
      return;
    }

    let deleted = 0;
    for (const pair of pairs) {
      const key = { exchange: exchangeId, pair, timeframe };
      const removed = this.store.delete(key);
      if (removed.feather) {
        deleted++;
        this.prompts.say(`Deleted: ${this.store.featherPath(key)}`);
      }
      if (removed.csv) this.prompts.say(`Deleted: ${this.store.csvPath(key)}`);
    }

    this.prompts.header("Deletion completed");
    this.prompts.say(`${deleted} file(s) deleted.`);
  }

  /**
   * Updates every stored series of an exchange, grouped by timeframe.
   */
  public async runAutoUpdate(): Promise<void> {
    const exchangeId = await this.chooseExchange("Choose exchange for auto update");
    const series = this.store.listSeries(exchangeId);
    if (series.length === 0) {
      this.prompts.say(`No files found for ${exchangeId}.`, "error");
      return;
    }

    const byTimeframe = new Map<string, SeriesKey[]>();
    for (const key of series) {
      const keys = byTimeframe.get(key.timeframe) ?? [];
      keys.push(key);
      byTimeframe.set(key.timeframe, keys);
    }

    this.prompts.header(`Auto update for ${exchangeId}`);
    this.prompts.say(
      `Found: ${byTimeframe.size} timeframe(s) with ${series.length} pair(s) in total`
    );
    for (const [timeframe, keys] of byTimeframe) {
      this.prompts.say(`  ${timeframe}: ${keys.length} pair(s)`);
    }

    if (!(await this.prompts.confirm("Start update?"))) return;

    let updated = 0;
    for (const [timeframe, keys] of byTimeframe) {
      this.prompts.header(`Updating timeframe ${timeframe}`);
      this.prompts.say(`Updating ${keys.length} pair(s)...`);
      updated += await this.update(exchangeId, keys);
    }

    this.prompts.header("Auto update completed");
    this.prompts.say(`${updated} of ${series.length} pair(s) updated.`);
  }
}
