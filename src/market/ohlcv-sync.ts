import type { CandleSource, OHLC, SeriesKey } from "../types";
import type { OhlcvStore } from "../storage/ohlcv-store";
import {
  ConfigError,
  type AdvisorError,
  type Result,
  errorMessage,
  fail,
  ok,
  toAdvisorError,
} from "../utils/errors";
import { logger } from "../utils/logger";
import { type Sleep, parseIsoDate, sleep as defaultSleep } from "../utils/time";

export interface FetchOptions {
  limit: number; // max candles per request
  rateLimitMs: number; // pause after every successful page
  retryDelayMs: number; // pause before retrying a failed request
  sleep?: Sleep;
}

export interface UpdateOptions extends FetchOptions {
  since: string; // ISO start used when no series exists yet
  csv?: boolean;
}

export interface UpdateSummary {
  key: SeriesKey;
  fetched: number;
  total: number;
  written: boolean;
}

/**
 * Walks the candle API forward from `sinceMs` until a page comes back empty
 * or the cursor reaches the exchange clock as read at the start.
 * Failed requests are retried after a fixed delay, without a cap.
 */
export async function fetchOHLCVRange(
  source: CandleSource,
  pair: string,
  timeframe: string,
  sinceMs: number,
  options: FetchOptions
): Promise<OHLC[]> {
  const sleep = options.sleep ?? defaultSleep;
  const all: OHLC[] = [];
  const nowMs = source.milliseconds();
  let cursor = sinceMs;

  while (cursor < nowMs) {
    let page: OHLC[];
    try {
      page = await source.fetchCandles(pair, timeframe, cursor, options.limit);
    } catch (error) {
      logger.warn(
        `[OhlcvSync] Fetch for ${pair} ${timeframe} failed: ${errorMessage(error)}, retrying in ${options.retryDelayMs / 1000}s`
      );
      await sleep(options.retryDelayMs);
      continue;
    }

    if (page.length === 0) break;

    logger.info(
      `[OhlcvSync] Fetched ${page.length} candles for ${pair} ${timeframe} from ${new Date(cursor).toISOString()}`
    );
    all.push(...page);
    cursor = page[page.length - 1].timestamp + 1;
    await sleep(options.rateLimitMs);
  }

  logger.info(`[OhlcvSync] ${all.length} candles loaded in total for ${pair} ${timeframe}`);
  return all;
}

/**
 * Concatenates both series, keeps the last occurrence of every timestamp
 * (so `fresh` wins over `existing`) and sorts ascending.
 */
export function mergeCandles(existing: OHLC[], fresh: OHLC[]): OHLC[] {
  const byTimestamp = new Map<number, OHLC>();
  for (const candle of existing) byTimestamp.set(candle.timestamp, candle);
  for (const candle of fresh) byTimestamp.set(candle.timestamp, candle);
  return [...byTimestamp.values()].sort((a, b) => a.timestamp - b.timestamp);
}

/**
 * Brings one stored series up to date. The file is only rewritten when new
 * rows arrived.
 */
export async function updatePair(
  source: CandleSource,
  store: OhlcvStore,
  key: SeriesKey,
  options: UpdateOptions
): Promise<UpdateSummary> {
  logger.info(`[OhlcvSync] -> Update ${key.exchange} ${key.pair} ${key.timeframe}`);

  const existing = store.load(key);
  let sinceMs: number;
  if (existing.length > 0) {
    sinceMs = existing[existing.length - 1].timestamp + 1;
  } else {
    const parsed = parseIsoDate(options.since);
    if (parsed === undefined) {
      throw new ConfigError(`Invalid start date: ${options.since}`);
    }
    sinceMs = parsed;
  }

  const fresh = await fetchOHLCVRange(
    source,
    key.pair,
    key.timeframe,
    sinceMs,
    options
  );

  if (fresh.length === 0) {
    logger.info(`[OhlcvSync] No new data for ${key.pair} ${key.timeframe}`);
    return { key, fetched: 0, total: existing.length, written: false };
  }

  const merged = mergeCandles(existing, fresh);
  store.save(key, merged, { csv: options.csv });
  return { key, fetched: fresh.length, total: merged.length, written: true };
}

/**
 * Updates several series in order. A failing series is logged and skipped so
 * the rest of the batch still runs.
 */
export async function updatePairs(
  source: CandleSource,
  store: OhlcvStore,
  keys: SeriesKey[],
  options: UpdateOptions
): Promise<Result<UpdateSummary, AdvisorError>[]> {
  const results: Result<UpdateSummary, AdvisorError>[] = [];
  for (const key of keys) {
    try {
      results.push(ok(await updatePair(source, store, key, options)));
    } catch (error) {
      logger.error(`[OhlcvSync] Update of ${key.pair} ${key.timeframe} failed`, error);
      results.push(fail(toAdvisorError(error, "storage")));
    }
  }
  return results;
}
