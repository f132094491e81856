import * as fs from "fs";
import * as path from "path";
import {
  DataType,
  TimeUnit,
  tableFromArrays,
  tableFromIPC,
  tableToIPC,
} from "apache-arrow";
import type { Table, Vector } from "apache-arrow";
import type { OHLC, SeriesKey, SeriesSummary } from "../types";
import { StorageError } from "../utils/errors";
import { logger } from "../utils/logger";

export const FEATHER_EXT = ".feather";
export const CSV_EXT = ".csv";

const PRICE_COLUMNS = ["open", "high", "low", "close", "volume"] as const;

/**
 * "BTC/EUR" + "1h" -> "BTC_EUR-1h"
 */
export function seriesFileStem(pair: string, timeframe: string): string {
  return `${pair.replace(/\//g, "_")}-${timeframe}`;
}

/**
 * Inverse of seriesFileStem. The timeframe is everything after the last "-".
 */
export function parseSeriesFileName(
  fileName: string
): { pair: string; timeframe: string } | null {
  const stem = path.parse(fileName).name;
  const dash = stem.lastIndexOf("-");
  if (dash <= 0 || dash === stem.length - 1) return null;
  return {
    pair: stem.slice(0, dash).replace(/_/g, "/"),
    timeframe: stem.slice(dash + 1),
  };
}

export function formatSize(sizeBytes: number): string {
  if (sizeBytes < 1024) return `${sizeBytes} Bytes`;
  if (sizeBytes < 1024 ** 2) return `${(sizeBytes / 1024).toFixed(2)} KB`;
  if (sizeBytes < 1024 ** 3) return `${(sizeBytes / 1024 ** 2).toFixed(2)} MB`;
  return `${(sizeBytes / 1024 ** 3).toFixed(2)} GB`;
}

function directorySize(dir: string): number {
  if (!fs.existsSync(dir)) return 0;
  let total = 0;
  for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) total += directorySize(full);
    else if (entry.isFile()) total += fs.statSync(full).size;
  }
  return total;
}

const UNIT_TO_MS: Record<TimeUnit, number> = {
  [TimeUnit.SECOND]: 1000,
  [TimeUnit.MILLISECOND]: 1,
  [TimeUnit.MICROSECOND]: 1 / 1000,
  [TimeUnit.NANOSECOND]: 1 / 1_000_000,
};

function toNumber(raw: unknown): number {
  if (typeof raw === "number") return raw;
  if (typeof raw === "bigint") return Number(raw);
  if (raw instanceof Date) return raw.getTime();
  return NaN;
}

/**
 * Reads the time column of a series file. Current files carry `timestamp`
 * (epoch ms); files written by older tooling carry `ts` (ms) or an Arrow
 * timestamp column named `date`.
 */
function readTimestamps(table: Table, filePath: string): number[] {
  for (const name of ["timestamp", "ts"]) {
    const column = table.getChild(name);
    if (column) return readColumn(column, 1);
  }

  const dateField = table.schema.fields.find(f => f.name === "date");
  const dateColumn = table.getChild("date");
  if (dateField && dateColumn) {
    const type = dateField.type;
    // Arrow JS already hands out epoch ms for timestamp columns unless it
    // falls back to raw bigint values, which are in the column's own unit.
    const bigintScale = DataType.isTimestamp(type) ? UNIT_TO_MS[type.unit] : 1;
    const values: number[] = [];
    for (let i = 0; i < dateColumn.length; i++) {
      const raw: unknown = dateColumn.get(i);
      values.push(
        typeof raw === "bigint" ? Math.round(Number(raw) * bigintScale) : toNumber(raw)
      );
    }
    return values;
  }

  throw new StorageError(`${filePath} has no timestamp column`);
}

function readColumn(column: Vector, scale: number): number[] {
  const values: number[] = [];
  for (let i = 0; i < column.length; i++) {
    const raw: unknown = column.get(i);
    values.push(toNumber(raw) * scale);
  }
  return values;
}

/**
 * Local OHLCV store: one Feather (Arrow IPC file) per (exchange, pair, timeframe)
 * under `<root>/<exchange>/`, with an optional CSV mirror next to it.
 */
export class OhlcvStore {
  constructor(public readonly root: string) {}

  public exchangeDir(exchange: string): string {
    return path.join(this.root, exchange);
  }

  public featherPath(key: SeriesKey): string {
    return path.join(
      this.exchangeDir(key.exchange),
      seriesFileStem(key.pair, key.timeframe) + FEATHER_EXT
    );
  }

  public csvPath(key: SeriesKey): string {
    return path.join(
      this.exchangeDir(key.exchange),
      seriesFileStem(key.pair, key.timeframe) + CSV_EXT
    );
  }

  public exists(key: SeriesKey): boolean {
    return fs.existsSync(this.featherPath(key));
  }

  /**
   * Loads a series sorted by timestamp. A missing file is an empty series.
   */
  public load(key: SeriesKey): OHLC[] {
    const filePath = this.featherPath(key);
    if (!fs.existsSync(filePath)) return [];

    let table: Table;
    try {
      table = tableFromIPC(fs.readFileSync(filePath));
    } catch (error) {
      throw new StorageError(`Could not read ${filePath}`, { cause: error });
    }

    const timestamps = readTimestamps(table, filePath);
    const columns = PRICE_COLUMNS.map(name => {
      const column = table.getChild(name);
      if (!column) throw new StorageError(`${filePath} has no ${name} column`);
      return readColumn(column, 1);
    });
    const [open, high, low, close, volume] = columns;

    const candles: OHLC[] = timestamps.map((timestamp, i) => ({
      timestamp,
      open: open[i],
      high: high[i],
      low: low[i],
      close: close[i],
      volume: volume[i],
    }));
    const valid = candles.filter(c => Number.isFinite(c.timestamp));
    const dropped = candles.length - valid.length;
    if (dropped > 0) {
      logger.warn(
        `[OhlcvStore] ${path.basename(filePath)}: dropped ${dropped} row(s) without a valid timestamp`
      );
    }
    return valid.sort((a, b) => a.timestamp - b.timestamp);
  }

  /**
   * Rewrites the whole series file; optionally mirrors it to CSV.
   */
  public save(key: SeriesKey, candles: OHLC[], options: { csv?: boolean } = {}): void {
    const dir = this.exchangeDir(key.exchange);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }

    const table = tableFromArrays({
      timestamp: Float64Array.from(candles, c => c.timestamp),
      open: Float64Array.from(candles, c => c.open),
      high: Float64Array.from(candles, c => c.high),
      low: Float64Array.from(candles, c => c.low),
      close: Float64Array.from(candles, c => c.close),
      volume: Float64Array.from(candles, c => c.volume),
    });

    const featherPath = this.featherPath(key);
    fs.writeFileSync(featherPath, tableToIPC(table, "file"));
    logger.info(`[OhlcvStore] Feather saved: ${path.basename(featherPath)}`);

    if (options.csv) {
      const csvPath = this.csvPath(key);
      fs.writeFileSync(csvPath, toCsv(candles));
      logger.info(`[OhlcvStore] CSV saved: ${path.basename(csvPath)}`);
    }
  }

  /**
   * Deletes the Feather file and its CSV mirror, reporting which existed.
   */
  public delete(key: SeriesKey): { feather: boolean; csv: boolean } {
    const removed = { feather: false, csv: false };
    const featherPath = this.featherPath(key);
    const csvPath = this.csvPath(key);

    if (fs.existsSync(featherPath)) {
      fs.unlinkSync(featherPath);
      removed.feather = true;
    }
    if (fs.existsSync(csvPath)) {
      fs.unlinkSync(csvPath);
      removed.csv = true;
    }
    return removed;
  }

  public listExchanges(): string[] {
    if (!fs.existsSync(this.root)) return [];
    return fs
      .readdirSync(this.root, { withFileTypes: true })
      .filter(entry => entry.isDirectory())
      .map(entry => entry.name)
      .sort();
  }

  public listSeries(exchange: string): SeriesKey[] {
    const dir = this.exchangeDir(exchange);
    if (!fs.existsSync(dir)) return [];

    const keys: SeriesKey[] = [];
    for (const fileName of fs.readdirSync(dir).sort()) {
      if (path.extname(fileName) !== FEATHER_EXT) continue;
      const info = parseSeriesFileName(fileName);
      if (info) keys.push({ exchange, ...info });
    }
    return keys;
  }

  public listTimeframes(exchange: string): string[] {
    const timeframes = new Set(this.listSeries(exchange).map(k => k.timeframe));
    return [...timeframes].sort();
  }

  public describe(key: SeriesKey): SeriesSummary {
    const candles = this.load(key);
    return {
      ...key,
      count: candles.length,
      first: candles[0]?.timestamp,
      last: candles[candles.length - 1]?.timestamp,
    };
  }

  public sizeOnDisk(): number {
    return directorySize(this.root);
  }
}

function toCsv(candles: OHLC[]): string {
  const lines = ["date,open,high,low,close,volume"];
  for (const c of candles) {
    lines.push(
      [
        new Date(c.timestamp).toISOString(),
        c.open.toFixed(8),
        c.high.toFixed(8),
        c.low.toFixed(8),
        c.close.toFixed(8),
        c.volume.toFixed(8),
      ].join(",")
    );
  }
  return lines.join("\n") + "\n";
}
