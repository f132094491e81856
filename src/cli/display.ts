import type { SeriesKey } from "../types";
import { type OhlcvStore, formatSize } from "../storage/ohlcv-store";
import { errorMessage } from "../utils/errors";
import { formatDay } from "../utils/time";

export type DisplayLayout = "standard" | "by-timeframe" | "by-pair";

export const DISPLAY_LAYOUTS: { label: string; layout: DisplayLayout }[] = [
  { label: "Standard", layout: "standard" },
  { label: "Sorted by timeframe", layout: "by-timeframe" },
  { label: "Sorted by pair", layout: "by-pair" },
];

/**
 * A display block: a header line followed by its body lines.
 */
export interface Section {
  title: string;
  lines: string[];
}

function describeRange(store: OhlcvStore, key: SeriesKey): string {
  try {
    const summary = store.describe(key);
    if (summary.count === 0 || summary.first === undefined || summary.last === undefined) {
      return "no data";
    }
    return `${formatDay(summary.first)} to ${formatDay(summary.last)} (${summary.count} candles)`;
  } catch (error) {
    return `error while loading: ${errorMessage(error)}`;
  }
}

const byName = (a: string, b: string) => a.localeCompare(b);

export function sizeLine(store: OhlcvStore): string {
  return `Data directory size: ${formatSize(store.sizeOnDisk())}`;
}

export function standardSections(store: OhlcvStore): Section[] {
  return store.listExchanges().map(exchange => {
    const keys = store.listSeries(exchange);
    return {
      title: `=== Exchange: ${exchange} ===`,
      lines:
        keys.length === 0
          ? ["(no files)"]
          : keys.map(key => `${key.pair} ${key.timeframe}: ${describeRange(store, key)}`),
    };
  });
}

export function timeframeSections(store: OhlcvStore): Section[] {
  // timeframe -> exchange -> pairs
  const grouped = new Map<string, Map<string, string[]>>();
  for (const exchange of store.listExchanges()) {
    for (const key of store.listSeries(exchange)) {
      const exchanges = grouped.get(key.timeframe) ?? new Map<string, string[]>();
      const pairs = exchanges.get(exchange) ?? [];
      pairs.push(key.pair);
      exchanges.set(exchange, pairs);
      grouped.set(key.timeframe, exchanges);
    }
  }

  return [...grouped.keys()].sort(byName).map(timeframe => {
    const lines: string[] = [];
    const exchanges = grouped.get(timeframe) ?? new Map<string, string[]>();
    for (const exchange of [...exchanges.keys()].sort(byName)) {
      const pairs = (exchanges.get(exchange) ?? []).sort(byName);
      lines.push(`  Exchange: ${exchange} (${pairs.length} pairs)`);
      for (const pair of pairs) lines.push(`    - ${pair}`);
    }
    return { title: `Timeframe: ${timeframe}`, lines };
  });
}

export function pairSections(store: OhlcvStore): Section[] {
  // pair -> exchange -> timeframes
  const grouped = new Map<string, Map<string, string[]>>();
  for (const exchange of store.listExchanges()) {
    for (const key of store.listSeries(exchange)) {
      const exchanges = grouped.get(key.pair) ?? new Map<string, string[]>();
      const timeframes = exchanges.get(exchange) ?? [];
      timeframes.push(key.timeframe);
      exchanges.set(exchange, timeframes);
      grouped.set(key.pair, exchanges);
    }
  }

  return [...grouped.keys()].sort(byName).map(pair => {
    const lines: string[] = [];
    const exchanges = grouped.get(pair) ?? new Map<string, string[]>();
    for (const exchange of [...exchanges.keys()].sort(byName)) {
      lines.push(`  Exchange: ${exchange}`);
      for (const timeframe of (exchanges.get(exchange) ?? []).sort(byName)) {
        const details = describeRange(store, { exchange, pair, timeframe });
        lines.push(`    - ${timeframe}: ${details}`);
      }
    }
    return { title: `Pair: ${pair}`, lines };
  });
}

export function sectionsFor(store: OhlcvStore, layout: DisplayLayout): Section[] {
  switch (layout) {
    case "standard":
      return standardSections(store);
    case "by-timeframe":
      return timeframeSections(store);
    case "by-pair":
      return pairSections(store);
  }
}
