import ccxt from "ccxt";
import type { Exchange, OHLCV, Ticker } from "ccxt";
import type {
  AccountBalances,
  BalanceSource,
  CandleSource,
  OHLC,
  TickerInfo,
  TickerSource,
} from "../types";
import { ExchangeError, errorMessage } from "../utils/errors";
import { logger } from "../utils/logger";

const EXCHANGE_CLASSES = {
  binance: ccxt.binance,
  bitget: ccxt.bitget,
  bybit: ccxt.bybit,
  coinbase: ccxt.coinbase,
  kraken: ccxt.kraken,
  okx: ccxt.okx,
};

export type SupportedExchange = keyof typeof EXCHANGE_CLASSES;

export function isSupportedExchange(id: string): id is SupportedExchange {
  return Object.prototype.hasOwnProperty.call(EXCHANGE_CLASSES, id);
}

export const SUPPORTED_EXCHANGES: SupportedExchange[] = Object.keys(
  EXCHANGE_CLASSES
).filter(isSupportedExchange);

export interface ExchangeCredentials {
  apiKey?: string;
  secret?: string;
  password?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function amountMap(value: unknown): Record<string, number> {
  const amounts: Record<string, number> = {};
  if (!isRecord(value)) return amounts;
  for (const [currency, amount] of Object.entries(value)) {
    if (typeof amount === "number" && Number.isFinite(amount)) {
      amounts[currency] = amount;
    }
  }
  return amounts;
}

const finite = (value: number | undefined): number | undefined =>
  typeof value === "number" && Number.isFinite(value) ? value : undefined;

export function toCandle(row: OHLCV): OHLC | null {
  const [timestamp, open, high, low, close, volume] = row;
  if (
    timestamp === undefined ||
    open === undefined ||
    high === undefined ||
    low === undefined ||
    close === undefined
  ) {
    return null;
  }
  return { timestamp, open, high, low, close, volume: volume ?? 0 };
}

export function toTickerInfo(symbol: string, ticker: Ticker): TickerInfo {
  return {
    symbol,
    last: finite(ticker.last),
    percentage: finite(ticker.percentage),
    quoteVolume: finite(ticker.quoteVolume),
    baseVolume: finite(ticker.baseVolume),
  };
}

/**
 * Thin wrapper over a ccxt exchange exposing only what the advisor and the
 * data fetcher consume, with ccxt's loose shapes narrowed to our own types.
 */
export class ExchangeManager implements CandleSource, TickerSource, BalanceSource {
  private exchange: Exchange;

  constructor(exchangeId: string, credentials: ExchangeCredentials = {}) {
    if (!isSupportedExchange(exchangeId)) {
      throw new ExchangeError(
        `Exchange ${exchangeId} is not supported (use one of ${SUPPORTED_EXCHANGES.join(", ")})`
      );
    }

    const ExchangeClass = EXCHANGE_CLASSES[exchangeId];
    this.exchange = new ExchangeClass({
      apiKey: credentials.apiKey,
      secret: credentials.secret,
      password: credentials.password,
      enableRateLimit: true,
      options: {
        defaultType: "spot",
      },
    });
  }

  public get id(): string {
    return this.exchange.id;
  }

  public milliseconds(): number {
    return this.exchange.milliseconds();
  }

  public async fetchCandles(
    pair: string,
    timeframe: string,
    since: number,
    limit: number
  ): Promise<OHLC[]> {
    // ccxt rows: [timestamp, open, high, low, close, volume]
    const rows = await this.exchange.fetchOHLCV(pair, timeframe, since, limit);
    const candles: OHLC[] = [];
    for (const row of rows) {
      const candle = toCandle(row);
      if (candle) candles.push(candle);
    }
    return candles;
  }

  public async fetchTickers(
    symbols?: string[]
  ): Promise<Record<string, TickerInfo>> {
    const tickers = await this.exchange.fetchTickers(symbols);
    const result: Record<string, TickerInfo> = {};
    for (const [symbol, ticker] of Object.entries(tickers)) {
      result[symbol] = toTickerInfo(symbol, ticker);
    }
    return result;
  }

  public async fetchBalances(): Promise<AccountBalances> {
    try {
      const balance: unknown = await this.exchange.fetchBalance();
      if (!isRecord(balance)) {
        throw new ExchangeError(`Unexpected balance payload from ${this.id}`);
      }
      return {
        total: amountMap(balance.total),
        free: amountMap(balance.free),
      };
    } catch (error) {
      logger.error(`[ExchangeManager] Fetching balance from ${this.id} failed: ${errorMessage(error)}`);
      throw error;
    }
  }
}
