/**
 * Core type definitions for the portfolio advisor and the OHLCV data fetcher
 */

export interface OHLC {
  timestamp: number; // epoch ms, start of the bucket
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

/**
 * Identifies one locally stored candle series.
 */
export interface SeriesKey {
  exchange: string;
  pair: string; // e.g. "BTC/EUR"
  timeframe: string; // e.g. "1h"
}

export interface SeriesSummary extends SeriesKey {
  count: number;
  first?: number;
  last?: number;
}

export interface TickerInfo {
  symbol: string;
  last?: number;
  percentage?: number; // 24h change in percent
  quoteVolume?: number;
  baseVolume?: number;
}

export interface AccountBalances {
  total: Record<string, number>;
  free: Record<string, number>;
}

export interface TradeBalance {
  equity: number; // whole portfolio valued in the quote currency
  freeMargin: number; // free quote currency cash
}

export interface PortfolioSnapshot {
  timestamp: string; // ISO
  exchange: string;
  quoteCurrency: string;
  balances: Record<string, number>;
  tradeBalance: TradeBalance;
  tickers: Record<string, TickerInfo>;
}

/**
 * Market data surface the candle sync needs from an exchange.
 */
export interface CandleSource {
  readonly id: string;
  milliseconds(): number;
  fetchCandles(
    pair: string,
    timeframe: string,
    since: number,
    limit: number
  ): Promise<OHLC[]>;
}

export interface TickerSource {
  fetchTickers(symbols?: string[]): Promise<Record<string, TickerInfo>>;
}

export interface BalanceSource {
  readonly id: string;
  fetchBalances(): Promise<AccountBalances>;
}
