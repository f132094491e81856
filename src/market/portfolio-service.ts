import * as fs from "fs";
import type { PortfolioConfig } from "../config/config";
import type {
  AccountBalances,
  BalanceSource,
  PortfolioSnapshot,
  TickerInfo,
  TickerSource,
} from "../types";
import { ExchangeError, StorageError, errorMessage } from "../utils/errors";
import { logger } from "../utils/logger";
import { type Sleep, sleep as defaultSleep } from "../utils/time";

export type PortfolioExchange = BalanceSource & TickerSource;

/**
 * Collects balances and current prices into a PortfolioSnapshot.
 */
export class PortfolioService {
  private readonly sleep: Sleep;
  private readonly now: () => Date;

  constructor(
    private readonly exchange: PortfolioExchange,
    private readonly settings: PortfolioConfig,
    deps: { sleep?: Sleep; now?: () => Date } = {}
  ) {
    this.sleep = deps.sleep ?? defaultSleep;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Assets worth asking a price for: held above the minimum and not fiat.
   */
  public heldAssets(balances: Record<string, number>): string[] {
    return Object.entries(balances)
      .filter(([asset, amount]) => {
        if (amount <= this.settings.minAssetAmount) return false;
        return !this.settings.fiatAssets.includes(asset.toUpperCase());
      })
      .map(([asset]) => asset);
  }

  /**
   * Fetches tickers in batches with a pause after each one. A failed batch
   * is skipped; its assets simply carry no price.
   */
  public async fetchTickers(pairs: string[]): Promise<Record<string, TickerInfo>> {
    const tickers: Record<string, TickerInfo> = {};
    const batchSize = this.settings.tickerBatchSize;

    for (let i = 0; i < pairs.length; i += batchSize) {
      const batch = pairs.slice(i, i + batchSize);
      try {
        Object.assign(tickers, await this.exchange.fetchTickers(batch));
      } catch (error) {
        logger.warn(
          `[Portfolio] Ticker request for ${batch.join(",")} failed: ${errorMessage(error)}`
        );
      }
      await this.sleep(this.settings.rateLimitMs);
    }

    return tickers;
  }

  public async fetchPortfolio(): Promise<PortfolioSnapshot> {
    const quote = this.settings.quoteCurrency;

    let balances: AccountBalances;
    try {
      balances = await this.exchange.fetchBalances();
    } catch (error) {
      throw new ExchangeError(
        `Fetching portfolio from ${this.exchange.id} failed: ${errorMessage(error)}`,
        { cause: error }
      );
    }
    await this.sleep(this.settings.rateLimitMs);

    const assets = this.heldAssets(balances.total);
    const pairs = assets.map(asset => `${asset}/${quote}`);
    logger.info(`[Portfolio] ${assets.length} priced assets held on ${this.exchange.id}`);

    const tickers = await this.fetchTickers(pairs);

    // Equity is everything valued in the quote currency; unpriced assets count as 0
    let equity = balances.total[quote] ?? 0;
    for (const asset of assets) {
      const last = tickers[`${asset}/${quote}`]?.last;
      if (last !== undefined) equity += balances.total[asset] * last;
    }

    return {
      timestamp: this.now().toISOString(),
      exchange: this.exchange.id,
      quoteCurrency: quote,
      balances: balances.total,
      tradeBalance: {
        equity,
        freeMargin: balances.free[quote] ?? 0,
      },
      tickers,
    };
  }

  public savePortfolio(snapshot: PortfolioSnapshot, filePath: string): void {
    try {
      fs.writeFileSync(filePath, JSON.stringify(snapshot, null, 2), "utf-8");
      logger.info(`[Portfolio] Portfolio data saved: ${filePath}`);
    } catch (error) {
      throw new StorageError(`Could not save portfolio to ${filePath}`, {
        cause: error,
      });
    }
  }
}
