import type { PortfolioSnapshot } from "../types";

const CURRENCY_SYMBOLS: Record<string, string> = {
  EUR: "€",
  USD: "$",
  GBP: "£",
};

export class ContextBuilder {
  /**
   * Renders a portfolio snapshot as the plain-text block inserted into the
   * analysis prompt. Assets below `minAssetAmount` are left out.
   */
  public static buildPortfolioContext(
    snapshot: PortfolioSnapshot,
    minAssetAmount: number
  ): string {
    const money = this.moneyFormatter(snapshot.quoteCurrency);
    let text = "CURRENT PORTFOLIO:\n\n";

    let assetCount = 0;
    for (const [asset, amount] of Object.entries(snapshot.balances)) {
      if (!Number.isFinite(amount) || amount < minAssetAmount) continue;

      text += `Asset: ${asset}\n`;
      text += `Amount: ${amount.toFixed(8)}\n`;

      const ticker = snapshot.tickers[`${asset}/${snapshot.quoteCurrency}`];
      if (ticker?.last !== undefined) {
        text += `Value: ${money(amount * ticker.last)}\n`;
        text += `Price: ${money(ticker.last)}\n`;
        if (ticker.percentage !== undefined) {
          text += `24h Change: ${ticker.percentage.toFixed(2)}%\n`;
        }
      }
      text += "\n";
      assetCount++;
    }

    if (assetCount === 0) {
      text += "No assets with a sufficient amount found.\n\n";
    }

    text += `TOTAL VALUE: ${money(snapshot.tradeBalance.equity)}\n`;
    text += `AVAILABLE CAPITAL: ${money(snapshot.tradeBalance.freeMargin)}\n`;
    text += `\nAs of: ${snapshot.timestamp}\n`;

    return text;
  }

  /**
   * Inserts the formatted portfolio into the template's {portfolio_data} slot.
   */
  public static fillTemplate(template: string, formattedPortfolio: string): string {
    return template.split("{portfolio_data}").join(formattedPortfolio);
  }

  private static moneyFormatter(currency: string): (value: number) => string {
    const symbol = CURRENCY_SYMBOLS[currency];
    return value =>
      symbol ? `${symbol}${value.toFixed(2)}` : `${value.toFixed(2)} ${currency}`;
  }
}
