import { parseArgs } from "util";
import { ConfigLoader } from "../config/config";
import { DataFetcher } from "../cli/data-fetcher";
import { numberOption, positiveIntOption } from "../cli/options";
import { Prompts } from "../cli/prompts";
import { ConsoleTerminal, QuitRequested } from "../cli/terminal";
import { ExchangeManager } from "../market/exchange-manager";
import { OhlcvStore } from "../storage/ohlcv-store";
import { logger } from "../utils/logger";

const BANNER = `
    ╔╦╗╔═╗╔╦╗╔═╗   ╔═╗╔═╗╔╦╗╔═╗╦ ╦╔═╗╦═╗
     ║║╠═╣ ║ ╠═╣───╠╣ ║╣  ║ ║  ╠═╣║╣ ╠╦╝
    ═╩╝╩ ╩ ╩ ╩ ╩   ╚  ╚═╝ ╩ ╚═╝╩ ╩╚═╝╩╚═
`;

async function main() {
  const config = ConfigLoader.getInstance();
  const { values } = parseArgs({
    options: {
      since: { type: "string" },
      limit: { type: "string" },
      "rate-limit": { type: "string" }, // seconds
      csv: { type: "boolean", default: config.fetcher.writeCsv },
    },
  });

  const rateLimitSeconds = numberOption(
    values["rate-limit"],
    config.fetcher.rateLimitMs / 1000,
    "rate-limit"
  );

  const term = new ConsoleTerminal();
  const prompts = new Prompts(term, { color: Boolean(process.stdout.isTTY) });
  const fetcher = new DataFetcher(
    new OhlcvStore(config.paths.ohlcvDir),
    prompts,
    exchangeId => new ExchangeManager(exchangeId),
    {
      exchanges: config.fetcher.exchanges,
      topPairsQuote: config.fetcher.topPairsQuote,
      since: values.since ?? config.fetcher.since,
      limit: positiveIntOption(values.limit, config.fetcher.limit, "limit"),
      rateLimitMs: rateLimitSeconds * 1000,
      retryDelayMs: config.fetcher.retryDelayMs,
      csv: values.csv,
    }
  );

  prompts.say();
  prompts.say(BANNER, "header");

  try {
    await fetcher.run();
  } catch (error) {
    if (!(error instanceof QuitRequested)) throw error;
    prompts.say("Quit.");
  } finally {
    term.close();
  }
}

main().catch(error => {
  logger.error("Data fetcher stopped with an error:", error);
  process.exit(1);
});
