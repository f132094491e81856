import { ConfigLoader } from "./config/config";
import { PortfolioAdvisor } from "./advisor";
import { LLMService } from "./llm/llm-service";
import { ExchangeManager } from "./market/exchange-manager";
import { PortfolioService } from "./market/portfolio-service";
import { TelegramNotifier } from "./notification/telegram-notifier";
import { logger } from "./utils/logger";

async function main() {
  logger.info("Starting portfolio advisor...");
  logger.info("--------------------------------");

  try {
    const config = ConfigLoader.getInstance();

    logger.info(`Loaded configuration:`);
    logger.info(`- Exchange: ${config.exchange.id}`);
    logger.info(`- LLM: ${config.llm.model} (${config.llm.baseUrl})`);
    logger.info(`- Quote currency: ${config.portfolio.quoteCurrency}`);
    logger.info("--------------------------------");

    const exchange = new ExchangeManager(config.exchange.id, {
      apiKey: config.exchange.apiKey,
      secret: config.exchange.apiSecret,
      password: config.exchange.apiPassword,
    });

    const advisor = new PortfolioAdvisor(
      config,
      new PortfolioService(exchange, config.portfolio),
      new LLMService(config.llm, { chatLogDir: config.paths.chatLogDir }),
      new TelegramNotifier(config.telegram)
    );

    const summary = await advisor.run();
    logger.info(`Portfolio: ${summary.portfolioFile}`);
    logger.info(`Analysis: ${summary.analysisFile}`);
  } catch (error) {
    logger.error("Fatal error in advisor run:", error);
    process.exit(1);
  }
}

void main();
