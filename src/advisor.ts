import * as fs from "fs";
import * as path from "path";
import type { AppConfig } from "./config/config";
import { ContextBuilder } from "./llm/context-builder";
import type { LLMService } from "./llm/llm-service";
import type { PortfolioService } from "./market/portfolio-service";
import type { TelegramNotifier } from "./notification/telegram-notifier";
import { ConfigError } from "./utils/errors";
import { logger } from "./utils/logger";
import { formatFileStamp } from "./utils/time";

export interface AdvisorRunSummary {
  portfolioFile: string;
  analysisFile: string;
  delivered: boolean;
}

/**
 * Names of the settings that must be present for a full advisor run.
 */
export function missingSettings(config: AppConfig): string[] {
  const required: [string, string][] = [
    ["OPENAI_API_KEY", config.llm.apiKey],
    ["EXCHANGE_API_KEY", config.exchange.apiKey],
    ["EXCHANGE_API_SECRET", config.exchange.apiSecret],
    ["TELEGRAM_BOT_TOKEN", config.telegram.botToken],
    ["TELEGRAM_CHAT_ID", config.telegram.chatId],
  ];
  return required.filter(([, value]) => !value).map(([name]) => name);
}

export function validateEnvironment(config: AppConfig): void {
  const missing = missingSettings(config);
  if (missing.length > 0) {
    throw new ConfigError(`Missing environment variables: ${missing.join(", ")}`);
  }
}

export function setupDirectories(config: AppConfig): void {
  for (const dir of [config.paths.dataDir, config.paths.portfolioDir, config.paths.llmDir]) {
    fs.mkdirSync(dir, { recursive: true });
    logger.debug(`Directory ensured: ${dir}`);
  }
}

/**
 * One advisor run: snapshot the portfolio, have it analyzed and deliver the result.
 */
export class PortfolioAdvisor {
  private readonly now: () => Date;

  constructor(
    private readonly config: AppConfig,
    private readonly portfolio: PortfolioService,
    private readonly llm: LLMService,
    private readonly notifier: TelegramNotifier,
    deps: { now?: () => Date } = {}
  ) {
    this.now = deps.now ?? (() => new Date());
  }

  public async run(): Promise<AdvisorRunSummary> {
    validateEnvironment(this.config);
    setupDirectories(this.config);

    const promptFile = this.config.paths.promptFile;
    if (!fs.existsSync(promptFile)) {
      throw new ConfigError(`Prompt file not found: ${promptFile}`);
    }

    const stamp = formatFileStamp(this.now());

    // 1. Portfolio snapshot
    logger.info(`Fetching portfolio from ${this.config.exchange.id}...`);
    const snapshot = await this.portfolio.fetchPortfolio();
    const portfolioFile = path.join(
      this.config.paths.portfolioDir,
      `portfolio_${stamp}.json`
    );
    this.portfolio.savePortfolio(snapshot, portfolioFile);

    // 2. Analysis
    logger.info("Running portfolio analysis...");
    const promptTemplate = fs.readFileSync(promptFile, "utf-8");
    const formatted = ContextBuilder.buildPortfolioContext(
      snapshot,
      this.config.portfolio.minAssetAmount
    );
    const analysis = await this.llm.analyzePortfolio(formatted, promptTemplate);
    const analysisFile = path.join(this.config.paths.llmDir, `analysis_${stamp}.txt`);
    await this.llm.saveAnalysis(analysis, analysisFile);

    // 3. Delivery
    logger.info("Sending analysis via Telegram...");
    const delivered = await this.notifier.sendMessage(analysis);
    if (!delivered) {
      logger.warn(`Telegram delivery failed; the analysis is kept in ${analysisFile}`);
    }

    logger.info("Advisor run completed");
    return { portfolioFile, analysisFile, delivered };
  }
}
