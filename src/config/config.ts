import dotenv from "dotenv";
import fs from "fs";
import toml from "@iarna/toml";
import path from "path";
import { logger } from "../utils/logger";
import { ConfigError } from "../utils/errors";

// Load environment variables immediately
dotenv.config();

export interface ExchangeConfig {
  id: string;
  apiKey: string;
  apiSecret: string;
  apiPassword?: string;
}

export interface LLMConfig {
  apiKey: string;
  baseUrl: string;
  model: string;
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
  logInteractions: boolean;
}

export interface TelegramConfig {
  botToken: string;
  chatId: string;
  maxMessageLength: number;
  parseMode: string;
  pauseMs: number;
  timeoutMs: number;
}

export interface PortfolioConfig {
  quoteCurrency: string;
  fiatAssets: string[];
  minAssetAmount: number;
  tickerBatchSize: number;
  rateLimitMs: number;
}

export interface FetcherConfig {
  exchanges: string[];
  since: string;
  limit: number;
  rateLimitMs: number;
  retryDelayMs: number;
  writeCsv: boolean;
  topPairsQuote: string;
}

export interface PathsConfig {
  baseDir: string;
  dataDir: string;
  portfolioDir: string;
  llmDir: string;
  ohlcvDir: string;
  promptFile: string;
  chatLogDir: string;
}

export interface AppConfig {
  // Environment variables
  exchange: ExchangeConfig;
  llm: LLMConfig;
  telegram: TelegramConfig;

  // config.toml
  portfolio: PortfolioConfig;
  fetcher: FetcherConfig;
  paths: PathsConfig;
}

type Env = Record<string, string | undefined>;
type Section = Record<string, unknown>;

function isSection(value: unknown): value is Section {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(root: Section, key: string): Section {
  const value = root[key];
  return isSection(value) ? value : {};
}

function num(sec: Section, key: string, fallback: number): number {
  const value = sec[key];
  return typeof value === "number" && Number.isFinite(value) ? value : fallback;
}

function positiveInt(sec: Section, key: string, fallback: number): number {
  const value = num(sec, key, fallback);
  if (!Number.isInteger(value) || value <= 0) {
    logger.warn(`Invalid ${key} (${value}) in config.toml, falling back to ${fallback}.`);
    return fallback;
  }
  return value;
}

function str(sec: Section, key: string, fallback: string): string {
  const value = sec[key];
  return typeof value === "string" && value.trim() !== "" ? value : fallback;
}

function bool(sec: Section, key: string, fallback: boolean): boolean {
  const value = sec[key];
  return typeof value === "boolean" ? value : fallback;
}

function strList(sec: Section, key: string, fallback: string[]): string[] {
  const value = sec[key];
  if (!Array.isArray(value)) return fallback;
  return value.filter((v): v is string => typeof v === "string");
}

export class ConfigLoader {
  private static instance: AppConfig | undefined;

  private constructor() {}

  public static getInstance(): AppConfig {
    if (!ConfigLoader.instance) {
      ConfigLoader.instance = ConfigLoader.load(
        path.resolve(process.cwd(), "config.toml"),
        process.env
      );
    }
    return ConfigLoader.instance;
  }

  /**
   * Builds the configuration from a TOML file and an environment map.
   * A missing file falls back to defaults; a malformed one is a ConfigError.
   */
  public static load(configPath: string, env: Env): AppConfig {
    let tomlConfig: Section = {};

    if (fs.existsSync(configPath)) {
      try {
        tomlConfig = toml.parse(fs.readFileSync(configPath, "utf-8"));
      } catch (error) {
        throw new ConfigError(`Could not parse ${configPath}`, { cause: error });
      }
    } else {
      logger.warn(`${configPath} not found, using defaults.`);
    }

    const baseDir = path.dirname(configPath);
    const pathsSection = section(tomlConfig, "paths");
    const portfolio = section(tomlConfig, "portfolio");
    const llm = section(tomlConfig, "llm");
    const telegram = section(tomlConfig, "telegram");
    const fetcher = section(tomlConfig, "fetcher");

    const exchangeId = (env.EXCHANGE_ID || "kraken").toLowerCase();
    const dataDir = path.resolve(baseDir, str(pathsSection, "data_dir", "data"));

    return {
      exchange: {
        id: exchangeId,
        apiKey: env.EXCHANGE_API_KEY || "",
        apiSecret: env.EXCHANGE_API_SECRET || "",
        apiPassword: env.EXCHANGE_API_PASSWORD,
      },
      llm: {
        apiKey: env.OPENAI_API_KEY || "",
        baseUrl: env.OPENAI_BASE_URL || "https://api.openai.com/v1",
        model: env.OPENAI_MODEL || "gpt-4-turbo-preview",
        temperature: num(llm, "temperature", 0.7),
        maxTokens: positiveInt(llm, "max_tokens", 2000),
        timeoutMs: positiveInt(llm, "timeout_ms", 60_000),
        logInteractions: bool(llm, "log_interactions", false),
      },
      telegram: {
        botToken: env.TELEGRAM_BOT_TOKEN || "",
        chatId: env.TELEGRAM_CHAT_ID || "",
        maxMessageLength: positiveInt(telegram, "max_message_length", 4000),
        parseMode: str(telegram, "parse_mode", "Markdown"),
        pauseMs: num(telegram, "pause_ms", 500),
        timeoutMs: positiveInt(telegram, "timeout_ms", 30_000),
      },
      portfolio: {
        quoteCurrency: str(portfolio, "quote_currency", "EUR").toUpperCase(),
        fiatAssets: strList(portfolio, "fiat_assets", ["EUR", "USD"]).map(a =>
          a.toUpperCase()
        ),
        minAssetAmount: num(portfolio, "min_asset_amount", 0.0001),
        tickerBatchSize: positiveInt(portfolio, "ticker_batch_size", 10),
        rateLimitMs: num(portfolio, "rate_limit_ms", 1000),
      },
      fetcher: {
        exchanges: strList(fetcher, "exchanges", ["binance", "kraken"]),
        since: str(fetcher, "since", "2012-01-01T00:00:00Z"),
        limit: positiveInt(fetcher, "limit", 1000),
        rateLimitMs: num(fetcher, "rate_limit_ms", 200),
        retryDelayMs: num(fetcher, "retry_delay_ms", 5000),
        writeCsv: bool(fetcher, "write_csv", false),
        topPairsQuote: str(fetcher, "top_pairs_quote", "EUR").toUpperCase(),
      },
      paths: {
        baseDir,
        dataDir,
        portfolioDir: path.join(dataDir, "portfolio", exchangeId),
        llmDir: path.join(dataDir, "llm"),
        ohlcvDir: path.join(dataDir, "ohlcv"),
        promptFile: path.resolve(
          baseDir,
          str(pathsSection, "prompt_file", "prompt.txt")
        ),
        chatLogDir: path.join(baseDir, "output", "chat"),
      },
    };
  }
}
