import OpenAI from "openai";
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
} from "openai/resources/chat/completions";
import fs from "fs";
import path from "path";
import type { LLMConfig } from "../config/config";
import { AnalysisError, errorMessage } from "../utils/errors";
import { logger } from "../utils/logger";
import { ContextBuilder } from "./context-builder";

/**
 * The slice of the OpenAI client the service calls.
 */
export interface ChatCompletionClient {
  chat: {
    completions: {
      create(body: ChatCompletionCreateParamsNonStreaming): Promise<ChatCompletion>;
    };
  };
}

export interface LLMServiceOptions {
  client?: ChatCompletionClient;
  chatLogDir?: string; // where interaction logs go when enabled
}

export class LLMService {
  private client: ChatCompletionClient;
  private model: string;
  private temperature: number;
  private maxTokens: number;
  private logInteractions: boolean;
  private chatLogDir: string;

  constructor(settings: LLMConfig, options: LLMServiceOptions = {}) {
    this.client =
      options.client ??
      new OpenAI({
        baseURL: settings.baseUrl,
        apiKey: settings.apiKey,
        timeout: settings.timeoutMs,
      });
    this.model = settings.model;
    this.temperature = settings.temperature;
    this.maxTokens = settings.maxTokens;
    this.logInteractions = settings.logInteractions;
    this.chatLogDir =
      options.chatLogDir ?? path.resolve(process.cwd(), "output", "chat");
  }

  private logTokenUsage(usage: ChatCompletion["usage"]) {
    if (!usage) return;
    const promptK = (usage.prompt_tokens / 1000).toFixed(3);
    const completionK = (usage.completion_tokens / 1000).toFixed(3);
    const totalK = (usage.total_tokens / 1000).toFixed(3);
    logger.info(
      `[Token usage] prompt: ${promptK}k | completion: ${completionK}k | total: ${totalK}k`
    );
  }

  private async saveInteractionLog(type: string, prompt: string, response: string) {
    if (!this.logInteractions) return;

    try {
      const timestamp = new Date().toISOString().replace(/[:.]/g, "-");
      if (!fs.existsSync(this.chatLogDir)) {
        fs.mkdirSync(this.chatLogDir, { recursive: true });
      }

      const filePath = path.join(this.chatLogDir, `${timestamp}_${type}.md`);
      const content = `# LLM Interaction Log - ${type}
Date: ${new Date().toLocaleString()}
Model: ${this.model}

## Prompt
\`\`\`text
${prompt}
\`\`\`

## Response
\`\`\`text
${response}
\`\`\`
`;

      await fs.promises.writeFile(filePath, content, "utf-8");
      logger.info(`LLM interaction log saved: ${filePath}`);
    } catch (error) {
      logger.error(`Saving LLM interaction log failed: ${errorMessage(error)}`);
    }
  }

  /**
   * Asks the model to analyze the portfolio.
   * @param formattedPortfolio output of ContextBuilder.buildPortfolioContext
   * @param promptTemplate template containing a {portfolio_data} placeholder
   * @returns the model's analysis text
   */
  public async analyzePortfolio(
    formattedPortfolio: string,
    promptTemplate: string
  ): Promise<string> {
    const prompt = ContextBuilder.fillTemplate(promptTemplate, formattedPortfolio);

    logger.info(`[LLM] Sending analysis request with model ${this.model}`);

    let response: ChatCompletion;
    try {
      response = await this.client.chat.completions.create({
        model: this.model,
        messages: [{ role: "user", content: prompt }],
        temperature: this.temperature,
        max_tokens: this.maxTokens,
      });
    } catch (error) {
      logger.error(`[LLM] API request failed: ${errorMessage(error)}`);
      throw new AnalysisError(`LLM API error: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    this.logTokenUsage(response.usage);

    const content = response.choices[0]?.message.content;
    if (!content) {
      throw new AnalysisError("LLM returned an empty response");
    }

    await this.saveInteractionLog("PORTFOLIO_ANALYSIS", prompt, content);

    logger.info("[LLM] Analysis completed");
    return content;
  }

  public async saveAnalysis(analysis: string, filePath: string): Promise<void> {
    try {
      await fs.promises.writeFile(filePath, analysis, "utf-8");
      logger.info(`Analysis saved: ${filePath}`);
    } catch (error) {
      throw new AnalysisError(`Could not save analysis to ${filePath}`, {
        cause: error,
      });
    }
  }
}
