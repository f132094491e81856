import axios from "axios";
import * as fs from "fs";
import * as path from "path";
import type { TelegramConfig } from "../config/config";
import { DeliveryError, errorMessage } from "../utils/errors";
import { logger } from "../utils/logger";
import { type Sleep, sleep as defaultSleep } from "../utils/time";
import { splitMessage } from "./message-splitter";

/**
 * The slice of an axios instance the notifier uses.
 */
export interface HttpClient {
  post(
    url: string,
    data: unknown,
    config?: { timeout?: number; validateStatus?: (status: number) => boolean }
  ): Promise<{ status: number; data: unknown }>;
}

export type TelegramSettings = Pick<
  TelegramConfig,
  "botToken" | "chatId" | "maxMessageLength" | "parseMode" | "pauseMs" | "timeoutMs"
>;

export class TelegramNotifier {
  private readonly http: HttpClient;
  private readonly sleep: Sleep;

  constructor(
    private readonly settings: TelegramSettings,
    deps: { http?: HttpClient; sleep?: Sleep } = {}
  ) {
    this.http = deps.http ?? axios.create();
    this.sleep = deps.sleep ?? defaultSleep;
  }

  private get configured(): boolean {
    return Boolean(this.settings.botToken && this.settings.chatId);
  }

  private endpoint(method: string): string {
    return `https://api.telegram.org/bot${this.settings.botToken}/${method}`;
  }

  /**
   * Sends a message, split into parts the Bot API accepts, strictly in order.
   * Returns false instead of throwing on any failure.
   */
  public async sendMessage(message: string): Promise<boolean> {
    if (!this.configured) {
      logger.error("[Telegram] Bot token or chat id missing");
      return false;
    }

    try {
      const parts = splitMessage(message, this.settings.maxMessageLength);
      for (let i = 0; i < parts.length; i++) {
        await this.http.post(
          this.endpoint("sendMessage"),
          {
            chat_id: this.settings.chatId,
            text: parts[i],
            parse_mode: this.settings.parseMode,
          },
          { timeout: this.settings.timeoutMs }
        );

        if (i < parts.length - 1) {
          await this.sleep(this.settings.pauseMs);
        }
      }

      logger.info(`[Telegram] Message sent (${parts.length} part(s))`);
      return true;
    } catch (error) {
      logger.error(`[Telegram] Sending message failed: ${errorMessage(error)}`);
      return false;
    }
  }

  /**
   * Uploads a file as a document. Returns false when the file is missing or
   * the API answers with anything but 200.
   */
  public async sendDocument(filePath: string, caption?: string): Promise<boolean> {
    if (!this.configured) {
      logger.error("[Telegram] Bot token or chat id missing");
      return false;
    }

    if (!fs.existsSync(filePath)) {
      logger.error(`[Telegram] File ${filePath} does not exist`);
      return false;
    }

    try {
      const form = new FormData();
      form.append("chat_id", this.settings.chatId);
      if (caption) form.append("caption", caption);
      form.append(
        "document",
        new Blob([fs.readFileSync(filePath)]),
        path.basename(filePath)
      );

      const response = await this.http.post(this.endpoint("sendDocument"), form, {
        timeout: this.settings.timeoutMs,
        validateStatus: () => true,
      });

      if (response.status !== 200) {
        throw new DeliveryError(
          `API error: ${response.status} - ${JSON.stringify(response.data)}`
        );
      }

      logger.info(`[Telegram] File ${filePath} sent`);
      return true;
    } catch (error) {
      logger.error(`[Telegram] Sending file failed: ${errorMessage(error)}`);
      return false;
    }
  }
}
