import path from "node:path";
import { Telegram } from "telegraf";

import { downloadBytes } from "../http/client";

export type BotCommandSpec = {
  command: string;
  description: string;
};

export type SendMessageOptions = {
  replyToMessageId?: number;
};

/**
 * The slice of the Bot API the core needs. Results are handed back as raw
 * fragments; the normalizer owns their interpretation.
 */
export interface BotApi {
  getUpdates(offset: number | null): Promise<unknown[]>;
  getFile(fileId: string): Promise<unknown>;
  downloadFile(filePath: string): Promise<Buffer>;
  getCollection(name: string): Promise<unknown>;
  sendMessage(chatId: number, text: string, options?: SendMessageOptions): Promise<unknown>;
  sendDocument(chatId: number, localPath: string): Promise<unknown>;
  setMyCommands(commands: BotCommandSpec[], scope: "default"): Promise<void>;
}

export function createTelegramBotApi(params: {
  token: string;
  apiRoot: string;
  pollTimeoutSeconds: number;
  downloadTimeoutMs?: number;
}): BotApi {
  const { token, pollTimeoutSeconds, downloadTimeoutMs = 30_000 } = params;
  const apiRoot = params.apiRoot.replace(/\/+$/, "");
  const telegram = new Telegram(token, { apiRoot });

  return {
    async getUpdates(offset) {
      // 0 lets the server pick the oldest unconfirmed update.
      return telegram.getUpdates(pollTimeoutSeconds, 100, offset ?? 0, undefined);
    },

    async getFile(fileId) {
      return telegram.getFile(fileId);
    },

    async downloadFile(filePath) {
      return downloadBytes(`${apiRoot}/file/bot${token}/${filePath}`, {
        requestName: "telegram_file_download",
        timeoutMs: downloadTimeoutMs,
        // Retries go back through the paced file queue.
        maxRetries: 0
      });
    },

    async getCollection(name) {
      return telegram.getStickerSet(name);
    },

    async sendMessage(chatId, text, options = {}) {
      return telegram.sendMessage(chatId, text, {
        parse_mode: "HTML",
        ...(options.replyToMessageId !== undefined
          ? { reply_parameters: { message_id: options.replyToMessageId } }
          : {})
      });
    },

    async sendDocument(chatId, localPath) {
      return telegram.sendDocument(chatId, { source: localPath, filename: path.basename(localPath) });
    },

    async setMyCommands(commands, scope) {
      await telegram.setMyCommands(commands, { scope: { type: scope } });
    }
  };
}
