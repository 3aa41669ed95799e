import type { EntityCache } from "../entities/cache";
import type { EntityNormalizer } from "../entities/normalizer";
import { logger, type Log } from "../logger";
import type { BotApi, SendMessageOptions } from "../telegram/botApi";
import { classifyApiFailure } from "../telegram/errors";

export type Messenger = {
  sendText(chatId: number, text: string, options?: SendMessageOptions): Promise<boolean>;
  sendArchive(chatId: number, archivePath: string): Promise<boolean>;
  /** Sends to every chat seen this session; resolves to the number reached. */
  broadcast(text: string): Promise<number>;
};

export function createMessenger(params: {
  api: BotApi;
  cache: EntityCache;
  normalizer: EntityNormalizer;
  log?: Log;
}): Messenger {
  const { api, cache, normalizer } = params;
  const log = params.log ?? logger;

  // Our own messages are cached like any other so replies can reference them.
  const recordSent = (raw: unknown, chatId: number) => {
    cache.markChatActive(String(chatId));
    try {
      normalizer.parseMessage(raw);
    } catch (err) {
      log.warn({ err, chatId }, "Could not record sent message");
    }
  };

  const knownChat = (chatId: number, action: string): boolean => {
    if (cache.has("chat", String(chatId))) return true;
    log.warn({ chatId, action }, "Refusing to send to unknown chat");
    return false;
  };

  const messenger: Messenger = {
    async sendText(chatId, text, options = {}) {
      if (text.trim().length === 0) {
        log.warn({ chatId }, "Refusing to send empty message");
        return false;
      }
      if (!knownChat(chatId, "sendMessage")) return false;
      if (options.replyToMessageId !== undefined && !cache.has("message", String(options.replyToMessageId))) {
        log.warn({ chatId, replyToMessageId: options.replyToMessageId }, "Refusing reply to unknown message");
        return false;
      }

      try {
        recordSent(await api.sendMessage(chatId, text, options), chatId);
        return true;
      } catch (err) {
        log.warn({ chatId, failure: classifyApiFailure(err) }, "sendMessage failed");
        return false;
      }
    },

    async sendArchive(chatId, archivePath) {
      if (!knownChat(chatId, "sendDocument")) return false;
      try {
        recordSent(await api.sendDocument(chatId, archivePath), chatId);
        log.info({ chatId, archivePath }, "Archive uploaded");
        return true;
      } catch (err) {
        log.warn({ chatId, archivePath, failure: classifyApiFailure(err) }, "sendDocument failed");
        return false;
      }
    },

    async broadcast(text) {
      let reached = 0;
      for (const chatId of cache.getActiveChats()) {
        if (await messenger.sendText(Number(chatId), text)) reached += 1;
      }
      return reached;
    }
  };

  return messenger;
}
