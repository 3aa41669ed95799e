import type { CollectionOrchestrator } from "../collections/orchestrator";
import type { SqliteDb } from "../db/db";
import {
  allowedPreferenceValues,
  getPreferences,
  getPreferenceValue,
  isPreferenceKey,
  setPreferenceValue
} from "../db/preferencesRepo";
import type { EntityCache } from "../entities/cache";
import type { BotEvents } from "../events";
import { logger, type Log } from "../logger";
import {
  escapeHtml,
  isAddressedTo,
  parseCommands,
  parseStickerSetName,
  renderCommandHelp,
  renderHelpText,
  renderStartText,
  type ParsedCommand
} from "./commands";
import type { Messenger } from "./messenger";

export const SHUTDOWN_NOTICE = "Bot is shutting down - command ignored.";

const SET_KEY_VALUE = /^([a-zA-Z_]+) +([^ ].*)$/;

type CommandContext = {
  chatId: number;
  userId: number;
  messageId: number;
  firstName: string;
};

export type CommandRouterOptions = {
  cache: EntityCache;
  db: SqliteDb;
  orchestrator: CollectionOrchestrator;
  messenger: Messenger;
  events: BotEvents;
  botName: string;
  adminUserIds: number[];
  log?: Log;
};

export class CommandRouter {
  private readonly options: CommandRouterOptions;
  private readonly log: Log;
  /** `${chatId}:${userId}` of users whose next message should carry a sticker. */
  private readonly awaitingSticker = new Set<string>();
  private readonly unsubscribe: () => void;

  constructor(options: CommandRouterOptions) {
    this.options = options;
    this.log = options.log ?? logger;
    this.unsubscribe = options.events.on("messageReceived", ({ chatId, messageId }) => {
      this.handleMessage(chatId, messageId).catch((err) => {
        this.log.error({ err, chatId, messageId }, "Message handling failed");
      });
    });
  }

  dispose() {
    this.unsubscribe();
  }

  async handleMessage(chatId: number, messageId: number): Promise<void> {
    const { cache, db } = this.options;
    const message = cache.get("message", String(messageId));
    if (!message?.from_id) return;

    const sender = cache.get("user", message.from_id);
    if (sender?.is_bot === "true") return;

    const ctx: CommandContext = {
      chatId,
      userId: Number(message.from_id),
      messageId,
      firstName: escapeHtml(sender?.first_name ?? "there")
    };

    const key = `${chatId}:${ctx.userId}`;
    const expectingSticker = this.awaitingSticker.delete(key);
    if (message.sticker_id && (expectingSticker || getPreferenceValue(db, ctx.userId, "greedy") === "yes")) {
      await this.requestFromSticker(message.sticker_id, ctx);
      return;
    }

    const commands = parseCommands(message.text ?? "").filter((c) => isAddressedTo(c, this.options.botName));
    if (expectingSticker && commands.length === 0) {
      await this.reply(ctx, "Could not find a sticker in the forwarded message.");
      return;
    }

    for (const command of commands) {
      await this.dispatch(command, ctx);
    }
  }

  private async dispatch(command: ParsedCommand, ctx: CommandContext) {
    this.log.info({ command: command.command, userId: ctx.userId, chatId: ctx.chatId }, "Command received");

    if (this.options.orchestrator.isShuttingDown()) {
      await this.reply(ctx, SHUTDOWN_NOTICE);
      return;
    }

    switch (command.command) {
      case "help":
        await this.reply(
          ctx,
          command.parameters ? renderCommandHelp(command.parameters, ctx.firstName) : renderHelpText(ctx.firstName)
        );
        return;
      case "start":
        await this.reply(ctx, renderStartText(ctx.firstName));
        return;
      case "set":
        await this.handleSet(command.parameters, ctx);
        return;
      case "stickerset":
        await this.handleStickerSet(command.parameters, ctx, false);
        return;
      case "refresh":
        if (!this.options.adminUserIds.includes(ctx.userId)) {
          await this.reply(ctx, "Only administrators can use /refresh.");
          return;
        }
        await this.handleStickerSet(command.parameters, ctx, true);
        return;
      default:
        await this.reply(
          ctx,
          `Unknown command /${escapeHtml(command.command)}.\nUse /help to get a list of available commands.`
        );
    }
  }

  private async handleStickerSet(parameters: string, ctx: CommandContext, refresh: boolean) {
    if (!parameters && !refresh) {
      this.awaitingSticker.add(`${ctx.chatId}:${ctx.userId}`);
      return;
    }

    const name = parseStickerSetName(parameters);
    if (!name) {
      await this.reply(ctx, `Could not identify the sticker set name from "${escapeHtml(parameters)}".`);
      return;
    }
    await this.requestCollection(name, ctx, refresh);
  }

  private async requestFromSticker(stickerId: string, ctx: CommandContext) {
    const sticker = this.options.cache.get("file", stickerId);
    if (!sticker?.set_name) {
      await this.reply(ctx, "Could not find a sticker set for the forwarded sticker.");
      return;
    }
    await this.requestCollection(sticker.set_name, ctx, false);
  }

  private async requestCollection(name: string, ctx: CommandContext, refresh: boolean) {
    const outcome = this.options.orchestrator.request(name, { userId: ctx.userId, chatId: ctx.chatId }, { refresh });
    if (outcome === "coalesced") {
      await this.reply(ctx, `Sticker set ${name} is already in the process of being downloaded.`);
    } else if (outcome === "rejected") {
      await this.reply(ctx, SHUTDOWN_NOTICE);
    }
  }

  private async handleSet(parameters: string, ctx: CommandContext) {
    const { db } = this.options;

    if (!parameters) {
      const lines = Object.entries(getPreferences(db, ctx.userId))
        .sort(([a], [b]) => a.localeCompare(b))
        .map(([key, value]) => `${key}: ${value}`);
      await this.reply(ctx, ["Preferences:", ...lines].join("\n"));
      return;
    }

    const match = SET_KEY_VALUE.exec(parameters);
    if (!match) {
      await this.reply(ctx, `"${escapeHtml(parameters)}" has an unexpected format.`);
      return;
    }

    const [, key, value] = match;
    if (!isPreferenceKey(key)) {
      await this.reply(ctx, `"${escapeHtml(key)}" has not been handled.`);
      return;
    }

    const allowed = allowedPreferenceValues(key);
    if (!allowed.includes(value)) {
      const options = allowed.map((v) => `"${v}"`).join(", ");
      await this.reply(ctx, `${key} should have one of the following values: ${options}.`);
      return;
    }

    setPreferenceValue(db, ctx.userId, key, value);
    await this.reply(ctx, `${key} set to "${value}".`);
  }

  private async reply(ctx: CommandContext, text: string) {
    await this.options.messenger.sendText(ctx.chatId, text, { replyToMessageId: ctx.messageId });
  }
}
