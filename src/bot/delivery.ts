import type { SqliteDb } from "../db/db";
import { getPreferences } from "../db/preferencesRepo";
import type { BotEventMap, BotEvents } from "../events";
import { logger, type Log } from "../logger";
import { escapeHtml } from "./commands";
import type { Messenger } from "./messenger";

type Settled = BotEventMap["collectionSettled"];
type MetadataReady = BotEventMap["collectionMetadataReady"];

export type CollectionDeliveryOptions = {
  db: SqliteDb;
  events: BotEvents;
  messenger: Messenger;
  log?: Log;
};

/**
 * Tells requesters how their sticker set request went, honouring each
 * user's provide_sticker_set and silent preferences.
 */
export class CollectionDelivery {
  private readonly db: SqliteDb;
  private readonly messenger: Messenger;
  private readonly log: Log;
  private readonly unsubscribers: Array<() => void>;
  /** Set name → users who received its archive this session. */
  private readonly sent = new Map<string, Set<number>>();
  private pending = 0;

  constructor(options: CollectionDeliveryOptions) {
    this.db = options.db;
    this.messenger = options.messenger;
    this.log = options.log ?? logger;

    this.unsubscribers = [
      options.events.on("collectionMetadataReady", (payload) => this.track(this.announceMetadata(payload))),
      options.events.on("collectionSettled", (payload) => this.track(this.deliver(payload)))
    ];
  }

  dispose() {
    for (const unsubscribe of this.unsubscribers) unsubscribe();
  }

  isIdle(): boolean {
    return this.pending === 0;
  }

  private track(work: Promise<void>) {
    this.pending += 1;
    void work
      .catch((err) => {
        this.log.error({ err }, "Delivery failed");
      })
      .finally(() => {
        this.pending -= 1;
      });
  }

  async announceMetadata(payload: MetadataReady): Promise<void> {
    const title = escapeHtml(payload.title.replace(/\n/g, " "));
    for (const requester of payload.requesters) {
      if (getPreferences(this.db, requester.userId).silent === "yes") continue;
      await this.messenger.sendText(requester.chatId, `Sticker set ${title} has ${payload.memberCount} stickers.`);
    }
  }

  async deliver(payload: Settled): Promise<void> {
    const { name, outcome } = payload;

    if (outcome.status === "failed") {
      const text =
        outcome.reason === "unknown_collection"
          ? `Sticker set "${name}" does not exist.`
          : `Sticker set "${name}" could not be downloaded. Please try again later.`;
      for (const requester of payload.requesters) {
        await this.messenger.sendText(requester.chatId, text);
      }
      return;
    }

    let recipients = this.sent.get(name);
    if (!recipients) {
      recipients = new Set();
      this.sent.set(name, recipients);
    }

    for (const requester of payload.requesters) {
      const action = getPreferences(this.db, requester.userId).provide_sticker_set;
      if (action === "never") {
        await this.messenger.sendText(requester.chatId, `Sticker set "${name}" was downloaded.`);
      } else if (action === "once" && recipients.has(requester.userId)) {
        await this.messenger.sendText(requester.chatId, `Sticker set "${name}" has been sent to you before.`);
      } else if (await this.messenger.sendArchive(requester.chatId, outcome.archivePath)) {
        recipients.add(requester.userId);
      }
    }
  }
}
