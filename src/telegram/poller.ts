import type { EntityNormalizer } from "../entities/normalizer";
import type { EntityRecord } from "../entities/types";
import type { BotEvents } from "../events";
import { logger, type Log } from "../logger";
import type { BotApi } from "./botApi";
import { classifyApiFailure } from "./errors";

export type UpdatePollerOptions = {
  api: BotApi;
  normalizer: EntityNormalizer;
  events: BotEvents;
  intervalMs: number;
  initialOffset: number | null;
  log?: Log;
};

export type PollResult = "skipped" | "failed" | "aborted" | "consumed";

/**
 * Offset-tracked getUpdates loop. A batch is consumed as a whole: if any
 * update in it cannot be parsed the offset stays put and the same batch is
 * fetched again on the next tick.
 */
export class UpdatePoller {
  private readonly api: BotApi;
  private readonly normalizer: EntityNormalizer;
  private readonly events: BotEvents;
  private readonly intervalMs: number;
  private readonly log: Log;
  private offset: number | null;
  private inFlight = false;
  private timer: NodeJS.Timeout | null = null;

  constructor(options: UpdatePollerOptions) {
    this.api = options.api;
    this.normalizer = options.normalizer;
    this.events = options.events;
    this.intervalMs = options.intervalMs;
    this.offset = options.initialOffset;
    this.log = options.log ?? logger;
  }

  getOffset(): number | null {
    return this.offset;
  }

  start() {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.tick().catch((err) => {
        this.log.error({ err }, "Poll tick failed");
      });
    }, this.intervalMs);
    this.log.info({ intervalMs: this.intervalMs, offset: this.offset }, "Polling started");
  }

  stop() {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    this.log.info({ offset: this.offset }, "Polling stopped");
  }

  async tick(): Promise<PollResult> {
    if (this.inFlight) return "skipped";
    this.inFlight = true;
    try {
      let batch: unknown[];
      try {
        batch = await this.api.getUpdates(this.offset);
      } catch (err) {
        const failure = classifyApiFailure(err);
        this.log.warn({ offset: this.offset, failure }, "getUpdates failed; retrying next tick");
        return "failed";
      }
      return this.consume(batch);
    } finally {
      this.inFlight = false;
    }
  }

  private consume(batch: unknown[]): PollResult {
    let next = this.offset;
    const records: EntityRecord[] = [];

    for (const raw of batch) {
      try {
        records.push(this.normalizer.parseUpdate(raw));
      } catch (err) {
        this.log.error({ err, offset: this.offset, parsed: records.length }, "Update batch aborted");
        return "aborted";
      }
    }

    for (const record of records) {
      const candidate = Number(record.id) + 1;
      if (next === null || candidate > next) next = candidate;
    }
    this.offset = next;

    for (const record of records) {
      this.events.emit("updateReceived", {
        updateId: Number(record.id),
        chatId: record.chat_id ? Number(record.chat_id) : null
      });
    }
    if (records.length > 0) {
      this.log.debug({ count: records.length, offset: this.offset }, "Update batch consumed");
    }
    return "consumed";
  }
}
