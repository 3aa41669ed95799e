import { logger, type Log } from "../logger";
import { classifyApiFailure, type ApiFailure } from "../telegram/errors";

export type EnqueueResult = "resident" | "queued" | "pending";

export type RateLimitedQueueOptions = {
  name: string;
  intervalMs: number;
  maxAttempts: number;
  /** Already available locally; no request needed. */
  isResident: (id: string) => boolean;
  /** Re-raise the arrival notification for a resident id. */
  announceResident: (id: string) => void;
  /** One request for one id. Resolves once the result is stored and announced. */
  fetch: (id: string) => Promise<void>;
  /** Called once when an id is given up on. */
  onFailed: (id: string, failure: ApiFailure) => void;
  log?: Log;
};

/**
 * FIFO of work ids drained one per tick with at most one request outstanding.
 * The remote side penalizes bursts, so pacing lives here and not in callers.
 */
export class RateLimitedQueue {
  readonly name: string;
  private readonly options: RateLimitedQueueOptions;
  private readonly log: Log;
  private readonly pending: string[] = [];
  private readonly attempts = new Map<string, number>();
  private inFlight: string | null = null;
  private timer: NodeJS.Timeout | null = null;

  constructor(options: RateLimitedQueueOptions) {
    this.name = options.name;
    this.options = options;
    this.log = options.log ?? logger;
  }

  enqueue(id: string): EnqueueResult {
    if (this.options.isResident(id)) {
      this.options.announceResident(id);
      return "resident";
    }
    if (this.inFlight === id || this.pending.includes(id)) {
      return "pending";
    }
    this.pending.push(id);
    this.log.debug({ queue: this.name, id, size: this.pending.length }, "Queued");
    return "queued";
  }

  size(): number {
    return this.pending.length + (this.inFlight === null ? 0 : 1);
  }

  isIdle(): boolean {
    return this.size() === 0;
  }

  start() {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.tick().catch((err) => {
        this.log.error({ err, queue: this.name }, "Queue tick failed");
      });
    }, this.options.intervalMs);
    this.log.info({ queue: this.name, intervalMs: this.options.intervalMs }, "Queue started");
  }

  stop() {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    this.log.info({ queue: this.name, remaining: this.size() }, "Queue stopped");
  }

  /** Handles at most one id. A tick while a request is outstanding does nothing. */
  async tick(): Promise<void> {
    if (this.inFlight !== null) return;
    const id = this.pending.shift();
    if (id === undefined) return;

    if (this.options.isResident(id)) {
      this.attempts.delete(id);
      this.options.announceResident(id);
      return;
    }

    this.inFlight = id;
    try {
      await this.options.fetch(id);
      this.attempts.delete(id);
    } catch (err) {
      this.handleFailure(id, err);
    } finally {
      this.inFlight = null;
    }
  }

  private handleFailure(id: string, err: unknown) {
    const failure = classifyApiFailure(err);
    const attempt = (this.attempts.get(id) ?? 0) + 1;

    if (failure.kind === "transport" && attempt < this.options.maxAttempts) {
      this.attempts.set(id, attempt);
      this.pending.push(id);
      this.log.warn(
        { queue: this.name, id, attempt, maxAttempts: this.options.maxAttempts, reason: failure.message },
        "Request failed; re-queued"
      );
      return;
    }

    this.attempts.delete(id);
    if (failure.kind === "transport") {
      this.log.error({ queue: this.name, id, attempt, reason: failure.message }, "Request failed; giving up");
    } else {
      this.log.warn(
        { queue: this.name, id, code: failure.code, description: failure.description, condition: failure.condition },
        "Request rejected by API"
      );
    }
    this.options.onFailed(id, failure);
  }
}
