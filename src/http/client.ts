import { logger } from "../logger";
import { redactBotToken } from "../telegram/redact";

const RETRYABLE_STATUSES = new Set([408, 429, 500, 502, 503, 504]);
const RETRYABLE_NETWORK_CODES = ["ECONNRESET", "ECONNREFUSED", "ETIMEDOUT", "EAI_AGAIN", "ENOTFOUND"];

export type DownloadOptions = {
  timeoutMs?: number;
  /** Extra in-request attempts on top of the first; the download queue retries on a slower clock. */
  maxRetries?: number;
  retryBaseDelayMs?: number;
  retryMaxDelayMs?: number;
  requestName?: string;
};

/** A raw download that did not produce usable bytes. */
export class DownloadError extends Error {
  constructor(
    message: string,
    readonly status: number | null,
    readonly retryable: boolean
  ) {
    super(message);
    this.name = "DownloadError";
  }
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function backoffDelayMs(attempt: number, base: number, max: number): number {
  return Math.min(max, base * 2 ** (attempt - 1)) + Math.floor(Math.random() * 100);
}

function errorField(err: unknown, field: "name" | "code" | "message"): string | undefined {
  if (!err || typeof err !== "object" || !(field in err)) return undefined;
  const value: unknown = Reflect.get(err, field);
  return typeof value === "string" ? value : undefined;
}

function isRetryableNetworkError(err: unknown): boolean {
  if (errorField(err, "name") === "AbortError") return true;
  if (errorField(err, "message")?.toLowerCase().includes("fetch failed")) return true;
  const code = errorField(err, "code");
  return code !== undefined && RETRYABLE_NETWORK_CODES.includes(code);
}

async function getOnce(url: string, timeoutMs: number): Promise<Response> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(new Error(`Request timed out after ${timeoutMs}ms`)), timeoutMs);
  timeoutId.unref?.();
  try {
    return await fetch(url, { method: "GET", signal: controller.signal });
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * GET a resource and return its body. Network errors and retryable statuses
 * are retried with backoff; what is left becomes a DownloadError whose
 * `retryable` flag tells the caller whether a later attempt may succeed.
 */
export async function downloadBytes(url: string, options: DownloadOptions = {}): Promise<Buffer> {
  const {
    timeoutMs = 30_000,
    maxRetries = 2,
    retryBaseDelayMs = 250,
    retryMaxDelayMs = 2_000,
    requestName = "file_download"
  } = options;
  const path = redactBotToken(url);
  const maxAttempts = maxRetries + 1;

  for (let attempt = 1; ; attempt += 1) {
    let response: Response;
    try {
      response = await getOnce(url, timeoutMs);
    } catch (err) {
      const message = errorField(err, "message") ?? "network error";
      if (attempt >= maxAttempts || !isRetryableNetworkError(err)) {
        throw new DownloadError(`Download failed: ${message}`, null, true);
      }
      const waitMs = backoffDelayMs(attempt, retryBaseDelayMs, retryMaxDelayMs);
      logger.warn({ requestName, path, attempt, maxAttempts, waitMs, errorMessage: message }, "Download retrying after network error");
      await delay(waitMs);
      continue;
    }

    if (!response.ok) {
      const retryable = RETRYABLE_STATUSES.has(response.status);
      await response.body?.cancel();
      if (!retryable || attempt >= maxAttempts) {
        throw new DownloadError(`Download failed with HTTP ${response.status}`, response.status, retryable);
      }
      const waitMs = backoffDelayMs(attempt, retryBaseDelayMs, retryMaxDelayMs);
      logger.warn({ requestName, path, status: response.status, attempt, maxAttempts, waitMs }, "Download retrying after retryable status");
      await delay(waitMs);
      continue;
    }

    const bytes = Buffer.from(await response.arrayBuffer());
    if (bytes.length === 0) {
      throw new DownloadError("Download returned an empty body", response.status, true);
    }
    return bytes;
  }
}
