import { TelegramError } from "telegraf";
import { NormalizationError } from "../entities/normalizer";
import { DownloadError } from "../http/client";

/** Named API conditions the core reacts to. */
export type ApiCondition = "collection_invalid";

export type ApiFailure =
  | { kind: "transport"; message: string }
  | { kind: "protocol"; code: number; description: string; condition: ApiCondition | null };

const CONDITIONS: Record<string, ApiCondition> = {
  "Bad Request: STICKERSET_INVALID": "collection_invalid"
};

/**
 * Transport failures are worth retrying later; protocol failures are the API
 * answering `ok: false` and are not. Flood control (429) and server errors
 * count as transport even when they carry an API envelope.
 */
export function classifyApiFailure(err: unknown): ApiFailure {
  if (err instanceof TelegramError) {
    if (err.code === 429 || err.code >= 500) {
      return { kind: "transport", message: err.description };
    }
    return {
      kind: "protocol",
      code: err.code,
      description: err.description,
      condition: CONDITIONS[err.description] ?? null
    };
  }

  if (err instanceof DownloadError) {
    if (err.retryable) return { kind: "transport", message: err.message };
    return { kind: "protocol", code: err.status ?? 0, description: err.message, condition: null };
  }

  if (err instanceof NormalizationError) {
    // The API answered, but with something we cannot use; asking again will not help.
    return { kind: "protocol", code: 0, description: err.message, condition: null };
  }

  // No API envelope at all: the request never got a usable answer.
  return { kind: "transport", message: err instanceof Error ? err.message : String(err) };
}
