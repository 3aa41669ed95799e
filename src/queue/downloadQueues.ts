import type { FileStore } from "../content/fileStore";
import type { EntityCache } from "../entities/cache";
import { NormalizationError, type EntityNormalizer } from "../entities/normalizer";
import type { BotEvents, CollectionFailureReason } from "../events";
import type { Log } from "../logger";
import type { BotApi } from "../telegram/botApi";
import type { ApiFailure } from "../telegram/errors";
import { RateLimitedQueue } from "./rateLimitedQueue";

type QueueDeps = {
  api: BotApi;
  normalizer: EntityNormalizer;
  events: BotEvents;
  intervalMs: number;
  maxAttempts: number;
  log?: Log;
};

function readFilePath(raw: unknown): string | null {
  if (typeof raw !== "object" || raw === null || !("file_path" in raw)) return null;
  const value: unknown = raw.file_path;
  return typeof value === "string" && value.length > 0 ? value : null;
}

/** getFile → merge the file record → fetch bytes → store under the file id. */
export function createFileQueue(deps: QueueDeps & { fileStore: FileStore }): RateLimitedQueue {
  const { api, normalizer, events, fileStore } = deps;

  return new RateLimitedQueue({
    name: "files",
    intervalMs: deps.intervalMs,
    maxAttempts: deps.maxAttempts,
    log: deps.log,
    isResident: (fileId) => fileStore.has(fileId),
    announceResident: (fileId) => events.emit("fileDownloaded", { fileId }),
    fetch: async (fileId) => {
      const raw = await api.getFile(fileId);
      const filePath = readFilePath(raw);
      normalizer.parseFile(raw);
      if (!filePath) {
        throw new NormalizationError("file", `getFile for ${fileId} returned no file_path`);
      }
      const bytes = await api.downloadFile(filePath);
      await fileStore.write(fileId, bytes);
      events.emit("fileDownloaded", { fileId });
    },
    onFailed: (fileId) => events.emit("fileFailed", { fileId })
  });
}

export function collectionFailureReason(failure: ApiFailure): CollectionFailureReason {
  if (failure.kind === "transport") return "unavailable";
  return failure.condition === "collection_invalid" ? "unknown_collection" : "rejected";
}

/** getStickerSet → normalize; the normalizer announces the arrival. */
export function createCollectionQueue(deps: QueueDeps & { cache: EntityCache }): RateLimitedQueue {
  const { api, normalizer, events, cache } = deps;

  return new RateLimitedQueue({
    name: "collections",
    intervalMs: deps.intervalMs,
    maxAttempts: deps.maxAttempts,
    log: deps.log,
    isResident: (name) => cache.hasCollection(name),
    announceResident: (name) => events.emit("collectionArrived", { name }),
    fetch: async (name) => {
      const raw = await api.getCollection(name);
      // Set names are matched case-insensitively remotely; keep the name it was asked for.
      const fragment = typeof raw === "object" && raw !== null && !Array.isArray(raw) ? { ...raw, name } : raw;
      normalizer.parseCollection(fragment);
    },
    onFailed: (name, failure) => events.emit("collectionFailed", { name, reason: collectionFailureReason(failure) })
  });
}
