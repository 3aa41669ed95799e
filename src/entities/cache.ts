import type { EntityStore } from "../db/entityStore";
import { logger } from "../logger";
import { ENTITY_KINDS, type CollectionRecord, type EntityKind, type EntityRecord } from "./types";

function nextAfterMax(ids: Iterable<string>): number | null {
  let max: number | null = null;
  for (const id of ids) {
    const n = Number(id);
    if (!Number.isSafeInteger(n)) continue;
    if (max === null || n > max) max = n;
  }
  return max === null ? null : max + 1;
}

/**
 * In-memory view of every normalized entity. The cache is the source of truth
 * for the running process; the store only matters across restarts.
 */
export class EntityCache {
  private readonly records = new Map<EntityKind, Map<string, EntityRecord>>();
  private readonly collections = new Map<string, CollectionRecord>();
  private readonly activeChats = new Set<string>();

  nextButtonListId = 0;
  nextButtonId = 0;

  constructor() {
    for (const kind of ENTITY_KINDS) {
      this.records.set(kind, new Map());
    }
  }

  /** Rebuilds the cache from the store and recomputes the id counters. */
  static load(store: EntityStore): EntityCache {
    const cache = new EntityCache();
    for (const kind of ENTITY_KINDS) {
      const table = cache.table(kind);
      for (const record of store.loadAll(kind)) {
        if (!record.id) continue;
        table.set(record.id, record);
      }
    }
    for (const collection of store.loadCollections()) {
      cache.collections.set(collection.name, collection);
    }

    cache.nextButtonListId = nextAfterMax(cache.table("button_list").keys()) ?? 0;
    cache.nextButtonId = nextAfterMax(cache.table("button").keys()) ?? 0;

    logger.info(
      {
        updates: cache.size("update"),
        messages: cache.size("message"),
        files: cache.size("file"),
        collections: cache.collections.size
      },
      "Entity cache loaded"
    );
    return cache;
  }

  private table(kind: EntityKind): Map<string, EntityRecord> {
    const table = this.records.get(kind);
    if (!table) throw new Error(`Unknown entity kind: ${kind}`);
    return table;
  }

  has(kind: EntityKind, id: string): boolean {
    return this.table(kind).has(id);
  }

  get(kind: EntityKind, id: string): EntityRecord | null {
    return this.table(kind).get(id) ?? null;
  }

  set(kind: EntityKind, record: EntityRecord) {
    this.table(kind).set(record.id, record);
  }

  size(kind: EntityKind): number {
    return this.table(kind).size;
  }

  /** One past the highest update id seen, or null before the first update. */
  computeOffset(): number | null {
    return nextAfterMax(this.table("update").keys());
  }

  hasCollection(name: string): boolean {
    return this.collections.has(name);
  }

  getCollection(name: string): CollectionRecord | null {
    return this.collections.get(name) ?? null;
  }

  collectionNames(): string[] {
    return [...this.collections.keys()];
  }

  setCollection(collection: CollectionRecord) {
    this.collections.set(collection.name, collection);
  }

  removeCollection(name: string): boolean {
    return this.collections.delete(name);
  }

  markChatActive(chatId: string) {
    this.activeChats.add(chatId);
  }

  getActiveChats(): string[] {
    return [...this.activeChats];
  }
}
