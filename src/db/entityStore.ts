import type { SqliteDb } from "./db";
import { COLLECTION_TABLE, entityTableName } from "./schema";
import { hasTextIdentity, type CollectionRecord, type EntityKind, type EntityRecord } from "../entities/types";

const MEMBER_KEY = "sticker_file_id";

/**
 * Durable side of the entity cache. Every call is independently atomic: a
 * record is either fully replaced or left as it was.
 */
export interface EntityStore {
  loadAll(kind: EntityKind): EntityRecord[];
  save(kind: EntityKind, record: EntityRecord): void;
  loadCollections(): CollectionRecord[];
  saveCollection(collection: CollectionRecord): void;
  removeCollection(name: string): void;
}

type TripleRow = { id: string | number; key: string; value: string | null };
type SequencedRow = { id: string; sequence: number; key: string; value: string | null };

function bindId(kind: EntityKind, id: string): string | number {
  if (hasTextIdentity(kind)) return id;
  const n = Number(id);
  if (!Number.isSafeInteger(n)) {
    throw new Error(`Entity ${kind} has a non-integer id: ${id}`);
  }
  return n;
}

export function createSqliteEntityStore(db: SqliteDb): EntityStore {
  const replaceRecord = db.transaction((table: string, id: string | number, record: EntityRecord) => {
    db.prepare(`DELETE FROM ${table} WHERE id = ?`).run(id);
    const insert = db.prepare(`INSERT INTO ${table} (id, key, value) VALUES (?, ?, ?)`);
    for (const [key, value] of Object.entries(record)) {
      insert.run(id, key, value);
    }
  });

  const replaceCollection = db.transaction((collection: CollectionRecord) => {
    db.prepare(`DELETE FROM ${COLLECTION_TABLE} WHERE id = ?`).run(collection.name);
    const insert = db.prepare(`INSERT INTO ${COLLECTION_TABLE} (id, sequence, key, value) VALUES (?, ?, ?, ?)`);
    for (const [key, value] of Object.entries(collection.info)) {
      insert.run(collection.name, 0, key, value);
    }
    collection.fileIds.forEach((fileId, index) => {
      insert.run(collection.name, index + 1, MEMBER_KEY, fileId);
    });
  });

  return {
    loadAll(kind) {
      const rows = db.prepare(`SELECT id, key, value FROM ${entityTableName(kind)}`).all() as TripleRow[];
      const byId = new Map<string, EntityRecord>();
      for (const row of rows) {
        const id = String(row.id);
        let record = byId.get(id);
        if (!record) {
          record = {};
          byId.set(id, record);
        }
        record[row.key] = row.value ?? "";
      }
      return [...byId.values()];
    },

    save(kind, record) {
      if (!record.id) {
        throw new Error(`Cannot save ${kind} record without an id`);
      }
      replaceRecord(entityTableName(kind), bindId(kind, record.id), record);
    },

    loadCollections() {
      const rows = db
        .prepare(`SELECT id, sequence, key, value FROM ${COLLECTION_TABLE} ORDER BY id, sequence`)
        .all() as SequencedRow[];
      const byName = new Map<string, CollectionRecord>();
      for (const row of rows) {
        let collection = byName.get(row.id);
        if (!collection) {
          collection = { name: row.id, info: {}, fileIds: [] };
          byName.set(row.id, collection);
        }
        if (row.key === MEMBER_KEY && row.sequence > 0) {
          collection.fileIds.push(row.value ?? "");
        } else {
          collection.info[row.key] = row.value ?? "";
        }
      }
      return [...byName.values()];
    },

    saveCollection(collection) {
      replaceCollection(collection);
    },

    removeCollection(name) {
      // Metadata and member list share the table, so one statement clears both.
      db.prepare(`DELETE FROM ${COLLECTION_TABLE} WHERE id = ?`).run(name);
    }
  };
}
