import type { SqliteDb } from "./db";
import { ENTITY_KINDS } from "../entities/types";
import { COLLECTION_TABLE, entityTableName } from "./schema";

type Migration = {
  id: string;
  run: (db: SqliteDb) => void;
};

type MigrationRow = { id: string };

function ensureMigrationsTable(db: SqliteDb) {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id TEXT PRIMARY KEY,
      applied_at INTEGER NOT NULL
    );
  `);
}

const MIGRATIONS: Migration[] = [
  {
    id: "20250501_001_entity_id_indexes",
    run: (db) => {
      for (const kind of ENTITY_KINDS) {
        const table = entityTableName(kind);
        db.exec(`CREATE INDEX IF NOT EXISTS idx_${table}_id ON ${table} (id);`);
      }
    }
  },
  {
    id: "20250501_002_sticker_set_order_index",
    run: (db) => {
      db.exec(`CREATE INDEX IF NOT EXISTS idx_${COLLECTION_TABLE}_id_sequence ON ${COLLECTION_TABLE} (id, sequence);`);
    }
  }
];

function assertUniqueMigrationIds(migrations: Migration[]) {
  const seen = new Set<string>();
  for (const migration of migrations) {
    if (seen.has(migration.id)) {
      throw new Error(`Duplicate migration id: ${migration.id}`);
    }
    seen.add(migration.id);
  }
}

export function applyDbMigrations(db: SqliteDb): { applied: string[]; total: number } {
  assertUniqueMigrationIds(MIGRATIONS);
  ensureMigrationsTable(db);

  const appliedRows = db.prepare("SELECT id FROM schema_migrations").all() as MigrationRow[];
  const appliedIds = new Set(appliedRows.map((row) => row.id));
  const insertApplied = db.prepare("INSERT INTO schema_migrations (id, applied_at) VALUES (?, ?)");

  const newlyApplied: string[] = [];
  const txn = db.transaction(() => {
    for (const migration of MIGRATIONS) {
      if (appliedIds.has(migration.id)) continue;
      migration.run(db);
      insertApplied.run(migration.id, Date.now());
      newlyApplied.push(migration.id);
      appliedIds.add(migration.id);
    }
  });

  txn();
  return { applied: newlyApplied, total: MIGRATIONS.length };
}
