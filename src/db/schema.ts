import { ENTITY_KINDS, hasTextIdentity, type EntityKind } from "../entities/types";

const TABLE_NAMES: Record<EntityKind, string> = {
  update: "update_info",
  message: "message_info",
  user: "user_info",
  chat: "chat_info",
  membership_change: "my_chat_member_info",
  file: "file_info",
  button_list: "button_list_info",
  button: "button_info",
  channel_post: "channel_post_info"
};

export const COLLECTION_TABLE = "sticker_set_info";

export function entityTableName(kind: EntityKind): string {
  return TABLE_NAMES[kind];
}

function entityTableSql(kind: EntityKind): string {
  const idType = hasTextIdentity(kind) ? "TEXT" : "INTEGER";
  return `CREATE TABLE IF NOT EXISTS ${entityTableName(kind)} (
  id ${idType} NOT NULL,
  key TEXT NOT NULL,
  value TEXT
);`;
}

// Every entity kind is stored as (id, key, value) triples. Sticker sets carry a
// sequence column so the member list keeps its order: sequence 0 holds the
// metadata attributes, 1..n the member file ids.
export const SCHEMA_SQL = `
${ENTITY_KINDS.map(entityTableSql).join("\n\n")}

CREATE TABLE IF NOT EXISTS ${COLLECTION_TABLE} (
  id TEXT NOT NULL,
  sequence INTEGER NOT NULL,
  key TEXT NOT NULL,
  value TEXT
);

-- Per-user preferences, independent of the entity cache.
CREATE TABLE IF NOT EXISTS preferences (
  user_id INTEGER NOT NULL,
  key TEXT NOT NULL,
  value TEXT NOT NULL,
  PRIMARY KEY (user_id, key)
);
`;
