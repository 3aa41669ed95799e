/**
 * Every normalized record is a flat attribute map with string values; numbers,
 * booleans and timestamps are stored in their string form so that all kinds
 * share one persistence layout.
 */
export type EntityRecord = Record<string, string>;

export type EntityKind =
  | "update"
  | "message"
  | "user"
  | "chat"
  | "membership_change"
  | "file"
  | "button_list"
  | "button"
  | "channel_post";

export const ENTITY_KINDS: readonly EntityKind[] = [
  "update",
  "message",
  "user",
  "chat",
  "membership_change",
  "file",
  "button_list",
  "button",
  "channel_post"
];

/** File identities are opaque strings; every other kind is keyed by an integer. */
export function hasTextIdentity(kind: EntityKind): boolean {
  return kind === "file";
}

/** A sticker set: metadata attributes plus its ordered member file ids. */
export type CollectionRecord = {
  name: string;
  info: EntityRecord;
  fileIds: string[];
};

export type UpdateSummaryType = "message" | "channel post" | "my_chat_member";
