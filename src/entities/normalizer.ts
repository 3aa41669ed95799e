import type { EntityStore } from "../db/entityStore";
import type { BotEvents } from "../events";
import { logger, type Log } from "../logger";
import type { EntityCache } from "./cache";
import type { CollectionRecord, EntityKind, EntityRecord, UpdateSummaryType } from "./types";

export class NormalizationError extends Error {
  constructor(
    readonly entity: string,
    message: string
  ) {
    super(message);
    this.name = "NormalizationError";
  }
}

type Fragment = Record<string, unknown>;

type FieldContext = {
  normalizer: EntityNormalizer;
  record: EntityRecord;
  entity: string;
  key: string;
};

type FieldHandler = (value: unknown, ctx: FieldContext) => void;
type FieldTable = Readonly<Record<string, FieldHandler>>;

function isFragment(value: unknown): value is Fragment {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function asFragment(value: unknown, entity: string): Fragment {
  if (!isFragment(value)) {
    throw new NormalizationError(entity, `Expected ${entity} to be an object`);
  }
  return value;
}

function readIntegerIdentity(fragment: Fragment, key: string, entity: string): string {
  const value = fragment[key];
  if (typeof value === "number" && Number.isSafeInteger(value)) return String(value);
  throw new NormalizationError(entity, `${entity} is missing its identity field "${key}"`);
}

function readTextIdentity(fragment: Fragment, key: string, entity: string): string {
  const value = fragment[key];
  if (typeof value === "string" && value.length > 0) return value;
  throw new NormalizationError(entity, `${entity} is missing its identity field "${key}"`);
}

/** Seconds since epoch → "YYYY-MM-DD HH:mm:ss" (UTC). */
export function formatTimestamp(seconds: number): string {
  return new Date(seconds * 1000).toISOString().slice(0, 19).replace("T", " ");
}

// ---- field handlers ---------------------------------------------------------

const ignored: FieldHandler = () => {};

function text(target?: string): FieldHandler {
  return (value, ctx) => {
    if (typeof value === "string" || typeof value === "number") {
      ctx.record[target ?? ctx.key] = String(value);
      return;
    }
    ctx.normalizer.warnField(ctx, "expected text");
  };
}

function flag(target?: string): FieldHandler {
  return (value, ctx) => {
    if (typeof value === "boolean") {
      ctx.record[target ?? ctx.key] = value ? "true" : "false";
      return;
    }
    ctx.normalizer.warnField(ctx, "expected boolean");
  };
}

function integer(target?: string): FieldHandler {
  return (value, ctx) => {
    if (typeof value === "number" && Number.isFinite(value)) {
      ctx.record[target ?? ctx.key] = String(Math.trunc(value));
      return;
    }
    ctx.normalizer.warnField(ctx, "expected integer");
  };
}

function decimal(target?: string): FieldHandler {
  return (value, ctx) => {
    if (typeof value === "number" && Number.isFinite(value)) {
      ctx.record[target ?? ctx.key] = String(value);
      return;
    }
    ctx.normalizer.warnField(ctx, "expected number");
  };
}

function timestamp(target: string): FieldHandler {
  return (value, ctx) => {
    if (typeof value === "number" && Number.isFinite(value)) {
      ctx.record[target] = formatTimestamp(value);
      return;
    }
    ctx.normalizer.warnField(ctx, "expected unix timestamp");
  };
}

function flags(keys: string[]): Record<string, FieldHandler> {
  const table: Record<string, FieldHandler> = {};
  for (const key of keys) table[key] = flag();
  return table;
}

/** Nested entity: parse it and keep only its id as a foreign key. */
function ref(target: string, parse: (n: EntityNormalizer, raw: unknown) => EntityRecord): FieldHandler {
  return (value, ctx) => {
    ctx.record[target] = parse(ctx.normalizer, value).id;
  };
}

/** Photo size lists are ordered smallest to largest; keep the largest. */
function largestPhoto(target: string): FieldHandler {
  return (value, ctx) => {
    if (!Array.isArray(value) || value.length === 0) {
      throw new NormalizationError(ctx.entity, `"${ctx.key}" did not have a last entry`);
    }
    ctx.record[target] = ctx.normalizer.parseFile(value[value.length - 1]).id;
  };
}

const parseUser = (n: EntityNormalizer, raw: unknown) => n.parseUser(raw);
const parseChat = (n: EntityNormalizer, raw: unknown) => n.parseChat(raw);
const parseFile = (n: EntityNormalizer, raw: unknown) => n.parseFile(raw);
const parseMessage = (n: EntityNormalizer, raw: unknown) => n.parseMessage(raw);

function updatePayload(
  type: UpdateSummaryType,
  idKey: "message_id" | "membership_id",
  parse: (n: EntityNormalizer, raw: unknown) => EntityRecord
): FieldHandler {
  return (value, ctx) => {
    if (ctx.record.type) {
      ctx.normalizer.warnField(ctx, "update already carries a payload");
      return;
    }
    const inner = parse(ctx.normalizer, value);
    ctx.record.type = type;
    ctx.record[idKey] = inner.id;
    if (inner.chat_id) ctx.record.chat_id = inner.chat_id;
  };
}

function memberStatus(prefix: string): FieldHandler {
  return (value, ctx) => {
    const status = ctx.normalizer.parseMemberStatus(value, ctx.key);
    for (const [key, sub] of Object.entries(status)) {
      ctx.record[`${prefix}${key}`] = sub;
    }
  };
}

// ---- per-kind field tables -------------------------------------------------

const UPDATE_FIELDS: FieldTable = {
  update_id: ignored,
  message: updatePayload("message", "message_id", parseMessage),
  edited_message: updatePayload("message", "message_id", parseMessage),
  channel_post: updatePayload("channel post", "message_id", (n, raw) => n.parseChannelPost(raw)),
  edited_channel_post: updatePayload("channel post", "message_id", (n, raw) => n.parseChannelPost(raw)),
  my_chat_member: updatePayload("my_chat_member", "membership_id", (n, raw) => n.parseMembershipChange(raw))
};

const MESSAGE_FIELDS: FieldTable = {
  message_id: integer("id"),
  message_thread_id: integer(),
  from: ref("from_id", parseUser),
  chat: ref("chat_id", parseChat),
  sender_chat: ref("sender_chat_id", parseChat),
  date: timestamp("date_time"),
  edit_date: timestamp("edit_date_time"),
  text: text(),
  caption: text(),
  animation: ref("animation_file_id", parseFile),
  document: ref("document_id", parseFile),
  sticker: ref("sticker_id", parseFile),
  photo: largestPhoto("photo_file_id"),
  new_chat_photo: largestPhoto("new_chat_photo_id"),
  new_chat_member: ref("new_chat_member_id", parseUser),
  new_chat_title: text(),
  forward_date: timestamp("forward_date_time"),
  forward_from: ref("forward_from_id", parseUser),
  forward_from_chat: ref("forward_from_chat_id", parseChat),
  forward_from_message_id: integer(),
  forward_sender_name: text(),
  forward_signature: text(),
  reply_to_message: ref("reply_to_message_id", parseMessage),
  reply_markup: (value, ctx) => {
    const list = ctx.normalizer.parseButtonList(value);
    if (list) ctx.record.button_list_id = list.id;
  },
  entities: ignored,
  caption_entities: ignored,
  forward_origin: ignored,
  link_preview_options: ignored,
  // Redundant with new_chat_member.
  new_chat_members: ignored,
  new_chat_participant: ignored
};

const CHANNEL_POST_FIELDS: FieldTable = {
  message_id: (value, ctx) => {
    integer("id")(value, ctx);
    integer("message_id")(value, ctx);
  },
  chat: ref("chat_id", parseChat),
  sender_chat: ref("sender_chat_id", parseChat),
  date: timestamp("date_time"),
  edit_date: timestamp("edit_date_time"),
  text: text(),
  caption: text(),
  document: ref("document_file_id", parseFile),
  photo: largestPhoto("photo_file_id"),
  media_group_id: text(),
  entities: ignored,
  caption_entities: ignored
};

const USER_FIELDS: FieldTable = {
  id: integer(),
  is_bot: flag(),
  is_premium: flag(),
  first_name: text(),
  last_name: text(),
  username: text(),
  language_code: text()
};

const CHAT_FIELDS: FieldTable = {
  id: integer(),
  type: text(),
  title: text(),
  first_name: text(),
  last_name: text(),
  username: text(),
  is_bot: flag(),
  is_forum: flag(),
  all_members_are_administrators: flag()
};

const MEMBERSHIP_FIELDS: FieldTable = {
  date: timestamp("date_time"),
  chat: ref("chat_id", parseChat),
  from: ref("from_id", parseUser),
  old_chat_member: memberStatus("old_chat_member_"),
  new_chat_member: memberStatus("new_chat_member_")
};

const MEMBER_STATUS_FLAGS = [
  "can_be_edited",
  "can_manage_chat",
  "can_change_info",
  "can_delete_messages",
  "can_invite_users",
  "can_restrict_members",
  "can_pin_messages",
  "can_manage_topics",
  "can_promote_members",
  "can_manage_video_chats",
  "can_manage_voice_chats",
  "can_post_messages",
  "can_edit_messages",
  "can_post_stories",
  "can_edit_stories",
  "can_delete_stories",
  "is_anonymous",
  "is_member"
];

const MEMBER_STATUS_FIELDS: FieldTable = {
  user: ref("user_id", parseUser),
  status: text(),
  custom_title: text(),
  until_date: (value, ctx) => {
    if (value === 0) {
      ctx.record.until_date = "";
      return;
    }
    timestamp("until_date")(value, ctx);
  },
  ...flags(MEMBER_STATUS_FLAGS)
};

const FILE_FIELDS: FieldTable = {
  file_id: (value, ctx) => {
    text("file_id")(value, ctx);
    text("id")(value, ctx);
  },
  file_unique_id: text(),
  file_size: integer(),
  file_name: text(),
  mime_type: text(),
  width: integer(),
  height: integer(),
  duration: decimal(),
  emoji: text(),
  set_name: text(),
  type: text(),
  is_animated: flag(),
  is_video: flag(),
  premium_animation: ref("premium_animation_file_id", parseFile),
  // Transient download location; resolved again on every getFile.
  file_path: ignored,
  thumb: ignored,
  thumbnail: ignored
};

const COLLECTION_FIELDS: FieldTable = {
  name: text("name"),
  title: text(),
  sticker_type: text(),
  contains_masks: flag(),
  is_animated: flag(),
  is_video: flag(),
  thumb: ignored,
  thumbnail: ignored
};

const BUTTON_FIELDS: FieldTable = {
  text: text(),
  callback_data: text(),
  url: text()
};

export type EntityNormalizerOptions = {
  cache: EntityCache;
  store: EntityStore;
  events: BotEvents;
  log?: Log;
};

/**
 * Turns raw API fragments into flat, deduplicated records. Nested objects are
 * parsed recursively and referenced by id. New or changed records are written
 * to the store and announced before the parse returns.
 */
export class EntityNormalizer {
  private readonly cache: EntityCache;
  private readonly store: EntityStore;
  private readonly events: BotEvents;
  private readonly log: Log;

  constructor(options: EntityNormalizerOptions) {
    this.cache = options.cache;
    this.store = options.store;
    this.events = options.events;
    this.log = options.log ?? logger;
  }

  warnField(ctx: FieldContext, reason: string) {
    this.log.warn({ entity: ctx.entity, key: ctx.key, reason }, "Unusable value in fragment [ignored]");
  }

  private applyFields(entity: string, fragment: Fragment, table: FieldTable, record: EntityRecord) {
    for (const [key, value] of Object.entries(fragment)) {
      if (!Object.hasOwn(table, key)) {
        this.log.warn({ entity, key }, "Unknown key in fragment [ignored]");
        continue;
      }
      table[key](value, { normalizer: this, record, entity, key });
    }
  }

  private commit(kind: EntityKind, record: EntityRecord) {
    this.cache.set(kind, record);
    try {
      this.store.save(kind, record);
    } catch (err) {
      this.log.error({ err, kind, id: record.id }, "Failed to persist entity; keeping in-memory copy");
    }
    this.events.emit("entityStored", { kind, id: record.id, record });
  }

  parseUpdate(raw: unknown): EntityRecord {
    const fragment = asFragment(raw, "update");
    const id = readIntegerIdentity(fragment, "update_id", "update");
    const cached = this.cache.get("update", id);
    if (cached) return cached;

    const record: EntityRecord = { id };
    this.applyFields("update", fragment, UPDATE_FIELDS, record);
    this.commit("update", record);
    return record;
  }

  parseMessage(raw: unknown): EntityRecord {
    const fragment = asFragment(raw, "message");
    const id = readIntegerIdentity(fragment, "message_id", "message");
    const cached = this.cache.get("message", id);
    if (cached) return cached;

    const record: EntityRecord = { id };
    this.applyFields("message", fragment, MESSAGE_FIELDS, record);
    this.commit("message", record);

    if (record.chat_id) {
      this.cache.markChatActive(record.chat_id);
      this.events.emit("messageReceived", { chatId: Number(record.chat_id), messageId: Number(id) });
    } else {
      this.log.warn({ messageId: id }, "Message has no chat; not announced");
    }
    return record;
  }

  parseChannelPost(raw: unknown): EntityRecord {
    const fragment = asFragment(raw, "channel_post");
    const id = readIntegerIdentity(fragment, "message_id", "channel_post");
    const cached = this.cache.get("channel_post", id);
    if (cached) return cached;

    const record: EntityRecord = { id };
    this.applyFields("channel_post", fragment, CHANNEL_POST_FIELDS, record);
    this.commit("channel_post", record);

    if (record.chat_id) {
      this.events.emit("channelPostReceived", { chatId: Number(record.chat_id), messageId: Number(id) });
    }
    return record;
  }

  parseUser(raw: unknown): EntityRecord {
    const fragment = asFragment(raw, "user");
    const id = readIntegerIdentity(fragment, "id", "user");
    const cached = this.cache.get("user", id);
    if (cached) return cached;

    const record: EntityRecord = { id };
    this.applyFields("user", fragment, USER_FIELDS, record);
    this.commit("user", record);
    return record;
  }

  parseChat(raw: unknown): EntityRecord {
    const fragment = asFragment(raw, "chat");
    const id = readIntegerIdentity(fragment, "id", "chat");
    const cached = this.cache.get("chat", id);
    if (cached) return cached;

    const record: EntityRecord = { id };
    this.applyFields("chat", fragment, CHAT_FIELDS, record);
    this.commit("chat", record);
    return record;
  }

  /** my_chat_member events have no id of their own; the event timestamp stands in. */
  parseMembershipChange(raw: unknown): EntityRecord {
    const fragment = asFragment(raw, "my_chat_member");
    const id = readIntegerIdentity(fragment, "date", "my_chat_member");
    const cached = this.cache.get("membership_change", id);
    if (cached) return cached;

    const record: EntityRecord = { id };
    this.applyFields("my_chat_member", fragment, MEMBERSHIP_FIELDS, record);
    this.commit("membership_change", record);
    return record;
  }

  /** Old/new status of a membership change; flattened into the parent, never stored alone. */
  parseMemberStatus(raw: unknown, entity: string): EntityRecord {
    const fragment = asFragment(raw, entity);
    const record: EntityRecord = {};
    this.applyFields(entity, fragment, MEMBER_STATUS_FIELDS, record);
    return record;
  }

  /**
   * Files show up in several partial views (sticker set listing, getFile
   * result, message attachment). New attributes are merged in; a value that
   * disagrees with the stored one is logged and the stored value is kept.
   */
  parseFile(raw: unknown): EntityRecord {
    const fragment = asFragment(raw, "file");
    const id = readTextIdentity(fragment, "file_id", "file");

    const incoming: EntityRecord = {};
    this.applyFields("file", fragment, FILE_FIELDS, incoming);
    incoming.id = id;

    const existing = this.cache.get("file", id);
    if (!existing) {
      this.commit("file", incoming);
      return incoming;
    }

    let merged: EntityRecord | null = null;
    for (const [key, value] of Object.entries(incoming)) {
      if (Object.hasOwn(existing, key)) {
        if (existing[key] !== value) {
          this.log.warn(
            { fileId: id, key, stored: existing[key], received: value },
            "File info mismatch; keeping stored value"
          );
        }
        continue;
      }
      merged = merged ?? { ...existing };
      merged[key] = value;
    }

    if (!merged) return existing;
    this.commit("file", merged);
    return merged;
  }

  parseButtonList(raw: unknown): EntityRecord | null {
    const fragment = asFragment(raw, "reply_markup");
    const rows = fragment.inline_keyboard;
    for (const key of Object.keys(fragment)) {
      if (key !== "inline_keyboard") {
        this.log.warn({ entity: "reply_markup", key }, "Unknown key in fragment [ignored]");
      }
    }

    const grid: Fragment[][] = [];
    if (Array.isArray(rows)) {
      for (const row of rows) {
        if (!Array.isArray(row) || row.length === 0 || !row.every(isFragment)) {
          grid.length = 0;
          break;
        }
        grid.push(row);
      }
    }
    if (grid.length === 0) {
      this.log.warn({ entity: "reply_markup" }, "reply_markup has no usable inline_keyboard [ignored]");
      return null;
    }

    const record: EntityRecord = { num_rows: String(grid.length) };
    grid.forEach((row, r) => {
      record[`row_${r}_num_cols`] = String(row.length);
      row.forEach((button, c) => {
        record[`row_${r}_col_${c}_button_id`] = this.parseButton(button).id;
      });
    });
    record.id = String(this.cache.nextButtonListId++);
    this.commit("button_list", record);
    return record;
  }

  private parseButton(fragment: Fragment): EntityRecord {
    const record: EntityRecord = {};
    this.applyFields("button", fragment, BUTTON_FIELDS, record);
    record.id = String(this.cache.nextButtonId++);
    this.commit("button", record);
    return record;
  }

  /**
   * Sticker set metadata. Every member sticker goes through the file merge and
   * the ordered list of their ids is fixed from here on.
   */
  parseCollection(raw: unknown): CollectionRecord {
    const fragment = asFragment(raw, "sticker_set");
    const name = readTextIdentity(fragment, "name", "sticker_set");
    const cached = this.cache.getCollection(name);
    if (cached) return cached;

    const { stickers, ...attributes } = fragment;
    const info: EntityRecord = { id: name };
    this.applyFields("sticker_set", attributes, COLLECTION_FIELDS, info);

    const fileIds: string[] = [];
    if (stickers !== undefined) {
      if (!Array.isArray(stickers)) {
        throw new NormalizationError("sticker_set", `"stickers" of ${name} is not a list`);
      }
      for (const sticker of stickers) {
        fileIds.push(this.parseFile(sticker).id);
      }
    }

    const collection: CollectionRecord = { name, info, fileIds };
    this.cache.setCollection(collection);
    try {
      this.store.saveCollection(collection);
    } catch (err) {
      this.log.error({ err, name }, "Failed to persist sticker set; keeping in-memory copy");
    }
    this.events.emit("collectionArrived", { name });
    return collection;
  }
}
