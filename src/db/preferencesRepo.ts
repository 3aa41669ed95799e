import type { SqliteDb } from "./db";

export const DEFAULT_PREFERENCES = {
  greedy: "no",
  provide_sticker_set: "always",
  silent: "no"
} as const;

export type PreferenceKey = keyof typeof DEFAULT_PREFERENCES;
export type Preferences = Record<PreferenceKey, string>;

const ALLOWED_VALUES: Record<PreferenceKey, readonly string[]> = {
  greedy: ["yes", "no"],
  provide_sticker_set: ["never", "once", "always"],
  silent: ["yes", "no"]
};

type PreferenceRow = { key: string; value: string };

export function isPreferenceKey(key: string): key is PreferenceKey {
  return Object.prototype.hasOwnProperty.call(DEFAULT_PREFERENCES, key);
}

export function allowedPreferenceValues(key: PreferenceKey): readonly string[] {
  return ALLOWED_VALUES[key];
}

/** Defaults overlaid with whatever the user has set. */
export function getPreferences(db: SqliteDb, userId: number): Preferences {
  const prefs: Preferences = { ...DEFAULT_PREFERENCES };
  const rows = db.prepare("SELECT key, value FROM preferences WHERE user_id = ?").all(userId) as PreferenceRow[];
  for (const row of rows) {
    if (isPreferenceKey(row.key)) {
      prefs[row.key] = row.value;
    }
  }
  return prefs;
}

export function getPreferenceValue(db: SqliteDb, userId: number, key: PreferenceKey): string {
  return getPreferences(db, userId)[key];
}

export function setPreferenceValue(db: SqliteDb, userId: number, key: string, value: string) {
  if (!isPreferenceKey(key)) {
    throw new Error(`Unknown preference "${key}"`);
  }
  if (!ALLOWED_VALUES[key].includes(value)) {
    throw new Error(`Preference "${key}" must be one of: ${ALLOWED_VALUES[key].join(", ")}`);
  }
  db.prepare(
    [
      "INSERT INTO preferences (user_id, key, value)",
      "VALUES (?, ?, ?)",
      "ON CONFLICT(user_id, key) DO UPDATE SET value = excluded.value"
    ].join(" ")
  ).run(userId, key, value);
}
