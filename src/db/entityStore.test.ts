import { afterEach, describe, expect, it } from "vitest";

import { applySchema, openSqlite, type SqliteDb } from "./db";
import { createSqliteEntityStore } from "./entityStore";
import { SCHEMA_SQL } from "./schema";

describe("sqlite entity store", () => {
  let db: SqliteDb | null = null;

  function open() {
    db = openSqlite(":memory:");
    applySchema(db, SCHEMA_SQL);
    return { db, store: createSqliteEntityStore(db) };
  }

  afterEach(() => {
    db?.close();
    db = null;
  });

  it("round-trips records per kind", () => {
    const { store } = open();

    store.save("user", { id: "42", first_name: "Ada", is_bot: "false" });
    store.save("file", { id: "AgADf1", file_id: "AgADf1", width: "512" });

    expect(store.loadAll("user")).toEqual([{ id: "42", first_name: "Ada", is_bot: "false" }]);
    expect(store.loadAll("file")).toEqual([{ id: "AgADf1", file_id: "AgADf1", width: "512" }]);
    expect(store.loadAll("chat")).toEqual([]);
  });

  it("replaces a record as a whole", () => {
    const { store, db } = open();

    store.save("file", { id: "f1", file_id: "f1", width: "512" });
    store.save("file", { id: "f1", file_id: "f1", width: "512", file_size: "10" });

    expect(store.loadAll("file")).toEqual([{ id: "f1", file_id: "f1", width: "512", file_size: "10" }]);
    const rows = db.prepare("SELECT COUNT(*) AS n FROM file_info WHERE id = ?").get("f1") as { n: number };
    expect(rows.n).toBe(4);
  });

  it("rejects records without an id or with a non-integer id", () => {
    const { store } = open();

    expect(() => store.save("user", { first_name: "Ghost" })).toThrow("Cannot save user record without an id");
    expect(() => store.save("message", { id: "abc" })).toThrow("Entity message has a non-integer id: abc");
  });

  it("keeps the member order of sticker sets", () => {
    const { store } = open();

    store.saveCollection({ name: "cats", info: { id: "cats", title: "Cats" }, fileIds: ["c3", "c1", "c2"] });

    expect(store.loadCollections()).toEqual([
      { name: "cats", info: { id: "cats", title: "Cats" }, fileIds: ["c3", "c1", "c2"] }
    ]);
  });

  it("removes a sticker set's metadata and member list together", () => {
    const { store } = open();
    store.saveCollection({ name: "cats", info: { id: "cats" }, fileIds: ["c1"] });
    store.saveCollection({ name: "dogs", info: { id: "dogs" }, fileIds: ["d1"] });

    store.removeCollection("cats");

    expect(store.loadCollections().map((c) => c.name)).toEqual(["dogs"]);
  });
});
