import fs from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { createServices, type BotServices } from "./context";
import { applySchema, openSqlite, type SqliteDb } from "./db/db";
import { SCHEMA_SQL } from "./db/schema";
import { createShutdown, SHUTDOWN_BROADCAST, waitUntil } from "./lifecycle";
import { createFakeBundler, createRecordingLog, FakeBotApi, loggedMessages, makeTempDir } from "./testing/fakes";

describe("waitUntil", () => {
  it("resolves true as soon as the check passes", async () => {
    let calls = 0;
    await expect(waitUntil(() => ++calls >= 3, 1000, 1)).resolves.toBe(true);
    expect(calls).toBe(3);
  });

  it("gives up after the timeout", async () => {
    await expect(waitUntil(() => false, 20, 5)).resolves.toBe(false);
  });
});

describe("createShutdown", () => {
  let root: string;
  let db: SqliteDb;
  let api: FakeBotApi;
  let services: BotServices;

  beforeEach(async () => {
    root = makeTempDir();
    db = openSqlite(":memory:");
    applySchema(db, SCHEMA_SQL);
    api = new FakeBotApi();
    services = createServices({
      config: {
        BOT_NAME: "courier_bot",
        FILES_DIR: path.join(root, "files"),
        COLLECTIONS_DIR: path.join(root, "collections"),
        POLL_INTERVAL_MS: 5000,
        DOWNLOAD_INTERVAL_MS: 1000,
        DOWNLOAD_MAX_ATTEMPTS: 2,
        ADMIN_TELEGRAM_USER_IDS: []
      },
      db,
      api,
      bundler: createFakeBundler().bundler
    });
    api.batches.push([
      { update_id: 1, message: { message_id: 1, chat: { id: 42, type: "private" }, date: 0, text: "hi" } }
    ]);
    await services.poller.tick();
  });

  afterEach(() => {
    services.stop();
    if (db.open) db.close();
    fs.rmSync(root, { recursive: true, force: true });
  });

  it("warns active chats, refuses new work and exits once idle", async () => {
    const exit = vi.fn();
    const closeServer = vi.fn(async () => undefined);
    const shutdown = createShutdown({ services, graceMs: 1000, closeServer, exit, pollMs: 5, log: createRecordingLog() });

    const first = shutdown("SIGTERM");
    const second = shutdown("SIGINT");
    await first;
    await second;

    expect(api.sentTexts()).toEqual([SHUTDOWN_BROADCAST]);
    expect(services.orchestrator.request("cats", { userId: 1, chatId: 42 })).toBe("rejected");
    expect(closeServer).toHaveBeenCalledTimes(1);
    expect(db.open).toBe(false);
    expect(exit).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledWith(0);
  });

  it("stops waiting for stuck work after the grace period", async () => {
    const exit = vi.fn();
    const log = createRecordingLog();
    services.orchestrator.request("cats", { userId: 1, chatId: 42 });

    await createShutdown({ services, graceMs: 20, exit, pollMs: 5, log })("SIGTERM");

    expect(loggedMessages(log.warn)).toEqual(["Shutting down...", "Grace period elapsed with work still in flight"]);
    expect(exit).toHaveBeenCalledWith(0);
  });
});
