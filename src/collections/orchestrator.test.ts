import fs from "node:fs";
import path from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";

import { createDiskFileStore } from "../content/fileStore";
import { EntityCache } from "../entities/cache";
import { EntityNormalizer } from "../entities/normalizer";
import { BotEvents, type BotEventMap } from "../events";
import { createCollectionQueue, createFileQueue } from "../queue/downloadQueues";
import {
  apiError,
  createFakeBundler,
  createRecordingLog,
  FakeBotApi,
  makeTempDir,
  MemoryEntityStore
} from "../testing/fakes";
import { CollectionOrchestrator } from "./orchestrator";

const ALICE = { userId: 1, chatId: 101 };
const BOB = { userId: 2, chatId: 102 };

const tempDirs: string[] = [];

function setup() {
  const root = makeTempDir();
  tempDirs.push(root);
  const api = new FakeBotApi();
  const store = new MemoryEntityStore();
  const cache = new EntityCache();
  const events = new BotEvents();
  const log = createRecordingLog();
  const normalizer = new EntityNormalizer({ cache, store, events, log });
  const fileStore = createDiskFileStore(path.join(root, "files"));
  const queueDeps = { api, normalizer, events, intervalMs: 1000, maxAttempts: 2, log };
  const fileQueue = createFileQueue({ ...queueDeps, fileStore });
  const collectionQueue = createCollectionQueue({ ...queueDeps, cache });
  const { bundler, calls: bundles } = createFakeBundler();
  const collectionsDir = path.join(root, "collections");

  const orchestrator = new CollectionOrchestrator({
    cache,
    store,
    fileStore,
    events,
    fileQueue,
    collectionQueue,
    collectionsDir,
    bundler,
    log
  });

  const settled: Array<BotEventMap["collectionSettled"]> = [];
  events.on("collectionSettled", (payload) => settled.push(payload));

  async function drain() {
    for (let i = 0; i < 50 && !(fileQueue.isIdle() && collectionQueue.isIdle()); i += 1) {
      await collectionQueue.tick();
      await fileQueue.tick();
    }
  }

  async function settledCount(n: number) {
    await vi.waitFor(() => {
      expect(settled).toHaveLength(n);
    });
  }

  return {
    api,
    cache,
    store,
    events,
    fileStore,
    fileQueue,
    collectionQueue,
    orchestrator,
    bundles,
    collectionsDir,
    settled,
    drain,
    settledCount
  };
}

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

describe("CollectionOrchestrator", () => {
  it("fetches metadata, then every member, then assembles once", async () => {
    const t = setup();
    t.api.addCollection("foo", ["f1", "f2", "f3"]);

    expect(t.orchestrator.request("foo", ALICE)).toBe("started");
    expect(t.orchestrator.isBusy()).toBe(true);
    await t.drain();
    await t.settledCount(1);

    expect(t.api.calls.getCollection).toEqual(["foo"]);
    expect([...t.api.calls.getFile].sort()).toEqual(["f1", "f2", "f3"]);
    expect(t.bundles).toHaveLength(1);
    expect(t.bundles[0].files).toEqual(["Sticker_001.webp", "Sticker_002.webp", "Sticker_003.webp"]);
    expect(t.settled[0]).toEqual({
      name: "foo",
      requesters: [ALICE],
      outcome: { status: "completed", archivePath: path.join(t.collectionsDir, "foo.zip") }
    });
    expect(t.orchestrator.isBusy()).toBe(false);
  });

  it("joins a second request to the running workflow", async () => {
    const t = setup();
    t.api.addCollection("foo", ["f1", "f2", "f3"]);

    t.orchestrator.request("foo", ALICE);
    await t.collectionQueue.tick();
    await t.fileQueue.tick();
    expect(t.orchestrator.snapshot()).toEqual([
      { name: "foo", state: "files_pending", remainingFiles: 2, requesters: 1 }
    ]);

    expect(t.orchestrator.request("foo", BOB)).toBe("coalesced");
    await t.drain();
    await t.settledCount(1);

    expect(t.api.calls.getCollection).toEqual(["foo"]);
    expect(t.api.calls.getFile).toHaveLength(3);
    expect(t.bundles).toHaveLength(1);
    expect(t.settled[0].requesters).toEqual([ALICE, BOB]);
  });

  it("serves many simultaneous requesters with one fetch per item", async () => {
    const t = setup();
    t.api.addCollection("foo", ["f1", "f2"]);
    const requesters = [1, 2, 3, 4, 5].map((n) => ({ userId: n, chatId: 100 + n }));

    const outcomes = requesters.map((r) => t.orchestrator.request("foo", r));
    await t.drain();
    await t.settledCount(1);

    expect(outcomes).toEqual(["started", "coalesced", "coalesced", "coalesced", "coalesced"]);
    expect(t.api.calls.getCollection).toEqual(["foo"]);
    expect([...t.api.calls.getFile].sort()).toEqual(["f1", "f2"]);
    expect(t.settled[0].requesters).toEqual(requesters);
  });

  it("fails every requester of a set that does not exist, without file fetches", async () => {
    const t = setup();

    t.orchestrator.request("bar", ALICE);
    t.orchestrator.request("bar", BOB);
    await t.drain();

    expect(t.settled).toEqual([
      { name: "bar", requesters: [ALICE, BOB], outcome: { status: "failed", reason: "unknown_collection" } }
    ]);
    expect(t.api.calls.getFile).toEqual([]);
    expect(t.orchestrator.isBusy()).toBe(false);
  });

  it("reports an unreachable set once retries run out", async () => {
    const t = setup();
    t.api.addCollection("foo", ["f1"]);
    t.api.collectionErrors.set("foo", [new Error("fetch failed"), new Error("fetch failed")]);

    t.orchestrator.request("foo", ALICE);
    await t.drain();

    expect(t.api.calls.getCollection).toEqual(["foo", "foo"]);
    expect(t.settled[0].outcome).toEqual({ status: "failed", reason: "unavailable" });
  });

  it("answers straight away when the archive already exists", () => {
    const t = setup();
    fs.mkdirSync(t.collectionsDir, { recursive: true });
    fs.writeFileSync(path.join(t.collectionsDir, "foo.zip"), "zip");

    expect(t.orchestrator.request("foo", ALICE)).toBe("ready");

    expect(t.settled).toEqual([
      {
        name: "foo",
        requesters: [ALICE],
        outcome: { status: "completed", archivePath: path.join(t.collectionsDir, "foo.zip") }
      }
    ]);
    expect(t.api.calls.getCollection).toEqual([]);
    expect(t.orchestrator.isBusy()).toBe(false);
  });

  it("only fetches members that are not on disk yet", async () => {
    const t = setup();
    t.api.addCollection("foo", ["f1", "f2"]);
    await t.fileStore.write("f1", Buffer.from("cached"));

    t.orchestrator.request("foo", ALICE);
    await t.drain();
    await t.settledCount(1);

    expect(t.api.calls.getFile).toEqual(["f2"]);
  });

  it("shares a member file between two sets", async () => {
    const t = setup();
    t.api.addCollection("foo", ["f1", "f2"]);
    t.api.addCollection("bar", ["f2", "f3"]);

    t.orchestrator.request("foo", ALICE);
    t.orchestrator.request("bar", BOB);
    await t.drain();
    await t.settledCount(2);

    expect([...t.api.calls.getFile].sort()).toEqual(["f1", "f2", "f3"]);
    expect(t.settled.map((s) => `${s.name}:${s.outcome.status}`).sort()).toEqual(["bar:completed", "foo:completed"]);
  });

  it("fails the set when a member file is rejected", async () => {
    const t = setup();
    t.api.addCollection("foo", ["f1", "f2"]);
    t.api.fileErrors.set("f2", [apiError(400, "Bad Request: wrong file identifier")]);

    t.orchestrator.request("foo", ALICE);
    await t.drain();

    expect(t.settled).toEqual([
      { name: "foo", requesters: [ALICE], outcome: { status: "failed", reason: "file_failed" } }
    ]);
    expect(t.bundles).toEqual([]);
    expect(t.orchestrator.isBusy()).toBe(false);
  });

  it("reuses cached metadata when only the archive is missing", async () => {
    const t = setup();
    t.api.addCollection("foo", ["f1"]);
    t.orchestrator.request("foo", ALICE);
    await t.drain();
    await t.settledCount(1);
    fs.rmSync(path.join(t.collectionsDir, "foo.zip"));

    expect(t.orchestrator.request("foo", BOB)).toBe("started");
    await t.settledCount(2);

    expect(t.api.calls.getCollection).toEqual(["foo"]);
    expect(t.api.calls.getFile).toEqual(["f1"]);
    expect(t.bundles).toHaveLength(2);
  });

  it("drops metadata and archive on refresh and fetches again", async () => {
    const t = setup();
    t.api.addCollection("foo", ["f1"]);
    t.orchestrator.request("foo", ALICE);
    await t.drain();
    await t.settledCount(1);
    t.api.addCollection("foo", ["f1", "f4"]);

    expect(t.orchestrator.request("foo", ALICE, { refresh: true })).toBe("started");
    expect(t.cache.hasCollection("foo")).toBe(false);
    expect(t.store.collections.has("foo")).toBe(false);
    expect(fs.existsSync(path.join(t.collectionsDir, "foo.zip"))).toBe(false);
    await t.drain();
    await t.settledCount(2);

    expect(t.api.calls.getCollection).toEqual(["foo", "foo"]);
    expect(t.cache.getCollection("foo")?.fileIds).toEqual(["f1", "f4"]);
    expect(t.bundles[1].files).toEqual(["Sticker_001.webp", "Sticker_002.webp"]);
  });

  it("refuses new requests once shutting down", () => {
    const t = setup();
    t.orchestrator.beginShutdown();

    expect(t.orchestrator.request("foo", ALICE)).toBe("rejected");
    expect(t.api.calls.getCollection).toEqual([]);
  });
});
