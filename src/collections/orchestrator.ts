import fs from "node:fs";

import type { FileStore } from "../content/fileStore";
import type { EntityStore } from "../db/entityStore";
import type { EntityCache } from "../entities/cache";
import type { BotEvents, CollectionFailureReason, CollectionOutcome, Requester } from "../events";
import { logger, type Log } from "../logger";
import type { EnqueueResult } from "../queue/rateLimitedQueue";
import { archivePathFor, assembleCollection, type ArchiveBundler } from "./assembler";

export type WorkflowState = "metadata_pending" | "files_pending" | "assembly_pending";

export type RequestOutcome = "started" | "coalesced" | "ready" | "rejected";

export type RequestOptions = {
  /** Drop cached metadata and archive first. Ignored while a workflow is in flight. */
  refresh?: boolean;
};

export interface WorkQueue {
  enqueue(id: string): EnqueueResult;
}

export type WorkflowSnapshot = {
  name: string;
  state: WorkflowState;
  remainingFiles: number;
  requesters: number;
};

type Workflow = {
  name: string;
  state: WorkflowState;
  requesters: Requester[];
  remaining: Set<string>;
};

export type CollectionOrchestratorOptions = {
  cache: EntityCache;
  store: EntityStore;
  fileStore: FileStore;
  events: BotEvents;
  fileQueue: WorkQueue;
  collectionQueue: WorkQueue;
  collectionsDir: string;
  bundler: ArchiveBundler;
  log?: Log;
};

/**
 * One workflow per sticker set name: metadata, then every missing member file,
 * then assembly. Concurrent requests for the same name join the running
 * workflow and are settled together by a single collectionSettled event.
 */
export class CollectionOrchestrator {
  private readonly options: CollectionOrchestratorOptions;
  private readonly log: Log;
  private readonly workflows = new Map<string, Workflow>();
  private readonly waitingOnFile = new Map<string, Set<string>>();
  private readonly unsubscribers: Array<() => void>;
  private shuttingDown = false;

  constructor(options: CollectionOrchestratorOptions) {
    this.options = options;
    this.log = options.log ?? logger;

    const { events } = options;
    this.unsubscribers = [
      events.on("collectionArrived", ({ name }) => this.onCollectionArrived(name)),
      events.on("collectionFailed", ({ name, reason }) => this.onCollectionFailed(name, reason)),
      events.on("fileDownloaded", ({ fileId }) => this.onFileDownloaded(fileId)),
      events.on("fileFailed", ({ fileId }) => this.onFileFailed(fileId))
    ];
  }

  dispose() {
    for (const unsubscribe of this.unsubscribers) unsubscribe();
  }

  beginShutdown() {
    this.shuttingDown = true;
  }

  isShuttingDown(): boolean {
    return this.shuttingDown;
  }

  isBusy(): boolean {
    return this.workflows.size > 0;
  }

  snapshot(): WorkflowSnapshot[] {
    return [...this.workflows.values()].map((wf) => ({
      name: wf.name,
      state: wf.state,
      remainingFiles: wf.remaining.size,
      requesters: wf.requesters.length
    }));
  }

  request(name: string, requester: Requester, options: RequestOptions = {}): RequestOutcome {
    if (this.shuttingDown) {
      this.log.info({ name, requester }, "Sticker set request rejected during shutdown");
      return "rejected";
    }

    const running = this.workflows.get(name);
    if (running) {
      const known = running.requesters.some((r) => r.userId === requester.userId && r.chatId === requester.chatId);
      if (!known) running.requesters.push(requester);
      this.log.info({ name, state: running.state, requesters: running.requesters.length }, "Sticker set request coalesced");
      return "coalesced";
    }

    const archivePath = archivePathFor(this.options.collectionsDir, name);
    if (options.refresh) {
      this.forget(name, archivePath);
    } else if (fs.existsSync(archivePath)) {
      this.options.events.emit("collectionSettled", {
        name,
        requesters: [requester],
        outcome: { status: "completed", archivePath }
      });
      return "ready";
    }

    this.workflows.set(name, { name, state: "metadata_pending", requesters: [requester], remaining: new Set() });
    this.log.info({ name, refresh: options.refresh ?? false }, "Sticker set workflow started");
    // A resident set is re-announced synchronously from here.
    this.options.collectionQueue.enqueue(name);
    return "started";
  }

  /** Metadata and member list go together, along with any previous archive. */
  private forget(name: string, archivePath: string) {
    this.options.cache.removeCollection(name);
    try {
      this.options.store.removeCollection(name);
    } catch (err) {
      this.log.error({ err, name }, "Failed to remove stored sticker set");
    }
    fs.rmSync(archivePath, { force: true });
    this.log.info({ name }, "Sticker set cleared for refresh");
  }

  private onCollectionArrived(name: string) {
    const wf = this.workflows.get(name);
    if (!wf || wf.state !== "metadata_pending") return;

    const collection = this.options.cache.getCollection(name);
    if (!collection) {
      this.log.error({ name }, "Sticker set announced but not cached");
      this.settle(wf, { status: "failed", reason: "rejected" });
      return;
    }

    this.options.events.emit("collectionMetadataReady", {
      name,
      title: collection.info.title ?? name,
      memberCount: collection.fileIds.length,
      requesters: [...wf.requesters]
    });

    const missing = collection.fileIds.filter((fileId) => !this.options.fileStore.has(fileId));
    wf.remaining = new Set(missing);
    if (wf.remaining.size === 0) {
      this.startAssembly(wf);
      return;
    }

    wf.state = "files_pending";
    for (const fileId of wf.remaining) {
      let names = this.waitingOnFile.get(fileId);
      if (!names) {
        names = new Set();
        this.waitingOnFile.set(fileId, names);
      }
      names.add(name);
    }
    this.log.info({ name, members: collection.fileIds.length, missing: wf.remaining.size }, "Sticker set files pending");
    for (const fileId of [...wf.remaining]) {
      this.options.fileQueue.enqueue(fileId);
    }
  }

  private onCollectionFailed(name: string, reason: CollectionFailureReason) {
    const wf = this.workflows.get(name);
    if (!wf || wf.state !== "metadata_pending") return;
    this.settle(wf, { status: "failed", reason });
  }

  private onFileDownloaded(fileId: string) {
    const names = this.waitingOnFile.get(fileId);
    if (!names) return;
    this.waitingOnFile.delete(fileId);

    for (const name of names) {
      const wf = this.workflows.get(name);
      if (!wf) continue;
      wf.remaining.delete(fileId);
      if (wf.state === "files_pending" && wf.remaining.size === 0) {
        this.startAssembly(wf);
      }
    }
  }

  private onFileFailed(fileId: string) {
    const names = this.waitingOnFile.get(fileId);
    if (!names) return;

    for (const name of [...names]) {
      const wf = this.workflows.get(name);
      if (wf) {
        this.log.warn({ name, fileId }, "Member file failed; failing sticker set");
        this.settle(wf, { status: "failed", reason: "file_failed" });
      }
    }
    this.waitingOnFile.delete(fileId);
  }

  private startAssembly(wf: Workflow) {
    wf.state = "assembly_pending";
    const collection = this.options.cache.getCollection(wf.name);
    if (!collection) {
      this.settle(wf, { status: "failed", reason: "assembly_failed" });
      return;
    }

    assembleCollection({
      collection,
      cache: this.options.cache,
      fileStore: this.options.fileStore,
      collectionsDir: this.options.collectionsDir,
      bundler: this.options.bundler
    })
      .then((archivePath) => this.settle(wf, { status: "completed", archivePath }))
      .catch((err) => {
        this.log.error({ err, name: wf.name }, "Sticker set assembly failed");
        this.settle(wf, { status: "failed", reason: "assembly_failed" });
      });
  }

  private settle(wf: Workflow, outcome: CollectionOutcome) {
    if (this.workflows.get(wf.name) !== wf) return;
    this.workflows.delete(wf.name);

    for (const fileId of wf.remaining) {
      const names = this.waitingOnFile.get(fileId);
      if (!names) continue;
      names.delete(wf.name);
      if (names.size === 0) this.waitingOnFile.delete(fileId);
    }

    this.log.info({ name: wf.name, outcome, requesters: wf.requesters.length }, "Sticker set workflow settled");
    this.options.events.emit("collectionSettled", { name: wf.name, requesters: wf.requesters, outcome });
  }
}
