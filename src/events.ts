import { EventEmitter } from "node:events";
import type { EntityKind, EntityRecord } from "./entities/types";

export type CollectionFailureReason = "unknown_collection" | "unavailable" | "rejected" | "file_failed" | "assembly_failed";

export type Requester = {
  userId: number;
  chatId: number;
};

export type CollectionOutcome =
  | { status: "completed"; archivePath: string }
  | { status: "failed"; reason: CollectionFailureReason };

export type BotEventMap = {
  entityStored: { kind: EntityKind; id: string; record: EntityRecord };
  updateReceived: { updateId: number; chatId: number | null };
  messageReceived: { chatId: number; messageId: number };
  channelPostReceived: { chatId: number; messageId: number };
  collectionArrived: { name: string };
  collectionFailed: { name: string; reason: CollectionFailureReason };
  fileDownloaded: { fileId: string };
  fileFailed: { fileId: string };
  collectionMetadataReady: { name: string; title: string; memberCount: number; requesters: Requester[] };
  collectionSettled: { name: string; requesters: Requester[]; outcome: CollectionOutcome };
};

export type BotEventName = keyof BotEventMap;

/**
 * Synchronous observer registry shared by the normalizer, queues and
 * orchestrator. Listeners run inside emit(), in registration order.
 */
export class BotEvents {
  private readonly emitter = new EventEmitter();

  constructor() {
    this.emitter.setMaxListeners(50);
  }

  on<K extends BotEventName>(event: K, listener: (payload: BotEventMap[K]) => void): () => void {
    this.emitter.on(event, listener);
    return () => {
      this.emitter.off(event, listener);
    };
  }

  emit<K extends BotEventName>(event: K, payload: BotEventMap[K]) {
    this.emitter.emit(event, payload);
  }
}
