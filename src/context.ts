import { CollectionDelivery } from "./bot/delivery";
import { createMessenger, type Messenger } from "./bot/messenger";
import { CommandRouter } from "./bot/router";
import { createZipBundler, type ArchiveBundler } from "./collections/assembler";
import { CollectionOrchestrator } from "./collections/orchestrator";
import type { Env } from "./config/env";
import { createDiskFileStore, type FileStore } from "./content/fileStore";
import type { SqliteDb } from "./db/db";
import { createSqliteEntityStore, type EntityStore } from "./db/entityStore";
import { EntityCache } from "./entities/cache";
import { EntityNormalizer } from "./entities/normalizer";
import { BotEvents } from "./events";
import type { BotStatus } from "./http/statusRouter";
import { createCollectionQueue, createFileQueue } from "./queue/downloadQueues";
import type { RateLimitedQueue } from "./queue/rateLimitedQueue";
import type { BotApi } from "./telegram/botApi";
import { UpdatePoller } from "./telegram/poller";

export type ServiceConfig = Pick<
  Env,
  | "BOT_NAME"
  | "FILES_DIR"
  | "COLLECTIONS_DIR"
  | "POLL_INTERVAL_MS"
  | "DOWNLOAD_INTERVAL_MS"
  | "DOWNLOAD_MAX_ATTEMPTS"
  | "ADMIN_TELEGRAM_USER_IDS"
>;

/** Everything the running bot shares, built once and passed around explicitly. */
export type BotServices = {
  db: SqliteDb;
  api: BotApi;
  store: EntityStore;
  cache: EntityCache;
  events: BotEvents;
  normalizer: EntityNormalizer;
  fileStore: FileStore;
  fileQueue: RateLimitedQueue;
  collectionQueue: RateLimitedQueue;
  orchestrator: CollectionOrchestrator;
  poller: UpdatePoller;
  messenger: Messenger;
  router: CommandRouter;
  delivery: CollectionDelivery;
  startedAt: Date;
  start(): void;
  stop(): void;
  isIdle(): boolean;
  status(): BotStatus;
};

export function createServices(params: {
  config: ServiceConfig;
  db: SqliteDb;
  api: BotApi;
  fileStore?: FileStore;
  bundler?: ArchiveBundler;
}): BotServices {
  const { config, db, api } = params;

  const store = createSqliteEntityStore(db);
  const cache = EntityCache.load(store);
  const events = new BotEvents();
  const normalizer = new EntityNormalizer({ cache, store, events });
  const fileStore = params.fileStore ?? createDiskFileStore(config.FILES_DIR);

  const queueDeps = {
    api,
    normalizer,
    events,
    intervalMs: config.DOWNLOAD_INTERVAL_MS,
    maxAttempts: config.DOWNLOAD_MAX_ATTEMPTS
  };
  const fileQueue = createFileQueue({ ...queueDeps, fileStore });
  const collectionQueue = createCollectionQueue({ ...queueDeps, cache });

  const orchestrator = new CollectionOrchestrator({
    cache,
    store,
    fileStore,
    events,
    fileQueue,
    collectionQueue,
    collectionsDir: config.COLLECTIONS_DIR,
    bundler: params.bundler ?? createZipBundler()
  });

  const poller = new UpdatePoller({
    api,
    normalizer,
    events,
    intervalMs: config.POLL_INTERVAL_MS,
    initialOffset: cache.computeOffset()
  });

  const messenger = createMessenger({ api, cache, normalizer });
  const router = new CommandRouter({
    cache,
    db,
    orchestrator,
    messenger,
    events,
    botName: config.BOT_NAME,
    adminUserIds: config.ADMIN_TELEGRAM_USER_IDS
  });
  const delivery = new CollectionDelivery({ db, events, messenger });
  const startedAt = new Date();

  return {
    db,
    api,
    store,
    cache,
    events,
    normalizer,
    fileStore,
    fileQueue,
    collectionQueue,
    orchestrator,
    poller,
    messenger,
    router,
    delivery,
    startedAt,

    start() {
      poller.start();
      fileQueue.start();
      collectionQueue.start();
    },

    stop() {
      poller.stop();
      fileQueue.stop();
      collectionQueue.stop();
    },

    isIdle() {
      return !orchestrator.isBusy() && fileQueue.isIdle() && collectionQueue.isIdle() && delivery.isIdle();
    },

    status() {
      return {
        startedAt,
        offset: poller.getOffset(),
        queues: { files: fileQueue.size(), collections: collectionQueue.size() },
        collectionsInFlight: orchestrator.snapshot(),
        shuttingDown: orchestrator.isShuttingDown()
      };
    }
  };
}
