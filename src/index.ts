import "dotenv/config";

import type { Server } from "node:http";
import express from "express";

import { BOT_COMMANDS } from "./bot/commands";
import { loadEnv } from "./config/env";
import { createServices } from "./context";
import { applySchema, openSqlite } from "./db/db";
import { SCHEMA_SQL } from "./db/schema";
import { createStatusRouter } from "./http/statusRouter";
import { createShutdown } from "./lifecycle";
import { logger } from "./logger";
import { createTelegramBotApi } from "./telegram/botApi";
import { classifyApiFailure } from "./telegram/errors";

async function main() {
  const env = loadEnv(process.env);

  // SQLite init + schema
  const db = openSqlite(env.DB_PATH);
  applySchema(db, SCHEMA_SQL);
  logger.info({ dbPath: env.DB_PATH }, "SQLite ready");

  const api = createTelegramBotApi({
    token: env.BOT_TOKEN,
    apiRoot: env.TELEGRAM_API_ROOT,
    pollTimeoutSeconds: env.POLL_TIMEOUT_SECONDS
  });

  const services = createServices({ config: env, db, api });
  logger.info(
    {
      botName: env.BOT_NAME,
      offset: services.poller.getOffset(),
      collections: services.cache.collectionNames().length
    },
    "Services ready"
  );

  try {
    await api.setMyCommands(BOT_COMMANDS, "default");
    logger.info({ commands: BOT_COMMANDS.length }, "Bot commands registered");
  } catch (err) {
    // Not fatal: commands still work, clients just lack the menu.
    logger.warn({ failure: classifyApiFailure(err) }, "Failed to register bot commands");
  }

  services.start();

  let server: Server | null = null;
  if (env.ENABLE_STATUS_SERVER) {
    const app = express();
    app.use(createStatusRouter({ getStatus: () => services.status() }));
    server = app.listen(env.PORT, () => {
      logger.info({ port: env.PORT }, "HTTP server listening");
    });
  }

  const shutdown = createShutdown({
    services,
    graceMs: env.SHUTDOWN_GRACE_MS,
    closeServer: server
      ? () =>
          new Promise<void>((resolve) => {
            server?.close(() => resolve());
          })
      : undefined,
    exit: (code) => process.exit(code)
  });

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err) => {
      logger.fatal({ err }, "Shutdown failed");
      process.exit(1);
    });
  };
  process.on("SIGINT", () => onSignal("SIGINT"));
  process.on("SIGTERM", () => onSignal("SIGTERM"));
}

main().catch((err) => {
  logger.fatal({ err }, "Fatal error");
  process.exit(1);
});
