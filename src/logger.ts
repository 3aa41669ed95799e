import pino from "pino";

const REDACT_PATHS = [
  "authorization",
  "token",
  "botToken",
  "BOT_TOKEN",
  "headers.authorization",
  "env.BOT_TOKEN"
];

export const logger = pino({
  level: process.env.LOG_LEVEL ?? "info",
  base: undefined,
  redact: {
    paths: REDACT_PATHS,
    censor: "[redacted]"
  }
});

export type Logger = typeof logger;

/** The slice of the logger that core components write to; tests pass a recorder. */
export type Log = Pick<Logger, "debug" | "info" | "warn" | "error">;
