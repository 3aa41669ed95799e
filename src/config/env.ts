import { z } from "zod";

function toBooleanFlag(val?: string): boolean {
  if (!val) return false;
  const lower = val.toLowerCase().trim();
  return lower === "true" || lower === "1" || lower === "yes";
}

const BOT_TOKEN_FORMAT = /^[0-9]+:[A-Za-z0-9_-]+$/;

const EnvSchema = z.object({
  BOT_TOKEN: z.string().min(1).regex(BOT_TOKEN_FORMAT, "BOT_TOKEN does not have a valid format"),
  // Username without the leading "@"; decides whether "/cmd@name" addresses us.
  BOT_NAME: z
    .string()
    .min(1)
    .transform((val) => val.trim().replace(/^@/, "")),

  DB_PATH: z.string().min(1).default("./data/bot.sqlite"),
  FILES_DIR: z.string().min(1).default("./data/files"),
  COLLECTIONS_DIR: z.string().min(1).default("./data/collections"),

  TELEGRAM_API_ROOT: z.string().url().default("https://api.telegram.org"),

  // The remote service throttles bots that poll or download in bursts.
  POLL_INTERVAL_MS: z.coerce.number().int().min(250).default(5_000),
  POLL_TIMEOUT_SECONDS: z.coerce.number().int().min(0).max(50).default(0),
  DOWNLOAD_INTERVAL_MS: z.coerce.number().int().min(100).default(1_000),
  DOWNLOAD_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),

  SHUTDOWN_GRACE_MS: z.coerce.number().int().min(0).default(60_000),

  PORT: z.coerce.number().int().positive().default(3000),
  ENABLE_STATUS_SERVER: z
    .string()
    .optional()
    .transform((val) => (val === undefined ? true : toBooleanFlag(val))),

  // Comma-separated Telegram numeric user ids allowed to run /refresh.
  ADMIN_TELEGRAM_USER_IDS: z
    .string()
    .optional()
    .transform((val) => {
      if (!val) return [];
      return val
        .split(",")
        .map((s) => s.trim())
        .filter(Boolean)
        .map((s) => Number(s))
        .filter((n) => Number.isFinite(n));
    })
});

export type Env = z.infer<typeof EnvSchema>;

export function loadEnv(raw: NodeJS.ProcessEnv): Env {
  const parsed = EnvSchema.safeParse(raw);
  if (!parsed.success) {
    // eslint-disable-next-line no-console
    console.error(parsed.error.flatten().fieldErrors);
    throw new Error("Invalid environment variables.");
  }

  return parsed.data;
}
