import type { BotServices } from "./context";
import { logger, type Log } from "./logger";

export const SHUTDOWN_BROADCAST = "Bot will shut down after current activities have been completed.";

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Resolves true once `check` passes, false when `timeoutMs` runs out first. */
export async function waitUntil(check: () => boolean, timeoutMs: number, pollMs = 250): Promise<boolean> {
  const deadline = Date.now() + timeoutMs;
  while (!check()) {
    if (Date.now() >= deadline) return false;
    await delay(Math.min(pollMs, Math.max(0, deadline - Date.now())));
  }
  return true;
}

export type ShutdownParams = {
  services: Pick<BotServices, "orchestrator" | "messenger" | "db" | "isIdle" | "stop">;
  graceMs: number;
  closeServer?: () => Promise<void>;
  exit: (code: number) => void;
  pollMs?: number;
  log?: Log;
};

/**
 * New commands are refused from the first signal on; work already accepted
 * runs until it is done or the grace period is over. Repeated signals share
 * the same shutdown.
 */
export function createShutdown(params: ShutdownParams): (signal: string) => Promise<void> {
  const { services, graceMs, closeServer, exit, pollMs } = params;
  const log = params.log ?? logger;
  let running: Promise<void> | null = null;

  const run = async (signal: string) => {
    log.warn({ signal }, "Shutting down...");
    services.orchestrator.beginShutdown();

    const reached = await services.messenger.broadcast(SHUTDOWN_BROADCAST);
    log.info({ chats: reached }, "Shutdown notice sent");

    const drained = await waitUntil(() => services.isIdle(), graceMs, pollMs);
    if (!drained) {
      log.warn({ graceMs }, "Grace period elapsed with work still in flight");
    }

    services.stop();
    if (closeServer) {
      await closeServer();
    }
    services.db.close();
    log.info("Shutdown complete");
    exit(0);
  };

  return (signal) => {
    if (!running) {
      running = run(signal);
    }
    return running;
  };
}
