import { Router } from "express";

import type { WorkflowSnapshot } from "../collections/orchestrator";

export type BotStatus = {
  startedAt: Date;
  offset: number | null;
  queues: { files: number; collections: number };
  collectionsInFlight: WorkflowSnapshot[];
  shuttingDown: boolean;
};

/** Whole seconds as h:mm:ss; hours are not wrapped. */
export function formatUptime(ms: number): string {
  const total = Math.max(0, Math.floor(ms / 1000));
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  const seconds = total % 60;
  return `${hours}:${String(minutes).padStart(2, "0")}:${String(seconds).padStart(2, "0")}`;
}

export function createStatusRouter(params: { getStatus: () => BotStatus; now?: () => number }) {
  const { getStatus, now = Date.now } = params;
  const router = Router();

  router.get("/healthz", (_req, res) => {
    res.status(200).json({ ok: true });
  });

  router.get("/status", (_req, res) => {
    const status = getStatus();
    res.status(200).json({
      ok: true,
      startedAt: status.startedAt.toISOString(),
      uptime: formatUptime(now() - status.startedAt.getTime()),
      offset: status.offset,
      queues: status.queues,
      collectionsInFlight: status.collectionsInFlight,
      shuttingDown: status.shuttingDown
    });
  });

  return router;
}
