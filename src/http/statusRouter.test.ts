import express from "express";
import { IncomingMessage, ServerResponse } from "node:http";
import { Socket } from "node:net";
import { describe, expect, it, vi } from "vitest";

import { createStatusRouter, formatUptime, type BotStatus } from "./statusRouter";

describe("formatUptime", () => {
  it("renders h:mm:ss without wrapping hours", () => {
    expect(formatUptime(0)).toBe("0:00:00");
    expect(formatUptime(61_999)).toBe("0:01:01");
    expect(formatUptime(90_061_000)).toBe("25:01:01");
  });

  it("clamps clock skew to zero", () => {
    expect(formatUptime(-5000)).toBe("0:00:00");
  });
});

const startedAt = new Date("2026-01-01T00:00:00.000Z");

function createApp(status: Partial<BotStatus> = {}) {
  const app = express();
  app.use(
    createStatusRouter({
      getStatus: () => ({
        startedAt,
        offset: 42,
        queues: { files: 2, collections: 1 },
        collectionsInFlight: [],
        shuttingDown: false,
        ...status
      }),
      now: () => startedAt.getTime() + 3_723_000
    })
  );
  return app;
}

/** Runs one GET through the app without opening a socket. */
function get(app: express.Express, url: string): Promise<{ status: number; body: unknown }> {
  const req = new IncomingMessage(new Socket());
  req.method = "GET";
  req.url = url;
  const res = new ServerResponse(req);

  return new Promise((resolve) => {
    vi.spyOn(res, "end").mockImplementation((chunk?: unknown) => {
      resolve({ status: res.statusCode, body: JSON.parse(String(chunk)) });
      return res;
    });
    app(req, res);
  });
}

describe("createStatusRouter", () => {
  it("answers /healthz", async () => {
    const response = await get(createApp(), "/healthz");

    expect(response).toEqual({ status: 200, body: { ok: true } });
  });

  it("reports uptime, offset and queue depths on /status", async () => {
    const response = await get(createApp({ shuttingDown: true }), "/status");

    expect(response.status).toBe(200);
    expect(response.body).toEqual({
      ok: true,
      startedAt: "2026-01-01T00:00:00.000Z",
      uptime: "1:02:03",
      offset: 42,
      queues: { files: 2, collections: 1 },
      collectionsInFlight: [],
      shuttingDown: true
    });
  });
});
