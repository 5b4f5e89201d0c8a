import express from "express";
import type { SyncStatus } from "./types.js";
import { logger } from "./utils/logger.js";

export function createApp(params: { getStatus: () => SyncStatus }) {
  const app = express();

  app.get("/healthz", (_req, res) => {
    const status = params.getStatus();
    res.status(status.state === "fatal" ? 503 : 200).json({
      ok: status.state !== "fatal",
      state: status.state,
      watermark: status.watermark,
      last_window: status.lastWindow,
      last_success_utc: status.lastSuccessUtc,
      last_error: status.lastError
    });
  });

  return app;
}

export function startServer(params: { port: number; getStatus: () => SyncStatus }) {
  const server = createApp(params).listen(params.port, () => {
    logger.info({ port: params.port }, "HTTP server listening");
  });
  return server;
}
