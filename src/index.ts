import { loadConfig } from "./config.js";
import { SyncFatalError } from "./errors.js";
import { logger } from "./utils/logger.js";
import { createSyncFromConfig } from "./createSync.js";
import { startServer } from "./server.js";

const cfg = loadConfig();
const { orchestrator, close } = await createSyncFromConfig(cfg);

if (cfg.PORT > 0) {
  startServer({ port: cfg.PORT, getStatus: () => orchestrator.getStatus() });
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    logger.info({ signal }, "Shutting down");
    orchestrator.stop();
    close()
      .catch((err: unknown) => logger.warn({ err }, "Error closing MongoDB client"))
      .finally(() => process.exit(0));
  });
}

logger.info(
  {
    thermostat: cfg.THERMOSTAT_ID,
    timezone: cfg.TIMEZONE,
    watermark_backend: cfg.WATERMARK_BACKEND,
    run_once: cfg.RUN_ONCE
  },
  "Starting runtime report sync loop"
);

try {
  await orchestrator.runForever({ once: cfg.RUN_ONCE });
  await close();
  process.exit(0);
} catch (err) {
  // A supervisor restarts us; progress resumes from the last stored watermark.
  const attempts = err instanceof SyncFatalError ? err.attempts : undefined;
  logger.fatal({ err, attempts }, "Sync loop stopped on unrecoverable error");
  await close().catch((closeErr: unknown) => logger.warn({ err: closeErr }, "Error closing MongoDB client"));
  process.exit(1);
}
