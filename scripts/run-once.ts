import { loadConfig } from "../src/config.js";
import { createSyncFromConfig } from "../src/createSync.js";
import { logger } from "../src/utils/logger.js";

const cfg = loadConfig();
const { orchestrator, close } = await createSyncFromConfig(cfg);

try {
  const outcome = await orchestrator.runIteration();
  logger.info({ outcome, watermark: orchestrator.getStatus().watermark }, "Ran one iteration");
} finally {
  await close();
}
