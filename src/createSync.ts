import type { AppConfig, EcobeeConfig } from "./config.js";
import { EcobeeTokenManager } from "./adapters/ecobee/auth.js";
import { EcobeeClient } from "./adapters/ecobee/client.js";
import { EcobeeReportFetcher } from "./adapters/ecobee/reportFetcher.js";
import { MongoRuntimeSink, closeMongo, initMongo } from "./adapters/store/mongoSink.js";
import { FileWatermarkStore, MongoWatermarkStore, type WatermarkStore } from "./adapters/store/watermarkStore.js";
import { SyncOrchestrator } from "./sync/orchestrator.js";

export function createEcobeeClient(cfg: EcobeeConfig): EcobeeClient {
  const tokens = new EcobeeTokenManager({
    apiKey: cfg.ECOBEE_API_KEY,
    baseUrl: cfg.ECOBEE_API_BASE_URL,
    credentialsPath: cfg.CREDENTIALS_PATH,
    skewSec: cfg.TOKEN_SKEW_SEC,
    timeoutMs: cfg.HTTP_TIMEOUT_MS
  });
  return new EcobeeClient({ baseUrl: cfg.ECOBEE_API_BASE_URL, timeoutMs: cfg.HTTP_TIMEOUT_MS, tokens });
}

export async function createSyncFromConfig(cfg: AppConfig): Promise<{
  orchestrator: SyncOrchestrator;
  close: () => Promise<void>;
}> {
  const mongo = await initMongo({
    uri: cfg.MONGODB_URI,
    dbName: cfg.MONGODB_DB_NAME,
    collectionName: cfg.MONGODB_COLLECTION,
    watermarkCollectionName: cfg.MONGODB_WATERMARK_COLLECTION
  });

  const watermarks: WatermarkStore =
    cfg.WATERMARK_BACKEND === "mongo"
      ? new MongoWatermarkStore(mongo.watermarkCollection)
      : new FileWatermarkStore(cfg.WORK_DIR);

  const orchestrator = new SyncOrchestrator(
    {
      thermostatSelection: cfg.THERMOSTAT_ID,
      columnFlags: cfg.columnFlags,
      timezone: cfg.TIMEZONE,
      maxWindowDays: cfg.MAX_WINDOW_DAYS,
      backfillStartDate: cfg.BACKFILL_START_DATE,
      retry: { attempts: cfg.RETRY_ATTEMPTS, baseDelayMs: cfg.RETRY_BASE_MS, maxDelayMs: cfg.RETRY_MAX_MS },
      idleSleepMs: cfg.IDLE_SLEEP_MS,
      windowPauseMs: cfg.WINDOW_PAUSE_MS,
      writeDerivedMetrics: cfg.WRITE_DERIVED_METRICS
    },
    {
      source: new EcobeeReportFetcher(createEcobeeClient(cfg)),
      sink: new MongoRuntimeSink(mongo.runtimeCollection),
      watermarks
    }
  );

  return { orchestrator, close: closeMongo };
}
