import path from "node:path";
import { z } from "zod";
import dotenv from "dotenv";
import type { ColumnFlags } from "./types.js";
import { hostTimezone, isCalendarDate } from "./utils/time.js";

dotenv.config();

const envBool = (defaultValue: boolean) =>
  z
    .string()
    .default(String(defaultValue))
    .transform((v) => ["1", "true", "yes", "y"].includes(v.trim().toLowerCase()));

const emptyToUndefined = (value: unknown) => {
  if (typeof value === "string" && value.trim().length === 0) return undefined;
  return value;
};

// Enough to talk to the vendor API; the thermostat listing needs nothing else.
const EcobeeEnvSchema = z.object({
  ECOBEE_API_KEY: z.string().min(1),
  ECOBEE_API_BASE_URL: z.string().url().default("https://api.ecobee.com"),

  WORK_DIR: z.preprocess(emptyToUndefined, z.string().optional()),
  CREDENTIALS_PATH: z.preprocess(emptyToUndefined, z.string().optional()),
  TOKEN_SKEW_SEC: z.coerce.number().int().min(0).default(60),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000)
});

const EnvSchema = EcobeeEnvSchema.extend({
  THERMOSTAT_ID: z.string().min(1),

  TIMEZONE: z.string().default(hostTimezone()),

  MONGODB_URI: z.preprocess(emptyToUndefined, z.string().optional()),
  MONGO_URL: z.preprocess(emptyToUndefined, z.string().optional()),
  MONGODB_DB_NAME: z.string().default("thermostat_runtime"),
  MONGODB_COLLECTION: z.string().default("ecobee_runtime_report"),
  MONGODB_WATERMARK_COLLECTION: z.string().default("sync_watermarks"),

  WATERMARK_BACKEND: z.enum(["file", "mongo"]).default("file"),
  BACKFILL_START_DATE: z.preprocess(
    emptyToUndefined,
    z.string().refine(isCalendarDate, "expected YYYY-MM-DD").optional()
  ),
  MAX_WINDOW_DAYS: z.coerce.number().int().positive().max(31).default(14),

  RETRY_ATTEMPTS: z.coerce.number().int().positive().default(5),
  RETRY_BASE_MS: z.coerce.number().int().positive().default(1_000),
  RETRY_MAX_MS: z.coerce.number().int().positive().default(60_000),
  IDLE_SLEEP_MS: z.coerce.number().int().positive().default(60 * 60_000),
  WINDOW_PAUSE_MS: z.coerce.number().int().min(0).default(3_000),
  RUN_ONCE: envBool(false),

  WRITE_HUMIDIFIER: envBool(false),
  WRITE_AUX_HEAT_1: envBool(false),
  WRITE_AUX_HEAT_2: envBool(false),
  WRITE_HEAT_PUMP_1: envBool(false),
  WRITE_HEAT_PUMP_2: envBool(false),
  WRITE_COOL_1: envBool(false),
  WRITE_COOL_2: envBool(false),
  WRITE_DERIVED_METRICS: envBool(false),

  PORT: z.coerce.number().int().min(0).default(3000)
});

type EcobeeEnv = z.infer<typeof EcobeeEnvSchema>;
type Env = z.infer<typeof EnvSchema>;

export type EcobeeConfig = Omit<EcobeeEnv, "WORK_DIR" | "CREDENTIALS_PATH"> & {
  WORK_DIR: string;
  CREDENTIALS_PATH: string;
};

export type AppConfig = Omit<Env, "MONGO_URL" | "MONGODB_URI" | "WORK_DIR" | "CREDENTIALS_PATH"> &
  EcobeeConfig & {
    MONGODB_URI: string;
    columnFlags: ColumnFlags;
  };

export function columnFlagsFromEnv(env: Env): ColumnFlags {
  return {
    humidifier: env.WRITE_HUMIDIFIER,
    auxHeat1: env.WRITE_AUX_HEAT_1,
    auxHeat2: env.WRITE_AUX_HEAT_2,
    compHeat1: env.WRITE_HEAT_PUMP_1,
    compHeat2: env.WRITE_HEAT_PUMP_2,
    compCool1: env.WRITE_COOL_1,
    compCool2: env.WRITE_COOL_2
  };
}

function parseEnv<T extends z.ZodTypeAny>(schema: T, env: NodeJS.ProcessEnv): z.infer<T> {
  const parsed = schema.safeParse(env);
  if (!parsed.success) {
    // eslint-disable-next-line no-console
    console.error(parsed.error.format());
    throw new Error("Invalid environment configuration");
  }
  return parsed.data;
}

function resolvePaths(raw: EcobeeEnv): Pick<EcobeeConfig, "WORK_DIR" | "CREDENTIALS_PATH"> {
  const workDir = path.resolve(raw.WORK_DIR ?? process.cwd());
  return {
    WORK_DIR: workDir,
    CREDENTIALS_PATH: path.resolve(workDir, raw.CREDENTIALS_PATH ?? "ecobee-cred-cache")
  };
}

export function loadEcobeeConfig(env: NodeJS.ProcessEnv = process.env): EcobeeConfig {
  const raw: EcobeeEnv = parseEnv(EcobeeEnvSchema, env);
  return { ...raw, ...resolvePaths(raw) };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const raw: Env = parseEnv(EnvSchema, env);
  const uri = raw.MONGODB_URI ?? raw.MONGO_URL;
  if (!uri) {
    throw new Error("MONGODB_URI (or MONGO_URL) is required");
  }
  const { MONGO_URL, ...rest } = raw;
  return {
    ...rest,
    ...resolvePaths(raw),
    MONGODB_URI: uri,
    columnFlags: columnFlagsFromEnv(raw)
  };
}
