import crypto from "node:crypto";
import { MongoClient, type AnyBulkWriteOperation, type Collection, type Db } from "mongodb";
import type { SinkFieldValue, SinkRecord } from "../../types.js";
import { logger } from "../../utils/logger.js";
import type { WatermarkDocument } from "./watermarkStore.js";

/** Batch sink for mapped runtime records. One call per thermostat per window. */
export interface RuntimeSink {
  writeBatch(records: SinkRecord[]): Promise<void>;
}

export interface MongoStoreConfig {
  uri: string;
  dbName: string;
  collectionName: string;
  watermarkCollectionName: string;
}

export interface RuntimeDocument {
  _id: string;
  measurement: string;
  time: Date;
  tags: Record<string, string>;
  fields: Record<string, SinkFieldValue>;
  written_at: Date;
}

export interface MongoStore {
  client: MongoClient;
  db: Db;
  runtimeCollection: Collection<RuntimeDocument>;
  watermarkCollection: Collection<WatermarkDocument>;
}

let cachedStore: MongoStore | null = null;

export function stableStringify(value: unknown): string {
  if (value === null || value === undefined) return JSON.stringify(value);
  if (value instanceof Date) return JSON.stringify(value.toISOString());
  if (typeof value !== "object") return JSON.stringify(value);
  if (Array.isArray(value)) return `[${value.map((v) => stableStringify(v)).join(",")}]`;
  const entries = Object.entries(value)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`);
  return `{${entries.join(",")}}`;
}

/**
 * Identity of a point: measurement + tag set + timestamp. Writing the same
 * point twice replaces it, which is what makes a re-run window harmless.
 */
export function pointId(record: Pick<SinkRecord, "measurement" | "tags" | "timestamp">): string {
  return crypto
    .createHash("sha256")
    .update(stableStringify({ measurement: record.measurement, tags: record.tags, time: record.timestamp }))
    .digest("hex");
}

export function buildUpsertOperations(
  records: SinkRecord[],
  writtenAt: Date = new Date()
): AnyBulkWriteOperation<RuntimeDocument>[] {
  return records.map((record) => {
    const doc: RuntimeDocument = {
      _id: pointId(record),
      measurement: record.measurement,
      time: record.timestamp,
      tags: record.tags,
      fields: record.fields,
      written_at: writtenAt
    };
    return { replaceOne: { filter: { _id: doc._id }, replacement: doc, upsert: true } };
  });
}

export class MongoRuntimeSink implements RuntimeSink {
  constructor(private readonly collection: Collection<RuntimeDocument>) {}

  async writeBatch(records: SinkRecord[]): Promise<void> {
    if (records.length === 0) return;
    const result = await this.collection.bulkWrite(buildUpsertOperations(records), { ordered: false });
    logger.debug(
      { points: records.length, upserted: result.upsertedCount, modified: result.modifiedCount },
      "Runtime batch written"
    );
  }
}

async function ensureIndexes(runtimeCollection: Collection<RuntimeDocument>) {
  const indexSpecs: { keys: Record<string, 1 | -1> }[] = [
    { keys: { "tags.device_id": 1, time: -1 } },
    { keys: { time: -1 } }
  ];

  for (const { keys } of indexSpecs) {
    try {
      await runtimeCollection.createIndex(keys);
    } catch (err) {
      logger.warn({ err, keys }, "Unable to create MongoDB index; continuing");
    }
  }
}

export async function initMongo(cfg: MongoStoreConfig): Promise<MongoStore> {
  if (cachedStore) return cachedStore;

  const client = new MongoClient(cfg.uri);
  await client.connect();
  const db = client.db(cfg.dbName);
  const runtimeCollection = db.collection<RuntimeDocument>(cfg.collectionName);
  const watermarkCollection = db.collection<WatermarkDocument>(cfg.watermarkCollectionName);
  await ensureIndexes(runtimeCollection);

  cachedStore = { client, db, runtimeCollection, watermarkCollection };
  return cachedStore;
}

export async function closeMongo(): Promise<void> {
  if (!cachedStore) return;
  const { client } = cachedStore;
  cachedStore = null;
  await client.close();
}
