import fs from "node:fs/promises";
import path from "node:path";
import type { Collection } from "mongodb";
import { errorMessage } from "../../errors.js";
import { logger } from "../../utils/logger.js";
import { type CalendarDate, isCalendarDate } from "../../utils/time.js";

/**
 * Durable "last fully synced day" per thermostat scope. A missing or
 * unparsable watermark reads as null (no progress).
 */
export interface WatermarkStore {
  read(key: string): Promise<CalendarDate | null>;
  write(key: string, date: CalendarDate): Promise<void>;
}

function safeKey(key: string): string {
  return key.replace(/[^A-Za-z0-9_-]+/g, "_");
}

export class FileWatermarkStore implements WatermarkStore {
  constructor(private readonly directory: string) {}

  pathFor(key: string): string {
    return path.join(this.directory, `last_data.${safeKey(key)}.txt`);
  }

  async read(key: string): Promise<CalendarDate | null> {
    const filePath = this.pathFor(key);
    let raw: string;
    try {
      raw = await fs.readFile(filePath, "utf-8");
    } catch (err) {
      logger.debug({ filePath, reason: errorMessage(err) }, "No watermark file; treating as no prior progress");
      return null;
    }

    const value = raw.trim();
    if (!isCalendarDate(value)) {
      logger.warn({ filePath, value }, "Watermark file is not a YYYY-MM-DD date; treating as no prior progress");
      return null;
    }
    return value;
  }

  /** Write-then-rename so a crash never leaves a half-written date behind. */
  async write(key: string, date: CalendarDate): Promise<void> {
    const filePath = this.pathFor(key);
    const tmpPath = `${filePath}.${process.pid}.tmp`;
    try {
      await fs.mkdir(this.directory, { recursive: true });
      await fs.writeFile(tmpPath, `${date}\n`, "utf-8");
      await fs.rename(tmpPath, filePath);
    } catch (err) {
      logger.error({ err, filePath, date }, "Failed to persist watermark");
      await fs.rm(tmpPath, { force: true }).catch((rmErr: unknown) => {
        logger.warn({ err: rmErr, tmpPath }, "Unable to remove temporary watermark file");
      });
      throw err;
    }
  }
}

export interface WatermarkDocument {
  _id: string;
  date: CalendarDate;
  updated_at: Date;
}

export class MongoWatermarkStore implements WatermarkStore {
  constructor(private readonly collection: Collection<WatermarkDocument>) {}

  async read(key: string): Promise<CalendarDate | null> {
    // Connection errors propagate: an unreachable database is not "no progress".
    const doc = await this.collection.findOne({ _id: key });
    if (!doc) return null;
    if (!isCalendarDate(doc.date)) {
      logger.warn({ key, value: doc.date }, "Stored watermark is not a YYYY-MM-DD date; treating as no prior progress");
      return null;
    }
    return doc.date;
  }

  async write(key: string, date: CalendarDate): Promise<void> {
    try {
      await this.collection.updateOne(
        { _id: key },
        { $set: { date, updated_at: new Date() } },
        { upsert: true }
      );
    } catch (err) {
      logger.error({ err, key, date }, "Failed to persist watermark");
      throw err;
    }
  }
}
