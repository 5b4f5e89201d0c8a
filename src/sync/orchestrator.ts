import type { RuntimeSource } from "../adapters/ecobee/reportFetcher.js";
import type { RuntimeSink } from "../adapters/store/mongoSink.js";
import type { WatermarkStore } from "../adapters/store/watermarkStore.js";
import { ConfigError, errorMessage } from "../errors.js";
import { mapSeries } from "../mapping/fieldMapper.js";
import type { ColumnFlags, SyncState, SyncStatus, SyncWindow } from "../types.js";
import { logger } from "../utils/logger.js";
import {
  type CalendarDate,
  type Clock,
  calendarDateInZone,
  compareDates,
  daysInRange,
  nowUtcIso,
  systemClock
} from "../utils/time.js";
import { type PlanResult, planWindow, seedWatermark } from "./planner.js";
import { type RetryPolicy, type Sleep, sleep as realSleep, withRetry } from "./retry.js";

export interface OrchestratorConfig {
  /** Thermostat selection match; also the watermark key. */
  thermostatSelection: string;
  columnFlags: ColumnFlags;
  timezone: string;
  maxWindowDays: number;
  backfillStartDate?: CalendarDate;
  retry: RetryPolicy;
  idleSleepMs: number;
  windowPauseMs: number;
  writeDerivedMetrics: boolean;
}

export interface OrchestratorDeps {
  source: RuntimeSource;
  sink: RuntimeSink;
  watermarks: WatermarkStore;
  clock?: Clock;
  sleep?: Sleep;
}

export type IterationOutcome =
  | { kind: "synced"; window: SyncWindow; thermostats: number; points: number }
  | { kind: "idle"; reason: "caught_up" | "unseeded" };

export class SyncOrchestrator {
  private readonly clock: Clock;
  private readonly sleep: Sleep;
  private stopped = false;
  private status: SyncStatus = {
    state: "idle",
    watermark: null,
    lastWindow: null,
    lastSuccessUtc: null,
    lastError: null
  };

  constructor(
    private readonly cfg: OrchestratorConfig,
    private readonly deps: OrchestratorDeps
  ) {
    this.clock = deps.clock ?? systemClock;
    this.sleep = deps.sleep ?? realSleep;
  }

  getStatus(): SyncStatus {
    return { ...this.status };
  }

  stop(): void {
    this.stopped = true;
  }

  private setState(state: SyncState): void {
    if (this.status.state !== state) {
      logger.debug({ from: this.status.state, to: state }, "Sync state");
    }
    this.status.state = state;
  }

  private async currentWatermark(): Promise<CalendarDate | null> {
    const stored = await this.deps.watermarks.read(this.cfg.thermostatSelection);
    if (stored !== null || !this.cfg.backfillStartDate) return stored;
    const seeded = seedWatermark(this.cfg.backfillStartDate);
    logger.info(
      { thermostat: this.cfg.thermostatSelection, backfillStart: this.cfg.backfillStartDate },
      "No watermark stored; starting from configured backfill date"
    );
    return seeded;
  }

  private async plan(): Promise<PlanResult> {
    this.setState("planning");
    const watermark = await this.currentWatermark();
    this.status.watermark = watermark;
    const today = calendarDateInZone(this.clock.now(), this.cfg.timezone);
    return planWindow({ watermark, today, maxSpanDays: this.cfg.maxWindowDays });
  }

  /**
   * Plan one window and, if there is one, fetch, write and advance it. The
   * watermark read and the window are each retried under the same policy.
   */
  async runIteration(): Promise<IterationOutcome> {
    const hooks = {
      sleep: this.sleep,
      onRetry: ({ attempt, delayMs, err }: { attempt: number; delayMs: number; err: unknown }) => {
        this.setState("retrying");
        this.status.lastError = errorMessage(err);
        logger.warn({ err, attempt, delayMs }, "Sync attempt failed; retrying");
      }
    };

    try {
      const plan = await withRetry(() => this.plan(), this.cfg.retry, hooks);

      if (plan.kind === "unseeded") {
        logger.warn(
          { thermostat: this.cfg.thermostatSelection },
          "No watermark and no BACKFILL_START_DATE; nothing to sync until one is set"
        );
        this.setState("idle");
        return { kind: "idle", reason: "unseeded" };
      }
      if (plan.kind === "caught_up") {
        logger.info({ watermark: this.status.watermark, yesterday: plan.yesterday }, "Nothing to do; caught up to yesterday");
        this.setState("idle");
        return { kind: "idle", reason: "caught_up" };
      }

      const { window } = plan;
      logger.info({ start: window.start, end: window.end, days: daysInRange(window.start, window.end) }, "Sync window planned");

      const outcome = await withRetry(() => this.syncWindow(window), this.cfg.retry, hooks);
      this.status.watermark = window.end;
      this.status.lastWindow = window;
      this.status.lastSuccessUtc = nowUtcIso(this.clock);
      this.status.lastError = null;
      this.setState("idle");
      logger.info(
        { window, thermostats: outcome.thermostats, points: outcome.points },
        "Sync window complete; watermark advanced"
      );
      return outcome;
    } catch (err) {
      this.status.lastError = errorMessage(err);
      this.setState("fatal");
      throw err;
    }
  }

  private async syncWindow(window: SyncWindow): Promise<Extract<IterationOutcome, { kind: "synced" }>> {
    const selection = this.cfg.thermostatSelection;

    this.setState("fetching");
    const metadata = await this.deps.source.fetchMetadata(selection);
    const series = await this.deps.source.fetchRuntimeReport(selection, window, this.cfg.columnFlags);

    this.setState("writing");
    let points = 0;
    for (const [thermostatId, entries] of series) {
      const meta = metadata.get(thermostatId);
      if (!meta) {
        logger.warn({ thermostatId }, "Runtime report returned a thermostat without metadata; tagging by id only");
      }
      const records = mapSeries(thermostatId, entries, meta, { writeDerivedMetrics: this.cfg.writeDerivedMetrics });
      await this.deps.sink.writeBatch(records);
      points += records.length;
      logger.info({ thermostatId, points: records.length }, "Runtime write good");
    }

    this.setState("advancing");
    const stored = await this.deps.watermarks.read(selection);
    if (stored !== null && compareDates(window.end, stored) < 0) {
      throw new ConfigError(
        `Stored watermark ${stored} is ahead of window end ${window.end}; is another instance running for ${selection}?`
      );
    }
    await this.deps.watermarks.write(selection, window.end);

    return { kind: "synced", window, thermostats: series.size, points };
  }

  /**
   * Loop until stopped. Pauses briefly between windows while catching up and
   * sleeps `idleSleepMs` once current. With `once`, returns as soon as there
   * is nothing left to do.
   */
  async runForever(options: { once?: boolean } = {}): Promise<void> {
    this.stopped = false;
    while (!this.stopped) {
      const outcome = await this.runIteration();
      if (this.stopped) break;
      if (outcome.kind === "idle") {
        if (options.once) return;
        this.setState("sleeping");
        await this.sleep(this.cfg.idleSleepMs);
        this.setState("idle");
      } else if (this.cfg.windowPauseMs > 0) {
        await this.sleep(this.cfg.windowPauseMs);
      }
    }
  }
}
