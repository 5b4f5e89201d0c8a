import type { SyncWindow } from "../types.js";
import { type CalendarDate, addDays, compareDates, minDate } from "../utils/time.js";

export const DEFAULT_MAX_WINDOW_DAYS = 14;

export type PlanResult =
  | { kind: "window"; window: SyncWindow; yesterday: CalendarDate }
  | { kind: "caught_up"; yesterday: CalendarDate }
  | { kind: "unseeded"; yesterday: CalendarDate };

/**
 * Next window to fetch: the day after the watermark up to yesterday, capped
 * at `maxSpanDays` days. Today is never fetched since it is still in progress.
 */
export function planWindow(params: {
  watermark: CalendarDate | null;
  today: CalendarDate;
  maxSpanDays?: number;
}): PlanResult {
  const maxSpanDays = params.maxSpanDays ?? DEFAULT_MAX_WINDOW_DAYS;
  if (!Number.isInteger(maxSpanDays) || maxSpanDays < 1) {
    throw new Error(`maxSpanDays must be a positive integer, got ${maxSpanDays}`);
  }

  const yesterday = addDays(params.today, -1);
  if (params.watermark === null) return { kind: "unseeded", yesterday };

  const start = addDays(params.watermark, 1);
  if (compareDates(start, yesterday) > 0) return { kind: "caught_up", yesterday };

  const end = minDate(addDays(start, maxSpanDays - 1), yesterday);
  return { kind: "window", window: { start, end }, yesterday };
}

/** Watermark that makes the first planned window start on `backfillStart`. */
export function seedWatermark(backfillStart: CalendarDate): CalendarDate {
  return addDays(backfillStart, -1);
}
