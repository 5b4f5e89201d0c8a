/** `YYYY-MM-DD`, no time of day and no zone. */
export type CalendarDate = string;

const DAY_MS = 24 * 60 * 60 * 1000;
const CALENDAR_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;
const CLOCK_TIME_RE = /^(\d{2}):(\d{2})(?::(\d{2}))?$/;

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = { now: () => new Date() };

export function nowUtcIso(clock: Clock = systemClock): string {
  return clock.now().toISOString();
}

/** UTC midnight of `date`, or null when it is not a real calendar date. */
export function calendarDateToUtcMs(date: string): number | null {
  const match = CALENDAR_DATE_RE.exec(date.trim());
  if (!match) return null;
  const [, y, m, d] = match;
  const year = Number(y);
  const month = Number(m);
  const day = Number(d);
  const ms = Date.UTC(year, month - 1, day);
  const check = new Date(ms);
  if (check.getUTCFullYear() !== year || check.getUTCMonth() !== month - 1 || check.getUTCDate() !== day) {
    return null;
  }
  return ms;
}

export function isCalendarDate(value: string): value is CalendarDate {
  return calendarDateToUtcMs(value) !== null;
}

export function parseCalendarDate(value: string): CalendarDate {
  const ms = calendarDateToUtcMs(value);
  if (ms === null) throw new Error(`Invalid calendar date "${value}" (expected YYYY-MM-DD)`);
  return formatUtcDate(new Date(ms));
}

function formatUtcDate(date: Date): CalendarDate {
  return date.toISOString().slice(0, 10);
}

export function addDays(date: CalendarDate, days: number): CalendarDate {
  const ms = calendarDateToUtcMs(date);
  if (ms === null) throw new Error(`Invalid calendar date "${date}"`);
  return formatUtcDate(new Date(ms + days * DAY_MS));
}

export function compareDates(a: CalendarDate, b: CalendarDate): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function minDate(a: CalendarDate, b: CalendarDate): CalendarDate {
  return compareDates(a, b) <= 0 ? a : b;
}

/** Inclusive day count of `[start, end]`. */
export function daysInRange(start: CalendarDate, end: CalendarDate): number {
  const s = calendarDateToUtcMs(start);
  const e = calendarDateToUtcMs(end);
  if (s === null || e === null) throw new Error(`Invalid date range ${start}..${end}`);
  return Math.round((e - s) / DAY_MS) + 1;
}

/** Calendar date of `instant` as seen on a wall clock in `timezone`. */
export function calendarDateInZone(instant: Date, timezone: string): CalendarDate {
  const parts = new Intl.DateTimeFormat("en-CA", {
    timeZone: timezone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit"
  }).formatToParts(instant);

  const get = (type: string) => parts.find((p) => p.type === type)?.value ?? "00";
  return `${get("year")}-${get("month")}-${get("day")}`;
}

/**
 * Wall-clock date and time read as if it were UTC. Only differences between
 * two such values are meaningful.
 */
export function parseNaiveLocalMs(date: string, time: string): number | null {
  const dayMs = calendarDateToUtcMs(date);
  const match = CLOCK_TIME_RE.exec(time.trim());
  if (dayMs === null || !match) return null;
  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  const seconds = match[3] === undefined ? 0 : Number(match[3]);
  if (hours > 23 || minutes > 59 || seconds > 59) return null;
  return dayMs + ((hours * 60 + minutes) * 60 + seconds) * 1000;
}

export function hostTimezone(): string {
  return Intl.DateTimeFormat().resolvedOptions().timeZone;
}
