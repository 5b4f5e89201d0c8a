import { MalformedResponseError } from "../../errors.js";
import { OPTIONAL_COLUMNS, type ColumnFlags, type RuntimeReportEntry } from "../../types.js";
import { calendarDateToUtcMs, parseNaiveLocalMs } from "../../utils/time.js";
import type { RuntimeReportResponse } from "./client.js";

/** Report rows are sampled every five minutes, indexed from local midnight. */
export const INTERVAL_MINUTES = 5;

export const BASE_COLUMNS = ["hvacMode"] as const;

export const CLIMATE_COLUMNS = [
  "zoneCoolTemp",
  "zoneHeatTemp",
  "zoneAveTemp",
  "zoneHumidity",
  "outdoorTemp",
  "outdoorHumidity",
  "fan"
] as const;

export function buildReportColumns(flags: ColumnFlags): string[] {
  return [...BASE_COLUMNS, ...CLIMATE_COLUMNS, ...OPTIONAL_COLUMNS.filter((c) => flags[c])];
}

function reportStartUtcMs(report: Pick<RuntimeReportResponse, "startDate" | "startInterval">): number {
  const dayMs = calendarDateToUtcMs(report.startDate);
  if (dayMs === null) {
    throw new MalformedResponseError(`Runtime report has unparsable startDate "${report.startDate}"`);
  }
  return dayMs + report.startInterval * INTERVAL_MINUTES * 60_000;
}

function splitRow(row: string, columnCount: number, thermostatId: string): { localMs: number; values: string[] } {
  const fields = row.split(",");
  if (fields.length < columnCount + 2) {
    throw new MalformedResponseError(
      `Runtime report row for ${thermostatId} has ${fields.length} fields, expected ${columnCount + 2}: "${row}"`
    );
  }
  const [date = "", time = "", ...values] = fields;
  const localMs = parseNaiveLocalMs(date, time);
  if (localMs === null) {
    throw new MalformedResponseError(`Runtime report row for ${thermostatId} has unparsable date/time "${date} ${time}"`);
  }
  return { localMs, values };
}

/**
 * Turns the report's comma-delimited rows into per-thermostat series with UTC
 * timestamps.
 *
 * Rows carry the thermostat's wall-clock time. The report header gives the
 * UTC instant of the first interval, so the first row fixes a single offset
 * that is applied to every row of that thermostat. A window that crosses a
 * DST change is skewed after the change.
 */
export function parseRuntimeReport(report: RuntimeReportResponse): Map<string, RuntimeReportEntry[]> {
  const utcStartMs = reportStartUtcMs(report);
  const columns = report.columns.split(",").map((c) => c.trim());
  const byThermostat = new Map<string, RuntimeReportEntry[]>();

  for (const item of report.reportList) {
    const thermostatId = item.thermostatIdentifier;
    const rows = item.rowList.map((row) => splitRow(row, columns.length, thermostatId));
    const first = rows[0];
    const offsetMs = first ? utcStartMs - first.localMs : 0;

    const entries: RuntimeReportEntry[] = rows.map(({ localMs, values }) => {
      const dataFields: Record<string, string> = {};
      columns.forEach((col, i) => {
        dataFields[col] = values[i] ?? "";
      });
      return { thermostatId, reportTime: new Date(localMs + offsetMs), dataFields };
    });

    byThermostat.set(thermostatId, entries);
  }

  return byThermostat;
}
