import type { CalendarDate } from "./utils/time.js";

/** Optional report channels, in the order they are appended to the column list. */
export const OPTIONAL_COLUMNS = [
  "humidifier",
  "auxHeat1",
  "auxHeat2",
  "compHeat1",
  "compHeat2",
  "compCool1",
  "compCool2"
] as const;

export type OptionalColumn = (typeof OPTIONAL_COLUMNS)[number];

export type ColumnFlags = Record<OptionalColumn, boolean>;

export const EQUIPMENT_FLAGS = [
  "heatPump",
  "heatPump2",
  "heatPump3",
  "compCool1",
  "compCool2",
  "auxHeat1",
  "auxHeat2",
  "auxHeat3",
  "fan",
  "humidifier",
  "dehumidifier",
  "ventilator",
  "economizer",
  "compHotWater",
  "auxHotWater"
] as const;

export type EquipmentFlag = (typeof EQUIPMENT_FLAGS)[number];

export type EquipmentStatus = Record<EquipmentFlag, boolean>;

export interface SyncWindow {
  start: CalendarDate;
  end: CalendarDate;
}

export interface ThermostatMetadata {
  identifier: string;
  name: string;
  modelNumber: string;
  brand: string;
}

export interface ThermostatSummary {
  identifier: string;
  name: string;
  connected: boolean;
  thermostatRevision: string;
  alertsRevision: string;
  runtimeRevision: string;
  intervalRevision: string;
  equipmentStatus: EquipmentStatus;
}

export interface RuntimeReportEntry {
  thermostatId: string;
  reportTime: Date;
  /** Raw values keyed by the vendor column name from the report header. */
  dataFields: Record<string, string>;
}

export type SinkFieldValue = number | string;

export interface SinkRecord {
  measurement: string;
  tags: Record<string, string>;
  fields: Record<string, SinkFieldValue>;
  timestamp: Date;
}

export type SyncState =
  | "idle"
  | "planning"
  | "fetching"
  | "writing"
  | "advancing"
  | "retrying"
  | "sleeping"
  | "fatal";

export interface SyncStatus {
  state: SyncState;
  watermark: CalendarDate | null;
  lastWindow: SyncWindow | null;
  lastSuccessUtc: string | null;
  lastError: string | null;
}
