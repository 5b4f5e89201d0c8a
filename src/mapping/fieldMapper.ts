import type { RuntimeReportEntry, SinkFieldValue, SinkRecord, ThermostatMetadata } from "../types.js";
import { indoorHumidityRecommendationPct } from "../utils/psychrometrics.js";

export const MEASUREMENT = "ecobee_runtime_report";
export const DEVICE_ID_PREFIX = "ecobee-";
export const RECEIVER = "ecobee-runtime-sync";

type FieldKind = "integer" | "float" | "string";

interface FieldSpec {
  field: string;
  kind: FieldKind;
}

const FIELD_MAP: Readonly<Record<string, FieldSpec>> = {
  auxHeat1: { field: "aux_heat_1_run_time_s", kind: "integer" },
  auxHeat2: { field: "aux_heat_2_run_time_s", kind: "integer" },
  compCool1: { field: "cool_1_run_time_s", kind: "integer" },
  compCool2: { field: "cool_2_run_time_s", kind: "integer" },
  compHeat1: { field: "heat_pump_1_run_time_s", kind: "integer" },
  compHeat2: { field: "heat_pump_2_run_time_s", kind: "integer" },
  humidifier: { field: "humidifier_run_time_s", kind: "integer" },
  fan: { field: "fan_run_time_s", kind: "integer" },
  zoneCoolTemp: { field: "setpoint_cool_F", kind: "float" },
  zoneHeatTemp: { field: "setpoint_heat_F", kind: "float" },
  zoneAveTemp: { field: "temperature_F", kind: "float" },
  zoneHumidity: { field: "humidity_pct", kind: "float" },
  outdoorTemp: { field: "outdoor_temperature_F", kind: "float" },
  outdoorHumidity: { field: "outdoor_humidity_pct", kind: "float" },
  hvacMode: { field: "HVAC_mode", kind: "string" }
};

const INTEGER_RE = /^[+-]?\d+$/;
const FLOAT_RE = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export interface MapOptions {
  writeDerivedMetrics?: boolean;
}

/** Empty or unparsable numbers yield undefined so the field is left out, not zeroed. */
export function coerceField(raw: string, kind: FieldKind): SinkFieldValue | undefined {
  const value = raw.trim();
  switch (kind) {
    case "string":
      return value;
    case "integer":
      return INTEGER_RE.test(value) ? Number.parseInt(value, 10) : undefined;
    case "float":
      return FLOAT_RE.test(value) ? Number.parseFloat(value) : undefined;
  }
}

export function buildTags(thermostatId: string, metadata?: ThermostatMetadata): Record<string, string> {
  const tags: Record<string, string> = {
    device_id: `${DEVICE_ID_PREFIX}${thermostatId}`,
    receiver: RECEIVER
  };
  if (metadata) {
    tags.thermostat_name = metadata.name;
    tags.thermostat_model = metadata.modelNumber;
    tags.thermostat_brand = metadata.brand;
  }
  return tags;
}

export function mapEntry(entry: RuntimeReportEntry, tags: Record<string, string>, options: MapOptions = {}): SinkRecord {
  const fields: Record<string, SinkFieldValue> = {};

  for (const [column, raw] of Object.entries(entry.dataFields)) {
    const spec = Object.hasOwn(FIELD_MAP, column) ? FIELD_MAP[column] : undefined;
    if (!spec) continue;
    const value = coerceField(raw, spec.kind);
    if (value !== undefined) fields[spec.field] = value;
  }

  const outdoor = fields.outdoor_temperature_F;
  if (options.writeDerivedMetrics && typeof outdoor === "number") {
    fields.recommended_indoor_humidity_pct = indoorHumidityRecommendationPct(outdoor);
  }

  return { measurement: MEASUREMENT, tags, fields, timestamp: entry.reportTime };
}

export function mapSeries(
  thermostatId: string,
  entries: RuntimeReportEntry[],
  metadata: ThermostatMetadata | undefined,
  options: MapOptions = {}
): SinkRecord[] {
  const tags = buildTags(thermostatId, metadata);
  return entries.map((entry) => mapEntry(entry, tags, options));
}
