import { MalformedResponseError } from "../../errors.js";
import { EQUIPMENT_FLAGS, type EquipmentFlag, type EquipmentStatus, type ThermostatSummary } from "../../types.js";
import { logger } from "../../utils/logger.js";
import type { ThermostatSummaryResponse } from "./client.js";

const REVISION_FIELDS = 7;

function isEquipmentFlag(name: string): name is EquipmentFlag {
  return EQUIPMENT_FLAGS.some((f) => f === name);
}

export function emptyEquipmentStatus(): EquipmentStatus {
  return {
    heatPump: false,
    heatPump2: false,
    heatPump3: false,
    compCool1: false,
    compCool2: false,
    auxHeat1: false,
    auxHeat2: false,
    auxHeat3: false,
    fan: false,
    humidifier: false,
    dehumidifier: false,
    ventilator: false,
    economizer: false,
    compHotWater: false,
    auxHotWater: false
  };
}

/** `"<id>:heatPump,fan"` → flags. Names outside the known set are logged and skipped. */
export function parseEquipmentStatus(entry: string): EquipmentStatus {
  const status = emptyEquipmentStatus();
  const sep = entry.indexOf(":");
  if (sep < 0) {
    throw new MalformedResponseError(`Equipment status entry missing ":" separator: "${entry}"`);
  }
  const running = entry.slice(sep + 1);
  if (!running) return status;

  for (const name of running.split(",").map((s) => s.trim()).filter(Boolean)) {
    if (isEquipmentFlag(name)) {
      status[name] = true;
    } else {
      logger.warn({ name, thermostatId: entry.slice(0, sep) }, "Unknown equipment status flag; ignoring");
    }
  }
  return status;
}

const TRUE_VALUES = new Set(["1", "t", "T", "true", "TRUE", "True"]);
const FALSE_VALUES = new Set(["0", "f", "F", "false", "FALSE", "False"]);

function parseConnected(raw: string, entry: string): boolean {
  if (TRUE_VALUES.has(raw)) return true;
  if (FALSE_VALUES.has(raw)) return false;
  throw new MalformedResponseError(`Revision entry has non-boolean connected field "${raw}": "${entry}"`);
}

/**
 * Revision entries are `id:name:connected:thermostatRev:alertsRev:runtimeRev:intervalRev`
 * and pair positionally with the status list.
 */
export function parseThermostatSummary(response: ThermostatSummaryResponse): Map<string, ThermostatSummary> {
  const summaries = new Map<string, ThermostatSummary>();
  if (response.revisionList.length !== response.thermostatCount) {
    throw new MalformedResponseError(
      `Summary lists ${response.revisionList.length} revision entries for ${response.thermostatCount} thermostats`
    );
  }

  for (let i = 0; i < response.thermostatCount; i++) {
    const entry = response.revisionList[i] ?? "";
    const fields = entry.split(":");
    if (fields.length < REVISION_FIELDS) {
      throw new MalformedResponseError(`Invalid revision entry, not enough fields: "${entry}"`);
    }
    const [
      identifier = "",
      name = "",
      connected = "",
      thermostatRevision = "",
      alertsRevision = "",
      runtimeRevision = "",
      intervalRevision = ""
    ] = fields;
    const statusEntry = response.statusList[i];

    summaries.set(identifier, {
      identifier,
      name,
      connected: parseConnected(connected, entry),
      thermostatRevision,
      alertsRevision,
      runtimeRevision,
      intervalRevision,
      equipmentStatus: statusEntry === undefined ? emptyEquipmentStatus() : parseEquipmentStatus(statusEntry)
    });
  }

  return summaries;
}

export function runningEquipment(status: EquipmentStatus): EquipmentFlag[] {
  return EQUIPMENT_FLAGS.filter((f) => status[f]);
}
