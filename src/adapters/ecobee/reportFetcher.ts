import type { ColumnFlags, RuntimeReportEntry, SyncWindow, ThermostatMetadata } from "../../types.js";
import { logger } from "../../utils/logger.js";
import type { EcobeeClient, Selection } from "./client.js";
import { buildReportColumns, parseRuntimeReport } from "./runtimeReport.js";

/** What the sync loop needs from the vendor. */
export interface RuntimeSource {
  fetchMetadata(thermostatSelection: string): Promise<Map<string, ThermostatMetadata>>;
  fetchRuntimeReport(
    thermostatSelection: string,
    window: SyncWindow,
    flags: ColumnFlags
  ): Promise<Map<string, RuntimeReportEntry[]>>;
}

export type ReportClient = Pick<EcobeeClient, "getThermostats" | "getRuntimeReport">;

function thermostatsSelection(match: string): Selection {
  return {
    selectionType: "thermostats",
    selectionMatch: match,
    includeAlerts: false,
    includeEvents: false,
    includeProgram: false,
    includeRuntime: false,
    includeExtendedRuntime: false,
    includeSettings: false,
    includeSensors: false,
    includeWeather: false
  };
}

export class EcobeeReportFetcher implements RuntimeSource {
  constructor(private readonly client: ReportClient) {}

  async fetchMetadata(thermostatSelection: string): Promise<Map<string, ThermostatMetadata>> {
    const thermostats = await this.client.getThermostats(thermostatsSelection(thermostatSelection));
    const metadata = new Map<string, ThermostatMetadata>();
    for (const t of thermostats) {
      metadata.set(t.identifier, {
        identifier: t.identifier,
        name: t.name,
        modelNumber: t.modelNumber,
        brand: t.brand
      });
    }
    return metadata;
  }

  async fetchRuntimeReport(
    thermostatSelection: string,
    window: SyncWindow,
    flags: ColumnFlags
  ): Promise<Map<string, RuntimeReportEntry[]>> {
    const columns = buildReportColumns(flags);
    const report = await this.client.getRuntimeReport({
      selection: { selectionType: "thermostats", selectionMatch: thermostatSelection },
      startDate: window.start,
      endDate: window.end,
      columns: columns.join(","),
      includeSensors: false
    });

    const series = parseRuntimeReport(report);
    logger.debug(
      {
        window,
        columns: report.columns,
        thermostats: [...series].map(([id, entries]) => ({ id, rows: entries.length }))
      },
      "Runtime report parsed"
    );
    return series;
  }
}
