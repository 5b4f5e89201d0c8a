import assert from "node:assert/strict";
import { test } from "node:test";
import { mapSeries } from "../../mapping/fieldMapper.js";
import type { ColumnFlags } from "../../types.js";
import type { RuntimeReportRequest, RuntimeReportResponse, Selection, ThermostatRecord } from "./client.js";
import { EcobeeReportFetcher, type ReportClient } from "./reportFetcher.js";

const noOptionalColumns: ColumnFlags = {
  humidifier: false,
  auxHeat1: false,
  auxHeat2: false,
  compHeat1: false,
  compHeat2: false,
  compCool1: false,
  compCool2: false
};

class FakeClient implements ReportClient {
  readonly selections: Selection[] = [];
  readonly reportRequests: RuntimeReportRequest[] = [];

  constructor(
    private readonly thermostats: ThermostatRecord[],
    private readonly report: RuntimeReportResponse
  ) {}

  async getThermostats(selection: Selection): Promise<ThermostatRecord[]> {
    this.selections.push(selection);
    return this.thermostats;
  }

  async getRuntimeReport(request: RuntimeReportRequest): Promise<RuntimeReportResponse> {
    this.reportRequests.push(request);
    return this.report;
  }
}

const report: RuntimeReportResponse = {
  startDate: "2022-02-16",
  startInterval: 61,
  endDate: "2022-02-16",
  endInterval: 287,
  columns: "zoneAveTemp,fan",
  reportList: [{ thermostatIdentifier: "311000000001", rowCount: 1, rowList: ["2022-02-16,00:05,70.5,1"] }],
  status: { code: 0, message: "" }
};

const thermostats: ThermostatRecord[] = [
  { identifier: "311000000001", name: "Upstairs", modelNumber: "nikeSmart", brand: "ecobee" },
  { identifier: "311000000002", name: "Basement", modelNumber: "apolloSmart", brand: "ecobee" }
];

test("metadata is requested for the selection with every include switched off", async () => {
  const client = new FakeClient(thermostats, report);
  const fetcher = new EcobeeReportFetcher(client);

  const metadata = await fetcher.fetchMetadata("311000000001,311000000002");

  assert.deepEqual(client.selections, [
    {
      selectionType: "thermostats",
      selectionMatch: "311000000001,311000000002",
      includeAlerts: false,
      includeEvents: false,
      includeProgram: false,
      includeRuntime: false,
      includeExtendedRuntime: false,
      includeSettings: false,
      includeSensors: false,
      includeWeather: false
    }
  ]);
  assert.deepEqual([...metadata.keys()], ["311000000001", "311000000002"]);
  assert.deepEqual(metadata.get("311000000002"), {
    identifier: "311000000002",
    name: "Basement",
    modelNumber: "apolloSmart",
    brand: "ecobee"
  });
});

test("the report request spans the window with the configured columns", async () => {
  const client = new FakeClient(thermostats, report);
  const fetcher = new EcobeeReportFetcher(client);

  await fetcher.fetchRuntimeReport(
    "311000000001",
    { start: "2022-02-16", end: "2022-02-20" },
    { ...noOptionalColumns, humidifier: true, compCool1: true }
  );

  assert.deepEqual(client.reportRequests, [
    {
      selection: { selectionType: "thermostats", selectionMatch: "311000000001" },
      startDate: "2022-02-16",
      endDate: "2022-02-20",
      columns:
        "hvacMode,zoneCoolTemp,zoneHeatTemp,zoneAveTemp,zoneHumidity,outdoorTemp,outdoorHumidity,fan,humidifier,compCool1",
      includeSensors: false
    }
  ]);
});

test("a report row becomes a point at the start of its interval", async () => {
  const fetcher = new EcobeeReportFetcher(new FakeClient(thermostats, report));

  const metadata = await fetcher.fetchMetadata("311000000001");
  const series = await fetcher.fetchRuntimeReport(
    "311000000001",
    { start: "2022-02-16", end: "2022-02-16" },
    noOptionalColumns
  );
  const entries = series.get("311000000001") ?? [];
  const points = mapSeries("311000000001", entries, metadata.get("311000000001"));

  assert.equal(points.length, 1);
  assert.deepEqual(points[0]?.fields, { temperature_F: 70.5, fan_run_time_s: 1 });
  assert.equal(points[0]?.timestamp.toISOString(), "2022-02-16T05:05:00.000Z");
  assert.equal(points[0]?.tags.thermostat_name, "Upstairs");
});
