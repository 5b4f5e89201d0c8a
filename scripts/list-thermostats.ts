import { loadEcobeeConfig } from "../src/config.js";
import { createEcobeeClient } from "../src/createSync.js";
import { parseThermostatSummary, runningEquipment } from "../src/adapters/ecobee/thermostatSummary.js";

const cfg = loadEcobeeConfig();
const client = createEcobeeClient(cfg);

const registered = { selectionType: "registered", selectionMatch: "" } as const;
const thermostats = await client.getThermostats(registered);
const summaries = parseThermostatSummary(
  await client.getThermostatSummary({ ...registered, includeEquipmentStatus: true })
);

for (const t of thermostats) {
  const summary = summaries.get(t.identifier);
  const state = summary ? (summary.connected ? "connected" : "offline") : "unknown";
  const running = summary ? runningEquipment(summary.equipmentStatus).join(",") || "idle" : "-";
  // eslint-disable-next-line no-console
  console.log(`'${t.name}': ID ${t.identifier} (${t.modelNumber}, ${state}, running: ${running})`);
}
