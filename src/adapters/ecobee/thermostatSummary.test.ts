import assert from "node:assert/strict";
import { test } from "node:test";
import { MalformedResponseError } from "../../errors.js";
import { parseEquipmentStatus, parseThermostatSummary, runningEquipment } from "./thermostatSummary.js";

test("revision and status lists pair up per thermostat", () => {
  const summaries = parseThermostatSummary({
    thermostatCount: 2,
    revisionList: [
      "311000000001:Upstairs:true:220216120000:220216120000:220216120500:220216120500",
      "311000000002:Basement:false:220216110000:220216110000:220216110500:220216110500"
    ],
    statusList: ["311000000001:compCool1,fan", "311000000002:"],
    status: { code: 0, message: "" }
  });

  const upstairs = summaries.get("311000000001");
  assert.ok(upstairs);
  assert.equal(upstairs.name, "Upstairs");
  assert.equal(upstairs.connected, true);
  assert.equal(upstairs.runtimeRevision, "220216120500");
  assert.deepEqual(runningEquipment(upstairs.equipmentStatus), ["compCool1", "fan"]);

  const basement = summaries.get("311000000002");
  assert.equal(basement?.connected, false);
  assert.deepEqual(basement ? runningEquipment(basement.equipmentStatus) : null, []);
});

test("short revision entries are rejected", () => {
  assert.throws(
    () =>
      parseThermostatSummary({
        thermostatCount: 1,
        revisionList: ["311000000001:Upstairs:true:1:2:3"],
        statusList: [],
        status: { code: 0, message: "" }
      }),
    (err: unknown) => err instanceof MalformedResponseError && /not enough fields/.test(err.message)
  );
});

test("a thermostat count that disagrees with the revision list is rejected", () => {
  assert.throws(
    () =>
      parseThermostatSummary({
        thermostatCount: 2,
        revisionList: ["311000000001:Upstairs:true:1:2:3:4"],
        statusList: [],
        status: { code: 0, message: "" }
      }),
    (err: unknown) =>
      err instanceof MalformedResponseError &&
      err.message === "Summary lists 1 revision entries for 2 thermostats"
  );
});

test("connected must be a boolean", () => {
  assert.throws(
    () =>
      parseThermostatSummary({
        thermostatCount: 1,
        revisionList: ["311000000001:Upstairs:maybe:1:2:3:4"],
        statusList: [],
        status: { code: 0, message: "" }
      }),
    MalformedResponseError
  );
});

test("unknown equipment names are ignored", () => {
  const status = parseEquipmentStatus("311000000001:heatPump,warpDrive,auxHeat1");
  assert.deepEqual(runningEquipment(status), ["heatPump", "auxHeat1"]);
  assert.throws(() => parseEquipmentStatus("no-separator"), MalformedResponseError);
});
