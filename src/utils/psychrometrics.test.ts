import assert from "node:assert/strict";
import { test } from "node:test";
import { indoorHumidityRecommendationPct, windChillF } from "./psychrometrics.js";

test("wind chill returns the temperature outside the formula's domain", () => {
  assert.equal(windChillF(60, 20), 60);
  assert.equal(windChillF(50.5, 10), 50.5);
  assert.equal(windChillF(20, 2.9), 20);
});

test("wind chill follows the NWS formula inside its domain", () => {
  const chill = windChillF(30, 20);
  assert.ok(Math.abs(chill - 17.36) < 0.1, `expected ~17.4, got ${chill}`);
  assert.ok(windChillF(50, 3) < 50);
});

test("indoor humidity recommendation steps down with outdoor temperature", () => {
  assert.equal(indoorHumidityRecommendationPct(50), 50);
  assert.equal(indoorHumidityRecommendationPct(49.9), 45);
  assert.equal(indoorHumidityRecommendationPct(25), 35);
  assert.equal(indoorHumidityRecommendationPct(0), 25);
  assert.equal(indoorHumidityRecommendationPct(-10), 20);
  assert.equal(indoorHumidityRecommendationPct(-20), 15);
});
