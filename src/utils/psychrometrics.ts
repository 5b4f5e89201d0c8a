// Comfort helpers for consumers of the stored runtime series.
// - wind chill (°F), NWS 2001 formula
// - maximum recommended indoor RH (%) for a given outdoor temperature

/**
 * Wind chill for `tempF` at `windSpeedMph`. The formula is only defined at or
 * below 50 °F with at least 3 mph of wind; outside that the temperature is
 * returned as-is.
 */
export function windChillF(tempF: number, windSpeedMph: number): number {
  if (tempF > 50 || windSpeedMph < 3) return tempF;
  const v = Math.pow(windSpeedMph, 0.16);
  return 35.74 + 0.6215 * tempF - 35.75 * v + 0.4275 * tempF * v;
}

const HUMIDITY_BANDS: ReadonlyArray<{ minOutdoorF: number; maxIndoorRhPct: number }> = [
  { minOutdoorF: 50, maxIndoorRhPct: 50 },
  { minOutdoorF: 40, maxIndoorRhPct: 45 },
  { minOutdoorF: 30, maxIndoorRhPct: 40 },
  { minOutdoorF: 20, maxIndoorRhPct: 35 },
  { minOutdoorF: 10, maxIndoorRhPct: 30 },
  { minOutdoorF: 0, maxIndoorRhPct: 25 },
  { minOutdoorF: -10, maxIndoorRhPct: 20 }
];

export function indoorHumidityRecommendationPct(outdoorTempF: number): number {
  const band = HUMIDITY_BANDS.find((b) => outdoorTempF >= b.minOutdoorF);
  return band ? band.maxIndoorRhPct : 15;
}
