import type { SyntheticQuality, TimeWindow } from "@energy-pipeline/shared";
import { enumerateSteps } from "@energy-pipeline/shared";
import { SYNTHETIC_BANDS } from "../core/source-profiles";
import type { SourceRecord } from "../core/types";
import { clamp, createRandom, gaussian, NOISE_SCALE, roundTo, seedFrom } from "./random";

/** Minute readings with an evening appliance peak around 19:00 UTC. */
export function generateHouseholdRecords(
  window: TimeWindow,
  householdId: string,
  quality: SyntheticQuality
): SourceRecord<"household">[] {
  const noise = NOISE_SCALE[quality];
  const rng = createRandom(seedFrom("household", householdId, window.start.getTime(), quality));

  return enumerateSteps(window, 1).map((timestamp) => {
    const hour = timestamp.getUTCHours() + timestamp.getUTCMinutes() / 60;
    const base = 0.5 + 0.3 * (1 + Math.cos((2 * Math.PI * (hour - 19)) / 24));
    const activePower = clamp(base + gaussian(rng) * 0.2 * noise, 0.05, 19);
    const activeEnergyWh = (activePower * 1000) / 60;

    const kitchen = activeEnergyWh * clamp(0.1 + gaussian(rng) * 0.03 * noise, 0, 0.2);
    const laundry = activeEnergyWh * clamp(0.08 + gaussian(rng) * 0.03 * noise, 0, 0.2);
    const heating = activeEnergyWh * clamp(0.35 + gaussian(rng) * 0.05 * noise, 0, 0.5);
    const subMetering1 = roundTo(kitchen, 3);
    const subMetering2 = roundTo(laundry, 3);
    const subMetering3 = roundTo(heating, 3);

    return {
      source: "household",
      timestamp,
      entityKey: householdId,
      measurements: {
        globalActivePower: roundTo(activePower, 3),
        globalReactivePower: roundTo(clamp(activePower * 0.2 + gaussian(rng) * 0.05 * noise, 0, 5), 3),
        voltage: roundTo(clamp(240 + gaussian(rng) * 5 * noise, 225, 255), 2),
        globalIntensity: roundTo(clamp(activePower * 4.2 + gaussian(rng) * 0.5 * noise, 0, 90), 2),
        subMetering1,
        subMetering2,
        subMetering3,
        calculatedOtherConsumption: roundTo(
          Math.max(0, roundTo(activeEnergyWh, 3) - subMetering1 - subMetering2 - subMetering3),
          3
        )
      },
      dataQualityScore: SYNTHETIC_BANDS[quality].floor,
      origin: { tier: "synthetic", url: null, qualityBand: SYNTHETIC_BANDS[quality] }
    };
  });
}
