import type { SyntheticQuality, TimeWindow } from "@energy-pipeline/shared";
import { enumerateSteps } from "@energy-pipeline/shared";
import { SYNTHETIC_BANDS } from "../core/source-profiles";
import type { SourceRecord } from "../core/types";
import { clamp, createRandom, exponential, gaussian, NOISE_SCALE, roundTo, seedFrom } from "./random";

const BASE_LOAD_MW: Record<string, number> = {
  FR: 50000,
  DE: 60000,
  ES: 35000
};

const DEFAULT_BASE_LOAD_MW = 40000;

export function generateGridRecords(
  window: TimeWindow,
  countries: string[],
  quality: SyntheticQuality
): SourceRecord<"grid">[] {
  const noise = NOISE_SCALE[quality];
  const steps = enumerateSteps(window, 60);
  const records: SourceRecord<"grid">[] = [];

  for (const country of countries) {
    const code = country.toUpperCase();
    const baseLoad = BASE_LOAD_MW[code] ?? DEFAULT_BASE_LOAD_MW;
    const rng = createRandom(seedFrom("grid", code, window.start.getTime(), quality));

    for (const timestamp of steps) {
      const hour = timestamp.getUTCHours();
      const weekday = timestamp.getUTCDay();
      const dailyFactor = 0.8 + 0.4 * (1 + Math.cos((2 * Math.PI * (hour - 19)) / 24));
      const weeklyFactor = weekday === 0 || weekday === 6 ? 0.7 : 0.9;
      const load = Math.max(1000, baseLoad * dailyFactor * weeklyFactor + gaussian(rng) * baseLoad * 0.05 * noise);

      const solar = hour >= 6 && hour <= 18 ? Math.max(0, 3000 + gaussian(rng) * 1000 * noise) : 0;
      const windOnshore = clamp(exponential(rng, 8000), 0, baseLoad);
      const windOffshore = clamp(exponential(rng, 4000), 0, baseLoad);
      const hydro = Math.max(0, baseLoad * 0.1 + gaussian(rng) * 500 * noise);
      const nuclear = Math.max(0, baseLoad * 0.7 + gaussian(rng) * 1000 * noise);
      const fossil = Math.max(0, load - (solar + windOnshore + windOffshore + hydro + nuclear));
      const otherRenewable = Math.max(0, 1000 + gaussian(rng) * 300 * noise);

      const components = [solar, windOnshore, windOffshore, hydro, nuclear, fossil, otherRenewable].map((value) =>
        roundTo(value, 1)
      );
      const [solarMw, onshoreMw, offshoreMw, hydroMw, nuclearMw, fossilMw, otherMw] = components;
      const total = roundTo(
        components.reduce((acc, value) => acc + value, 0),
        1
      );
      const loadMw = roundTo(load, 1);

      records.push({
        source: "grid",
        timestamp,
        entityKey: code,
        measurements: {
          loadActualMw: loadMw,
          loadForecastMw: roundTo(Math.max(0, load * (1 + gaussian(rng) * 0.02 * noise)), 1),
          solarGenerationActualMw: solarMw,
          windOnshoreGenerationActualMw: onshoreMw,
          windOffshoreGenerationActualMw: offshoreMw,
          hydroGenerationActualMw: hydroMw,
          nuclearGenerationActualMw: nuclearMw,
          fossilGenerationActualMw: fossilMw,
          otherRenewableGenerationMw: otherMw,
          totalGenerationMw: total,
          netImportExportMw: roundTo(total - loadMw, 1),
          priceDayAheadEurMwh: roundTo(clamp(50 + gaussian(rng) * 20 * noise, -100, 500), 2)
        },
        dataQualityScore: SYNTHETIC_BANDS[quality].floor,
        origin: { tier: "synthetic", url: null, qualityBand: SYNTHETIC_BANDS[quality] }
      });
    }
  }

  return records;
}
