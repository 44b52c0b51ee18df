import type { SyntheticQuality, TimeWindow } from "@energy-pipeline/shared";
import { enumerateSteps } from "@energy-pipeline/shared";
import { SYNTHETIC_BANDS } from "../core/source-profiles";
import type { SourceRecord, WeatherLocation } from "../core/types";
import { clamp, createRandom, exponential, gaussian, NOISE_SCALE, roundTo, seedFrom } from "./random";

/**
 * Hourly observations per location: a diurnal temperature curve peaking
 * mid-afternoon, cooler at higher latitudes, radiation only in daylight.
 */
export function generateWeatherRecords(
  window: TimeWindow,
  locations: WeatherLocation[],
  quality: SyntheticQuality
): SourceRecord<"weather">[] {
  const noise = NOISE_SCALE[quality];
  const steps = enumerateSteps(window, 60);
  const records: SourceRecord<"weather">[] = [];

  for (const location of locations) {
    const rng = createRandom(seedFrom("weather", location.locationId, window.start.getTime(), quality));
    const baseTemperature = 15 - (Math.abs(location.latitude) - 45) * 0.4;

    for (const timestamp of steps) {
      const hour = timestamp.getUTCHours();
      const temperature = clamp(
        baseTemperature + 6 * Math.sin((2 * Math.PI * (hour - 9)) / 24) + gaussian(rng) * 2 * noise,
        -55,
        55
      );
      const humidity = clamp(60 - 1.5 * (temperature - baseTemperature) + gaussian(rng) * 10 * noise, 5, 100);
      const dewSpread = 2 + Math.abs(gaussian(rng)) * 3 * noise + (100 - humidity) / 10;
      const windSpeed = clamp(10 + exponential(rng, 5 * noise), 0, 150);
      const daylight = Math.sin((Math.PI * (hour - 6)) / 12);

      records.push({
        source: "weather",
        timestamp,
        entityKey: location.locationId,
        measurements: {
          latitude: location.latitude,
          longitude: location.longitude,
          temperature2mC: roundTo(temperature, 2),
          relativeHumidity2mPct: roundTo(humidity, 1),
          dewPoint2mC: roundTo(temperature - dewSpread, 2),
          apparentTemperatureC: roundTo(temperature - windSpeed * 0.05, 2),
          rainMm: roundTo(clamp(exponential(rng, 0.1 * noise), 0, 50), 2),
          shortwaveRadiationWM2: roundTo(daylight > 0 ? 500 * daylight * (0.5 + rng() * 0.5) : 0, 1),
          windSpeed10mKmh: roundTo(windSpeed, 1),
          windDirection10mDeg: roundTo(rng() * 360, 0),
          windGusts10mKmh: roundTo(clamp(windSpeed * (1.3 + rng() * 0.4), 0, 250), 1),
          cloudCoverPct: roundTo(rng() * 100, 0),
          surfacePressureHpa: roundTo(clamp(1013 + gaussian(rng) * 10 * noise, 950, 1050), 1),
          visibilityM: roundTo(clamp(20000 + gaussian(rng) * 8000 * noise, 1000, 50000), 0)
        },
        dataQualityScore: SYNTHETIC_BANDS[quality].floor,
        origin: { tier: "synthetic", url: null, qualityBand: SYNTHETIC_BANDS[quality] }
      });
    }
  }

  return records;
}
