import type { SyntheticQuality, TimeWindow } from "@energy-pipeline/shared";
import { describeError, hoursBetween, toUtcDate, windowContains } from "@energy-pipeline/shared";
import { DateTime } from "luxon";
import { z } from "zod";
import { PermanentFetchError, RunCancelled, TransientFetchError } from "../core/errors";
import type { LoggerLike } from "../core/logger";
import { silentLogger } from "../core/logger";
import { REAL_DATA_BAND } from "../core/source-profiles";
import type { FetchOptions, SourceRecord, SourceSettings, WeatherLocation, WeatherMeasurements } from "../core/types";
import { generateWeatherRecords } from "../synthetic/weather";
import { PlannedEndpoint, planDeclaredOrder, SourceAdapter } from "./adapter.interface";
import { HttpTransport, malformedPayload } from "./http-transport";

/** Windows ending longer ago than this are served from the archive first. */
export const ARCHIVE_CUTOFF_HOURS = 5 * 24;

const HOURLY_VARIABLES = {
  temperature_2m: "temperature2mC",
  relative_humidity_2m: "relativeHumidity2mPct",
  dew_point_2m: "dewPoint2mC",
  apparent_temperature: "apparentTemperatureC",
  rain: "rainMm",
  shortwave_radiation: "shortwaveRadiationWM2",
  wind_speed_10m: "windSpeed10mKmh",
  wind_direction_10m: "windDirection10mDeg",
  wind_gusts_10m: "windGusts10mKmh",
  cloud_cover: "cloudCoverPct",
  surface_pressure: "surfacePressureHpa",
  visibility: "visibilityM"
} as const satisfies Record<string, keyof WeatherMeasurements>;

const seriesSchema = z.array(z.number().nullable()).optional();

const hourlyPayloadSchema = z.object({
  hourly: z.object({
    time: z.array(z.string()),
    temperature_2m: seriesSchema,
    relative_humidity_2m: seriesSchema,
    dew_point_2m: seriesSchema,
    apparent_temperature: seriesSchema,
    rain: seriesSchema,
    shortwave_radiation: seriesSchema,
    wind_speed_10m: seriesSchema,
    wind_direction_10m: seriesSchema,
    wind_gusts_10m: seriesSchema,
    cloud_cover: seriesSchema,
    surface_pressure: seriesSchema,
    visibility: seriesSchema
  })
});

type HourlyPayload = z.infer<typeof hourlyPayloadSchema>["hourly"];

export class WeatherAdapter implements SourceAdapter<"weather"> {
  readonly source = "weather" as const;

  constructor(
    private readonly transport: HttpTransport,
    private readonly locations: WeatherLocation[],
    private readonly logger: LoggerLike = silentLogger
  ) {}

  planEndpoints(window: TimeWindow, settings: SourceSettings, now: Date): PlannedEndpoint[] {
    const archive: PlannedEndpoint = { url: settings.endpointUrl, tier: "primary", params: { models: "era5" } };
    const declared = planDeclaredOrder(settings).slice(1);
    if (!settings.forecastUrl) {
      return [archive, ...declared];
    }

    const forecast: PlannedEndpoint = { url: settings.forecastUrl, tier: "primary" };
    const historical = hoursBetween(window.end, now) > ARCHIVE_CUTOFF_HOURS;
    const ordered = historical ? [archive, forecast] : [forecast, archive];
    return [
      ordered[0],
      ...ordered.slice(1).map((endpoint): PlannedEndpoint => ({ ...endpoint, tier: "fallback" })),
      ...declared.filter((endpoint) => endpoint.url !== settings.forecastUrl)
    ];
  }

  async fetchFrom(
    endpoint: PlannedEndpoint,
    window: TimeWindow,
    options: FetchOptions = {}
  ): Promise<SourceRecord<"weather">[]> {
    const records: SourceRecord<"weather">[] = [];
    const failures: Array<{ location: WeatherLocation; error: unknown }> = [];
    for (const location of this.locations) {
      const url = buildRequestUrl(endpoint, location, window);
      try {
        const payload = await this.transport.getJson(url, options.signal);
        records.push(...parseHourlyPayload(payload, location, endpoint, window));
      } catch (error) {
        if (error instanceof RunCancelled) {
          throw error;
        }
        failures.push({ location, error });
      }
    }

    if (failures.length && failures.length === this.locations.length) {
      throw combineLocationFailures(endpoint.url, failures);
    }
    for (const { location, error } of failures) {
      this.logger.warn(
        { endpoint: endpoint.url, location_id: location.locationId, error: describeError(error) },
        "Weather location failed, keeping the other locations"
      );
    }
    return records;
  }

  synthesize(window: TimeWindow, quality: SyntheticQuality): SourceRecord<"weather">[] {
    return generateWeatherRecords(window, this.locations, quality);
  }
}

/** Every location failed: transient when any single failure was. */
function combineLocationFailures(
  url: string,
  failures: Array<{ location: WeatherLocation; error: unknown }>
): TransientFetchError | PermanentFetchError {
  const message = `All weather locations failed at ${url}: ${failures
    .map(({ location, error }) => `${location.locationId} (${describeError(error)})`)
    .join("; ")}`;
  const cause = failures[0].error;
  if (failures.some(({ error }) => error instanceof TransientFetchError)) {
    return new TransientFetchError({ url, message, cause });
  }
  return new PermanentFetchError({ url, message, cause });
}

export function buildRequestUrl(endpoint: PlannedEndpoint, location: WeatherLocation, window: TimeWindow): string {
  const url = new URL(endpoint.url);
  url.searchParams.set("latitude", String(location.latitude));
  url.searchParams.set("longitude", String(location.longitude));
  url.searchParams.set("start_date", toUtcDate(window.start));
  url.searchParams.set("end_date", toUtcDate(window.end));
  url.searchParams.set("hourly", Object.keys(HOURLY_VARIABLES).join(","));
  url.searchParams.set("timezone", "UTC");
  for (const [key, value] of Object.entries(endpoint.params ?? {})) {
    url.searchParams.set(key, value);
  }
  return url.toString();
}

export function parseHourlyPayload(
  payload: unknown,
  location: WeatherLocation,
  endpoint: PlannedEndpoint,
  window: TimeWindow
): SourceRecord<"weather">[] {
  const parsed = hourlyPayloadSchema.safeParse(payload);
  if (!parsed.success) {
    throw malformedPayload(endpoint.url, parsed.error.issues.map((issue) => issue.path.join(".") || issue.message).join(", "));
  }

  const hourly = parsed.data.hourly;
  const records: SourceRecord<"weather">[] = [];
  hourly.time.forEach((rawTime, index) => {
    const time = DateTime.fromISO(rawTime, { zone: "utc" });
    if (!time.isValid) {
      return;
    }
    const timestamp = time.toJSDate();
    if (!windowContains(window, timestamp)) {
      return;
    }

    const value = (variable: keyof typeof HOURLY_VARIABLES) => seriesValue(hourly, variable, index);
    records.push({
      source: "weather",
      timestamp,
      entityKey: location.locationId,
      measurements: {
        latitude: location.latitude,
        longitude: location.longitude,
        temperature2mC: value("temperature_2m"),
        relativeHumidity2mPct: value("relative_humidity_2m"),
        dewPoint2mC: value("dew_point_2m"),
        apparentTemperatureC: value("apparent_temperature"),
        rainMm: value("rain"),
        shortwaveRadiationWM2: value("shortwave_radiation"),
        windSpeed10mKmh: value("wind_speed_10m"),
        windDirection10mDeg: value("wind_direction_10m"),
        windGusts10mKmh: value("wind_gusts_10m"),
        cloudCoverPct: value("cloud_cover"),
        surfacePressureHpa: value("surface_pressure"),
        visibilityM: value("visibility")
      },
      dataQualityScore: 0,
      origin: { tier: endpoint.tier, url: endpoint.url, qualityBand: REAL_DATA_BAND }
    });
  });
  return records;
}

function seriesValue(hourly: HourlyPayload, variable: keyof typeof HOURLY_VARIABLES, index: number): number | null {
  const series = hourly[variable];
  const value = series?.[index];
  return typeof value === "number" ? value : null;
}
