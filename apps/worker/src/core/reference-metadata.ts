import type { HouseholdMetadata, WeatherLocation } from "./types";

export interface Queryable {
  query(text: string, values?: unknown[]): Promise<{ rowCount: number | null }>;
}

/** Upserts one `weather.stations` row per configured location. Returns the row count. */
export async function seedWeatherStations(db: Queryable, locations: WeatherLocation[]): Promise<number> {
  if (!locations.length) {
    return 0;
  }

  const values: Array<string | number> = [];
  const tuples = locations.map((location) => {
    values.push(
      location.locationId,
      location.name,
      location.latitude,
      location.longitude,
      location.timezone,
      location.countryCode
    );
    const offset = values.length - 6;
    return `($${offset + 1}, $${offset + 2}, $${offset + 3}, $${offset + 4}, $${offset + 5}, $${offset + 6}, 'synoptic', 'open-meteo')`;
  });

  const result = await db.query(
    `
    insert into weather.stations (
      location_id,
      station_name,
      latitude,
      longitude,
      timezone,
      country_code,
      station_type,
      data_provider
    )
    values ${tuples.join(", ")}
    on conflict (location_id) do update
      set station_name = excluded.station_name,
          latitude = excluded.latitude,
          longitude = excluded.longitude,
          timezone = excluded.timezone,
          country_code = excluded.country_code
    `,
    values
  );
  return result.rowCount ?? 0;
}

export async function seedHouseholdMetadata(
  db: Queryable,
  householdId: string,
  metadata: HouseholdMetadata | undefined
): Promise<number> {
  if (!metadata) {
    return 0;
  }

  const result = await db.query(
    `
    insert into household.metadata (
      household_id,
      location_name,
      latitude,
      longitude,
      timezone,
      installation_date,
      meter_type,
      sampling_frequency,
      data_source
    )
    values ($1, $2, $3, $4, $5, $6, $7, $8::interval, $9)
    on conflict (household_id) do update
      set location_name = excluded.location_name,
          latitude = excluded.latitude,
          longitude = excluded.longitude,
          timezone = excluded.timezone,
          installation_date = excluded.installation_date,
          meter_type = excluded.meter_type,
          sampling_frequency = excluded.sampling_frequency,
          data_source = excluded.data_source,
          updated_at = now()
    `,
    [
      householdId,
      metadata.locationName,
      metadata.latitude,
      metadata.longitude,
      metadata.timezone,
      metadata.installationDate ?? null,
      metadata.meterType,
      `${metadata.samplingMinutes} minutes`,
      metadata.dataSource
    ]
  );
  return result.rowCount ?? 0;
}
