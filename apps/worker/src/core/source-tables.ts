import type { SourceKind } from "@energy-pipeline/shared";
import type { GridMeasurements, HouseholdMeasurements, SourceRecord, WeatherMeasurements } from "./types";

export type SqlValue = string | number | Date | null;

export interface SourceTable<K extends SourceKind> {
  table: string;
  columns: string[];
  conflictColumns: string[];
  toRow(record: SourceRecord<K>): SqlValue[];
}

const householdColumns: Array<[keyof HouseholdMeasurements, string]> = [
  ["globalActivePower", "global_active_power"],
  ["globalReactivePower", "global_reactive_power"],
  ["voltage", "voltage"],
  ["globalIntensity", "global_intensity"],
  ["subMetering1", "sub_metering_1"],
  ["subMetering2", "sub_metering_2"],
  ["subMetering3", "sub_metering_3"],
  ["calculatedOtherConsumption", "calculated_other_consumption"]
];

const weatherColumns: Array<[keyof WeatherMeasurements, string]> = [
  ["latitude", "latitude"],
  ["longitude", "longitude"],
  ["temperature2mC", "temperature_2m_c"],
  ["relativeHumidity2mPct", "relative_humidity_2m_pct"],
  ["dewPoint2mC", "dew_point_2m_c"],
  ["apparentTemperatureC", "apparent_temperature_c"],
  ["rainMm", "rain_mm"],
  ["shortwaveRadiationWM2", "shortwave_radiation_w_m2"],
  ["windSpeed10mKmh", "wind_speed_10m_kmh"],
  ["windDirection10mDeg", "wind_direction_10m_deg"],
  ["windGusts10mKmh", "wind_gusts_10m_kmh"],
  ["cloudCoverPct", "cloud_cover_pct"],
  ["surfacePressureHpa", "surface_pressure_hpa"],
  ["visibilityM", "visibility_m"]
];

const gridColumns: Array<[keyof GridMeasurements, string]> = [
  ["loadActualMw", "load_actual_mw"],
  ["loadForecastMw", "load_forecast_mw"],
  ["solarGenerationActualMw", "solar_generation_actual_mw"],
  ["windOnshoreGenerationActualMw", "wind_onshore_generation_actual_mw"],
  ["windOffshoreGenerationActualMw", "wind_offshore_generation_actual_mw"],
  ["hydroGenerationActualMw", "hydro_generation_actual_mw"],
  ["nuclearGenerationActualMw", "nuclear_generation_actual_mw"],
  ["fossilGenerationActualMw", "fossil_generation_actual_mw"],
  ["otherRenewableGenerationMw", "other_renewable_generation_mw"],
  ["totalGenerationMw", "total_generation_mw"],
  ["netImportExportMw", "net_import_export_mw"],
  ["priceDayAheadEurMwh", "price_day_ahead_eur_mwh"]
];

/** Short provenance tag stored beside each row. */
export function sourceTag(record: SourceRecord<SourceKind>): string {
  const { tier, url } = record.origin;
  return url ? `${tier}:${url}` : tier;
}

function qualityFlags(record: SourceRecord<SourceKind>): string {
  return JSON.stringify({
    score: record.dataQualityScore,
    tier: record.origin.tier,
    url: record.origin.url
  });
}

export const SOURCE_TABLES: { [K in SourceKind]: SourceTable<K> } = {
  household: {
    table: "household.consumption",
    columns: [
      "timestamp",
      "household_id",
      ...householdColumns.map(([, column]) => column),
      "data_quality_score",
      "source_file"
    ],
    conflictColumns: ["timestamp", "household_id"],
    toRow: (record) => [
      record.timestamp,
      record.entityKey,
      ...householdColumns.map(([field]) => record.measurements[field]),
      record.dataQualityScore,
      sourceTag(record)
    ]
  },
  weather: {
    table: "weather.observations",
    columns: [
      "timestamp",
      "location_id",
      ...weatherColumns.map(([, column]) => column),
      "data_provider",
      "quality_control_flags"
    ],
    conflictColumns: ["timestamp", "location_id"],
    toRow: (record) => [
      record.timestamp,
      record.entityKey,
      ...weatherColumns.map(([field]) => record.measurements[field]),
      sourceTag(record),
      qualityFlags(record)
    ]
  },
  grid: {
    table: "grid.operations",
    columns: [
      "timestamp",
      "country_code",
      "region_code",
      ...gridColumns.map(([, column]) => column),
      "source",
      "data_quality_flags"
    ],
    conflictColumns: ["timestamp", "country_code", "region_code"],
    toRow: (record) => [
      record.timestamp,
      record.entityKey,
      record.entityKey,
      ...gridColumns.map(([field]) => record.measurements[field]),
      sourceTag(record),
      qualityFlags(record)
    ]
  }
};

export function buildUpsertStatement<K extends SourceKind>(
  table: SourceTable<K>,
  records: SourceRecord<K>[]
): { text: string; values: SqlValue[] } {
  const values: SqlValue[] = [];
  const tuples = records.map((record) => {
    const row = table.toRow(record);
    const placeholders = row.map((value) => {
      values.push(value);
      return `$${values.length}`;
    });
    return `(${placeholders.join(", ")}, now())`;
  });

  const updates = table.columns
    .filter((column) => !table.conflictColumns.includes(column))
    .map((column) => `${column} = excluded.${column}`);

  const text = `
      insert into ${table.table} (${table.columns.join(", ")}, ingestion_timestamp)
      values ${tuples.join(",\n        ")}
      on conflict (${table.conflictColumns.join(", ")}) do update set
        ${[...updates, "ingestion_timestamp = excluded.ingestion_timestamp"].join(",\n        ")}
      returning (xmax = 0) as inserted
      `;
  return { text, values };
}
