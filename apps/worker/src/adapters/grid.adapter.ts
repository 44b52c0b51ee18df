import type { SyntheticQuality, TimeWindow } from "@energy-pipeline/shared";
import { windowContains } from "@energy-pipeline/shared";
import { DateTime } from "luxon";
import { REAL_DATA_BAND } from "../core/source-profiles";
import type { FetchOptions, GridMeasurements, SourceRecord, SourceSettings } from "../core/types";
import { columnIndex, parseDelimited, parseNumericCell } from "../parsers/delimited";
import { generateGridRecords } from "../synthetic/grid";
import { PlannedEndpoint, planDeclaredOrder, SourceAdapter } from "./adapter.interface";
import { HttpTransport, malformedPayload } from "./http-transport";

/** Column suffixes of the 60-minute single-index export, after `<CC>_`. */
const COUNTRY_COLUMNS = {
  loadActualMw: "load_actual_entsoe_transparency",
  loadForecastMw: "load_forecast_entsoe_transparency",
  solarGenerationActualMw: "solar_generation_actual",
  windOnshoreGenerationActualMw: "wind_onshore_generation_actual",
  windOffshoreGenerationActualMw: "wind_offshore_generation_actual",
  hydroGenerationActualMw: "hydro_generation_actual",
  nuclearGenerationActualMw: "nuclear_generation_actual",
  fossilGenerationActualMw: "fossil_gas_generation_actual",
  priceDayAheadEurMwh: "price_day_ahead"
} as const;

type CountryColumn = keyof typeof COUNTRY_COLUMNS;

const GENERATION_FIELDS = [
  "solarGenerationActualMw",
  "windOnshoreGenerationActualMw",
  "windOffshoreGenerationActualMw",
  "hydroGenerationActualMw",
  "nuclearGenerationActualMw",
  "fossilGenerationActualMw"
] as const;

export class GridAdapter implements SourceAdapter<"grid"> {
  readonly source = "grid" as const;

  constructor(
    private readonly transport: HttpTransport,
    private readonly countries: string[]
  ) {}

  planEndpoints(_window: TimeWindow, settings: SourceSettings): PlannedEndpoint[] {
    return planDeclaredOrder(settings);
  }

  async fetchFrom(endpoint: PlannedEndpoint, window: TimeWindow, options: FetchOptions = {}): Promise<SourceRecord<"grid">[]> {
    const text = await this.transport.getText(endpoint.url, options.signal);
    return parseGridCsv(text, this.countries, endpoint, window);
  }

  synthesize(window: TimeWindow, quality: SyntheticQuality): SourceRecord<"grid">[] {
    return generateGridRecords(window, this.countries, quality);
  }
}

export function parseGridCsv(
  text: string,
  countries: string[],
  endpoint: PlannedEndpoint,
  window: TimeWindow
): SourceRecord<"grid">[] {
  const table = parseDelimited(text, ",");
  const timestampIndex = columnIndex(table.header, "utc_timestamp");
  if (timestampIndex < 0) {
    throw malformedPayload(endpoint.url, "missing column utc_timestamp");
  }

  const layouts = countries
    .map((country) => ({ code: country.toUpperCase(), indexes: resolveCountryColumns(table.header, country) }))
    .filter((layout) => layout.indexes.loadActualMw >= 0);
  if (!layouts.length) {
    throw malformedPayload(endpoint.url, `no load columns for ${countries.join(", ")}`);
  }

  const records: SourceRecord<"grid">[] = [];
  for (const row of table.rows) {
    const time = DateTime.fromISO(row[timestampIndex] ?? "", { zone: "utc" });
    if (!time.isValid) {
      continue;
    }
    const timestamp = time.toJSDate();
    if (!windowContains(window, timestamp)) {
      continue;
    }

    for (const layout of layouts) {
      const cell = (column: CountryColumn) => {
        const index = layout.indexes[column];
        return index >= 0 ? parseNumericCell(row[index]) : null;
      };
      records.push({
        source: "grid",
        timestamp,
        entityKey: layout.code,
        measurements: deriveTotals({
          loadActualMw: cell("loadActualMw"),
          loadForecastMw: cell("loadForecastMw"),
          solarGenerationActualMw: cell("solarGenerationActualMw"),
          windOnshoreGenerationActualMw: cell("windOnshoreGenerationActualMw"),
          windOffshoreGenerationActualMw: cell("windOffshoreGenerationActualMw"),
          hydroGenerationActualMw: cell("hydroGenerationActualMw"),
          nuclearGenerationActualMw: cell("nuclearGenerationActualMw"),
          fossilGenerationActualMw: cell("fossilGenerationActualMw"),
          otherRenewableGenerationMw: null,
          totalGenerationMw: null,
          netImportExportMw: null,
          priceDayAheadEurMwh: cell("priceDayAheadEurMwh")
        }),
        dataQualityScore: 0,
        origin: { tier: endpoint.tier, url: endpoint.url, qualityBand: REAL_DATA_BAND }
      });
    }
  }
  return records;
}

/** Fills total generation from the components and net exchange from total minus load. */
export function deriveTotals(measurements: GridMeasurements): GridMeasurements {
  const components = GENERATION_FIELDS.map((field) => measurements[field]).filter(
    (value): value is number => value !== null
  );
  const totalGenerationMw =
    measurements.totalGenerationMw ??
    (components.length ? Math.round(components.reduce((acc, value) => acc + value, 0) * 10) / 10 : null);
  const netImportExportMw =
    measurements.netImportExportMw ??
    (totalGenerationMw !== null && measurements.loadActualMw !== null
      ? Math.round((totalGenerationMw - measurements.loadActualMw) * 10) / 10
      : null);
  return { ...measurements, totalGenerationMw, netImportExportMw };
}

function resolveCountryColumns(header: string[], country: string): Record<CountryColumn, number> {
  const prefix = country.toUpperCase();
  const index = (column: CountryColumn) => columnIndex(header, `${prefix}_${COUNTRY_COLUMNS[column]}`);
  return {
    loadActualMw: index("loadActualMw"),
    loadForecastMw: index("loadForecastMw"),
    solarGenerationActualMw: index("solarGenerationActualMw"),
    windOnshoreGenerationActualMw: index("windOnshoreGenerationActualMw"),
    windOffshoreGenerationActualMw: index("windOffshoreGenerationActualMw"),
    hydroGenerationActualMw: index("hydroGenerationActualMw"),
    nuclearGenerationActualMw: index("nuclearGenerationActualMw"),
    fossilGenerationActualMw: index("fossilGenerationActualMw"),
    priceDayAheadEurMwh: index("priceDayAheadEurMwh")
  };
}
