import { deriveTotals, parseGridCsv } from "../../src/adapters/grid.adapter";

const ENDPOINT = { url: "https://grid.example.test/time_series_60min.csv", tier: "fallback" as const };
const WINDOW = { start: new Date("2024-03-01T10:00:00Z"), end: new Date("2024-03-01T11:00:00Z") };

const CSV = [
  [
    "utc_timestamp",
    "cet_cest_timestamp",
    "FR_load_actual_entsoe_transparency",
    "FR_solar_generation_actual",
    "FR_nuclear_generation_actual",
    "DE_load_actual_entsoe_transparency",
    "DE_solar_generation_actual",
    "DE_wind_onshore_generation_actual",
    "DE_price_day_ahead"
  ].join(","),
  "2024-03-01T09:00:00Z,2024-03-01T10:00:00+0100,51000,2000,39000,59000,7000,11000,70",
  "2024-03-01T10:00:00Z,2024-03-01T11:00:00+0100,52000.5,3000.2,40000.1,61000,8000.4,12000.3,75.5",
  "2024-03-01T11:00:00Z,2024-03-01T12:00:00+0100,,,,60000,,,"
].join("\n");

describe("parseGridCsv", () => {
  it("emits one record per configured country and hour", () => {
    const records = parseGridCsv(CSV, ["fr", "de", "it"], ENDPOINT, WINDOW);

    expect(records.map((record) => `${record.entityKey}@${record.timestamp.toISOString()}`)).toEqual([
      "FR@2024-03-01T10:00:00.000Z",
      "DE@2024-03-01T10:00:00.000Z",
      "FR@2024-03-01T11:00:00.000Z",
      "DE@2024-03-01T11:00:00.000Z"
    ]);
    expect(records[0].origin).toEqual({ tier: "fallback", url: ENDPOINT.url, qualityBand: { floor: 0, ceiling: 1 } });
  });

  it("derives total generation and net exchange from the components", () => {
    const [france, germany] = parseGridCsv(CSV, ["FR", "DE"], ENDPOINT, WINDOW);

    expect(france.measurements.loadActualMw).toBe(52000.5);
    expect(france.measurements.windOnshoreGenerationActualMw).toBeNull();
    expect(france.measurements.totalGenerationMw).toBeCloseTo(43000.3, 5);
    expect(france.measurements.netImportExportMw).toBeCloseTo(-9000.2, 5);

    expect(germany.measurements.totalGenerationMw).toBeCloseTo(20000.7, 5);
    expect(germany.measurements.netImportExportMw).toBeCloseTo(-40999.3, 5);
    expect(germany.measurements.priceDayAheadEurMwh).toBe(75.5);
  });

  it("leaves totals empty when no component is reported", () => {
    const records = parseGridCsv(CSV, ["FR", "DE"], ENDPOINT, WINDOW);
    const [franceLate, germanyLate] = records.slice(2);

    expect(franceLate.measurements.loadActualMw).toBeNull();
    expect(franceLate.measurements.totalGenerationMw).toBeNull();
    expect(germanyLate.measurements.loadActualMw).toBe(60000);
    expect(germanyLate.measurements.totalGenerationMw).toBeNull();
    expect(germanyLate.measurements.netImportExportMw).toBeNull();
  });

  it("rejects exports without a timestamp or load column", () => {
    expect(() => parseGridCsv("timestamp,FR_load_actual_entsoe_transparency\n", ["FR"], ENDPOINT, WINDOW)).toThrow(
      `Malformed payload from ${ENDPOINT.url}: missing column utc_timestamp`
    );
    expect(() => parseGridCsv(CSV, ["IT"], ENDPOINT, WINDOW)).toThrow(
      `Malformed payload from ${ENDPOINT.url}: no load columns for IT`
    );
  });
});

describe("deriveTotals", () => {
  it("keeps reported totals", () => {
    const measurements = deriveTotals({
      loadActualMw: 100,
      loadForecastMw: null,
      solarGenerationActualMw: 10,
      windOnshoreGenerationActualMw: null,
      windOffshoreGenerationActualMw: null,
      hydroGenerationActualMw: null,
      nuclearGenerationActualMw: null,
      fossilGenerationActualMw: null,
      otherRenewableGenerationMw: null,
      totalGenerationMw: 120,
      netImportExportMw: null,
      priceDayAheadEurMwh: null
    });

    expect(measurements.totalGenerationMw).toBe(120);
    expect(measurements.netImportExportMw).toBe(20);
  });
});
