import { RecordValidator } from "../../src/core/record-validator";
import { SOURCE_PROFILES } from "../../src/core/source-profiles";
import type { WeatherLocation } from "../../src/core/types";
import { columnIndex, parseDelimited, parseNumericCell } from "../../src/parsers/delimited";
import { generateGridRecords } from "../../src/synthetic/grid";
import { generateHouseholdRecords } from "../../src/synthetic/household";
import { createRandom, seedFrom } from "../../src/synthetic/random";
import { generateWeatherRecords } from "../../src/synthetic/weather";

const LOCATIONS: WeatherLocation[] = [
  { locationId: "north", name: "North", latitude: 60, longitude: 10, timezone: "UTC", countryCode: "NO" },
  { locationId: "south", name: "South", latitude: 37, longitude: -5, timezone: "UTC", countryCode: "ES" }
];

function inBand(score: number) {
  return score >= 0.7 && score <= 0.85;
}

describe("synthetic household data", () => {
  const window = { start: new Date("2024-06-01T18:00:00Z"), end: new Date("2024-06-01T18:09:00Z") };

  it("is deterministic for the same window and quality", () => {
    const first = generateHouseholdRecords(window, "house-1", "high");
    const second = generateHouseholdRecords(window, "house-1", "high");

    expect(first).toHaveLength(10);
    expect(second).toEqual(first);
    expect(generateHouseholdRecords(window, "house-2", "high")).not.toEqual(first);
  });

  it("passes validation with scores inside the synthetic band", () => {
    const records = generateHouseholdRecords(window, "house-1", "high");
    const outcome = new RecordValidator(SOURCE_PROFILES.household).validate(records, "strict", { now: window.end });

    expect(outcome.acceptedCount).toBe(10);
    expect(outcome.warnings).toEqual([]);
    expect(outcome.accepted.every((record) => inBand(record.dataQualityScore))).toBe(true);
  });
});

describe("synthetic weather data", () => {
  const window = { start: new Date("2024-06-01T00:00:00Z"), end: new Date("2024-06-01T05:00:00Z") };

  it("emits hourly rows per location with dew point below temperature", () => {
    const records = generateWeatherRecords(window, LOCATIONS, "basic");

    expect(records).toHaveLength(12);
    expect(records.filter((record) => record.entityKey === "south")).toHaveLength(6);
    for (const { measurements } of records) {
      expect(measurements.dewPoint2mC).not.toBeNull();
      expect(measurements.temperature2mC).not.toBeNull();
      expect((measurements.dewPoint2mC ?? 0) < (measurements.temperature2mC ?? 0)).toBe(true);
    }
  });

  it("passes validation", () => {
    const records = generateWeatherRecords(window, LOCATIONS, "standard");
    const outcome = new RecordValidator(SOURCE_PROFILES.weather).validate(records, "strict", { now: window.end });

    expect(outcome.acceptedCount).toBe(12);
    expect(outcome.isAcceptable).toBe(true);
    expect(outcome.accepted.every((record) => record.dataQualityScore >= 0.55 && record.dataQualityScore <= 0.7)).toBe(true);
  });
});

describe("synthetic grid data", () => {
  const window = { start: new Date("2024-03-02T00:00:00Z"), end: new Date("2024-03-02T02:00:00Z") };

  it("keeps total generation equal to its components", () => {
    const records = generateGridRecords(window, ["fr", "XX"], "high");

    expect(records.map((record) => record.entityKey)).toEqual(["FR", "FR", "FR", "XX", "XX", "XX"]);
    for (const { measurements } of records) {
      const components = [
        measurements.solarGenerationActualMw,
        measurements.windOnshoreGenerationActualMw,
        measurements.windOffshoreGenerationActualMw,
        measurements.hydroGenerationActualMw,
        measurements.nuclearGenerationActualMw,
        measurements.fossilGenerationActualMw,
        measurements.otherRenewableGenerationMw
      ].reduce<number>((acc, value) => acc + (value ?? 0), 0);
      expect(measurements.totalGenerationMw).toBeCloseTo(components, 1);
      expect(measurements.loadActualMw).toBeGreaterThan(0);
    }
  });

  it("passes validation", () => {
    const records = generateGridRecords(window, ["FR", "DE"], "high");
    const outcome = new RecordValidator(SOURCE_PROFILES.grid).validate(records, "strict", { now: window.end });

    expect(outcome.acceptedCount).toBe(6);
    expect(outcome.accepted.every((record) => inBand(record.dataQualityScore))).toBe(true);
  });
});

describe("random helpers", () => {
  it("repeats sequences for equal seeds", () => {
    const a = createRandom(seedFrom("grid", "FR", 1));
    const b = createRandom(seedFrom("grid", "FR", 1));
    const draws = [a(), a(), a()];

    expect([b(), b(), b()]).toEqual(draws);
    expect(draws.every((value) => value >= 0 && value < 1)).toBe(true);
    expect(seedFrom("grid", "FR", 1)).not.toBe(seedFrom("grid", "DE", 1));
  });
});

describe("delimited parsing", () => {
  it("splits header and rows and skips blank lines", () => {
    const table = parseDelimited("\uFEFFa;b\r\n1;2\r\n\r\n3;?\n", ";");
    expect(table).toEqual({ header: ["a", "b"], rows: [["1", "2"], ["3", "?"]] });
    expect(columnIndex(table.header, "B")).toBe(1);
    expect(parseDelimited("", ",")).toEqual({ header: [], rows: [] });
  });

  it("reads numeric cells and missing markers", () => {
    expect(parseNumericCell(" 4.25 ")).toBe(4.25);
    expect(parseNumericCell("?")).toBeNull();
    expect(parseNumericCell("")).toBeNull();
    expect(parseNumericCell("abc")).toBeNull();
    expect(parseNumericCell(undefined)).toBeNull();
  });
});
