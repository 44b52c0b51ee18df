import type { SyntheticQuality, TimeWindow } from "@energy-pipeline/shared";
import { describeError, windowContains } from "@energy-pipeline/shared";
import { unzipSync } from "fflate";
import { REAL_DATA_BAND } from "../core/source-profiles";
import type { FetchOptions, SourceRecord, SourceSettings } from "../core/types";
import { columnIndex, parseDelimited, parseNumericCell } from "../parsers/delimited";
import { generateHouseholdRecords } from "../synthetic/household";
import { PlannedEndpoint, planDeclaredOrder, SourceAdapter } from "./adapter.interface";
import { HttpTransport, malformedPayload } from "./http-transport";

const UCI_COLUMNS = {
  date: "Date",
  time: "Time",
  globalActivePower: "Global_active_power",
  globalReactivePower: "Global_reactive_power",
  voltage: "Voltage",
  globalIntensity: "Global_intensity",
  subMetering1: "Sub_metering_1",
  subMetering2: "Sub_metering_2",
  subMetering3: "Sub_metering_3"
} as const;

export class HouseholdAdapter implements SourceAdapter<"household"> {
  readonly source = "household" as const;

  constructor(
    private readonly transport: HttpTransport,
    private readonly householdId: string
  ) {}

  planEndpoints(_window: TimeWindow, settings: SourceSettings): PlannedEndpoint[] {
    return planDeclaredOrder(settings);
  }

  async fetchFrom(
    endpoint: PlannedEndpoint,
    window: TimeWindow,
    options: FetchOptions = {}
  ): Promise<SourceRecord<"household">[]> {
    const payload = await this.transport.getBytes(endpoint.url, options.signal);
    const text = extractCsvText(endpoint.url, payload);
    return parseHouseholdCsv(text, this.householdId, endpoint, window);
  }

  synthesize(window: TimeWindow, quality: SyntheticQuality): SourceRecord<"household">[] {
    return generateHouseholdRecords(window, this.householdId, quality);
  }
}

export function extractCsvText(url: string, payload: Uint8Array): string {
  if (!isZipArchive(payload)) {
    return new TextDecoder("utf-8").decode(payload);
  }

  let entries: Record<string, Uint8Array>;
  try {
    entries = unzipSync(payload);
  } catch (error) {
    throw malformedPayload(url, `unreadable ZIP archive (${describeError(error)})`);
  }
  const name = Object.keys(entries)
    .filter((entry) => /\.(txt|csv)$/i.test(entry) && !entry.startsWith("__MACOSX/"))
    .sort()[0];
  if (!name) {
    throw malformedPayload(url, "ZIP archive has no .txt or .csv entry");
  }
  return new TextDecoder("utf-8").decode(entries[name]);
}

export function parseHouseholdCsv(
  text: string,
  householdId: string,
  endpoint: PlannedEndpoint,
  window: TimeWindow
): SourceRecord<"household">[] {
  const table = parseDelimited(text, ";");
  const resolve = (name: string) => {
    const index = columnIndex(table.header, name);
    if (index < 0) {
      throw malformedPayload(endpoint.url, `missing column ${name}`);
    }
    return index;
  };
  const indexes = {
    date: resolve(UCI_COLUMNS.date),
    time: resolve(UCI_COLUMNS.time),
    globalActivePower: resolve(UCI_COLUMNS.globalActivePower),
    globalReactivePower: resolve(UCI_COLUMNS.globalReactivePower),
    voltage: resolve(UCI_COLUMNS.voltage),
    globalIntensity: resolve(UCI_COLUMNS.globalIntensity),
    subMetering1: resolve(UCI_COLUMNS.subMetering1),
    subMetering2: resolve(UCI_COLUMNS.subMetering2),
    subMetering3: resolve(UCI_COLUMNS.subMetering3)
  };

  const records: SourceRecord<"household">[] = [];
  for (const row of table.rows) {
    const timestamp = parseUciTimestamp(row[indexes.date], row[indexes.time]);
    if (!timestamp || !windowContains(window, timestamp)) {
      continue;
    }

    const globalActivePower = parseNumericCell(row[indexes.globalActivePower]);
    const subMetering1 = parseNumericCell(row[indexes.subMetering1]);
    const subMetering2 = parseNumericCell(row[indexes.subMetering2]);
    const subMetering3 = parseNumericCell(row[indexes.subMetering3]);

    records.push({
      source: "household",
      timestamp,
      entityKey: householdId,
      measurements: {
        globalActivePower,
        globalReactivePower: parseNumericCell(row[indexes.globalReactivePower]),
        voltage: parseNumericCell(row[indexes.voltage]),
        globalIntensity: parseNumericCell(row[indexes.globalIntensity]),
        subMetering1,
        subMetering2,
        subMetering3,
        calculatedOtherConsumption: calculateOtherConsumption(globalActivePower, [
          subMetering1,
          subMetering2,
          subMetering3
        ])
      },
      dataQualityScore: 0,
      origin: { tier: endpoint.tier, url: endpoint.url, qualityBand: REAL_DATA_BAND }
    });
  }
  return records;
}

/** Minute energy (Wh) not covered by the sub-meters. */
export function calculateOtherConsumption(globalActivePower: number | null, subMeters: Array<number | null>): number | null {
  if (globalActivePower === null) {
    return null;
  }
  const subMetered = subMeters.reduce<number>((acc, value) => acc + (value ?? 0), 0);
  return Math.round(((globalActivePower * 1000) / 60 - subMetered) * 1000) / 1000;
}

/** UCI exports write `d/m/yyyy` and `hh:mm:ss`, read here as UTC. */
export function parseUciTimestamp(date: string | undefined, time: string | undefined): Date | null {
  const dateMatch = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/.exec(date?.trim() ?? "");
  const timeMatch = /^(\d{1,2}):(\d{2})(?::(\d{2}))?$/.exec(time?.trim() ?? "");
  if (!dateMatch || !timeMatch) {
    return null;
  }
  const [, day, month, year] = dateMatch;
  const [, hour, minute, second] = timeMatch;
  const value = new Date(
    Date.UTC(Number(year), Number(month) - 1, Number(day), Number(hour), Number(minute), Number(second ?? 0))
  );
  if (value.getUTCDate() !== Number(day) || value.getUTCMonth() !== Number(month) - 1) {
    return null;
  }
  return value;
}

function isZipArchive(payload: Uint8Array): boolean {
  return payload.length >= 4 && payload[0] === 0x50 && payload[1] === 0x4b && payload[2] === 0x03 && payload[3] === 0x04;
}
