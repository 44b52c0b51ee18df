import type { SourceKind, SyntheticQuality, TimeWindow } from "@energy-pipeline/shared";
import { PlannedEndpoint, planDeclaredOrder, SourceAdapter } from "../src/adapters/adapter.interface";
import { PermanentFetchError } from "../src/core/errors";
import type { JobRepository, NewIngestionJob } from "../src/core/job-tracker";
import type { ChunkWriter, ChunkWriteResult } from "../src/core/record-upserter";
import { REAL_DATA_BAND } from "../src/core/source-profiles";
import type {
  GridMeasurements,
  HouseholdMeasurements,
  IngestionJob,
  RecordOrigin,
  SourceRecord,
  SourceSettings
} from "../src/core/types";

export const PRIMARY_URL = "https://primary.example.test/data";
export const MIRROR_URL = "https://mirror.example.test/data";

export const WINDOW: TimeWindow = {
  start: new Date("2024-06-01T10:00:00Z"),
  end: new Date("2024-06-01T12:00:00Z")
};

export function sourceSettings(overrides: Partial<SourceSettings> = {}): SourceSettings {
  return {
    endpointUrl: PRIMARY_URL,
    fallbackUrls: [MIRROR_URL],
    enableSyntheticFallback: false,
    syntheticQuality: "high",
    intervalSeconds: 60,
    lookbackMinutes: 60,
    ...overrides
  };
}

export function householdRecord(
  timestamp: Date,
  overrides: Partial<HouseholdMeasurements> = {},
  origin: Partial<RecordOrigin> = {}
): SourceRecord<"household"> {
  return {
    source: "household",
    timestamp,
    entityKey: "house-1",
    measurements: {
      globalActivePower: 1.2,
      globalReactivePower: 0.1,
      voltage: 240,
      globalIntensity: 5,
      subMetering1: 0,
      subMetering2: 1,
      subMetering3: 10,
      calculatedOtherConsumption: 9,
      ...overrides
    },
    dataQualityScore: 0,
    origin: { tier: "primary", url: PRIMARY_URL, qualityBand: REAL_DATA_BAND, ...origin }
  };
}

/** `count` household readings one minute apart from `start`. */
export function householdSeries(
  start: Date,
  count: number,
  overrides: (index: number) => Partial<HouseholdMeasurements> = () => ({})
): SourceRecord<"household">[] {
  return Array.from({ length: count }, (_, index) =>
    householdRecord(new Date(start.getTime() + index * 60_000), overrides(index))
  );
}

export function gridRecord(timestamp: Date, country: string, overrides: Partial<GridMeasurements> = {}): SourceRecord<"grid"> {
  return {
    source: "grid",
    timestamp,
    entityKey: country,
    measurements: {
      loadActualMw: 50000,
      loadForecastMw: 49500,
      solarGenerationActualMw: 1000,
      windOnshoreGenerationActualMw: null,
      windOffshoreGenerationActualMw: null,
      hydroGenerationActualMw: null,
      nuclearGenerationActualMw: 40000,
      fossilGenerationActualMw: null,
      otherRenewableGenerationMw: null,
      totalGenerationMw: 41000,
      netImportExportMw: -9000,
      priceDayAheadEurMwh: 80,
      ...overrides
    },
    dataQualityScore: 0,
    origin: { tier: "primary", url: PRIMARY_URL, qualityBand: REAL_DATA_BAND }
  };
}

export function makeJob(overrides: Partial<IngestionJob> = {}): IngestionJob {
  return {
    id: 1,
    jobName: "test_job",
    dataSource: "household",
    startTime: new Date("2024-06-01T12:00:00Z"),
    endTime: new Date("2024-06-01T12:00:00Z"),
    status: "success",
    recordsProcessed: 0,
    recordsInserted: 0,
    recordsUpdated: 0,
    recordsRejected: 0,
    processingDurationSeconds: 0,
    errorMessage: null,
    ...overrides
  };
}

export type EndpointBehaviour<K extends SourceKind> =
  | SourceRecord<K>[]
  | Error
  | ((call: number) => Promise<SourceRecord<K>[]>);

/** Adapter whose endpoints answer from a fixed table keyed by URL. */
export class StubAdapter<K extends SourceKind> implements SourceAdapter<K> {
  readonly calls: string[] = [];

  constructor(
    readonly source: K,
    private readonly behaviours: Record<string, EndpointBehaviour<K>>,
    private readonly synthetic: (window: TimeWindow, quality: SyntheticQuality) => SourceRecord<K>[] = () => []
  ) {}

  planEndpoints(_window: TimeWindow, settings: SourceSettings): PlannedEndpoint[] {
    return planDeclaredOrder(settings);
  }

  async fetchFrom(endpoint: PlannedEndpoint): Promise<SourceRecord<K>[]> {
    this.calls.push(endpoint.url);
    const behaviour = this.behaviours[endpoint.url];
    if (behaviour === undefined) {
      throw new PermanentFetchError({ url: endpoint.url, message: "no stub for endpoint" });
    }
    if (behaviour instanceof Error) {
      throw behaviour;
    }
    if (typeof behaviour === "function") {
      return behaviour(this.calls.length);
    }
    return behaviour;
  }

  synthesize(window: TimeWindow, quality: SyntheticQuality): SourceRecord<K>[] {
    return this.synthetic(window, quality);
  }
}

/** Keeps rows keyed by natural key, like the conflict target of the real tables. */
export class MemoryChunkWriter<K extends SourceKind> implements ChunkWriter<K> {
  readonly rows = new Map<string, SourceRecord<K>>();
  calls = 0;

  constructor(private readonly failWhen: (records: SourceRecord<K>[], call: number) => Error | null = () => null) {}

  async writeChunk(records: SourceRecord<K>[]): Promise<ChunkWriteResult> {
    this.calls += 1;
    const failure = this.failWhen(records, this.calls);
    if (failure) {
      throw failure;
    }
    let inserted = 0;
    for (const record of records) {
      const key = `${record.timestamp.toISOString()}|${record.entityKey}`;
      if (!this.rows.has(key)) {
        inserted += 1;
      }
      this.rows.set(key, record);
    }
    return { inserted, updated: records.length - inserted };
  }
}

export class InMemoryJobRepository implements JobRepository {
  readonly jobs = new Map<number, IngestionJob>();
  failInsert: Error | null = null;
  failUpdate: Error | null = null;
  private nextId = 1;

  async insert(job: NewIngestionJob): Promise<number> {
    if (this.failInsert) {
      throw this.failInsert;
    }
    const id = this.nextId;
    this.nextId += 1;
    this.jobs.set(id, { id, ...job });
    return id;
  }

  async update(job: IngestionJob): Promise<void> {
    if (this.failUpdate) {
      throw this.failUpdate;
    }
    this.jobs.set(job.id, job);
  }
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
}

export function deferred<T>(): Deferred<T> {
  let settle: (value: T) => void = () => undefined;
  const promise = new Promise<T>((resolve) => {
    settle = resolve;
  });
  return { promise, resolve: (value) => settle(value) };
}
