import type { IngestionJobStatus, SourceKind, SyntheticQuality, TimeWindow } from "@energy-pipeline/shared";

export type HouseholdMeasurements = {
  globalActivePower: number | null;
  globalReactivePower: number | null;
  voltage: number | null;
  globalIntensity: number | null;
  subMetering1: number | null;
  subMetering2: number | null;
  subMetering3: number | null;
  calculatedOtherConsumption: number | null;
};

export type WeatherMeasurements = {
  latitude: number | null;
  longitude: number | null;
  temperature2mC: number | null;
  relativeHumidity2mPct: number | null;
  dewPoint2mC: number | null;
  apparentTemperatureC: number | null;
  rainMm: number | null;
  shortwaveRadiationWM2: number | null;
  windSpeed10mKmh: number | null;
  windDirection10mDeg: number | null;
  windGusts10mKmh: number | null;
  cloudCoverPct: number | null;
  surfacePressureHpa: number | null;
  visibilityM: number | null;
};

export type GridMeasurements = {
  loadActualMw: number | null;
  loadForecastMw: number | null;
  solarGenerationActualMw: number | null;
  windOnshoreGenerationActualMw: number | null;
  windOffshoreGenerationActualMw: number | null;
  hydroGenerationActualMw: number | null;
  nuclearGenerationActualMw: number | null;
  fossilGenerationActualMw: number | null;
  otherRenewableGenerationMw: number | null;
  totalGenerationMw: number | null;
  netImportExportMw: number | null;
  priceDayAheadEurMwh: number | null;
};

export interface MeasurementsBySource {
  household: HouseholdMeasurements;
  weather: WeatherMeasurements;
  grid: GridMeasurements;
}

export type MeasurementField<K extends SourceKind> = keyof MeasurementsBySource[K] & string;

export type SourceTier = "primary" | "fallback" | "synthetic";

export interface QualityBand {
  floor: number;
  ceiling: number;
}

export interface RecordOrigin {
  tier: SourceTier;
  url: string | null;
  qualityBand: QualityBand;
}

/** One normalized observation. `(timestamp, entityKey)` is the natural key. */
export interface SourceRecord<K extends SourceKind> {
  source: K;
  timestamp: Date;
  entityKey: string;
  measurements: MeasurementsBySource[K];
  dataQualityScore: number;
  origin: RecordOrigin;
}

/** Union of the per-source records, discriminated by `source`. */
export type NormalizedRecord<K extends SourceKind = SourceKind> = K extends SourceKind ? SourceRecord<K> : never;

export type RejectionReason = "stale" | "incomplete" | "out_of_bounds";

export interface ValidationOutcome<K extends SourceKind = SourceKind> {
  accepted: SourceRecord<K>[];
  acceptedCount: number;
  rejectedCount: number;
  duplicateCount: number;
  rejections: Record<RejectionReason, number>;
  rejectionRatio: number;
  warnings: string[];
  isAcceptable: boolean;
}

export interface FailedChunk {
  index: number;
  total: number;
  size: number;
  attempts: number;
  errorMessage: string;
}

export interface WriteResult {
  inserted: number;
  updated: number;
  committed: number;
  failedChunk: FailedChunk | null;
  cancelled: boolean;
}

export type TerminalJobStatus = Exclude<IngestionJobStatus, "running">;

export interface IngestionJob {
  id: number;
  jobName: string;
  dataSource: string;
  startTime: Date;
  endTime: Date | null;
  status: IngestionJobStatus;
  recordsProcessed: number;
  recordsInserted: number;
  recordsUpdated: number;
  recordsRejected: number;
  processingDurationSeconds: number | null;
  errorMessage: string | null;
}

export interface JobCompletion {
  status: TerminalJobStatus;
  recordsProcessed: number;
  recordsInserted: number;
  recordsUpdated: number;
  recordsRejected: number;
  errorMessage: string | null;
}

export interface EndpointFailure {
  url: string;
  message: string;
  transient: boolean;
}

export interface FetchResult<K extends SourceKind = SourceKind> {
  records: SourceRecord<K>[];
  tier: SourceTier;
  url: string | null;
  failures: EndpointFailure[];
}

export interface FetchOptions {
  signal?: AbortSignal;
}

export interface WeatherLocation {
  locationId: string;
  name: string;
  latitude: number;
  longitude: number;
  timezone: string;
  countryCode: string;
}

export interface HouseholdMetadata {
  locationName: string;
  latitude: number;
  longitude: number;
  timezone: string;
  installationDate?: string;
  meterType: string;
  samplingMinutes: number;
  dataSource: string;
}

export interface SourceSettings {
  endpointUrl: string;
  fallbackUrls: string[];
  forecastUrl?: string;
  enableSyntheticFallback: boolean;
  syntheticQuality: SyntheticQuality;
  intervalSeconds: number;
  lookbackMinutes: number;
}

export interface QualityWeights {
  freshness: number;
  completeness: number;
  accuracy: number;
  consistency: number;
}

export interface IngestionSettings {
  batchSize: number;
  maxRetries: number;
  retryDelaySeconds: number;
  maxRetryDelaySeconds: number;
  backoff: "fixed" | "exponential";
  chunkRetries: number;
  strictValidation: boolean;
  rejectionTolerance: number;
  strictRejectionTolerance: number;
  minCompleteness: number;
  qualityWeights: QualityWeights;
  dataRetentionDays: number;
  gapLookbackDays: number;
  maxGapDays: number;
  requestTimeoutMs: number;
  drainTimeoutMs: number;
}

export interface PipelineConfig {
  householdId: string;
  householdMetadata?: HouseholdMetadata;
  gridCountries: string[];
  weatherLocations: WeatherLocation[];
  sources: Record<SourceKind, SourceSettings>;
  ingestion: IngestionSettings;
}

export type { TimeWindow };
