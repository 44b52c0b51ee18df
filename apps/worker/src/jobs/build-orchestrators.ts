import type { SourceKind } from "@energy-pipeline/shared";
import { Pool } from "pg";
import { HttpTransport } from "../adapters/http-transport";
import { AdapterRegistry } from "../adapters/registry";
import { SourceClient } from "../adapters/source-client";
import { JobTracker, PgJobRepository } from "../core/job-tracker";
import type { LoggerLike } from "../core/logger";
import { IngestionMetrics } from "../core/metrics";
import { PgChunkWriter, RecordUpserter } from "../core/record-upserter";
import { RecordValidator } from "../core/record-validator";
import { SOURCE_PROFILES } from "../core/source-profiles";
import { SOURCE_TABLES } from "../core/source-tables";
import type { PipelineConfig } from "../core/types";
import { IngestionOrchestrator } from "./ingestion-orchestrator";

export interface PipelineDeps {
  db: Pool;
  logger: LoggerLike;
  metrics: IngestionMetrics;
  registry?: AdapterRegistry;
  clock?: () => Date;
}

export function buildOrchestrator<K extends SourceKind>(
  source: K,
  config: PipelineConfig,
  deps: PipelineDeps & { registry: AdapterRegistry; tracker: JobTracker }
): IngestionOrchestrator<K> {
  const { ingestion } = config;
  return new IngestionOrchestrator({
    client: new SourceClient(deps.registry.resolve(source), deps.logger, deps.clock),
    validator: new RecordValidator(SOURCE_PROFILES[source], {
      minCompleteness: ingestion.minCompleteness,
      rejectionTolerance: ingestion.rejectionTolerance,
      strictRejectionTolerance: ingestion.strictRejectionTolerance,
      weights: ingestion.qualityWeights
    }),
    upserter: new RecordUpserter(new PgChunkWriter(deps.db, SOURCE_TABLES[source]), {
      batchSize: ingestion.batchSize,
      chunkRetries: ingestion.chunkRetries,
      logger: deps.logger
    }),
    tracker: deps.tracker,
    sourceSettings: config.sources[source],
    settings: ingestion,
    logger: deps.logger,
    metrics: deps.metrics,
    clock: deps.clock
  });
}

export function buildOrchestrators(
  config: PipelineConfig,
  sources: SourceKind[],
  deps: PipelineDeps
): IngestionOrchestrator<SourceKind>[] {
  const registry =
    deps.registry ??
    AdapterRegistry.fromConfig(config, new HttpTransport({ timeoutMs: config.ingestion.requestTimeoutMs }), deps.logger);
  const tracker = new JobTracker(new PgJobRepository(deps.db), deps.clock);
  return sources.map((source) => buildOrchestrator(source, config, { ...deps, registry, tracker }));
}
