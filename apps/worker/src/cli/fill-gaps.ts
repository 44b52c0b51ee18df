import { describeError, formatWindow } from "@energy-pipeline/shared";
import { Pool } from "pg";
import { loadEnvironment, resolveSsl } from "../config/env";
import { loadRuntimeConfig } from "../config/pipeline-config";
import { PgWeatherCoverageRepository } from "../core/data-gaps";
import { createLogger } from "../core/logger";
import { IngestionMetrics } from "../core/metrics";
import { buildOrchestrators } from "../jobs/build-orchestrators";
import { GapBackfiller } from "../jobs/gap-backfill";

loadEnvironment();

const runtime = loadRuntimeConfig();
const logger = createLogger(runtime.logLevel, "energy-pipeline-fill-gaps");
const metrics = new IngestionMetrics();

async function main() {
  if (!runtime.databaseUrl) {
    throw new Error("DATABASE_URL is required");
  }

  const db = new Pool({
    connectionString: runtime.databaseUrl,
    max: runtime.dbPoolMax,
    idleTimeoutMillis: runtime.dbIdleTimeoutMs,
    ssl: resolveSsl(runtime.databaseUrl)
  });

  try {
    const { pipeline } = runtime;
    const [weather] = buildOrchestrators(pipeline, ["weather"], { db, logger, metrics });
    const backfiller = new GapBackfiller(
      weather,
      new PgWeatherCoverageRepository(db),
      pipeline.weatherLocations.map((location) => location.locationId),
      {
        lookbackDays: pipeline.ingestion.gapLookbackDays,
        maxGapDays: pipeline.ingestion.maxGapDays,
        retentionDays: pipeline.ingestion.dataRetentionDays,
        logger
      }
    );

    const result = await backfiller.backfill();
    metrics.flush(logger);

    const summary = {
      range: formatWindow(result.range),
      gaps: result.gaps.length,
      filled: result.filled.map(formatWindow),
      skipped: result.skipped.map(formatWindow),
      jobs: result.jobs.map((job) => ({ job_id: job.id, status: job.status, inserted: job.recordsInserted }))
    };
    if (result.jobs.some((job) => job.status === "failed")) {
      logger.error(summary, "Gap backfill finished with failures");
      process.exitCode = 1;
      return;
    }
    logger.info(summary, "Gap backfill finished");
  } finally {
    await db.end();
  }
}

main().catch((error) => {
  logger.error({ error: describeError(error) }, "Gap backfill crashed");
  process.exit(1);
});
