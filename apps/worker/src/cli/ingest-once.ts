import { describeError, formatWindow, parseWindow, resolveTrailingWindow } from "@energy-pipeline/shared";
import type { TimeWindow } from "@energy-pipeline/shared";
import { Pool } from "pg";
import { envFlag, envValue, loadEnvironment, resolveSsl } from "../config/env";
import { loadRuntimeConfig } from "../config/pipeline-config";
import { createLogger } from "../core/logger";
import { IngestionMetrics } from "../core/metrics";
import { seedHouseholdMetadata, seedWeatherStations } from "../core/reference-metadata";
import { buildOrchestrators } from "../jobs/build-orchestrators";

loadEnvironment();

const runtime = loadRuntimeConfig();
const logger = createLogger(runtime.logLevel, "energy-pipeline-ingest-once");
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
    const seedReference = envFlag(process.env.SEED_STATIONS);
    if (seedReference ?? runtime.sources.includes("weather")) {
      const seeded = await seedWeatherStations(db, runtime.pipeline.weatherLocations);
      logger.info({ stations: seeded }, "Weather stations seeded");
    }
    if (seedReference ?? runtime.sources.includes("household")) {
      const seeded = await seedHouseholdMetadata(db, runtime.pipeline.householdId, runtime.pipeline.householdMetadata);
      logger.info({ households: seeded }, "Household metadata seeded");
    }

    const orchestrators = buildOrchestrators(runtime.pipeline, runtime.sources, { db, logger, metrics });
    logger.info({ sources: runtime.sources }, "Starting one-off ingestion run");

    const jobs = await Promise.all(
      orchestrators.map((orchestrator) => {
        const window = resolveWindow(runtime.pipeline.sources[orchestrator.source].lookbackMinutes);
        logger.info({ source: orchestrator.source, window: formatWindow(window) }, "Ingesting window");
        return orchestrator.run(window, { jobName: `manual_${orchestrator.source}` });
      })
    );

    metrics.flush(logger);

    const failures = jobs
      .filter((job) => job.status === "failed")
      .map((job) => ({ source: job.dataSource, job_id: job.id, error: job.errorMessage }));
    if (failures.length) {
      logger.error({ failures }, "One-off ingestion finished with failures");
      process.exitCode = 1;
      return;
    }

    logger.info(
      { jobs: jobs.map((job) => ({ source: job.dataSource, job_id: job.id, status: job.status })) },
      "One-off ingestion finished"
    );
  } finally {
    await db.end();
  }
}

function resolveWindow(lookbackMinutes: number): TimeWindow {
  const from = envValue(process.env.INGESTION_FROM);
  const to = envValue(process.env.INGESTION_TO);
  if (from || to) {
    if (!from || !to) {
      throw new Error("INGESTION_FROM and INGESTION_TO must be set together");
    }
    return parseWindow(from, to);
  }
  return resolveTrailingWindow(lookbackMinutes);
}

main().catch((error) => {
  logger.error({ error: describeError(error) }, "One-off ingestion crashed");
  process.exit(1);
});
