import { describeError } from "@energy-pipeline/shared";
import { Queue, Worker } from "bullmq";
import { Pool } from "pg";
import { loadEnvironment, resolveSsl } from "./config/env";
import { loadRuntimeConfig } from "./config/pipeline-config";
import { createLogger } from "./core/logger";
import { IngestionMetrics } from "./core/metrics";
import { seedHouseholdMetadata, seedWeatherStations } from "./core/reference-metadata";
import { buildOrchestrators } from "./jobs/build-orchestrators";
import {
  buildRepeatableJobs,
  createIngestionProcessor,
  IngestionJobData,
  IngestionJobSummary,
  registerRepeatableJobs
} from "./jobs/queue-dispatch";
import { buildSchedule, StreamingManager } from "./jobs/streaming-manager";

loadEnvironment();

const runtime = loadRuntimeConfig();
const logger = createLogger(runtime.logLevel);
const metrics = new IngestionMetrics();

if (!runtime.databaseUrl) {
  throw new Error("DATABASE_URL is required for worker");
}
const db = new Pool({
  connectionString: runtime.databaseUrl,
  max: runtime.dbPoolMax,
  idleTimeoutMillis: runtime.dbIdleTimeoutMs,
  ssl: resolveSsl(runtime.databaseUrl)
});

const shutdownController = new AbortController();
const orchestrators = buildOrchestrators(runtime.pipeline, runtime.sources, { db, logger, metrics });
let manager: StreamingManager | null = null;
let queue: Queue<IngestionJobData, IngestionJobSummary> | null = null;
let worker: Worker<IngestionJobData, IngestionJobSummary> | null = null;
let shuttingDown = false;

async function bootstrap() {
  if (runtime.sources.includes("weather")) {
    const seeded = await seedWeatherStations(db, runtime.pipeline.weatherLocations);
    logger.info({ stations: seeded }, "Weather stations seeded");
  }
  if (runtime.sources.includes("household")) {
    const seeded = await seedHouseholdMetadata(db, runtime.pipeline.householdId, runtime.pipeline.householdMetadata);
    logger.info({ households: seeded }, "Household metadata seeded");
  }

  if (runtime.mode === "queue") {
    const ingestionQueue = startQueueMode();
    await registerRepeatableJobs(ingestionQueue, buildRepeatableJobs(runtime.pipeline, runtime.sources));
  } else {
    manager = new StreamingManager(orchestrators, buildSchedule(runtime.pipeline, runtime.sources), {
      drainTimeoutMs: runtime.pipeline.ingestion.drainTimeoutMs,
      logger
    });
    manager.start();
  }

  setInterval(() => metrics.flush(logger), 60_000).unref();
  logger.info({ mode: runtime.mode, sources: runtime.sources }, "Worker started");
}

function startQueueMode(): Queue<IngestionJobData, IngestionJobSummary> {
  const connection = { url: runtime.redisUrl };
  const processor = createIngestionProcessor(orchestrators, { logger, signal: shutdownController.signal });
  queue = new Queue<IngestionJobData, IngestionJobSummary>(runtime.queueName, { connection });
  worker = new Worker<IngestionJobData, IngestionJobSummary>(runtime.queueName, (job) => processor(job), {
    connection,
    concurrency: runtime.sources.length
  });

  worker.on("completed", (job, result) => {
    logger.info({ queueJobId: job.id, source: result.source, status: result.status }, "Queue job completed");
  });

  worker.on("failed", (job, error) => {
    logger.error({ queueJobId: job?.id, name: job?.name, error: describeError(error) }, "Queue job failed");
  });

  return queue;
}

async function shutdown() {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  logger.info("Shutting down worker...");
  try {
    if (manager) {
      await manager.stop();
    }
    if (worker) {
      const closing = worker.close();
      const drainTimer = setTimeout(() => shutdownController.abort(), runtime.pipeline.ingestion.drainTimeoutMs);
      await closing;
      clearTimeout(drainTimer);
    }
    if (queue) {
      await queue.close();
    }
    metrics.flush(logger);
  } finally {
    await db.end();
  }
  process.exit(0);
}

function onSignal() {
  shutdown().catch((error) => {
    logger.error({ error: describeError(error) }, "Shutdown failed");
    process.exit(1);
  });
}

process.on("SIGINT", onSignal);
process.on("SIGTERM", onSignal);

bootstrap().catch((error) => {
  logger.error({ error: describeError(error) }, "Fatal worker error");
  onSignal();
});
