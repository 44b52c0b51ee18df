import type { SourceKind } from "@energy-pipeline/shared";
import { isSourceKind, parseWindow, resolveTrailingWindow } from "@energy-pipeline/shared";
import type { JobsOptions } from "bullmq";
import type { LoggerLike } from "../core/logger";
import type { IngestionJob, PipelineConfig } from "../core/types";
import type { SourceRunner } from "./streaming-manager";

export const INGESTION_JOB_NAME = "ingest-source";

export interface IngestionJobData {
  source: string;
  lookbackMinutes?: number;
  from?: string;
  to?: string;
}

export interface RepeatableJob {
  name: string;
  data: IngestionJobData;
  options: JobsOptions;
}

export interface IngestionQueue {
  add(name: string, data: IngestionJobData, opts?: JobsOptions): Promise<unknown>;
}

export interface QueuedJob {
  id?: string;
  name: string;
  data: IngestionJobData;
}

export interface IngestionJobSummary {
  jobId: number;
  source: string;
  status: IngestionJob["status"];
  recordsProcessed: number;
  recordsInserted: number;
  recordsRejected: number;
  errorMessage: string | null;
}

/** One repeatable job per source, repeating every configured interval. */
export function buildRepeatableJobs(config: PipelineConfig, sources: SourceKind[]): RepeatableJob[] {
  return sources.map((source) => {
    const settings = config.sources[source];
    return {
      name: INGESTION_JOB_NAME,
      data: { source, lookbackMinutes: settings.lookbackMinutes },
      options: {
        jobId: `ingest:${source}`,
        repeat: { every: settings.intervalSeconds * 1000 },
        attempts: 1,
        removeOnComplete: 5000,
        removeOnFail: 10000
      }
    };
  });
}

export async function registerRepeatableJobs(queue: IngestionQueue, jobs: RepeatableJob[]) {
  for (const job of jobs) {
    await queue.add(job.name, job.data, job.options);
  }
}

export interface IngestionProcessorOptions {
  logger: LoggerLike;
  clock?: () => Date;
  signal?: AbortSignal;
}

/**
 * Turns a queued job into an orchestrator run. Failed runs are recorded in
 * the job log and returned, not thrown, so queue-level attempts never kick in.
 */
export function createIngestionProcessor(runners: SourceRunner[], options: IngestionProcessorOptions) {
  const clock = options.clock ?? (() => new Date());
  const bySource = new Map<SourceKind, SourceRunner>(runners.map((runner) => [runner.source, runner]));

  return async (job: QueuedJob): Promise<IngestionJobSummary> => {
    const { source } = job.data;
    if (!isSourceKind(source)) {
      throw new Error(`Queued job ${job.id ?? job.name} names unknown source ${source}`);
    }
    const runner = bySource.get(source);
    if (!runner) {
      throw new Error(`No orchestrator registered for source ${source}`);
    }

    const window =
      job.data.from && job.data.to
        ? parseWindow(job.data.from, job.data.to)
        : resolveTrailingWindow(job.data.lookbackMinutes ?? 60, clock());

    const result = await runner.run(window, { signal: options.signal, jobName: `queued_${source}` });
    options.logger.info({ queue_job_id: job.id, job_id: result.id, source, status: result.status }, "Queued run settled");
    return {
      jobId: result.id,
      source,
      status: result.status,
      recordsProcessed: result.recordsProcessed,
      recordsInserted: result.recordsInserted,
      recordsRejected: result.recordsRejected,
      errorMessage: result.errorMessage
    };
  };
}
