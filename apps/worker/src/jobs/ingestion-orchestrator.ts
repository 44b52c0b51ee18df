import type { SourceKind, TimeWindow } from "@energy-pipeline/shared";
import { describeError, formatWindow } from "@energy-pipeline/shared";
import { SourceClient } from "../adapters/source-client";
import { PartialWriteFailure, RunCancelled, ValidationRejected } from "../core/errors";
import { JobTracker } from "../core/job-tracker";
import type { LoggerLike } from "../core/logger";
import { IngestionMetrics } from "../core/metrics";
import { RecordUpserter } from "../core/record-upserter";
import { RecordValidator } from "../core/record-validator";
import { RetryPolicy, Sleeper } from "../core/retry-policy";
import type {
  FetchResult,
  IngestionJob,
  IngestionSettings,
  JobCompletion,
  SourceSettings,
  ValidationOutcome,
  WriteResult
} from "../core/types";

export type RunState = "idle" | "running" | "succeeded" | "partially_succeeded" | "failed";

export interface RunOptions {
  signal?: AbortSignal;
  jobName?: string;
}

export type OrchestratorSettings = Pick<
  IngestionSettings,
  "maxRetries" | "retryDelaySeconds" | "maxRetryDelaySeconds" | "backoff" | "strictValidation"
>;

export interface IngestionOrchestratorDeps<K extends SourceKind> {
  client: SourceClient<K>;
  validator: RecordValidator<K>;
  upserter: RecordUpserter<K>;
  tracker: JobTracker;
  sourceSettings: SourceSettings;
  settings: OrchestratorSettings;
  logger: LoggerLike;
  metrics?: IngestionMetrics;
  sleeper?: Sleeper;
  clock?: () => Date;
}

const STATE_BY_STATUS: Record<JobCompletion["status"], RunState> = {
  success: "succeeded",
  partial_success: "partially_succeeded",
  failed: "failed"
};

/**
 * Runs fetch, validate and write for one source. Runs on the same
 * orchestrator are queued behind each other; `run` resolves with the
 * terminal job record and never rejects.
 */
export class IngestionOrchestrator<K extends SourceKind> {
  private runState: RunState = "idle";
  private tail: Promise<void> = Promise.resolve();
  private readonly clock: () => Date;

  constructor(private readonly deps: IngestionOrchestratorDeps<K>) {
    this.clock = deps.clock ?? (() => new Date());
  }

  get source(): K {
    return this.deps.client.source;
  }

  get state(): RunState {
    return this.runState;
  }

  run(window: TimeWindow, options: RunOptions = {}): Promise<IngestionJob> {
    const next = this.tail.then(() => this.execute(window, options));
    // Ordering only; callers see failures through `next`.
    this.tail = next.then(
      () => undefined,
      () => undefined
    );
    return next;
  }

  private async execute(window: TimeWindow, options: RunOptions): Promise<IngestionJob> {
    const { tracker, logger } = this.deps;
    const jobName = options.jobName ?? `${this.source}_ingestion`;
    this.runState = "running";

    let job: IngestionJob;
    try {
      job = await tracker.start(jobName, this.source);
    } catch (error) {
      logger.error({ source: this.source, error: describeError(error) }, "Could not record job start");
      const detached: IngestionJob = {
        id: 0,
        jobName,
        dataSource: this.source,
        startTime: this.clock(),
        endTime: null,
        status: "running",
        recordsProcessed: 0,
        recordsInserted: 0,
        recordsUpdated: 0,
        recordsRejected: 0,
        processingDurationSeconds: null,
        errorMessage: null
      };
      return this.settle(detached, failure(`Could not record job start: ${describeError(error)}`), false);
    }

    let completion: JobCompletion;
    try {
      logger.info({ job_id: job.id, source: this.source, window: formatWindow(window) }, "Ingestion run started");
      completion = await this.process(job, window, options.signal);
    } catch (error) {
      logger.error({ job_id: job.id, source: this.source, error: describeError(error) }, "Ingestion run crashed");
      completion = failure(`Run crashed: ${describeError(error)}`);
    }
    return this.settle(job, completion, true);
  }

  private async process(job: IngestionJob, window: TimeWindow, signal?: AbortSignal): Promise<JobCompletion> {
    const { logger, validator, settings } = this.deps;

    let fetched: FetchResult<K>;
    try {
      fetched = await this.fetchWithRetry(job, window, signal);
    } catch (error) {
      if (error instanceof RunCancelled) {
        return failure(error.message);
      }
      return failure(`Fetch failed: ${describeError(error)}`);
    }
    this.deps.metrics?.markTier(fetched.tier);

    const processed = fetched.records.length;
    let outcome: ValidationOutcome<K>;
    try {
      outcome = validator.validate(fetched.records, settings.strictValidation ? "strict" : "lenient", {
        now: this.clock(),
        window
      });
    } catch (error) {
      return { ...failure(`Validation failed: ${describeError(error)}`), recordsProcessed: processed };
    }
    if (outcome.warnings.length) {
      logger.warn({ job_id: job.id, source: this.source, warnings: outcome.warnings }, "Validation warnings");
    }
    if (!outcome.isAcceptable) {
      const rejected = new ValidationRejected({
        rejectedCount: outcome.rejectedCount,
        total: outcome.acceptedCount + outcome.rejectedCount,
        rejections: outcome.rejections,
        warnings: outcome.warnings
      });
      return { ...failure(rejected.message), recordsProcessed: processed, recordsRejected: outcome.rejectedCount };
    }

    if (signal?.aborted) {
      return {
        ...failure("Run cancelled before write"),
        recordsProcessed: processed,
        recordsRejected: outcome.rejectedCount
      };
    }

    let written: WriteResult;
    try {
      written = await this.deps.upserter.write(outcome.accepted, job.id, { signal });
    } catch (error) {
      return {
        ...failure(`Write failed: ${describeError(error)}`),
        recordsProcessed: processed,
        recordsRejected: outcome.rejectedCount
      };
    }

    const counts = {
      recordsProcessed: processed,
      recordsInserted: written.inserted + written.updated,
      recordsUpdated: written.updated,
      recordsRejected: outcome.rejectedCount
    };

    if (written.failedChunk) {
      const message = new PartialWriteFailure(written.failedChunk, written.committed).message;
      return { ...counts, status: written.committed > 0 ? "partial_success" : "failed", errorMessage: message };
    }
    if (written.cancelled) {
      const message = `Run cancelled after committing ${written.committed} of ${outcome.acceptedCount} records`;
      return { ...counts, status: written.committed > 0 ? "partial_success" : "failed", errorMessage: message };
    }
    return { ...counts, status: "success", errorMessage: null };
  }

  private fetchWithRetry(job: IngestionJob, window: TimeWindow, signal?: AbortSignal): Promise<FetchResult<K>> {
    const { settings, logger, client, sourceSettings } = this.deps;
    const policy = new RetryPolicy({
      maxAttempts: settings.maxRetries,
      baseDelayMs: settings.retryDelaySeconds * 1000,
      maxDelayMs: settings.maxRetryDelaySeconds * 1000,
      backoff: settings.backoff,
      sleeper: this.deps.sleeper,
      onRetry: ({ attempt, maxAttempts, delayMs, error }) =>
        logger.warn(
          {
            job_id: job.id,
            source: this.source,
            attempt,
            max_attempts: maxAttempts,
            delay_ms: delayMs,
            error: describeError(error)
          },
          "Fetch attempt failed, retrying"
        ),
      onGiveUp: ({ attempt, reason, error }) =>
        logger.error(
          { job_id: job.id, source: this.source, attempt, reason, error: describeError(error) },
          "Fetch gave up"
        )
    });
    return policy.execute(() => client.fetch(window, sourceSettings, { signal }), signal);
  }

  private async settle(job: IngestionJob, completion: JobCompletion, persist: boolean): Promise<IngestionJob> {
    const { tracker, logger } = this.deps;
    let finished: IngestionJob;
    if (persist) {
      try {
        finished = await tracker.finish(job, completion);
      } catch (error) {
        logger.error({ job_id: job.id, error: describeError(error) }, "Could not record job completion");
        finished = tracker.complete(job, completion);
      }
    } else {
      finished = tracker.complete(job, completion);
    }

    this.runState = STATE_BY_STATUS[completion.status];
    try {
      this.deps.metrics?.markRun(this.source, finished);
    } catch (error) {
      logger.warn({ job_id: finished.id, error: describeError(error) }, "Could not record run metrics");
    }
    const payload = {
      job_id: finished.id,
      source: this.source,
      status: finished.status,
      processed: finished.recordsProcessed,
      inserted: finished.recordsInserted,
      updated: finished.recordsUpdated,
      rejected: finished.recordsRejected,
      duration_s: finished.processingDurationSeconds,
      error: finished.errorMessage
    };
    if (finished.status === "failed") {
      logger.error(payload, "Ingestion run failed");
    } else if (finished.status === "partial_success") {
      logger.warn(payload, "Ingestion run partially succeeded");
    } else {
      logger.info(payload, "Ingestion run succeeded");
    }
    return finished;
  }
}

function failure(errorMessage: string): JobCompletion {
  return {
    status: "failed",
    recordsProcessed: 0,
    recordsInserted: 0,
    recordsUpdated: 0,
    recordsRejected: 0,
    errorMessage
  };
}
