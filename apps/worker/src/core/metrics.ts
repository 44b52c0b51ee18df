import type { SourceKind } from "@energy-pipeline/shared";
import type { LoggerLike } from "./logger";
import type { IngestionJob, SourceTier } from "./types";

export class IngestionMetrics {
  private successRuns = 0;
  private partialRuns = 0;
  private failedRuns = 0;
  private fallbackUsage = 0;
  private syntheticUsage = 0;
  private recordsWritten = 0;
  private recordsRejected = 0;
  private lastSource = "";
  private lastRunAt = "";

  markRun(source: SourceKind, job: IngestionJob) {
    if (job.status === "success") {
      this.successRuns += 1;
    } else if (job.status === "partial_success") {
      this.partialRuns += 1;
    } else if (job.status === "failed") {
      this.failedRuns += 1;
    }
    this.recordsWritten += job.recordsInserted;
    this.recordsRejected += job.recordsRejected;
    this.lastSource = source;
    this.lastRunAt = (job.endTime ?? new Date()).toISOString();
  }

  markTier(tier: SourceTier) {
    if (tier === "fallback") {
      this.fallbackUsage += 1;
    } else if (tier === "synthetic") {
      this.syntheticUsage += 1;
    }
  }

  snapshot() {
    return {
      success_runs: this.successRuns,
      partial_runs: this.partialRuns,
      failed_runs: this.failedRuns,
      fallback_usage: this.fallbackUsage,
      synthetic_usage: this.syntheticUsage,
      records_written: this.recordsWritten,
      records_rejected: this.recordsRejected,
      last_source: this.lastSource,
      last_run_at: this.lastRunAt
    };
  }

  flush(logger: LoggerLike) {
    logger.info(this.snapshot(), "Ingestion metrics snapshot");
  }
}
