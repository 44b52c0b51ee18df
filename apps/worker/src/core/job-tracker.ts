import { truncateMessage } from "@energy-pipeline/shared";
import { Pool } from "pg";
import type { IngestionJob, JobCompletion } from "./types";

export type NewIngestionJob = Omit<IngestionJob, "id">;

export interface JobRepository {
  insert(job: NewIngestionJob): Promise<number>;
  update(job: IngestionJob): Promise<void>;
}

interface InsertedJobRow {
  id: number;
}

export class PgJobRepository implements JobRepository {
  constructor(private readonly db: Pool) {}

  async insert(job: NewIngestionJob): Promise<number> {
    const result = await this.db.query<InsertedJobRow>(
      `
      insert into metadata.ingestion_log (
        job_name,
        data_source,
        start_time,
        end_time,
        status,
        records_processed,
        records_inserted,
        records_updated,
        records_rejected,
        error_message,
        processing_duration_seconds
      )
      values ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)
      returning id
      `,
      [
        job.jobName,
        job.dataSource,
        job.startTime,
        job.endTime,
        job.status,
        job.recordsProcessed,
        job.recordsInserted,
        job.recordsUpdated,
        job.recordsRejected,
        job.errorMessage,
        job.processingDurationSeconds
      ]
    );
    const row = result.rows[0];
    if (!row) {
      throw new Error("Insert into metadata.ingestion_log returned no id");
    }
    return row.id;
  }

  async update(job: IngestionJob): Promise<void> {
    await this.db.query(
      `
      update metadata.ingestion_log
      set end_time = $2,
          status = $3,
          records_processed = $4,
          records_inserted = $5,
          records_updated = $6,
          records_rejected = $7,
          error_message = $8,
          processing_duration_seconds = $9
      where id = $1
      `,
      [
        job.id,
        job.endTime,
        job.status,
        job.recordsProcessed,
        job.recordsInserted,
        job.recordsUpdated,
        job.recordsRejected,
        job.errorMessage,
        job.processingDurationSeconds
      ]
    );
  }
}

export class JobTracker {
  constructor(
    private readonly repository: JobRepository,
    private readonly clock: () => Date = () => new Date()
  ) {}

  async start(jobName: string, dataSource: string): Promise<IngestionJob> {
    const job: NewIngestionJob = {
      jobName,
      dataSource,
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
    const id = await this.repository.insert(job);
    return { id, ...job };
  }

  async finish(job: IngestionJob, completion: JobCompletion): Promise<IngestionJob> {
    const finished = this.complete(job, completion);
    await this.repository.update(finished);
    return finished;
  }

  /** The terminal form of `job`, without persisting it. */
  complete(job: IngestionJob, completion: JobCompletion): IngestionJob {
    if (job.status !== "running") {
      throw new Error(`Job ${job.id} already finished with status ${job.status}`);
    }

    const endTime = this.clock();
    return {
      ...job,
      endTime,
      status: completion.status,
      recordsProcessed: completion.recordsProcessed,
      recordsInserted: completion.recordsInserted,
      recordsUpdated: completion.recordsUpdated,
      recordsRejected: completion.recordsRejected,
      processingDurationSeconds: Math.max(0, Math.round((endTime.getTime() - job.startTime.getTime()) / 1000)),
      errorMessage:
        completion.status === "success" || completion.errorMessage === null
          ? null
          : truncateMessage(completion.errorMessage)
    };
  }
}
