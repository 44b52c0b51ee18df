import type { SourceKind } from "@energy-pipeline/shared";
import { describeError } from "@energy-pipeline/shared";
import { Pool } from "pg";
import { RunCancelled } from "./errors";
import type { LoggerLike } from "./logger";
import { RetryPolicy, Sleeper } from "./retry-policy";
import { buildUpsertStatement, SourceTable } from "./source-tables";
import type { FailedChunk, FetchOptions, SourceRecord, WriteResult } from "./types";

export interface ChunkWriteResult {
  inserted: number;
  updated: number;
}

/** Writes one chunk atomically: every row or none. */
export interface ChunkWriter<K extends SourceKind> {
  writeChunk(records: SourceRecord<K>[]): Promise<ChunkWriteResult>;
}

interface UpsertRow {
  inserted: boolean;
}

export class PgChunkWriter<K extends SourceKind> implements ChunkWriter<K> {
  constructor(
    private readonly db: Pool,
    private readonly table: SourceTable<K>
  ) {}

  async writeChunk(records: SourceRecord<K>[]): Promise<ChunkWriteResult> {
    const statement = buildUpsertStatement(this.table, records);
    const client = await this.db.connect();
    try {
      await client.query("begin");
      const result = await client.query<UpsertRow>(statement.text, statement.values);
      await client.query("commit");
      const inserted = result.rows.filter((row) => row.inserted).length;
      return { inserted, updated: result.rows.length - inserted };
    } catch (error) {
      await client.query("rollback");
      throw error;
    } finally {
      client.release();
    }
  }
}

export interface RecordUpserterOptions {
  batchSize: number;
  /** Extra attempts per chunk after the first. */
  chunkRetries: number;
  chunkRetryDelayMs?: number;
  sleeper?: Sleeper;
  logger: LoggerLike;
}

export class RecordUpserter<K extends SourceKind> {
  constructor(
    private readonly writer: ChunkWriter<K>,
    private readonly options: RecordUpserterOptions
  ) {
    if (!Number.isInteger(options.batchSize) || options.batchSize < 1) {
      throw new Error(`batchSize must be an integer >= 1, got ${options.batchSize}`);
    }
  }

  /**
   * Commits `records` chunk by chunk in order. Stops at the first chunk that
   * exhausts its retries and reports what was committed before it.
   */
  async write(records: SourceRecord<K>[], jobId: number, options: FetchOptions = {}): Promise<WriteResult> {
    const chunks = chunk(records, this.options.batchSize);
    const result: WriteResult = { inserted: 0, updated: 0, committed: 0, failedChunk: null, cancelled: false };

    for (let index = 0; index < chunks.length; index += 1) {
      if (options.signal?.aborted) {
        result.cancelled = true;
        this.options.logger.warn(
          { job_id: jobId, committed: result.committed, remaining_chunks: chunks.length - index },
          "Write cancelled between chunks"
        );
        return result;
      }

      const current = chunks[index];
      let attempts = 0;
      const policy = new RetryPolicy({
        maxAttempts: this.options.chunkRetries + 1,
        baseDelayMs: this.options.chunkRetryDelayMs ?? 250,
        maxDelayMs: 10_000,
        backoff: "exponential",
        shouldRetry: () => true,
        sleeper: this.options.sleeper,
        onRetry: ({ attempt, maxAttempts, delayMs, error }) =>
          this.options.logger.warn(
            {
              job_id: jobId,
              chunk: index + 1,
              chunks: chunks.length,
              attempt,
              max_attempts: maxAttempts,
              delay_ms: delayMs,
              error: describeError(error)
            },
            "Chunk write failed, retrying"
          )
      });

      try {
        const written = await policy.execute((attempt) => {
          attempts = attempt;
          return this.writer.writeChunk(current);
        }, options.signal);
        result.inserted += written.inserted;
        result.updated += written.updated;
        result.committed += current.length;
      } catch (error) {
        if (error instanceof RunCancelled) {
          result.cancelled = true;
          return result;
        }
        const failedChunk: FailedChunk = {
          index,
          total: chunks.length,
          size: current.length,
          attempts,
          errorMessage: describeError(error)
        };
        result.failedChunk = failedChunk;
        this.options.logger.error(
          { job_id: jobId, ...failedChunk, committed: result.committed },
          "Chunk write failed permanently"
        );
        return result;
      }
    }

    return result;
  }
}

export function chunk<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let start = 0; start < items.length; start += size) {
    chunks.push(items.slice(start, start + size));
  }
  return chunks;
}
