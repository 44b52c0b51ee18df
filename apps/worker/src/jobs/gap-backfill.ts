import type { TimeWindow } from "@energy-pipeline/shared";
import { formatWindow } from "@energy-pipeline/shared";
import { DateTime } from "luxon";
import { CoverageRepository, DataGap, findGaps, mergeGapWindows, windowSlotHours } from "../core/data-gaps";
import type { LoggerLike } from "../core/logger";
import type { IngestionJob } from "../core/types";
import type { SourceRunner } from "./streaming-manager";

export interface GapBackfillOptions {
  lookbackDays: number;
  maxGapDays: number;
  retentionDays: number;
  stepMinutes?: number;
  logger: LoggerLike;
  clock?: () => Date;
}

export interface GapBackfillResult {
  range: TimeWindow;
  gaps: DataGap[];
  filled: TimeWindow[];
  skipped: TimeWindow[];
  jobs: IngestionJob[];
}

/**
 * Finds hours with no stored rows for each entity and re-ingests them through
 * the source's orchestrator. Detection never reaches past the retention
 * horizon, and windows longer than `maxGapDays` are reported, not fetched.
 */
export class GapBackfiller {
  private readonly clock: () => Date;
  private readonly stepMinutes: number;

  constructor(
    private readonly runner: SourceRunner,
    private readonly repository: CoverageRepository,
    private readonly entityKeys: string[],
    private readonly options: GapBackfillOptions
  ) {
    this.clock = options.clock ?? (() => new Date());
    this.stepMinutes = options.stepMinutes ?? 60;
  }

  detectionRange(): TimeWindow {
    const end = this.clock();
    const days = Math.min(this.options.lookbackDays, this.options.retentionDays);
    return { start: DateTime.fromJSDate(end, { zone: "utc" }).minus({ days }).toJSDate(), end };
  }

  async detect(range = this.detectionRange()): Promise<DataGap[]> {
    const gaps: DataGap[] = [];
    for (const entityKey of this.entityKeys) {
      const present = await this.repository.listTimestamps(entityKey, range);
      gaps.push(...findGaps(entityKey, present, range, this.stepMinutes));
    }
    return gaps;
  }

  async backfill(signal?: AbortSignal): Promise<GapBackfillResult> {
    const { logger } = this.options;
    const range = this.detectionRange();
    const gaps = await this.detect(range);
    const result: GapBackfillResult = { range, gaps, filled: [], skipped: [], jobs: [] };

    if (!gaps.length) {
      logger.info({ source: this.runner.source, range: formatWindow(range) }, "No data gaps found");
      return result;
    }

    for (const window of mergeGapWindows(gaps, this.stepMinutes)) {
      const hours = windowSlotHours(window, this.stepMinutes);
      if (hours / 24 > this.options.maxGapDays) {
        logger.warn(
          {
            source: this.runner.source,
            window: formatWindow(window),
            gap_hours: hours,
            max_gap_days: this.options.maxGapDays
          },
          "Gap too large to fill"
        );
        result.skipped.push(window);
        continue;
      }
      if (signal?.aborted) {
        break;
      }

      logger.info({ source: this.runner.source, window: formatWindow(window), gap_hours: hours }, "Filling data gap");
      const job = await this.runner.run(window, { signal, jobName: `gap_fill_${this.runner.source}` });
      result.filled.push(window);
      result.jobs.push(job);
    }
    return result;
  }
}
