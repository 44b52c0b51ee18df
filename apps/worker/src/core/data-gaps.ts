import type { TimeWindow } from "@energy-pipeline/shared";
import { enumerateSteps, hoursBetween } from "@energy-pipeline/shared";
import { Pool } from "pg";

export interface DataGap {
  entityKey: string;
  start: Date;
  end: Date;
  hours: number;
}

export interface CoverageRepository {
  listTimestamps(entityKey: string, range: TimeWindow): Promise<Date[]>;
}

interface TimestampRow {
  timestamp: Date;
}

export class PgWeatherCoverageRepository implements CoverageRepository {
  constructor(private readonly db: Pool) {}

  async listTimestamps(locationId: string, range: TimeWindow): Promise<Date[]> {
    const result = await this.db.query<TimestampRow>(
      `
      select timestamp
      from weather.observations
      where location_id = $1
        and timestamp >= $2
        and timestamp <= $3
      order by timestamp
      `,
      [locationId, range.start, range.end]
    );
    return result.rows.map((row) => row.timestamp);
  }
}

/**
 * Slots of `stepMinutes` inside `range` with no stored row, grouped into
 * runs of consecutive missing slots.
 */
export function findGaps(entityKey: string, present: Date[], range: TimeWindow, stepMinutes = 60): DataGap[] {
  const seen = new Set(present.map((timestamp) => timestamp.getTime()));
  const gaps: DataGap[] = [];
  let run: Date[] = [];

  const close = () => {
    if (run.length) {
      gaps.push({ entityKey, start: run[0], end: run[run.length - 1], hours: (run.length * stepMinutes) / 60 });
      run = [];
    }
  };

  for (const slot of enumerateSteps(range, stepMinutes)) {
    if (seen.has(slot.getTime())) {
      close();
    } else {
      run.push(slot);
    }
  }
  close();
  return gaps;
}

/** Overlapping or adjacent gaps of any entity collapse into one fetch window. */
export function mergeGapWindows(gaps: DataGap[], stepMinutes = 60): TimeWindow[] {
  const stepMs = stepMinutes * 60_000;
  const sorted = [...gaps].sort((a, b) => a.start.getTime() - b.start.getTime());
  const windows: TimeWindow[] = [];

  for (const gap of sorted) {
    const last = windows.length ? windows[windows.length - 1] : null;
    if (last && gap.start.getTime() <= last.end.getTime() + stepMs) {
      if (gap.end > last.end) {
        last.end = gap.end;
      }
      continue;
    }
    windows.push({ start: gap.start, end: gap.end });
  }
  return windows;
}

export function windowSlotHours(window: TimeWindow, stepMinutes = 60): number {
  return hoursBetween(window.start, window.end) + stepMinutes / 60;
}
