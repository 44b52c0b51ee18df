import type { SourceKind, TimeWindow } from "@energy-pipeline/shared";
import { CoverageRepository, findGaps, mergeGapWindows, windowSlotHours } from "../../src/core/data-gaps";
import { silentLogger } from "../../src/core/logger";
import type { IngestionJob } from "../../src/core/types";
import { GapBackfiller } from "../../src/jobs/gap-backfill";
import type { RunOptions } from "../../src/jobs/ingestion-orchestrator";
import type { SourceRunner } from "../../src/jobs/streaming-manager";
import { makeJob } from "../helpers";

const NOW = new Date("2024-06-10T12:30:00Z");
const DAY: TimeWindow = { start: new Date("2024-06-09T12:30:00Z"), end: NOW };

function hourlySlots(firstIso: string, count: number, missing: string[] = []): Date[] {
  const first = new Date(firstIso).getTime();
  const skip = new Set(missing.map((iso) => new Date(iso).getTime()));
  return Array.from({ length: count }, (_, index) => new Date(first + index * 3_600_000)).filter(
    (slot) => !skip.has(slot.getTime())
  );
}

class MemoryCoverage implements CoverageRepository {
  readonly ranges: TimeWindow[] = [];

  constructor(private readonly rows: Record<string, Date[]>) {}

  async listTimestamps(entityKey: string, range: TimeWindow): Promise<Date[]> {
    this.ranges.push(range);
    return this.rows[entityKey] ?? [];
  }
}

class RecordingRunner implements SourceRunner {
  readonly calls: Array<{ window: TimeWindow; options?: RunOptions }> = [];

  constructor(
    readonly source: SourceKind,
    private readonly status: IngestionJob["status"] = "success"
  ) {}

  async run(window: TimeWindow, options?: RunOptions): Promise<IngestionJob> {
    this.calls.push({ window, options });
    return makeJob({ id: this.calls.length, dataSource: this.source, status: this.status });
  }
}

const iso = (window: TimeWindow) => [window.start.toISOString(), window.end.toISOString()];

describe("findGaps", () => {
  it("groups consecutive missing hours", () => {
    const present = hourlySlots("2024-06-09T13:00:00Z", 24, [
      "2024-06-10T03:00:00Z",
      "2024-06-10T04:00:00Z",
      "2024-06-10T05:00:00Z",
      "2024-06-10T09:00:00Z"
    ]);

    expect(findGaps("paris", present, DAY)).toEqual([
      {
        entityKey: "paris",
        start: new Date("2024-06-10T03:00:00Z"),
        end: new Date("2024-06-10T05:00:00Z"),
        hours: 3
      },
      {
        entityKey: "paris",
        start: new Date("2024-06-10T09:00:00Z"),
        end: new Date("2024-06-10T09:00:00Z"),
        hours: 1
      }
    ]);
  });

  it("reports the whole range when nothing is stored", () => {
    expect(findGaps("oslo", [], DAY)).toEqual([
      {
        entityKey: "oslo",
        start: new Date("2024-06-09T13:00:00Z"),
        end: new Date("2024-06-10T12:00:00Z"),
        hours: 24
      }
    ]);
  });

  it("finds nothing when every hour is stored", () => {
    expect(findGaps("paris", hourlySlots("2024-06-09T13:00:00Z", 24), DAY)).toEqual([]);
  });
});

describe("mergeGapWindows", () => {
  it("joins overlapping and adjacent gaps of different entities", () => {
    const windows = mergeGapWindows([
      { entityKey: "berlin", start: new Date("2024-06-10T04:00:00Z"), end: new Date("2024-06-10T07:00:00Z"), hours: 4 },
      { entityKey: "paris", start: new Date("2024-06-10T03:00:00Z"), end: new Date("2024-06-10T05:00:00Z"), hours: 3 },
      { entityKey: "paris", start: new Date("2024-06-10T08:00:00Z"), end: new Date("2024-06-10T08:00:00Z"), hours: 1 },
      { entityKey: "madrid", start: new Date("2024-06-10T11:00:00Z"), end: new Date("2024-06-10T11:00:00Z"), hours: 1 }
    ]);

    expect(windows.map(iso)).toEqual([
      ["2024-06-10T03:00:00.000Z", "2024-06-10T08:00:00.000Z"],
      ["2024-06-10T11:00:00.000Z", "2024-06-10T11:00:00.000Z"]
    ]);
    expect(windowSlotHours(windows[0])).toBe(6);
  });
});

describe("GapBackfiller", () => {
  const options = { lookbackDays: 1, maxGapDays: 7, retentionDays: 1095, logger: silentLogger, clock: () => NOW };

  it("re-ingests the merged gap windows through the runner", async () => {
    const coverage = new MemoryCoverage({
      paris: hourlySlots("2024-06-09T13:00:00Z", 24, [
        "2024-06-10T03:00:00Z",
        "2024-06-10T04:00:00Z",
        "2024-06-10T05:00:00Z"
      ]),
      berlin: hourlySlots("2024-06-09T13:00:00Z", 24, [
        "2024-06-10T04:00:00Z",
        "2024-06-10T05:00:00Z",
        "2024-06-10T06:00:00Z",
        "2024-06-10T07:00:00Z"
      ])
    });
    const runner = new RecordingRunner("weather");
    const backfiller = new GapBackfiller(runner, coverage, ["paris", "berlin"], options);

    const result = await backfiller.backfill();

    expect(result.gaps.map((gap) => `${gap.entityKey}:${gap.hours}`)).toEqual(["paris:3", "berlin:4"]);
    expect(runner.calls.map((call) => iso(call.window))).toEqual([
      ["2024-06-10T03:00:00.000Z", "2024-06-10T07:00:00.000Z"]
    ]);
    expect(runner.calls[0].options?.jobName).toBe("gap_fill_weather");
    expect(result.jobs.map((job) => job.id)).toEqual([1]);
    expect(result.skipped).toEqual([]);
  });

  it("skips windows longer than the gap limit", async () => {
    const runner = new RecordingRunner("weather");
    const backfiller = new GapBackfiller(runner, new MemoryCoverage({}), ["oslo"], { ...options, maxGapDays: 0.5 });

    const result = await backfiller.backfill();

    expect(runner.calls).toEqual([]);
    expect(result.skipped.map(iso)).toEqual([["2024-06-09T13:00:00.000Z", "2024-06-10T12:00:00.000Z"]]);
  });

  it("does not look back past the retention horizon", async () => {
    const coverage = new MemoryCoverage({ paris: hourlySlots("2024-06-09T13:00:00Z", 24) });
    const backfiller = new GapBackfiller(new RecordingRunner("weather"), coverage, ["paris"], {
      ...options,
      lookbackDays: 90,
      retentionDays: 1
    });

    const result = await backfiller.backfill();

    expect(coverage.ranges).toEqual([DAY]);
    expect(result.gaps).toEqual([]);
    expect(result.jobs).toEqual([]);
  });

  it("stops filling once cancelled", async () => {
    const controller = new AbortController();
    controller.abort();
    const runner = new RecordingRunner("weather");
    const backfiller = new GapBackfiller(runner, new MemoryCoverage({}), ["oslo"], options);

    const result = await backfiller.backfill(controller.signal);

    expect(result.gaps).toHaveLength(1);
    expect(runner.calls).toEqual([]);
    expect(result.filled).toEqual([]);
  });
});
