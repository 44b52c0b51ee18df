import { JobTracker } from "../../src/core/job-tracker";
import { IngestionMetrics } from "../../src/core/metrics";
import { Queryable, seedHouseholdMetadata, seedWeatherStations } from "../../src/core/reference-metadata";
import { InMemoryJobRepository, makeJob } from "../helpers";

function steppingClock(...isoTimes: string[]) {
  const times = isoTimes.map((value) => new Date(value));
  let index = 0;
  return () => {
    const value = times[Math.min(index, times.length - 1)];
    index += 1;
    return value;
  };
}

describe("JobTracker", () => {
  it("records a running job and finishes it with rounded duration", async () => {
    const repository = new InMemoryJobRepository();
    const tracker = new JobTracker(repository, steppingClock("2024-06-01T10:00:00.000Z", "2024-06-01T10:00:02.600Z"));

    const job = await tracker.start("manual_grid", "grid");
    expect(job).toEqual(
      expect.objectContaining({ id: 1, jobName: "manual_grid", dataSource: "grid", status: "running", endTime: null })
    );

    const finished = await tracker.finish(job, {
      status: "partial_success",
      recordsProcessed: 30,
      recordsInserted: 20,
      recordsUpdated: 5,
      recordsRejected: 2,
      errorMessage: "Chunk 3 of 3 failed after 3 attempt(s): timeout"
    });

    expect(finished.processingDurationSeconds).toBe(3);
    expect(finished.endTime?.toISOString()).toBe("2024-06-01T10:00:02.600Z");
    expect(repository.jobs.get(1)).toEqual(finished);
  });

  it("truncates long error messages and clears them on success", async () => {
    const tracker = new JobTracker(new InMemoryJobRepository(), () => new Date("2024-06-01T10:00:00Z"));
    const job = await tracker.start("job", "weather");

    const failed = tracker.complete(job, {
      status: "failed",
      recordsProcessed: 0,
      recordsInserted: 0,
      recordsUpdated: 0,
      recordsRejected: 0,
      errorMessage: "x".repeat(3000)
    });
    expect(failed.errorMessage).toHaveLength(2000);
    expect(failed.errorMessage?.endsWith("...")).toBe(true);

    const succeeded = tracker.complete(job, {
      status: "success",
      recordsProcessed: 1,
      recordsInserted: 1,
      recordsUpdated: 0,
      recordsRejected: 0,
      errorMessage: "ignored"
    });
    expect(succeeded.errorMessage).toBeNull();
  });

  it("refuses to finish a job twice", () => {
    const tracker = new JobTracker(new InMemoryJobRepository());
    const done = makeJob({ id: 4, status: "failed" });

    expect(() =>
      tracker.complete(done, {
        status: "success",
        recordsProcessed: 0,
        recordsInserted: 0,
        recordsUpdated: 0,
        recordsRejected: 0,
        errorMessage: null
      })
    ).toThrow("Job 4 already finished with status failed");
  });
});

describe("IngestionMetrics", () => {
  it("counts runs by status and fallback tiers", () => {
    const metrics = new IngestionMetrics();
    metrics.markRun("grid", makeJob({ status: "success", recordsInserted: 10 }));
    metrics.markRun("grid", makeJob({ status: "partial_success", recordsInserted: 4, recordsRejected: 1 }));
    metrics.markRun("weather", makeJob({ status: "failed", endTime: new Date("2024-06-01T13:00:00Z") }));
    metrics.markTier("primary");
    metrics.markTier("fallback");
    metrics.markTier("synthetic");

    expect(metrics.snapshot()).toEqual({
      success_runs: 1,
      partial_runs: 1,
      failed_runs: 1,
      fallback_usage: 1,
      synthetic_usage: 1,
      records_written: 14,
      records_rejected: 1,
      last_source: "weather",
      last_run_at: "2024-06-01T13:00:00.000Z"
    });
  });
});

describe("seedWeatherStations", () => {
  it("upserts one row per location", async () => {
    const queries: Array<{ text: string; values?: unknown[] }> = [];
    const db: Queryable = {
      query: async (text, values) => {
        queries.push({ text, values });
        return { rowCount: 2 };
      }
    };

    const count = await seedWeatherStations(db, [
      { locationId: "a", name: "A", latitude: 1, longitude: 2, timezone: "UTC", countryCode: "FR" },
      { locationId: "b", name: "B", latitude: 3, longitude: 4, timezone: "UTC", countryCode: "DE" }
    ]);

    expect(count).toBe(2);
    expect(queries).toHaveLength(1);
    expect(queries[0].values).toEqual(["a", "A", 1, 2, "UTC", "FR", "b", "B", 3, 4, "UTC", "DE"]);
    expect(queries[0].text).toContain("($7, $8, $9, $10, $11, $12, 'synoptic', 'open-meteo')");
    expect(queries[0].text).toContain("on conflict (location_id) do update");
  });

  it("skips the query without locations", async () => {
    const db: Queryable = {
      query: async () => {
        throw new Error("should not query");
      }
    };
    await expect(seedWeatherStations(db, [])).resolves.toBe(0);
  });
});

describe("seedHouseholdMetadata", () => {
  const metadata = {
    locationName: "Test Town",
    latitude: 45.5,
    longitude: 4.25,
    timezone: "Europe/Paris",
    meterType: "smart_meter",
    samplingMinutes: 1,
    dataSource: "test archive"
  };

  it("upserts the configured household", async () => {
    const queries: Array<{ text: string; values?: unknown[] }> = [];
    const db: Queryable = {
      query: async (text, values) => {
        queries.push({ text, values });
        return { rowCount: 1 };
      }
    };

    const count = await seedHouseholdMetadata(db, "house-1", { ...metadata, installationDate: "2020-01-31" });

    expect(count).toBe(1);
    expect(queries[0].values).toEqual([
      "house-1",
      "Test Town",
      45.5,
      4.25,
      "Europe/Paris",
      "2020-01-31",
      "smart_meter",
      "1 minutes",
      "test archive"
    ]);
    expect(queries[0].text).toContain("insert into household.metadata");
    expect(queries[0].text).toContain("values ($1, $2, $3, $4, $5, $6, $7, $8::interval, $9)");
    expect(queries[0].text).toContain("on conflict (household_id) do update");
  });

  it("stores a missing installation date as null", async () => {
    const values: unknown[][] = [];
    const db: Queryable = {
      query: async (_text, params) => {
        values.push(params ?? []);
        return { rowCount: 1 };
      }
    };

    await seedHouseholdMetadata(db, "house-1", metadata);

    expect(values[0][5]).toBeNull();
  });

  it("does nothing without configured metadata", async () => {
    const db: Queryable = {
      query: async () => {
        throw new Error("unexpected query");
      }
    };

    await expect(seedHouseholdMetadata(db, "house-1", undefined)).resolves.toBe(0);
  });
});
