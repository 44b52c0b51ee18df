import type { SourceKind, TimeWindow } from "@energy-pipeline/shared";
import { describeError, resolveTrailingWindow } from "@energy-pipeline/shared";
import type { LoggerLike } from "../core/logger";
import type { IngestionJob, PipelineConfig } from "../core/types";
import type { RunOptions } from "./ingestion-orchestrator";

export interface ScheduleEntry {
  source: SourceKind;
  intervalSeconds: number;
  lookbackMinutes: number;
}

export interface SourceRunner {
  readonly source: SourceKind;
  run(window: TimeWindow, options?: RunOptions): Promise<IngestionJob>;
}

export type ManagerState = "idle" | "running" | "stopping" | "stopped";

export interface StreamingManagerOptions {
  drainTimeoutMs: number;
  logger: LoggerLike;
  clock?: () => Date;
}

interface EntryState {
  entry: ScheduleEntry;
  runner: SourceRunner;
  timer: NodeJS.Timeout | null;
  inFlight: Promise<IngestionJob> | null;
  controller: AbortController | null;
}

export function buildSchedule(config: PipelineConfig, sources: SourceKind[]): ScheduleEntry[] {
  return sources.map((source) => ({
    source,
    intervalSeconds: config.sources[source].intervalSeconds,
    lookbackMinutes: config.sources[source].lookbackMinutes
  }));
}

/**
 * Runs each scheduled source on its own timer. A source's next run is armed
 * only after its previous run settles, so runs of one source never overlap
 * while different sources proceed independently.
 */
export class StreamingManager {
  private managerState: ManagerState = "idle";
  private readonly entries = new Map<SourceKind, EntryState>();
  private readonly clock: () => Date;

  constructor(
    runners: SourceRunner[],
    schedule: ScheduleEntry[],
    private readonly options: StreamingManagerOptions
  ) {
    this.clock = options.clock ?? (() => new Date());
    for (const entry of schedule) {
      const runner = runners.find((candidate) => candidate.source === entry.source);
      if (!runner) {
        throw new Error(`No orchestrator for scheduled source ${entry.source}`);
      }
      if (entry.intervalSeconds <= 0 || entry.lookbackMinutes <= 0) {
        throw new Error(`Schedule for ${entry.source} needs a positive interval and lookback`);
      }
      if (this.entries.has(entry.source)) {
        throw new Error(`Source ${entry.source} is scheduled twice`);
      }
      this.entries.set(entry.source, { entry, runner, timer: null, inFlight: null, controller: null });
    }
  }

  get state(): ManagerState {
    return this.managerState;
  }

  start() {
    if (this.managerState !== "idle") {
      throw new Error(`Streaming manager cannot start from state ${this.managerState}`);
    }
    this.managerState = "running";
    for (const state of this.entries.values()) {
      this.launch(state);
    }
    this.options.logger.info(
      { sources: [...this.entries.values()].map((state) => state.entry) },
      "Streaming manager started"
    );
  }

  /**
   * Stops arming new runs, waits up to `drainTimeoutMs` for in-flight runs,
   * then cancels the rest. Resolves with the terminal job of every run that
   * was in flight and settled with one; crashed runs are only logged.
   */
  async stop(): Promise<IngestionJob[]> {
    if (this.managerState !== "running") {
      return [];
    }
    this.managerState = "stopping";

    const inFlight: Array<Promise<IngestionJob>> = [];
    for (const state of this.entries.values()) {
      if (state.timer) {
        clearTimeout(state.timer);
        state.timer = null;
      }
      if (state.inFlight) {
        inFlight.push(state.inFlight);
      }
    }

    const drained = await waitWithTimeout(Promise.allSettled(inFlight), this.options.drainTimeoutMs);
    if (!drained) {
      const cancelled = [...this.entries.values()].filter((state) => state.controller !== null);
      this.options.logger.warn(
        { sources: cancelled.map((state) => state.entry.source), drain_timeout_ms: this.options.drainTimeoutMs },
        "Drain timeout reached, cancelling in-flight runs"
      );
      for (const state of cancelled) {
        state.controller?.abort();
      }
    }

    const jobs: IngestionJob[] = [];
    for (const settled of await Promise.allSettled(inFlight)) {
      if (settled.status === "fulfilled") {
        jobs.push(settled.value);
      }
    }
    this.managerState = "stopped";
    this.options.logger.info(
      { drained_runs: jobs.length, crashed_runs: inFlight.length - jobs.length },
      "Streaming manager stopped"
    );
    return jobs;
  }

  private launch(state: EntryState) {
    this.runCycle(state).catch((error) => {
      this.options.logger.error({ source: state.entry.source, error: describeError(error) }, "Streaming cycle crashed");
    });
  }

  private async runCycle(state: EntryState) {
    state.timer = null;
    if (this.managerState !== "running") {
      return;
    }

    const controller = new AbortController();
    const window = resolveTrailingWindow(state.entry.lookbackMinutes, this.clock());
    state.controller = controller;
    try {
      state.inFlight = state.runner.run(window, {
        signal: controller.signal,
        jobName: `streaming_${state.entry.source}`
      });
      await state.inFlight;
    } catch (error) {
      this.options.logger.error(
        { source: state.entry.source, error: describeError(error) },
        "Streaming run crashed, next run stays scheduled"
      );
    } finally {
      state.inFlight = null;
      state.controller = null;
    }

    if (this.managerState === "running") {
      state.timer = setTimeout(() => this.launch(state), state.entry.intervalSeconds * 1000);
    }
  }
}

async function waitWithTimeout(promise: Promise<unknown>, timeoutMs: number): Promise<boolean> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<boolean>((resolve) => {
    timer = setTimeout(() => resolve(false), timeoutMs);
  });
  try {
    return await Promise.race([promise.then(() => true), timeout]);
  } finally {
    clearTimeout(timer);
  }
}
