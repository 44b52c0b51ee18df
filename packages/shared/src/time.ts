import { DateTime } from "luxon";

export interface TimeWindow {
  start: Date;
  end: Date;
}

export function resolveTrailingWindow(lookbackMinutes: number, now = new Date()): TimeWindow {
  const end = DateTime.fromJSDate(now, { zone: "utc" }).startOf("minute");
  return {
    start: end.minus({ minutes: lookbackMinutes }).toJSDate(),
    end: end.toJSDate()
  };
}

export function parseWindow(from: string, to: string): TimeWindow {
  const start = DateTime.fromISO(from, { zone: "utc" });
  const end = DateTime.fromISO(to, { zone: "utc" });
  if (!start.isValid || !end.isValid) {
    throw new Error(`Invalid window bounds: from=${from}, to=${to}`);
  }
  if (end < start) {
    throw new Error(`Window end ${to} is before start ${from}`);
  }
  return { start: start.toJSDate(), end: end.toJSDate() };
}

export function windowContains(window: TimeWindow, timestamp: Date): boolean {
  const value = timestamp.getTime();
  return value >= window.start.getTime() && value <= window.end.getTime();
}

/**
 * Timestamps from the first step boundary at or after `window.start` up to
 * `window.end` inclusive, `stepMinutes` apart.
 */
export function enumerateSteps(window: TimeWindow, stepMinutes: number): Date[] {
  if (!Number.isInteger(stepMinutes) || stepMinutes < 1) {
    throw new Error("stepMinutes must be an integer >= 1");
  }

  const stepMs = stepMinutes * 60_000;
  const first = Math.ceil(window.start.getTime() / stepMs) * stepMs;
  const steps: Date[] = [];
  for (let cursor = first; cursor <= window.end.getTime(); cursor += stepMs) {
    steps.push(new Date(cursor));
  }
  return steps;
}

export function hoursBetween(earlier: Date, later: Date): number {
  return (later.getTime() - earlier.getTime()) / 3_600_000;
}

export function formatWindow(window: TimeWindow): string {
  return `${window.start.toISOString()}..${window.end.toISOString()}`;
}

export function toUtcDate(value: Date): string {
  return DateTime.fromJSDate(value, { zone: "utc" }).toISODate() ?? "";
}
