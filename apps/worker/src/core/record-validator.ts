import type { SourceKind, TimeWindow } from "@energy-pipeline/shared";
import { hoursBetween } from "@energy-pipeline/shared";
import { FieldBounds, isWithinBounds, SourceProfile } from "./source-profiles";
import type {
  MeasurementsBySource,
  QualityBand,
  QualityWeights,
  RejectionReason,
  SourceRecord,
  ValidationOutcome
} from "./types";

export type Strictness = "strict" | "lenient";

export interface RecordValidatorOptions {
  minCompleteness: number;
  rejectionTolerance: number;
  strictRejectionTolerance: number;
  weights: QualityWeights;
}

export interface ValidationContext {
  now?: Date;
  window?: TimeWindow;
}

type FieldValues = Record<string, number | null>;

interface RecordChecks {
  completeness: number;
  accuracy: number;
  consistency: number;
  outOfBounds: string[];
  inconsistencies: string[];
}

export const DEFAULT_VALIDATOR_OPTIONS: RecordValidatorOptions = {
  minCompleteness: 0.95,
  rejectionTolerance: 0.2,
  strictRejectionTolerance: 0,
  weights: { freshness: 1, completeness: 1, accuracy: 1, consistency: 1 }
};

const MAX_WARNING_SAMPLES = 5;

/**
 * Quality gate between fetch and write. Pure: the same records, strictness
 * and reference time always give the same outcome.
 */
export class RecordValidator<K extends SourceKind> {
  private readonly options: RecordValidatorOptions;

  constructor(
    private readonly profile: SourceProfile<K>,
    options: Partial<RecordValidatorOptions> = {}
  ) {
    this.options = { ...DEFAULT_VALIDATOR_OPTIONS, ...options };
    const weightSum = Object.values(this.options.weights).reduce((acc, value) => acc + value, 0);
    if (weightSum <= 0) {
      throw new Error("Quality weights must sum to a positive number");
    }
  }

  validate(records: SourceRecord<K>[], strictness: Strictness, context: ValidationContext = {}): ValidationOutcome<K> {
    const rejections: Record<RejectionReason, number> = { stale: 0, incomplete: 0, out_of_bounds: 0 };
    const warnings: string[] = [];

    const unique = dedupeByNaturalKey(records);
    const duplicateCount = records.length - unique.length;
    if (duplicateCount > 0) {
      warnings.push(`${duplicateCount} duplicate record(s) collapsed to the last occurrence`);
    }

    const total = unique.length;
    if (!total) {
      return {
        accepted: [],
        acceptedCount: 0,
        rejectedCount: 0,
        duplicateCount,
        rejections,
        rejectionRatio: 0,
        warnings: [...warnings, "Batch is empty"],
        isAcceptable: false
      };
    }

    const reference = resolveReferenceTime(context);
    const newest = unique.reduce((max, record) => (record.timestamp > max ? record.timestamp : max), unique[0].timestamp);
    const newestAgeHours = hoursBetween(newest, reference);
    if (newestAgeHours > this.profile.stalenessHours) {
      const message =
        `Newest ${this.profile.source} record ${newest.toISOString()} is ${newestAgeHours.toFixed(1)}h old ` +
        `(threshold ${this.profile.stalenessHours}h)`;
      warnings.push(message);
      if (strictness === "strict") {
        rejections.stale = total;
        return this.buildOutcome([], total, duplicateCount, rejections, warnings, strictness);
      }
    }

    const accepted: SourceRecord<K>[] = [];
    const boundsSamples: string[] = [];
    const consistencySamples: string[] = [];
    let inconsistentCount = 0;

    for (const record of unique) {
      const checks = this.checkRecord(record.measurements);
      if (checks.completeness < this.options.minCompleteness) {
        rejections.incomplete += 1;
        continue;
      }
      if (checks.outOfBounds.length) {
        rejections.out_of_bounds += 1;
        if (boundsSamples.length < MAX_WARNING_SAMPLES) {
          boundsSamples.push(`${record.entityKey}@${record.timestamp.toISOString()}: ${checks.outOfBounds.join(", ")}`);
        }
        continue;
      }
      if (checks.inconsistencies.length) {
        inconsistentCount += 1;
        if (consistencySamples.length < MAX_WARNING_SAMPLES) {
          consistencySamples.push(
            `${record.entityKey}@${record.timestamp.toISOString()}: ${checks.inconsistencies.join(", ")}`
          );
        }
      }

      const freshness = freshnessRatio(hoursBetween(record.timestamp, reference), this.profile.stalenessHours);
      const ratios = {
        freshness,
        completeness: checks.completeness,
        accuracy: checks.accuracy,
        consistency: checks.consistency
      };
      accepted.push({ ...record, dataQualityScore: this.score(ratios, record.origin.qualityBand) });
    }

    if (rejections.incomplete) {
      warnings.push(
        `${rejections.incomplete} record(s) below completeness ${this.options.minCompleteness} ` +
          `on ${this.profile.requiredFields.join(", ")}`
      );
    }
    if (rejections.out_of_bounds) {
      warnings.push(`${rejections.out_of_bounds} record(s) out of bounds: ${boundsSamples.join("; ")}`);
    }
    if (inconsistentCount) {
      warnings.push(`${inconsistentCount} record(s) failed consistency checks: ${consistencySamples.join("; ")}`);
    }

    return this.buildOutcome(accepted, total, duplicateCount, rejections, warnings, strictness);
  }

  private buildOutcome(
    accepted: SourceRecord<K>[],
    total: number,
    duplicateCount: number,
    rejections: Record<RejectionReason, number>,
    warnings: string[],
    strictness: Strictness
  ): ValidationOutcome<K> {
    const rejectedCount = total - accepted.length;
    const rejectionRatio = total ? rejectedCount / total : 0;
    const tolerance =
      strictness === "strict" ? this.options.strictRejectionTolerance : this.options.rejectionTolerance;
    return {
      accepted,
      acceptedCount: accepted.length,
      rejectedCount,
      duplicateCount,
      rejections,
      rejectionRatio,
      warnings,
      isAcceptable: accepted.length > 0 && rejectionRatio <= tolerance
    };
  }

  private checkRecord(measurements: MeasurementsBySource[K]): RecordChecks {
    const values: FieldValues = measurements;
    const boundsByField: Partial<Record<string, FieldBounds>> = this.profile.bounds;
    const required = this.profile.requiredFields;
    const present = required.filter((field) => isPresent(values[field])).length;
    const completeness = required.length ? present / required.length : 1;

    const outOfBounds: string[] = [];
    let boundedPresent = 0;
    for (const [field, bounds] of Object.entries(boundsByField)) {
      const value = values[field];
      if (!bounds || !isPresent(value)) {
        continue;
      }
      boundedPresent += 1;
      if (!isWithinBounds(value, bounds)) {
        outOfBounds.push(`${field}=${value}`);
      }
    }
    const accuracy = boundedPresent ? (boundedPresent - outOfBounds.length) / boundedPresent : 1;

    const inconsistencies = this.profile.consistency
      .map((check) => check(measurements))
      .filter((problem): problem is string => problem !== null);
    const checksRun = this.profile.consistency.length;
    const consistency = checksRun ? (checksRun - inconsistencies.length) / checksRun : 1;

    return { completeness, accuracy, consistency, outOfBounds, inconsistencies };
  }

  private score(ratios: QualityWeights, band: QualityBand): number {
    const { weights } = this.options;
    const weightSum = weights.freshness + weights.completeness + weights.accuracy + weights.consistency;
    const raw =
      (ratios.freshness * weights.freshness +
        ratios.completeness * weights.completeness +
        ratios.accuracy * weights.accuracy +
        ratios.consistency * weights.consistency) /
      weightSum;
    return Math.round((band.floor + (band.ceiling - band.floor) * raw) * 100) / 100;
  }
}

export function dedupeByNaturalKey<R extends { timestamp: Date; entityKey: string }>(records: R[]): R[] {
  const byKey = new Map<string, R>();
  for (const record of records) {
    byKey.set(`${record.timestamp.getTime()}|${record.entityKey}`, record);
  }
  return Array.from(byKey.values());
}

export function resolveReferenceTime(context: ValidationContext): Date {
  const now = context.now ?? new Date();
  if (context.window && context.window.end < now) {
    return context.window.end;
  }
  return now;
}

/** 1 at the reference time, falling linearly to 0 at 24x the staleness threshold. */
export function freshnessRatio(ageHours: number, stalenessHours: number): number {
  const age = Math.max(0, ageHours);
  return Math.max(0, Math.min(1, 1 - age / (stalenessHours * 24)));
}

function isPresent(value: number | null | undefined): value is number {
  return typeof value === "number" && Number.isFinite(value);
}
