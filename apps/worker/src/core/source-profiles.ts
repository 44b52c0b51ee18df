import type { SourceKind, SyntheticQuality } from "@energy-pipeline/shared";
import type {
  GridMeasurements,
  HouseholdMeasurements,
  MeasurementField,
  MeasurementsBySource,
  QualityBand,
  WeatherMeasurements
} from "./types";

export interface FieldBounds {
  min: number;
  max: number;
  /** Lower bound itself is out of range. */
  minExclusive?: boolean;
}

export interface SourceProfile<K extends SourceKind> {
  source: K;
  stalenessHours: number;
  requiredFields: MeasurementField<K>[];
  bounds: Partial<Record<MeasurementField<K>, FieldBounds>>;
  /** Cross-field checks. Each returns a problem description or null. */
  consistency: Array<(measurements: MeasurementsBySource[K]) => string | null>;
}

export const REAL_DATA_BAND: QualityBand = { floor: 0, ceiling: 1 };

export const SYNTHETIC_BANDS: Record<SyntheticQuality, QualityBand> = {
  basic: { floor: 0.4, ceiling: 0.55 },
  standard: { floor: 0.55, ceiling: 0.7 },
  high: { floor: 0.7, ceiling: 0.85 }
};

const GENERATION_TOLERANCE = 0.1;

const householdProfile: SourceProfile<"household"> = {
  source: "household",
  stalenessHours: 168,
  requiredFields: ["globalActivePower", "voltage", "globalIntensity"],
  bounds: {
    globalActivePower: { min: 0, max: 20 },
    globalReactivePower: { min: 0, max: 20 },
    voltage: { min: 200, max: 260 },
    globalIntensity: { min: 0, max: 100 },
    subMetering1: { min: 0, max: 1000 },
    subMetering2: { min: 0, max: 1000 },
    subMetering3: { min: 0, max: 1000 }
  },
  consistency: [checkSubMetering]
};

const weatherProfile: SourceProfile<"weather"> = {
  source: "weather",
  stalenessHours: 3,
  requiredFields: ["temperature2mC", "relativeHumidity2mPct", "windSpeed10mKmh"],
  bounds: {
    temperature2mC: { min: -60, max: 60 },
    relativeHumidity2mPct: { min: 0, max: 100 },
    windSpeed10mKmh: { min: 0, max: 200 },
    windGusts10mKmh: { min: 0, max: 300 },
    windDirection10mDeg: { min: 0, max: 360 },
    surfacePressureHpa: { min: 800, max: 1100 },
    rainMm: { min: 0, max: 200 },
    shortwaveRadiationWM2: { min: 0, max: 1500 },
    cloudCoverPct: { min: 0, max: 100 },
    visibilityM: { min: 0, max: 50000 }
  },
  consistency: [checkDewPoint]
};

const gridProfile: SourceProfile<"grid"> = {
  source: "grid",
  stalenessHours: 2,
  requiredFields: ["loadActualMw", "totalGenerationMw"],
  bounds: {
    loadActualMw: { min: 0, max: 1_000_000, minExclusive: true },
    solarGenerationActualMw: { min: 0, max: 1_000_000 },
    windOnshoreGenerationActualMw: { min: 0, max: 1_000_000 },
    windOffshoreGenerationActualMw: { min: 0, max: 1_000_000 },
    hydroGenerationActualMw: { min: 0, max: 1_000_000 },
    nuclearGenerationActualMw: { min: 0, max: 1_000_000 },
    fossilGenerationActualMw: { min: 0, max: 1_000_000 },
    totalGenerationMw: { min: 0, max: 1_000_000 },
    priceDayAheadEurMwh: { min: -500, max: 3000 }
  },
  consistency: [checkGenerationTotal]
};

export const SOURCE_PROFILES: { [K in SourceKind]: SourceProfile<K> } = {
  household: householdProfile,
  weather: weatherProfile,
  grid: gridProfile
};

export function isWithinBounds(value: number, bounds: FieldBounds): boolean {
  const aboveMin = bounds.minExclusive ? value > bounds.min : value >= bounds.min;
  return aboveMin && value <= bounds.max;
}

function checkSubMetering(measurements: HouseholdMeasurements): string | null {
  const { globalActivePower, subMetering1, subMetering2, subMetering3 } = measurements;
  if (globalActivePower === null) {
    return null;
  }
  const activeEnergyWh = (globalActivePower * 1000) / 60;
  const subMetered = (subMetering1 ?? 0) + (subMetering2 ?? 0) + (subMetering3 ?? 0);
  if (subMetered > activeEnergyWh + 1e-9) {
    return `sub-metering ${round(subMetered)} Wh exceeds active energy ${round(activeEnergyWh)} Wh`;
  }
  return null;
}

function checkDewPoint(measurements: WeatherMeasurements): string | null {
  const { dewPoint2mC, temperature2mC } = measurements;
  if (dewPoint2mC === null || temperature2mC === null) {
    return null;
  }
  if (dewPoint2mC > temperature2mC) {
    return `dew point ${dewPoint2mC} C above temperature ${temperature2mC} C`;
  }
  return null;
}

function checkGenerationTotal(measurements: GridMeasurements): string | null {
  const components = [
    measurements.solarGenerationActualMw,
    measurements.windOnshoreGenerationActualMw,
    measurements.windOffshoreGenerationActualMw,
    measurements.hydroGenerationActualMw,
    measurements.nuclearGenerationActualMw,
    measurements.fossilGenerationActualMw,
    measurements.otherRenewableGenerationMw
  ].filter((value): value is number => value !== null);
  const total = measurements.totalGenerationMw;
  if (total === null || !components.length) {
    return null;
  }
  const sum = components.reduce((acc, value) => acc + value, 0);
  if (sum === 0) {
    return total === 0 ? null : `total generation ${round(total)} MW with no component generation`;
  }
  if (Math.abs(total - sum) / sum > GENERATION_TOLERANCE) {
    return `total generation ${round(total)} MW differs from component sum ${round(sum)} MW by more than 10%`;
  }
  return null;
}

function round(value: number): number {
  return Math.round(value * 100) / 100;
}
