import type { SyntheticQuality } from "@energy-pipeline/shared";

export type RandomFn = () => number;

/** Lehmer generator; the same seed always yields the same sequence. */
export function createRandom(seed: number): RandomFn {
  let state = Math.floor(Math.abs(seed)) % 2147483647;
  if (state <= 0) {
    state += 2147483646;
  }
  return () => {
    state = (state * 16807) % 2147483647;
    return (state - 1) / 2147483646;
  };
}

export function seedFrom(...parts: Array<string | number>): number {
  let hash = 2166136261;
  for (const char of parts.join("|")) {
    hash ^= char.charCodeAt(0);
    hash = Math.imul(hash, 16777619) >>> 0;
  }
  return hash;
}

/** Standard normal sample (Box-Muller). */
export function gaussian(rng: RandomFn): number {
  const u1 = Math.max(rng(), 1e-12);
  const u2 = rng();
  return Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
}

export function exponential(rng: RandomFn, mean: number): number {
  return -Math.log(Math.max(1 - rng(), 1e-12)) * mean;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

export function roundTo(value: number, digits: number): number {
  const factor = Math.pow(10, digits);
  return Math.round(value * factor) / factor;
}

export const NOISE_SCALE: Record<SyntheticQuality, number> = {
  basic: 1,
  standard: 0.6,
  high: 0.3
};
