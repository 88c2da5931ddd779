/** Promise-based timer helpers shared by the choreography code. */

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, Math.max(0, ms)));
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

/** Source of uniform randoms in [0, 1); injectable for deterministic runs. */
export type RandomSource = () => number;

/** Scale `base` by a random factor in [1 - ratio, 1 + ratio]; never below 1. */
export function applyJitter(base: number, ratio: number, random: RandomSource = Math.random): number {
  const clampedRatio = clamp(ratio, 0, 0.95);
  const delta = (random() * 2 - 1) * clampedRatio;
  return Math.max(1, base * (1 + delta));
}
