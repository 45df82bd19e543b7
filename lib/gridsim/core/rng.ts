// lib/gridsim/core/rng.ts
// Seeded randomness for grid generation, placement and agent draws.

import seedrandom from 'seedrandom';

// Uniform float in [0, 1). seedrandom's prng satisfies this directly.
export type Rng = () => number;

export function makeRng(seed: number | string): Rng {
  return seedrandom(String(seed));
}

export function randInt(rng: Rng, min: number, max: number): number {
  const a = Math.ceil(min);
  const b = Math.floor(max);
  if (b < a) return a;
  return a + Math.floor(rng() * (b - a + 1));
}

export function pickOne<T>(rng: Rng, xs: readonly T[]): T | null {
  if (!xs.length) return null;
  return xs[randInt(rng, 0, xs.length - 1)];
}
