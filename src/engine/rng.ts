// src/engine/rng.ts

/** A source of floats in [0, 1), like Math.random. */
export type Rng = () => number;

/**
 * Seeded mulberry32 generator. Same seed, same sequence on every platform.
 */
export function createRng(seed: number): Rng {
  let state = seed >>> 0;

  return (): number => {
    state |= 0;
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function randomSeed(): number {
  return Math.floor(Math.random() * 4294967296) >>> 0;
}

/** Uniform integer in [min, max]. */
export function randomInt(rng: Rng, min: number, max: number): number {
  return min + Math.floor(rng() * (max - min + 1));
}

/** Derive a per-game seed so batches stay reproducible from one base seed. */
export function deriveSeed(baseSeed: number, index: number): number {
  return (baseSeed * 31 + index * 17 + 13) >>> 0;
}
