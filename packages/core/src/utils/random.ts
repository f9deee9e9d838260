/** A source of floats in [0, 1), same contract as Math.random */
export type RandomSource = () => number;

/**
 * Seeded random number generator (mulberry32)
 * Produces deterministic sequence for reproducible shuffles
 */
export function seededRandom(seed: number): RandomSource {
  return function() {
    seed |= 0;
    seed = seed + 0x6D2B79F5 | 0;
    let t = Math.imul(seed ^ seed >>> 15, 1 | seed);
    t = t + Math.imul(t ^ t >>> 7, 61 | t) ^ t;
    return ((t ^ t >>> 14) >>> 0) / 4294967296;
  };
}

/** Seeded generator when a seed is given, otherwise Math.random */
export function createRng(seed?: number): RandomSource {
  return seed !== undefined ? seededRandom(seed) : Math.random;
}

/**
 * Uniform integer in [0, bound). Values a custom source returns outside
 * [0, 1) are clamped into range.
 */
export function randomIndex(rng: RandomSource, bound: number): number {
  const index = Math.floor(rng() * bound);
  if (!(index >= 0)) return 0;
  return Math.min(index, bound - 1);
}

/** Parse a decimal integer seed, e.g. from a flag or env var */
export function parseSeed(text: string): number {
  if (!/^-?\d+$/.test(text.trim())) {
    throw new RangeError(`Invalid seed: ${text}`);
  }
  return parseInt(text, 10) | 0;
}
