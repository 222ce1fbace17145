/**
 * Random sources and categorical draws for the sampling estimator.
 */

import { InvalidInputError } from './errors.js';

/** Returns a float in [0, 1). Math.random satisfies this. */
export type RandomSource = () => number;

/**
 * Seeded PRNG (Mulberry32). Same seed, same sequence.
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    let t = (state = (state + 0x6d2b79f5) >>> 0);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function uniformChoice<T>(items: readonly T[], random: RandomSource): T {
  if (items.length === 0) {
    throw new InvalidInputError('Cannot choose from an empty list');
  }
  const idx = Math.min(Math.floor(random() * items.length), items.length - 1);
  return items[idx];
}

/**
 * Draw one item with probability weight / total weight.
 *
 * Builds the cumulative weights and binary-searches for the first bucket
 * whose upper bound exceeds `random() * total`. Zero-weight items own an
 * empty bucket and are never selected.
 */
export function weightedChoice<T>(items: readonly T[], weights: readonly number[], random: RandomSource): T {
  if (items.length === 0) {
    throw new InvalidInputError('Cannot choose from an empty list');
  }
  if (items.length !== weights.length) {
    throw new InvalidInputError(`Got ${items.length} items but ${weights.length} weights`);
  }

  const cumulative = new Float64Array(weights.length);
  let total = 0;
  for (let i = 0; i < weights.length; i++) {
    const w = weights[i];
    if (!Number.isFinite(w) || w < 0) {
      throw new InvalidInputError(`Weight at index ${i} must be a non-negative number, got ${w}`);
    }
    total += w;
    cumulative[i] = total;
  }
  if (total <= 0) {
    throw new InvalidInputError('Weights must not all be zero');
  }

  const target = random() * total;
  let lo = 0;
  let hi = cumulative.length - 1;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (cumulative[mid] > target) {
      hi = mid;
    } else {
      lo = mid + 1;
    }
  }

  // Rounding can leave target past the last non-zero bucket; step back onto it
  while (lo > 0 && weights[lo] === 0) lo--;
  return items[lo];
}
