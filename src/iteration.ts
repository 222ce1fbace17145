/**
 * PageRank iteration — fixed-point relaxation of the PageRank equations.
 *
 *   PR(p) = (1 - d) / N  +  d * Σ_q c(q, p)
 *
 *   c(q, p) = PR(q) / |L(q)|   if q links to p
 *           + PR(q) / N        if q is a dead end (L(q) empty)
 *
 * Both terms are checked for every q, including q = p: a dead end spreads
 * its rank over every page, itself included, matching the transition model.
 *
 * Each sweep is synchronous: the new table is computed entirely from the
 * previous one and then replaces it. Iteration stops at the first sweep in
 * which no page moved by more than `threshold`. The relaxation is a
 * contraction for d < 1; `maxIterations` bounds the loop anyway and raises
 * NonConvergenceError rather than returning a partial table.
 */

import { type Corpus, type Page, type RankTable, assertCorpus, assertDamping } from './corpus.js';
import { DEFAULT_DAMPING, DEFAULT_MAX_ITERATIONS, DEFAULT_THRESHOLD } from './config.js';
import { InvalidInputError, NonConvergenceError } from './errors.js';

const INITIAL_SUM_TOLERANCE = 1e-6;

export interface IterateOptions {
  /** Probability of following a link. Default 0.85. */
  damping?: number;
  /** Largest per-page change accepted as converged. Default 0.001. */
  threshold?: number;
  /** Sweep cap before NonConvergenceError. Default 10000. */
  maxIterations?: number;
  /** Starting ranks; uniform 1/N when omitted. */
  initial?: ReadonlyMap<Page, number>;
}

export interface IterationResult {
  ranks: RankTable;
  /** Sweeps performed, the converging one included. */
  iterations: number;
  /** Largest per-page change in the final sweep. */
  delta: number;
}

function initialRanks(corpus: Corpus, initial?: ReadonlyMap<Page, number>): RankTable {
  const n = corpus.size;
  const ranks: RankTable = new Map();

  if (!initial) {
    for (const page of corpus.keys()) ranks.set(page, 1 / n);
    return ranks;
  }

  let sum = 0;
  for (const page of corpus.keys()) {
    const value = initial.get(page);
    if (value === undefined || !Number.isFinite(value) || value < 0) {
      throw new InvalidInputError(`Initial rank for "${page}" must be a non-negative number`);
    }
    ranks.set(page, value);
    sum += value;
  }
  if (Math.abs(sum - 1) > INITIAL_SUM_TOLERANCE) {
    throw new InvalidInputError(`Initial ranks must sum to 1, got ${sum}`);
  }
  return ranks;
}

/**
 * Run the relaxation to convergence and report how many sweeps it took.
 */
export function iterateRankWithStats(corpus: Corpus, options: IterateOptions = {}): IterationResult {
  const damping = options.damping ?? DEFAULT_DAMPING;
  const threshold = options.threshold ?? DEFAULT_THRESHOLD;
  const maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS;

  assertCorpus(corpus);
  assertDamping(damping);
  if (!Number.isFinite(threshold) || threshold <= 0) {
    throw new InvalidInputError(`Convergence threshold must be positive, got ${threshold}`);
  }
  if (!Number.isInteger(maxIterations) || maxIterations < 1) {
    throw new InvalidInputError(`Iteration cap must be an integer >= 1, got ${maxIterations}`);
  }

  const n = corpus.size;
  const teleport = (1 - damping) / n;
  let ranks = initialRanks(corpus, options.initial);
  let delta = Infinity;

  for (let iter = 1; iter <= maxIterations; iter++) {
    const next: RankTable = new Map();

    for (const page of corpus.keys()) {
      let sum = 0;
      for (const [q, links] of corpus) {
        const rank = ranks.get(q) ?? 0;
        if (links.has(page)) sum += rank / links.size;
        if (links.size === 0) sum += rank / n;
      }
      next.set(page, teleport + damping * sum);
    }

    delta = 0;
    for (const [page, rank] of next) {
      delta = Math.max(delta, Math.abs(rank - (ranks.get(page) ?? 0)));
    }

    ranks = next;
    if (delta <= threshold) {
      return { ranks, iterations: iter, delta };
    }
  }

  throw new NonConvergenceError(maxIterations, delta);
}

export function iterateRank(corpus: Corpus, options: IterateOptions = {}): RankTable {
  return iterateRankWithStats(corpus, options).ranks;
}
