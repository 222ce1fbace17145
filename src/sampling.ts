/**
 * PageRank sampling — rank as visitation frequency of a random surfer.
 *
 * The surfer starts on a uniformly random page and takes `samples` steps.
 * Each step records a visit to the current page, asks the transition model
 * where to go next, and draws the next page from that distribution.
 * PageRank(p) = visits(p) / samples.
 *
 * Results are a Monte Carlo estimate: pass a seeded `random` to make a run
 * reproducible.
 */

import { type Corpus, type Page, type RankTable, assertCorpus, assertDamping } from './corpus.js';
import { DEFAULT_DAMPING, DEFAULT_SAMPLES } from './config.js';
import { InvalidInputError } from './errors.js';
import { type RandomSource, uniformChoice, weightedChoice } from './random.js';
import { transitionModel } from './transition.js';

export interface SampleOptions {
  /** Probability of following a link. Default 0.85. */
  damping?: number;
  /** Number of pages visited. Default 10000. */
  samples?: number;
  random?: RandomSource;
}

export function sampleRank(corpus: Corpus, options: SampleOptions = {}): RankTable {
  const damping = options.damping ?? DEFAULT_DAMPING;
  const samples = options.samples ?? DEFAULT_SAMPLES;
  const random = options.random ?? Math.random;

  assertCorpus(corpus);
  assertDamping(damping);
  if (!Number.isInteger(samples) || samples < 1) {
    throw new InvalidInputError(`Sample count must be an integer >= 1, got ${samples}`);
  }

  const pages: Page[] = [...corpus.keys()];
  const visits = new Map<Page, number>();
  for (const page of pages) visits.set(page, 0);

  let current = uniformChoice(pages, random);
  for (let i = 0; i < samples; i++) {
    visits.set(current, (visits.get(current) ?? 0) + 1);
    const distribution = transitionModel(corpus, current, damping);
    current = weightedChoice(pages, pages.map(p => distribution.get(p) ?? 0), random);
  }

  const ranks: RankTable = new Map();
  for (const [page, count] of visits) {
    ranks.set(page, count / samples);
  }
  return ranks;
}
