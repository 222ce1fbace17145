/**
 * Iterative estimator tests — fixed points of known graphs, convergence, errors.
 */

import { type RankTable, createCorpus } from '../src/corpus.js';
import { InvalidInputError, NonConvergenceError } from '../src/errors.js';
import { iterateRank, iterateRankWithStats } from '../src/iteration.js';

function total(ranks: RankTable): number {
  let sum = 0;
  for (const v of ranks.values()) sum += v;
  return sum;
}

describe('iterateRank', () => {
  test('two pages linking to each other split evenly', () => {
    const { ranks, iterations } = iterateRankWithStats(createCorpus({ a: ['b'], b: ['a'] }), { damping: 0.85 });
    expect(ranks.get('a')).toBeCloseTo(0.5, 10);
    expect(ranks.get('b')).toBeCloseTo(0.5, 10);
    expect(iterations).toBe(1);
  });

  test('single dead-end page keeps rank 1', () => {
    const ranks = iterateRank(createCorpus({ only: [] }));
    expect(ranks.size).toBe(1);
    expect(ranks.get('only')).toBeCloseTo(1, 10);
  });

  test('three-page cycle converges to equal ranks', () => {
    const ranks = iterateRank(createCorpus({ a: ['b'], b: ['c'], c: ['a'] }), { damping: 0.85 });
    for (const page of ['a', 'b', 'c']) {
      expect(ranks.get(page)).toBeCloseTo(1 / 3, 6);
    }
  });

  test('dead end spreads its rank over every page, itself included', () => {
    // Fixed point: a = 0.075 + 0.425 b, b = 0.075 + 0.85 a + 0.425 b
    const ranks = iterateRank(createCorpus({ a: ['b'], b: [] }));
    expect(ranks.get('a')).toBeCloseTo(0.5 / 1.425, 2);
    expect(ranks.get('b')).toBeCloseTo(1 - 0.5 / 1.425, 2);
  });

  test('sums to 1 on a mixed graph', () => {
    const corpus = createCorpus({
      home: ['about', 'blog'],
      about: ['home'],
      blog: ['home', 'about', 'archive'],
      archive: [],
      orphan: ['home'],
    });
    expect(Math.abs(total(iterateRank(corpus)) - 1)).toBeLessThan(1e-6);
  });

  test('fixed point does not depend on the starting ranks', () => {
    const corpus = createCorpus({ a: ['b', 'c'], b: ['c'], c: ['a'], d: [] });
    const fromUniform = iterateRank(corpus);
    const fromSkewed = iterateRank(corpus, { initial: new Map([['a', 0], ['b', 0], ['c', 0], ['d', 1]]) });

    for (const page of corpus.keys()) {
      expect(Math.abs((fromUniform.get(page) ?? 0) - (fromSkewed.get(page) ?? 0))).toBeLessThan(0.005);
    }
  });

  test('damping 0 gives the uniform table after one sweep', () => {
    const { ranks, iterations } = iterateRankWithStats(createCorpus({ a: ['b'], b: ['c'], c: [], d: ['a'] }), { damping: 0 });
    expect(iterations).toBe(1);
    for (const value of ranks.values()) expect(value).toBeCloseTo(0.25, 12);
  });

  test('a tighter threshold takes more sweeps', () => {
    const corpus = createCorpus({ a: ['b'], b: [] });
    const loose = iterateRankWithStats(corpus, { threshold: 0.01 });
    const tight = iterateRankWithStats(corpus, { threshold: 1e-9 });
    expect(tight.iterations).toBeGreaterThan(loose.iterations);
    expect(tight.delta).toBeLessThanOrEqual(1e-9);
  });

  test('throws NonConvergenceError when the sweep cap runs out', () => {
    const corpus = createCorpus({ a: ['b'], b: [] });
    let caught: unknown;
    try {
      iterateRank(corpus, { maxIterations: 1 });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(NonConvergenceError);
    if (caught instanceof NonConvergenceError) {
      expect(caught.iterations).toBe(1);
      expect(caught.delta).toBeCloseTo(0.2125, 10);
    }
  });

  test('rejects bad input', () => {
    const corpus = createCorpus({ a: ['b'], b: ['a'] });
    expect(() => iterateRank(createCorpus({}))).toThrow('Corpus is empty');
    expect(() => iterateRank(corpus, { damping: 2 })).toThrow(InvalidInputError);
    expect(() => iterateRank(corpus, { threshold: 0 })).toThrow(InvalidInputError);
    expect(() => iterateRank(corpus, { maxIterations: 0 })).toThrow(InvalidInputError);
    expect(() => iterateRank(corpus, { initial: new Map([['a', 1]]) })).toThrow('Initial rank for "b" must be a non-negative number');
    expect(() => iterateRank(corpus, { initial: new Map([['a', 0.4], ['b', 0.4]]) })).toThrow(InvalidInputError);
  });
});
