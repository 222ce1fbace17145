/**
 * Rank configuration: named defaults plus environment overrides.
 *
 *   PAGERANK_DAMPING         damping factor in [0, 1]       (0.85)
 *   PAGERANK_SAMPLES         random-surfer steps, >= 1      (10000)
 *   PAGERANK_THRESHOLD       per-page convergence delta     (0.001)
 *   PAGERANK_MAX_ITERATIONS  sweep cap for iteration        (10000)
 *   PAGERANK_SEED            integer seed for sampling      (unset = Math.random)
 *   CORPUS_DIR               directory of .html pages       (cwd)
 */

import * as path from 'path';
import { InvalidInputError } from './errors.js';

export const DEFAULT_DAMPING = 0.85;
export const DEFAULT_SAMPLES = 10000;
export const DEFAULT_THRESHOLD = 0.001;
export const DEFAULT_MAX_ITERATIONS = 10000;

export interface RankConfig {
  damping: number;
  samples: number;
  threshold: number;
  maxIterations: number;
  seed?: number;
  corpusDir: string;
}

type Env = Record<string, string | undefined>;

function readNumber(env: Env, key: string, fallback: number, integer: boolean): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || (integer && !Number.isInteger(value))) {
    throw new InvalidInputError(`${key} must be ${integer ? 'an integer' : 'a number'}, got "${raw}"`);
  }
  return value;
}

export function loadConfig(env: Env = process.env): RankConfig {
  const damping = readNumber(env, 'PAGERANK_DAMPING', DEFAULT_DAMPING, false);
  if (damping < 0 || damping > 1) {
    throw new InvalidInputError(`PAGERANK_DAMPING must be within [0, 1], got ${damping}`);
  }

  const samples = readNumber(env, 'PAGERANK_SAMPLES', DEFAULT_SAMPLES, true);
  if (samples < 1) {
    throw new InvalidInputError(`PAGERANK_SAMPLES must be at least 1, got ${samples}`);
  }

  const threshold = readNumber(env, 'PAGERANK_THRESHOLD', DEFAULT_THRESHOLD, false);
  if (threshold <= 0) {
    throw new InvalidInputError(`PAGERANK_THRESHOLD must be positive, got ${threshold}`);
  }

  const maxIterations = readNumber(env, 'PAGERANK_MAX_ITERATIONS', DEFAULT_MAX_ITERATIONS, true);
  if (maxIterations < 1) {
    throw new InvalidInputError(`PAGERANK_MAX_ITERATIONS must be at least 1, got ${maxIterations}`);
  }

  const config: RankConfig = {
    damping,
    samples,
    threshold,
    maxIterations,
    corpusDir: env.CORPUS_DIR ? path.resolve(env.CORPUS_DIR) : process.cwd(),
  };

  if (env.PAGERANK_SEED !== undefined && env.PAGERANK_SEED.trim() !== '') {
    config.seed = readNumber(env, 'PAGERANK_SEED', 0, true);
  }

  return config;
}
