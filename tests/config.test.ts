import path from 'path';
import {
  DEFAULT_DAMPING,
  DEFAULT_MAX_ITERATIONS,
  DEFAULT_SAMPLES,
  DEFAULT_THRESHOLD,
  loadConfig,
} from '../src/config.js';
import { InvalidInputError } from '../src/errors.js';

describe('loadConfig', () => {
  test('defaults without environment', () => {
    const config = loadConfig({});
    expect(config).toEqual({
      damping: DEFAULT_DAMPING,
      samples: DEFAULT_SAMPLES,
      threshold: DEFAULT_THRESHOLD,
      maxIterations: DEFAULT_MAX_ITERATIONS,
      corpusDir: process.cwd(),
    });
    expect(config.damping).toBe(0.85);
    expect(config.samples).toBe(10000);
    expect(config.threshold).toBe(0.001);
  });

  test('reads overrides', () => {
    const config = loadConfig({
      PAGERANK_DAMPING: '0.5',
      PAGERANK_SAMPLES: '200',
      PAGERANK_THRESHOLD: '1e-6',
      PAGERANK_MAX_ITERATIONS: '50',
      PAGERANK_SEED: '7',
      CORPUS_DIR: 'corpus0',
    });
    expect(config).toEqual({
      damping: 0.5,
      samples: 200,
      threshold: 1e-6,
      maxIterations: 50,
      seed: 7,
      corpusDir: path.resolve('corpus0'),
    });
  });

  test('blank values fall back to defaults', () => {
    expect(loadConfig({ PAGERANK_DAMPING: '  ', PAGERANK_SEED: '' })).toEqual(loadConfig({}));
  });

  test('rejects malformed values', () => {
    expect(() => loadConfig({ PAGERANK_DAMPING: 'high' })).toThrow('PAGERANK_DAMPING must be a number, got "high"');
    expect(() => loadConfig({ PAGERANK_DAMPING: '1.5' })).toThrow(InvalidInputError);
    expect(() => loadConfig({ PAGERANK_SAMPLES: '0' })).toThrow('PAGERANK_SAMPLES must be at least 1, got 0');
    expect(() => loadConfig({ PAGERANK_SAMPLES: '10.5' })).toThrow('PAGERANK_SAMPLES must be an integer, got "10.5"');
    expect(() => loadConfig({ PAGERANK_THRESHOLD: '-1' })).toThrow(InvalidInputError);
    expect(() => loadConfig({ PAGERANK_MAX_ITERATIONS: '0' })).toThrow(InvalidInputError);
    expect(() => loadConfig({ PAGERANK_SEED: 'abc' })).toThrow(InvalidInputError);
  });
});
