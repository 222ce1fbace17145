#!/usr/bin/env node
/**
 * Rank a directory of HTML pages with both estimators and print the results.
 *
 * Usage: rank-corpus <directory>
 */
import { crawl, corpusStats } from '../src/corpus.js';
import { loadConfig } from '../src/config.js';
import { iterateRank } from '../src/iteration.js';
import { createSeededRandom } from '../src/random.js';
import { formatRanks } from '../src/report.js';
import { sampleRank } from '../src/sampling.js';

async function main() {
  if (process.argv.length !== 3) {
    console.error('Usage: rank-corpus <directory>');
    process.exit(1);
  }

  const config = loadConfig();
  const corpus = await crawl(process.argv[2]);
  const stats = corpusStats(corpus);
  console.error(`Crawled ${stats.pages} pages, ${stats.links} links, ${stats.deadEnds} dead ends`);

  const random = config.seed === undefined ? Math.random : createSeededRandom(config.seed);
  const sampled = sampleRank(corpus, { damping: config.damping, samples: config.samples, random });
  console.log(formatRanks(`PageRank Results from Sampling (n = ${config.samples})`, sampled));

  const iterated = iterateRank(corpus, {
    damping: config.damping,
    threshold: config.threshold,
    maxIterations: config.maxIterations,
  });
  console.log(formatRanks('PageRank Results from Iteration', iterated));
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
