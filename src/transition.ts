/**
 * Random-surfer transition model.
 *
 * From `page`, the surfer follows one of its links with probability
 * `damping` or jumps to any page with probability `1 - damping`. A dead end
 * (no outbound links) jumps uniformly regardless of damping.
 */

import { type Corpus, type Distribution, type Page, assertCorpus, assertDamping, assertPage } from './corpus.js';

export function transitionModel(corpus: Corpus, page: Page, damping: number): Distribution {
  assertCorpus(corpus);
  assertPage(corpus, page);
  assertDamping(damping);

  const n = corpus.size;
  const links = corpus.get(page) ?? new Set<Page>();
  const distribution: Distribution = new Map();

  if (links.size === 0) {
    for (const p of corpus.keys()) distribution.set(p, 1 / n);
    return distribution;
  }

  for (const p of corpus.keys()) distribution.set(p, (1 - damping) / n);
  // Link targets get the follow share on top of the teleport share
  const follow = damping / links.size;
  for (const link of links) {
    distribution.set(link, (distribution.get(link) ?? 0) + follow);
  }
  return distribution;
}
