/**
 * The closed link graph both estimators run on.
 *
 * A corpus maps each page to the set of pages it links to. It is closed:
 * every link target is itself a page, and no page links to itself.
 * Construction (createCorpus, crawl) enforces this; the estimators only
 * check for emptiness and page membership.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import * as cheerio from 'cheerio';
import { InvalidInputError } from './errors.js';

export type Page = string;
export type Corpus = ReadonlyMap<Page, ReadonlySet<Page>>;

/** Probability of moving to each page; sums to 1. */
export type Distribution = Map<Page, number>;

/** Estimated PageRank of each page; sums to 1. */
export type RankTable = Map<Page, number>;

export type LinkListing = Record<Page, Iterable<Page>> | ReadonlyMap<Page, Iterable<Page>>;

export interface CorpusStats {
  pages: number;
  links: number;
  deadEnds: number;
}

function isMapListing(listing: LinkListing): listing is ReadonlyMap<Page, Iterable<Page>> {
  return listing instanceof Map;
}

function listingEntries(listing: LinkListing): Iterable<readonly [Page, Iterable<Page>]> {
  return isMapListing(listing) ? listing.entries() : Object.entries(listing);
}

/**
 * Build a closed corpus from an adjacency listing.
 * Self links and links to pages outside the listing are dropped.
 */
export function createCorpus(listing: LinkListing): Corpus {
  const raw = new Map<Page, Set<Page>>();
  for (const [page, links] of listingEntries(listing)) {
    const existing = raw.get(page) ?? new Set<Page>();
    for (const link of links) existing.add(link);
    raw.set(page, existing);
  }

  const corpus = new Map<Page, ReadonlySet<Page>>();
  for (const [page, links] of raw) {
    const kept = new Set<Page>();
    for (const link of links) {
      if (link !== page && raw.has(link)) kept.add(link);
    }
    corpus.set(page, kept);
  }
  return corpus;
}

export function assertCorpus(corpus: Corpus): void {
  if (corpus.size === 0) {
    throw new InvalidInputError('Corpus is empty');
  }
}

export function assertPage(corpus: Corpus, page: Page): void {
  if (!corpus.has(page)) {
    throw new InvalidInputError(`Page "${page}" is not in the corpus`);
  }
}

export function assertDamping(damping: number): void {
  if (!Number.isFinite(damping) || damping < 0 || damping > 1) {
    throw new InvalidInputError(`Damping factor must be within [0, 1], got ${damping}`);
  }
}

/** Extract the href of every anchor in an HTML document. */
export function extractLinks(html: string): Page[] {
  const $ = cheerio.load(html);
  const links: Page[] = [];
  $('a[href]').each((_, el) => {
    const href = $(el).attr('href');
    if (href) links.push(href);
  });
  return links;
}

/**
 * Parse every .html file in `directory` (non-recursive) and return the
 * corpus of links between them. Pages are keyed by file name.
 */
export async function crawl(directory: string): Promise<Corpus> {
  const entries = await fs.readdir(directory);
  const listing = new Map<Page, Page[]>();

  for (const filename of entries.sort()) {
    if (!filename.endsWith('.html')) continue;
    const contents = await fs.readFile(path.join(directory, filename), 'utf-8');
    listing.set(filename, extractLinks(contents));
  }

  return createCorpus(listing);
}

export function corpusStats(corpus: Corpus): CorpusStats {
  let links = 0;
  let deadEnds = 0;
  for (const targets of corpus.values()) {
    links += targets.size;
    if (targets.size === 0) deadEnds++;
  }
  return { pages: corpus.size, links, deadEnds };
}
