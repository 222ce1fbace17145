import { type RankTable } from './corpus.js';

/**
 * Render a rank table as a title line followed by `  page: 0.1234` lines
 * in page order.
 */
export function formatRanks(title: string, ranks: RankTable): string {
  const lines = [title];
  for (const page of [...ranks.keys()].sort()) {
    lines.push(`  ${page}: ${(ranks.get(page) ?? 0).toFixed(4)}`);
  }
  return lines.join('\n');
}
