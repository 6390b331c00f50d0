import chalk from 'chalk';
import type { CandidatePair } from '../comparator/types.js';
import { combinedSize } from '../ranking/ranker.js';
import { humanReadableSize } from '../utils/size.js';

export function formatPercent(similarity: number): string {
  return `${(similarity * 100).toFixed(2)}%`;
}

/**
 * Formats ranked pairs for the console
 */
export function formatReport(pairs: readonly CandidatePair[]): string {
  const lines: string[] = [];

  for (const pair of pairs) {
    lines.push(
      `${chalk.bold(`Similarity: ${formatPercent(pair.similarity)}`)}, ` +
        `Total Size: ${humanReadableSize(combinedSize(pair))}`
    );
    lines.push(`  Folder 1: ${pair.folderA.path}`);
    lines.push(`  Folder 2: ${pair.folderB.path}`);
    lines.push('');
  }

  return lines.join('\n');
}
