import type { CandidatePair } from '../comparator/types.js';
import type { SortMode } from '../config/types.js';

type PairComparator = (a: CandidatePair, b: CandidatePair) => number;

export function combinedSize(pair: CandidatePair): number {
  return pair.folderA.byteSize + pair.folderB.byteSize;
}

/** Plain code unit order, independent of locale */
function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

const bySimilarityDesc: PairComparator = (a, b) => b.similarity - a.similarity;
const bySizeDesc: PairComparator = (a, b) => combinedSize(b) - combinedSize(a);
const byPathAAsc: PairComparator = (a, b) => compareStrings(a.folderA.path, b.folderA.path);
const byPathBAsc: PairComparator = (a, b) => compareStrings(a.folderB.path, b.folderB.path);

function chain(...comparators: PairComparator[]): PairComparator {
  return (a, b) => {
    for (const compare of comparators) {
      const result = compare(a, b);
      if (result !== 0) return result;
    }
    return 0;
  };
}

/**
 * Full key tuple per sort mode. The paths always take part, so pairs with
 * distinct paths never compare equal.
 */
export const RANKINGS: Record<SortMode, PairComparator> = {
  similarity: chain(bySimilarityDesc, bySizeDesc, byPathAAsc, byPathBAsc),
  size: chain(bySizeDesc, bySimilarityDesc, byPathAAsc, byPathBAsc),
  name: chain(byPathAAsc, byPathBAsc, bySimilarityDesc, bySizeDesc)
};

/**
 * Sorts candidate pairs for display and resolution
 * @returns A new sorted array; the input is left untouched
 */
export function rankCandidates(
  pairs: readonly CandidatePair[],
  mode: SortMode = 'similarity'
): CandidatePair[] {
  return [...pairs].sort(RANKINGS[mode]);
}
