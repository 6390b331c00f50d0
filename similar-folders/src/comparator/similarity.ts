import type { FolderRecord, Fingerprint } from '../scanner/types.js';
import type { CandidatePair, CompareOptions } from './types.js';
import { getFingerprint } from '../scanner/folder-scanner.js';
import { MissingPathError } from '../errors.js';
import { logger } from '../utils/logger.js';

/** Upper bound on progress notifications for one comparison run */
const MAX_PROGRESS_NOTIFICATIONS = 1_000_000;

/**
 * Similarity of two fingerprints: shared names divided by the size of the larger
 * fingerprint. Two empty fingerprints have similarity 0.
 *
 * @example
 * computeSimilarity(new Set(['x', 'y', 'z']), new Set(['x', 'y', 'w'])) // 2/3
 */
export function computeSimilarity(a: Fingerprint, b: Fingerprint): number {
  const total = Math.max(a.size, b.size);
  if (total === 0) {
    return 0;
  }

  const [smaller, larger] = a.size <= b.size ? [a, b] : [b, a];
  let common = 0;
  for (const name of smaller) {
    if (larger.has(name)) {
      common++;
    }
  }

  return common / total;
}

/**
 * Number of unordered pairs among n folders
 */
export function countComparisons(n: number): number {
  return n < 2 ? 0 : (n * (n - 1)) / 2;
}

/**
 * Yields every index pair (i, j) with i < j exactly once
 */
export function* enumeratePairs(n: number): Generator<[number, number]> {
  for (let i = 0; i < n; i++) {
    for (let j = i + 1; j < n; j++) {
      yield [i, j];
    }
  }
}

/**
 * Every how many comparisons a progress notification is emitted
 */
export function progressInterval(
  totalComparisons: number,
  maxNotifications = MAX_PROGRESS_NOTIFICATIONS
): number {
  return Math.max(1, Math.floor(totalComparisons / maxNotifications));
}

/**
 * Compares two folders by fingerprint. Fingerprints are read fresh on every call.
 * @returns The similarity, or null when one of the folders no longer exists
 */
export async function compareFolderPair(
  folderA: FolderRecord,
  folderB: FolderRecord,
  depth: number
): Promise<number | null> {
  try {
    const [fingerprintA, fingerprintB] = await Promise.all([
      getFingerprint(folderA.path, depth),
      getFingerprint(folderB.path, depth)
    ]);
    return computeSimilarity(fingerprintA, fingerprintB);
  } catch (error) {
    if (error instanceof MissingPathError) {
      logger.warn(`${error.message} (pair skipped)`);
      return null;
    }
    throw error;
  }
}

/**
 * Compares every pair of folders and keeps those at or above the minimum
 * similarity.
 *
 * Cost is quadratic: n folders take n(n-1)/2 comparisons, each reading two
 * fingerprints from disk. No pruning: any two folders can be
 * similar regardless of size or name.
 *
 * Workers share one pair iterator and one dispatch counter, so progress is
 * decimated on the global comparison count whatever the concurrency.
 *
 * @returns Matching pairs in completion order (rank them afterwards)
 */
export async function compareFolders(
  folders: readonly FolderRecord[],
  options: CompareOptions
): Promise<CandidatePair[]> {
  const { depth, minSimilarity, onProgress } = options;
  const total = countComparisons(folders.length);
  const interval = progressInterval(total, options.maxNotifications);
  const pairs = enumeratePairs(folders.length);
  const candidates: CandidatePair[] = [];
  let dispatched = 0;

  const worker = async (): Promise<void> => {
    for (let next = pairs.next(); !next.done; next = pairs.next()) {
      const [i, j] = next.value;
      const folderA = folders[i];
      const folderB = folders[j];

      const index = dispatched++;
      if (index % interval === 0) {
        onProgress?.(index / total, `Comparing... ${folderA.path} <-> ${folderB.path}`);
      }

      const similarity = await compareFolderPair(folderA, folderB, depth);
      if (similarity !== null && similarity * 100 >= minSimilarity) {
        candidates.push({ folderA, folderB, similarity });
      }
    }
  };

  const workerCount = Math.max(1, Math.min(options.concurrency ?? 1, total));
  await Promise.all(Array.from({ length: workerCount }, () => worker()));

  return candidates;
}
