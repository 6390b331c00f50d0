import type { FolderRecord, ProgressCallback } from '../scanner/types.js';

/**
 * Two folders whose fingerprints are similar enough to report
 */
export interface CandidatePair {
  folderA: FolderRecord;
  folderB: FolderRecord;

  /** Shared entries divided by the larger fingerprint size, 0-1 */
  similarity: number;
}

export interface CompareOptions {
  /** Fingerprint depth, at least 1 */
  depth: number;

  /** Minimum similarity percentage (0-100) */
  minSimilarity: number;

  /** Number of pairs compared at the same time (default 1) */
  concurrency?: number;

  onProgress?: ProgressCallback;

  /** Upper bound on progress notifications (default 1,000,000) */
  maxNotifications?: number;
}
