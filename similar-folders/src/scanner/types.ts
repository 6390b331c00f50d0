/**
 * A directory that passed the scan filters
 */
export interface FolderRecord {
  /** Absolute path of the directory */
  path: string;

  /** Total size of all regular files below the directory, symlinks excluded */
  byteSize: number;
}

/**
 * Set of entry names below a folder, nested names qualified as 'sub/file.txt'
 */
export type Fingerprint = ReadonlySet<string>;

export interface ScanOptions {
  minSizeBytes: number;
  maxSizeBytes: number | null;  // null = no upper bound
  minEntries: number;  // Minimum fingerprint size
  depth: number;  // Fingerprint depth, at least 1
}

/**
 * Receives the fraction of work done (0-1) and a label for the current item
 */
export type ProgressCallback = (fraction: number, label: string) => void;
