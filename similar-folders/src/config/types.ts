/** Order in which candidate pairs are listed */
export type SortMode = 'similarity' | 'size' | 'name';

export const SORT_MODES: readonly SortMode[] = ['similarity', 'size', 'name'];

/**
 * Configuration for a similar-folders run
 */
export interface SimilarFoldersConfig {
  /** Root directories to search; none may contain another */
  roots: string[];

  /** Which folders take part in the comparison */
  filters: {
    /** Minimum total folder size in bytes */
    minSizeBytes: number;

    /** Maximum total folder size in bytes (null = no limit) */
    maxSizeBytes: number | null;

    /** Minimum number of fingerprint entries a folder must have */
    minEntries: number;
  };

  comparison: {
    /** Minimum similarity percentage (0-100) for a pair to be reported */
    minSimilarity: number;

    /** How many levels of entry names make up a folder's fingerprint */
    depth: number;

    /** Number of folder pairs compared concurrently */
    concurrency: number;
  };

  output: {
    sort: SortMode;

    /** CSV file for the results (null = timestamped file in the temp directory) */
    outputFile: string | null;

    /** Print results to the console even when there are many */
    print: boolean;

    /** Result count from which results go to the CSV file instead of the console */
    displayLimit: number;
  };

  interactive: {
    enabled: boolean;

    /** Directory of the deletion log (null = system temp directory) */
    deletionLogDir: string | null;
  };

  verbose: boolean;
  silent: boolean;
}

/**
 * Configuration as read from a JSON file: every section optional
 */
export interface PartialConfig {
  roots?: string[];
  filters?: Partial<SimilarFoldersConfig['filters']>;
  comparison?: Partial<SimilarFoldersConfig['comparison']>;
  output?: Partial<SimilarFoldersConfig['output']>;
  interactive?: Partial<SimilarFoldersConfig['interactive']>;
  verbose?: boolean;
  silent?: boolean;
}
