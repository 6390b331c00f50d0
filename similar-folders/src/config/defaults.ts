import type { SimilarFoldersConfig } from './types.js';

/**
 * Default configuration values
 */
export const defaultConfig: SimilarFoldersConfig = {
  roots: [],
  filters: {
    minSizeBytes: 0,
    maxSizeBytes: null,
    minEntries: 1
  },
  comparison: {
    minSimilarity: 50,
    depth: 1,
    concurrency: 4
  },
  output: {
    sort: 'similarity',
    outputFile: null,
    print: false,
    displayLimit: 200
  },
  interactive: {
    enabled: false,
    deletionLogDir: null
  },
  verbose: false,
  silent: false
};
