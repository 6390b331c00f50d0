import fs from 'fs/promises';
import path from 'path';
import { loadConfig, mergeConfig, validateConfig } from './config/config.js';
import type { PartialConfig, SimilarFoldersConfig } from './config/types.js';
import { scanFolders } from './scanner/folder-scanner.js';
import type { FolderRecord } from './scanner/types.js';
import { compareFolders, countComparisons } from './comparator/similarity.js';
import type { CandidatePair } from './comparator/types.js';
import { rankCandidates } from './ranking/ranker.js';
import { defaultResultsPath, saveResults } from './output/csv-writer.js';
import { formatReport } from './output/report.js';
import { DeletionLog, deletionLogPath } from './workstation/deletion-log.js';
import { ResolutionWorkstation, createConsolePrompter } from './workstation/workstation.js';
import type { Prompter, WorkstationSummary } from './workstation/workstation.js';
import { createProgressSink, modeFromFlags } from './utils/progress.js';
import type { ProgressSink } from './utils/progress.js';
import { logger } from './utils/logger.js';

export type { SimilarFoldersConfig, PartialConfig, SortMode } from './config/types.js';
export type { FolderRecord, Fingerprint } from './scanner/types.js';
export type { CandidatePair } from './comparator/types.js';
export type { WorkstationSummary, Prompter } from './workstation/workstation.js';
export { computeSimilarity } from './comparator/similarity.js';
export { getFingerprint, scanFolders } from './scanner/folder-scanner.js';
export { rankCandidates } from './ranking/ranker.js';
export { ResolutionWorkstation } from './workstation/workstation.js';
export { DeletionLog } from './workstation/deletion-log.js';

export interface FindSimilarOptions {
  /** Optional JSON configuration file */
  configPath?: string;

  /** Settings that take precedence over the configuration file */
  overrides?: PartialConfig;

  debug?: boolean;

  /** Operator input for interactive mode (defaults to the terminal) */
  prompter?: Prompter;

  /** Progress output (defaults to stdout, following the verbose and silent settings) */
  progress?: ProgressSink;

  /** Console output for results */
  print?: (message: string) => void;

  /** Clock used for the results file and deletion log names */
  now?: Date;
}

export interface FindSimilarResult {
  config: SimilarFoldersConfig;
  folders: FolderRecord[];
  pairs: CandidatePair[];

  /** CSV file the results were written to, if any */
  resultsFile: string | null;

  /** Outcome of the interactive session, if one ran */
  session: WorkstationSummary | null;
}

/**
 * Main entry point: scans the roots, compares every pair of folders, ranks the
 * matches, reports them and optionally resolves them interactively.
 */
export async function findSimilarFolders(options: FindSimilarOptions = {}): Promise<FindSimilarResult> {
  if (options.debug) {
    logger.enableDebug();
  }

  const loaded = await loadConfig(options.configPath);
  const config = validateConfig(mergeConfig(loaded, options.overrides ?? {}));
  logger.debug(`Config: ${JSON.stringify(config, null, 2)}`);

  const progress = options.progress ?? createProgressSink(modeFromFlags(config.verbose, config.silent));
  const print = options.print ?? console.log;
  const note = (message: string): void => {
    if (!config.silent) {
      logger.info(message);
    }
  };

  note(`Scanning ${config.roots.length} root director${config.roots.length === 1 ? 'y' : 'ies'}...`);
  const folders = await scanFolders(
    config.roots,
    {
      minSizeBytes: config.filters.minSizeBytes,
      maxSizeBytes: config.filters.maxSizeBytes,
      minEntries: config.filters.minEntries,
      depth: config.comparison.depth
    },
    (fraction, label) => progress.notify(fraction, label)
  );
  progress.done();
  note(`Found ${folders.length} folders matching the filters`);

  note(`${countComparisons(folders.length)} folder pairs to be compared`);
  const matches = await compareFolders(folders, {
    depth: config.comparison.depth,
    minSimilarity: config.comparison.minSimilarity,
    concurrency: config.comparison.concurrency,
    onProgress: (fraction, label) => progress.notify(fraction, label)
  });
  progress.done();

  const pairs = rankCandidates(matches, config.output.sort);
  const resultsFile = await outputResults(pairs, config, print, options.now);

  let session: WorkstationSummary | null = null;
  if (config.interactive.enabled && pairs.length > 0) {
    session = await resolveInteractively(pairs, config, options);
  }

  return { config, folders, pairs, resultsFile, session };
}

/**
 * Prints the results, or saves them when there are too many to print.
 * An explicit output file always receives them.
 * @returns Path of the CSV file written, or null
 */
async function outputResults(
  pairs: CandidatePair[],
  config: SimilarFoldersConfig,
  print: (message: string) => void,
  now?: Date
): Promise<string | null> {
  const { output } = config;
  const printable = pairs.length < output.displayLimit || output.print;

  if (printable) {
    print(pairs.length === 0 ? 'No similar folders found.' : `\n${formatReport(pairs)}`);
  } else {
    print(`Too many results to print to stdout (${pairs.length}).`);
    print('Use --print to force printing them.');
  }

  if (printable && output.outputFile === null) {
    return null;
  }

  const destination = output.outputFile ?? defaultResultsPath(now);
  await saveResults(pairs, destination);
  print(`Results saved to: ${destination}`);
  return destination;
}

async function resolveInteractively(
  pairs: CandidatePair[],
  config: SimilarFoldersConfig,
  options: FindSimilarOptions
): Promise<WorkstationSummary> {
  const print = options.print ?? console.log;
  const prompter = options.prompter ?? createConsolePrompter();
  const logPath = deletionLogPath(config.interactive.deletionLogDir ?? undefined, options.now);

  try {
    await fs.mkdir(path.dirname(logPath), { recursive: true });
    const workstation = new ResolutionWorkstation({
      prompter,
      deletionLog: new DeletionLog(logPath, print),
      print
    });
    const summary = await workstation.run(pairs);

    logger.success(
      `Merged: ${summary.merged}, marked for deletion: ${summary.deleted}, ` +
        `skipped: ${summary.skipped}, failed: ${summary.failed}`
    );
    return summary;
  } finally {
    prompter.close();
  }
}
