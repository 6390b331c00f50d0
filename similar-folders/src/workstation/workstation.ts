/**
 * Interactive resolution of ranked candidate pairs.
 */

import fs from 'fs/promises';
import * as readline from 'node:readline/promises';
import { stdin, stdout } from 'node:process';
import path from 'path';
import type { CandidatePair } from '../comparator/types.js';
import type { FolderRecord } from '../scanner/types.js';
import type { DeletionLog } from './deletion-log.js';
import type { TreeCopier } from './tree-copier.js';
import { copyTreeOnto } from './tree-copier.js';
import { ACTION_PROMPT, parseAction } from './actions.js';
import type { ResolutionAction } from './actions.js';
import { MissingPathError, errorCode, errorMessage } from '../errors.js';
import { formatPercent } from '../output/report.js';
import { logger } from '../utils/logger.js';
import { isSameOrInside } from '../utils/paths.js';
import { humanReadableSize } from '../utils/size.js';

/**
 * Source of operator answers. A readline interface fits as is.
 */
export interface Prompter {
  question(query: string): Promise<string>;
  close(): void;
}

export function createConsolePrompter(): Prompter {
  return readline.createInterface({ input: stdin, output: stdout });
}

export type ResolutionOutcome =
  | 'merged'
  | 'deleted'
  | 'skipped'
  | 'suppressed'
  | 'failed'
  | 'quit';

export interface WorkstationSummary {
  presented: number;
  merged: number;
  deleted: number;
  skipped: number;
  suppressed: number;
  failed: number;
  quit: boolean;
}

export interface WorkstationOptions {
  prompter: Prompter;
  deletionLog: DeletionLog;
  copyTree?: TreeCopier;
  formatSize?: (bytes: number) => string;
  print?: (message: string) => void;
}

/**
 * Orders a pair for presentation: the larger folder is the primary. On equal
 * sizes the first folder of the pair is the primary.
 */
export function orientPair(pair: CandidatePair): { primary: FolderRecord; secondary: FolderRecord } {
  return pair.folderA.byteSize >= pair.folderB.byteSize
    ? { primary: pair.folderA, secondary: pair.folderB }
    : { primary: pair.folderB, secondary: pair.folderA };
}

async function assertExists(folderPath: string): Promise<void> {
  try {
    await fs.stat(folderPath);
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      throw new MissingPathError(folderPath);
    }
    throw error;
  }
}

/**
 * Walks the operator through candidate pairs one at a time. Once a folder is
 * merged away or marked for deletion, every later pair touching it or anything
 * below it is dropped without being shown.
 *
 * Folders are never removed here; deletions only go to the deletion log.
 */
export class ResolutionWorkstation {
  private readonly resolvedPrefixes = new Set<string>();
  private readonly prompter: Prompter;
  private readonly deletionLog: DeletionLog;
  private readonly copyTree: TreeCopier;
  private readonly formatSize: (bytes: number) => string;
  private readonly print: (message: string) => void;

  constructor(options: WorkstationOptions) {
    this.prompter = options.prompter;
    this.deletionLog = options.deletionLog;
    this.copyTree = options.copyTree ?? copyTreeOnto;
    this.formatSize = options.formatSize ?? humanReadableSize;
    this.print = options.print ?? console.log;
  }

  /** Paths merged away or marked for deletion so far */
  get resolved(): ReadonlySet<string> {
    return this.resolvedPrefixes;
  }

  isResolved(folderPath: string): boolean {
    for (const prefix of this.resolvedPrefixes) {
      if (isSameOrInside(prefix, folderPath)) {
        return true;
      }
    }
    return false;
  }

  /**
   * Resolves every pair in order until the list ends or the operator quits
   */
  async run(pairs: readonly CandidatePair[]): Promise<WorkstationSummary> {
    const summary: WorkstationSummary = {
      presented: 0,
      merged: 0,
      deleted: 0,
      skipped: 0,
      suppressed: 0,
      failed: 0,
      quit: false
    };

    for (let index = 0; index < pairs.length; index++) {
      const outcome = await this.resolve(pairs[index], `${index + 1}/${pairs.length}`);

      if (outcome === 'suppressed') {
        summary.suppressed++;
        continue;
      }

      summary.presented++;
      switch (outcome) {
        case 'merged':
          summary.merged++;
          break;
        case 'deleted':
          summary.deleted++;
          break;
        case 'skipped':
          summary.skipped++;
          break;
        case 'failed':
          summary.failed++;
          break;
        case 'quit':
          summary.quit = true;
          return summary;
      }
    }

    return summary;
  }

  /**
   * Presents one pair and carries out the chosen action
   * @param position - Shown in the header, e.g. '3/12'
   */
  async resolve(pair: CandidatePair, position?: string): Promise<ResolutionOutcome> {
    if (this.isResolved(pair.folderA.path) || this.isResolved(pair.folderB.path)) {
      logger.debug(`Skipping resolved pair: ${pair.folderA.path} <-> ${pair.folderB.path}`);
      return 'suppressed';
    }

    const { primary, secondary } = orientPair(pair);
    this.present(pair.similarity, primary, secondary, position);

    const action = await this.askAction();

    switch (action) {
      case 'merge-up':
        return this.merge(secondary, primary);
      case 'merge-down':
        return this.merge(primary, secondary);
      case 'delete-up':
        return (await this.markForDeletion(primary.path)) ? 'deleted' : 'failed';
      case 'delete-down':
        return (await this.markForDeletion(secondary.path)) ? 'deleted' : 'failed';
      case 'skip':
        return 'skipped';
      case 'quit':
        return 'quit';
    }
  }

  private present(
    similarity: number,
    primary: FolderRecord,
    secondary: FolderRecord,
    position?: string
  ): void {
    const header = position ? `[${position}] ` : '';
    this.print(`\n${'='.repeat(70)}`);
    this.print(`${header}Similarity: ${formatPercent(similarity)}`);
    this.print(`  Primary   (${this.formatSize(primary.byteSize)}): ${primary.path}`);
    this.print(`  Secondary (${this.formatSize(secondary.byteSize)}): ${secondary.path}`);
    this.print('='.repeat(70));
  }

  private async askAction(): Promise<ResolutionAction> {
    while (true) {
      const answer = await this.prompter.question(ACTION_PROMPT);
      const action = parseAction(answer);
      if (action) {
        return action;
      }
      this.print(`Invalid choice "${answer.trim()}". Please enter mu, md, du, dd, s or q.`);
    }
  }

  /**
   * Copies `source` onto `destination`, then marks `source` for deletion.
   * Nothing is marked when either folder is gone, the copy fails or the log cannot be written.
   */
  private async merge(source: FolderRecord, destination: FolderRecord): Promise<ResolutionOutcome> {
    try {
      await assertExists(source.path);
      await assertExists(destination.path);
    } catch (error) {
      if (error instanceof MissingPathError) {
        logger.warn(`${error.message} (pair skipped)`);
        return 'failed';
      }
      throw error;
    }

    logger.info(`Copying ${source.path} -> ${destination.path}`);
    try {
      await this.copyTree(source.path, destination.path);
    } catch (error) {
      logger.error(`Merge failed, nothing marked for deletion: ${errorMessage(error)}`);
      return 'failed';
    }

    return (await this.markForDeletion(source.path)) ? 'merged' : 'failed';
  }

  /**
   * Appends the folder to the deletion log and resolves it.
   * @returns false when the log could not be written; the folder stays unresolved
   */
  private async markForDeletion(folderPath: string): Promise<boolean> {
    try {
      await this.deletionLog.append(folderPath);
    } catch (error) {
      logger.error(`Could not write deletion log ${this.deletionLog.logPath}: ${errorMessage(error)}`);
      return false;
    }
    this.resolvedPrefixes.add(path.resolve(folderPath));
    this.print(`Marked for deletion: ${folderPath}`);
    return true;
  }
}
