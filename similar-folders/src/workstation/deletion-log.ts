import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import chalk from 'chalk';

function pad(value: number): string {
  return value.toString().padStart(2, '0');
}

/**
 * Log file for one day's sessions: folder_deletions_YYYYMMDD.txt
 */
export function deletionLogPath(directory: string = os.tmpdir(), now: Date = new Date()): string {
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  return path.join(directory, `folder_deletions_${date}.txt`);
}

/**
 * Append-only record of folders the operator decided to delete. Nothing here
 * removes anything: the paths are left for the operator to delete with another
 * tool.
 */
export class DeletionLog {
  private warningShown = false;

  constructor(
    readonly logPath: string,
    private readonly print: (message: string) => void = console.log
  ) {}

  /**
   * Appends one absolute path as a line. The first append of the session also
   * prints where the log lives and how to act on it.
   */
  async append(folderPath: string): Promise<void> {
    await fs.appendFile(this.logPath, `${path.resolve(folderPath)}\n`, 'utf-8');

    if (!this.warningShown) {
      this.warningShown = true;
      this.print(
        chalk.yellow(
          `\nFolders marked for deletion are listed in: ${this.logPath}\n` +
            'Nothing has been deleted. Review the list and remove the folders with an external tool.\n'
        )
      );
    }
  }
}
