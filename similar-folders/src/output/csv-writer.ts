import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import type { CandidatePair } from '../comparator/types.js';
import { combinedSize } from '../ranking/ranker.js';

const HEADER = ['Similarity', 'Total Size', 'Folder 1', 'Size 1', 'Folder 2', 'Size 2'];

/** Quotes a CSV field when it holds a comma, quote or line break */
export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Renders candidate pairs as CSV, one row per pair in the given order
 */
export function formatCsv(pairs: readonly CandidatePair[]): string {
  const rows = [HEADER];

  for (const pair of pairs) {
    rows.push([
      (pair.similarity * 100).toFixed(2),
      String(combinedSize(pair)),
      path.resolve(pair.folderA.path),
      String(pair.folderA.byteSize),
      path.resolve(pair.folderB.path),
      String(pair.folderB.byteSize)
    ]);
  }

  return rows.map(row => row.map(escapeCsvField).join(',')).join('\n') + '\n';
}

function pad(value: number): string {
  return value.toString().padStart(2, '0');
}

/**
 * Timestamped results file in the system temp directory
 *
 * @example
 * defaultResultsPath(new Date(2024, 2, 5, 14, 7, 9))
 * // '/tmp/folder_diffs_20240305-140709.csv'
 */
export function defaultResultsPath(now: Date = new Date()): string {
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return path.join(os.tmpdir(), `folder_diffs_${date}-${time}.csv`);
}

/**
 * Writes the results to a CSV file. The content goes to a temporary file next to
 * the destination first and is renamed into place, so a failed write never leaves
 * a partial file behind.
 */
export async function saveResults(pairs: readonly CandidatePair[], destination: string): Promise<void> {
  const target = path.resolve(destination);
  const tempFile = path.join(path.dirname(target), `.${path.basename(target)}.${process.pid}.tmp`);

  try {
    await fs.writeFile(tempFile, formatCsv(pairs), 'utf-8');
    await fs.rename(tempFile, target);
  } catch (error) {
    await fs.rm(tempFile, { force: true });
    throw error;
  }
}
