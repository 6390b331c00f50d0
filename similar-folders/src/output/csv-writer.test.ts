import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import os from 'os';
import { escapeCsvField, formatCsv, defaultResultsPath, saveResults } from './csv-writer.js';
import type { CandidatePair } from '../comparator/types.js';

const pairs: CandidatePair[] = [
  {
    folderA: { path: '/data/a', byteSize: 100 },
    folderB: { path: '/data/b,c', byteSize: 50 },
    similarity: 0.5
  },
  {
    folderA: { path: '/data/x', byteSize: 1 },
    folderB: { path: '/data/y', byteSize: 2 },
    similarity: 2 / 3
  }
];

describe('escapeCsvField', () => {
  it('should leave plain values alone', () => {
    expect(escapeCsvField('/data/photos')).toBe('/data/photos');
  });

  it('should quote commas, quotes and line breaks', () => {
    expect(escapeCsvField('a,b')).toBe('"a,b"');
    expect(escapeCsvField('say "hi"')).toBe('"say ""hi"""');
    expect(escapeCsvField('two\nlines')).toBe('"two\nlines"');
  });
});

describe('formatCsv', () => {
  it('should write a header and one row per pair', () => {
    expect(formatCsv(pairs)).toBe(
      'Similarity,Total Size,Folder 1,Size 1,Folder 2,Size 2\n' +
        '50.00,150,/data/a,100,"/data/b,c",50\n' +
        '66.67,3,/data/x,1,/data/y,2\n'
    );
  });

  it('should write only the header without results', () => {
    expect(formatCsv([])).toBe('Similarity,Total Size,Folder 1,Size 1,Folder 2,Size 2\n');
  });
});

describe('defaultResultsPath', () => {
  it('should timestamp the file name', () => {
    expect(defaultResultsPath(new Date(2024, 2, 5, 14, 7, 9))).toBe(
      path.join(os.tmpdir(), 'folder_diffs_20240305-140709.csv')
    );
  });
});

describe('saveResults', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'similar-folders-csv-test-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should write the CSV and leave no temporary file', async () => {
    const destination = path.join(tempDir, 'results.csv');

    await saveResults(pairs, destination);

    expect(await fs.readFile(destination, 'utf-8')).toBe(formatCsv(pairs));
    expect(await fs.readdir(tempDir)).toEqual(['results.csv']);
  });

  it('should replace an existing file', async () => {
    const destination = path.join(tempDir, 'results.csv');
    await fs.writeFile(destination, 'stale');

    await saveResults([], destination);

    expect(await fs.readFile(destination, 'utf-8')).toBe('Similarity,Total Size,Folder 1,Size 1,Folder 2,Size 2\n');
  });

  it('should leave nothing behind when the destination cannot be written', async () => {
    const destination = path.join(tempDir, 'missing-dir', 'results.csv');

    await expect(saveResults(pairs, destination)).rejects.toThrow();
    expect(await fs.readdir(tempDir)).toEqual([]);
  });
});
