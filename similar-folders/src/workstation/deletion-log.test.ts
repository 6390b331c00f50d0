import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import os from 'os';
import { DeletionLog, deletionLogPath } from './deletion-log.js';

describe('deletionLogPath', () => {
  it('should name the file after the day', () => {
    expect(deletionLogPath('/logs', new Date(2024, 0, 9, 23, 59))).toBe(
      path.join('/logs', 'folder_deletions_20240109.txt')
    );
  });

  it('should default to the system temp directory', () => {
    expect(path.dirname(deletionLogPath())).toBe(os.tmpdir());
  });
});

describe('DeletionLog', () => {
  let tempDir: string;
  let logPath: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'similar-folders-log-test-'));
    logPath = path.join(tempDir, 'deletions.txt');
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should append one absolute path per line', async () => {
    const log = new DeletionLog(logPath, vi.fn());

    await log.append('/data/old-copy');
    await log.append('/data/other copy');

    expect(await fs.readFile(logPath, 'utf-8')).toBe('/data/old-copy\n/data/other copy\n');
  });

  it('should resolve relative paths', async () => {
    const log = new DeletionLog(logPath, vi.fn());

    await log.append('relative/dir');

    expect(await fs.readFile(logPath, 'utf-8')).toBe(`${path.resolve('relative/dir')}\n`);
  });

  it('should keep what earlier sessions wrote', async () => {
    await fs.writeFile(logPath, '/from/earlier/run\n');
    const log = new DeletionLog(logPath, vi.fn());

    await log.append('/data/new');

    expect(await fs.readFile(logPath, 'utf-8')).toBe('/from/earlier/run\n/data/new\n');
  });

  it('should print the safety notice once per session', async () => {
    const print = vi.fn();
    const log = new DeletionLog(logPath, print);

    await log.append('/data/a');
    await log.append('/data/b');

    expect(print).toHaveBeenCalledTimes(1);
    expect(print.mock.calls[0][0]).toContain(logPath);
    expect(print.mock.calls[0][0]).toContain('Nothing has been deleted');
  });

  it('should not print before anything is logged', () => {
    const print = vi.fn();
    new DeletionLog(logPath, print);

    expect(print).not.toHaveBeenCalled();
  });
});
