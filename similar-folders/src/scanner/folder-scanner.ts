import fs from 'fs/promises';
import type { Dirent } from 'fs';
import path from 'path';
import type { FolderRecord, Fingerprint, ScanOptions, ProgressCallback } from './types.js';
import { ConfigurationError, MissingPathError, errorCode, errorMessage } from '../errors.js';
import { logger } from '../utils/logger.js';

/**
 * Lists a directory sorted by name. Failures are logged and read as an empty
 * directory, except a missing top-level directory which raises MissingPathError.
 */
async function listDirectory(dirPath: string, isTopLevel: boolean): Promise<Dirent[]> {
  let entries: Dirent[];

  try {
    entries = await fs.readdir(dirPath, { withFileTypes: true });
  } catch (error) {
    const code = errorCode(error);
    if (isTopLevel && (code === 'ENOENT' || code === 'ENOTDIR')) {
      throw new MissingPathError(dirPath);
    }
    if (code === 'EACCES' || code === 'EPERM') {
      logger.warn(`Permission denied: ${dirPath}`);
    } else if (code === 'ENOENT') {
      logger.warn(`Directory not found: ${dirPath}`);
    } else {
      logger.warn(`Error reading directory ${dirPath}: ${errorMessage(error)}`);
    }
    return [];
  }

  return entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
}

/**
 * Collects the entry names of a folder down to `depth` levels.
 * Symbolic links are never listed or followed.
 *
 * @param dirPath - Folder to fingerprint
 * @param depth - 1 = immediate entries only, 2 = also the entries of subfolders, etc.
 * @throws MissingPathError if the folder itself does not exist
 *
 * @example
 * // folder/ contains a.txt and logs/b.txt
 * await getFingerprint('folder', 2) // Set { 'a.txt', 'logs', 'logs/b.txt' }
 */
export async function getFingerprint(dirPath: string, depth: number): Promise<Fingerprint> {
  const names = new Set<string>();
  await collectNames(dirPath, depth, 0, '', names);
  return names;
}

async function collectNames(
  dirPath: string,
  depth: number,
  currentDepth: number,
  prefix: string,
  names: Set<string>
): Promise<void> {
  const entries = await listDirectory(dirPath, currentDepth === 0);

  for (const entry of entries) {
    if (entry.isSymbolicLink()) {
      continue;
    }

    const name = `${prefix}${entry.name}`;
    names.add(name);

    if (entry.isDirectory() && currentDepth < depth - 1) {
      await collectNames(path.join(dirPath, entry.name), depth, currentDepth + 1, `${name}/`, names);
    }
  }
}

interface MeasuredTree {
  /** Directories below the root in walk order (pre-order) */
  directories: string[];
  sizes: Map<string, number>;
}

/**
 * Walks a tree once, recording every directory and the total size of the
 * regular files below it
 */
async function measureTree(root: string): Promise<MeasuredTree> {
  const tree: MeasuredTree = { directories: [], sizes: new Map() };
  await measureDirectory(root, tree, true);
  return tree;
}

async function measureDirectory(dirPath: string, tree: MeasuredTree, isRoot: boolean): Promise<number> {
  if (!isRoot) {
    tree.directories.push(dirPath);
  }

  const entries = await listDirectory(dirPath, false);
  let total = 0;

  for (const entry of entries) {
    const fullPath = path.join(dirPath, entry.name);

    if (entry.isSymbolicLink()) {
      logger.debug(`Skipping symlink: ${fullPath}`);
      continue;
    }

    if (entry.isDirectory()) {
      total += await measureDirectory(fullPath, tree, false);
    } else if (entry.isFile()) {
      try {
        const stats = await fs.lstat(fullPath);
        total += stats.size;
      } catch (error) {
        logger.warn(`Cannot read file size: ${fullPath} (${errorMessage(error)})`);
      }
    }
  }

  tree.sizes.set(dirPath, total);
  return total;
}

/**
 * Total size of the regular files below a directory, symlinks excluded
 */
export async function getFolderSize(dirPath: string): Promise<number> {
  const tree = await measureTree(dirPath);
  return tree.sizes.get(dirPath) ?? 0;
}

async function assertDirectories(roots: string[]): Promise<void> {
  for (const root of roots) {
    let isDirectory = false;
    try {
      isDirectory = (await fs.stat(root)).isDirectory();
    } catch (error) {
      throw new ConfigurationError(`cannot access root path ${root}: ${errorMessage(error)}`);
    }
    if (!isDirectory) {
      throw new ConfigurationError(`root path is not a directory: ${root}`);
    }
  }
}

/**
 * Finds every directory below the roots whose size and fingerprint size pass the
 * filters. The roots themselves are not candidates.
 *
 * @param roots - Absolute, non-overlapping root directories
 * @param options - Size bounds, minimum entry count and fingerprint depth
 * @param onProgress - Called once per directory examined
 * @returns Matching folders in walk order
 */
export async function scanFolders(
  roots: string[],
  options: ScanOptions,
  onProgress?: ProgressCallback
): Promise<FolderRecord[]> {
  await assertDirectories(roots);

  const directories: string[] = [];
  const sizes = new Map<string, number>();

  for (const root of roots) {
    logger.debug(`Measuring: ${root}`);
    const tree = await measureTree(root);
    directories.push(...tree.directories);
    for (const [dirPath, size] of tree.sizes) {
      sizes.set(dirPath, size);
    }
  }

  logger.debug(`Found ${directories.length} directories below ${roots.length} root(s)`);

  const folders: FolderRecord[] = [];

  for (let index = 0; index < directories.length; index++) {
    const dirPath = directories[index];
    onProgress?.(index / directories.length, `Gathering folders... ${dirPath}`);

    const byteSize = sizes.get(dirPath) ?? 0;
    if (byteSize < options.minSizeBytes) {
      continue;
    }
    if (options.maxSizeBytes !== null && byteSize > options.maxSizeBytes) {
      continue;
    }

    let fingerprint: Fingerprint;
    try {
      fingerprint = await getFingerprint(dirPath, options.depth);
    } catch (error) {
      if (error instanceof MissingPathError) {
        logger.warn(`${error.message} (skipped)`);
        continue;
      }
      throw error;
    }

    if (fingerprint.size >= options.minEntries) {
      folders.push({ path: dirPath, byteSize });
    }
  }

  return folders;
}
