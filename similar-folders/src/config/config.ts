import fs from 'fs/promises';
import path from 'path';
import type { PartialConfig, SimilarFoldersConfig } from './types.js';
import { SORT_MODES } from './types.js';
import { defaultConfig } from './defaults.js';
import { ConfigurationError, errorCode } from '../errors.js';
import { findOverlap } from '../utils/paths.js';

/**
 * Loads configuration from an optional JSON file, merged with defaults.
 * Without a path the defaults are returned.
 */
export async function loadConfig(configPath?: string): Promise<SimilarFoldersConfig> {
  if (!configPath) {
    return mergeConfig(defaultConfig, {});
  }

  const resolved = path.resolve(configPath);
  let content: string;
  try {
    content = await fs.readFile(resolved, 'utf-8');
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      throw new Error(`Configuration file not found: ${resolved}`);
    }
    throw error;
  }

  const userConfig: PartialConfig = JSON.parse(content);
  return mergeConfig(defaultConfig, userConfig);
}

/**
 * Deep merges a partial configuration over a complete one, section by section
 */
export function mergeConfig(
  base: SimilarFoldersConfig,
  overrides: PartialConfig
): SimilarFoldersConfig {
  return {
    roots: overrides.roots ?? [...base.roots],
    filters: { ...base.filters, ...overrides.filters },
    comparison: { ...base.comparison, ...overrides.comparison },
    output: { ...base.output, ...overrides.output },
    interactive: { ...base.interactive, ...overrides.interactive },
    verbose: overrides.verbose ?? base.verbose,
    silent: overrides.silent ?? base.silent
  };
}

function assertNumber(value: unknown, name: string): void {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ConfigurationError(`${name} must be a number`);
  }
}

function assertBoolean(value: unknown, name: string): void {
  if (typeof value !== 'boolean') {
    throw new ConfigurationError(`${name} must be true or false`);
  }
}

function assertPathOrNull(value: unknown, name: string): void {
  if (value !== null && typeof value !== 'string') {
    throw new ConfigurationError(`${name} must be a path or null`);
  }
}

/**
 * Validates the configuration and resolves roots to absolute paths.
 * Runs before any scanning.
 * @throws ConfigurationError if configuration is invalid
 */
export function validateConfig(config: SimilarFoldersConfig): SimilarFoldersConfig {
  if (!Array.isArray(config.roots) || config.roots.length === 0) {
    throw new ConfigurationError('at least one root path is required');
  }
  if (!config.roots.every(root => typeof root === 'string')) {
    throw new ConfigurationError('root paths must be strings');
  }

  const roots = config.roots.map(root => path.resolve(root));
  const overlap = findOverlap(roots);
  if (overlap) {
    const [ancestor, descendant] = overlap;
    throw new ConfigurationError(
      ancestor === descendant
        ? `root path given twice: ${ancestor}`
        : `root paths overlap: ${descendant} is inside ${ancestor}`
    );
  }

  const { filters, comparison, output, interactive } = config;

  // Values from the JSON file are not typed
  assertNumber(filters.minSizeBytes, 'minSizeBytes');
  if (filters.maxSizeBytes !== null) {
    assertNumber(filters.maxSizeBytes, 'maxSizeBytes');
  }
  assertNumber(filters.minEntries, 'minEntries');
  assertNumber(comparison.minSimilarity, 'minSimilarity');
  assertNumber(output.displayLimit, 'displayLimit');
  assertBoolean(output.print, 'print');
  assertBoolean(interactive.enabled, 'interactive.enabled');
  assertBoolean(config.verbose, 'verbose');
  assertBoolean(config.silent, 'silent');
  assertPathOrNull(output.outputFile, 'outputFile');
  assertPathOrNull(interactive.deletionLogDir, 'deletionLogDir');

  if (!Number.isInteger(comparison.depth) || comparison.depth < 1) {
    throw new ConfigurationError('depth must be an integer of at least 1');
  }

  if (!(comparison.minSimilarity >= 0 && comparison.minSimilarity <= 100)) {
    throw new ConfigurationError('minSimilarity must be between 0 and 100');
  }

  if (!Number.isInteger(comparison.concurrency) || comparison.concurrency < 1) {
    throw new ConfigurationError('concurrency must be an integer of at least 1');
  }

  if (filters.minEntries < 0) {
    throw new ConfigurationError('minEntries must not be negative');
  }

  if (filters.minSizeBytes < 0) {
    throw new ConfigurationError('minSizeBytes must not be negative');
  }

  if (filters.maxSizeBytes !== null && filters.maxSizeBytes < filters.minSizeBytes) {
    throw new ConfigurationError('maxSizeBytes must not be smaller than minSizeBytes');
  }

  if (!SORT_MODES.includes(output.sort)) {
    throw new ConfigurationError(`sort must be one of: ${SORT_MODES.join(', ')}`);
  }

  if (output.displayLimit < 0) {
    throw new ConfigurationError('displayLimit must not be negative');
  }

  if (config.verbose && config.silent) {
    throw new ConfigurationError('verbose and silent cannot be combined');
  }

  return { ...config, roots };
}
