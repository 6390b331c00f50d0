#!/usr/bin/env node

import { buildApplication, buildCommand, run } from '@stricli/core';
import type { CommandContext } from '@stricli/core';
import { findSimilarFolders } from './find-similar.js';
import type { PartialConfig, SortMode } from './config/types.js';
import { parseSize } from './utils/size.js';
import { logger } from './utils/logger.js';
import { errorMessage } from './errors.js';

interface FindFlags {
  config?: string;
  'min-size'?: string;
  'max-size'?: string;
  'min-files'?: number;
  'min-similarity'?: number;
  depth?: number;
  sort?: SortMode;
  concurrency?: number;
  output?: string;
  print: boolean;
  interactive: boolean;
  'log-dir'?: string;
  verbose: boolean;
  silent: boolean;
  debug: boolean;
}

function parseNumber(input: string): number {
  const value = Number(input);
  if (input.trim() === '' || !Number.isFinite(value)) {
    throw new Error(`not a number: ${input}`);
  }
  return value;
}

/**
 * Turns command-line flags into config overrides. Boolean flags only override
 * when set, so a config file can still switch them on.
 */
function flagsToOverrides(flags: FindFlags, roots: string[]): PartialConfig {
  const filters: NonNullable<PartialConfig['filters']> = {};
  const comparison: NonNullable<PartialConfig['comparison']> = {};
  const output: NonNullable<PartialConfig['output']> = {};
  const interactive: NonNullable<PartialConfig['interactive']> = {};

  if (flags['min-size'] !== undefined) filters.minSizeBytes = parseSize(flags['min-size']);
  if (flags['max-size'] !== undefined) filters.maxSizeBytes = parseSize(flags['max-size']);
  if (flags['min-files'] !== undefined) filters.minEntries = flags['min-files'];

  if (flags['min-similarity'] !== undefined) comparison.minSimilarity = flags['min-similarity'];
  if (flags.depth !== undefined) comparison.depth = flags.depth;
  if (flags.concurrency !== undefined) comparison.concurrency = flags.concurrency;

  if (flags.sort !== undefined) output.sort = flags.sort;
  if (flags.output !== undefined) output.outputFile = flags.output;
  if (flags.print) output.print = true;

  if (flags.interactive) interactive.enabled = true;
  if (flags['log-dir'] !== undefined) interactive.deletionLogDir = flags['log-dir'];

  return {
    ...(roots.length > 0 ? { roots } : {}),
    filters,
    comparison,
    output,
    interactive,
    ...(flags.verbose ? { verbose: true } : {}),
    ...(flags.silent ? { silent: true } : {})
  };
}

const findCommand = buildCommand({
  docs: {
    brief: 'Find similar folder structures and optionally resolve duplicates'
  },
  parameters: {
    positional: {
      kind: 'array',
      parameter: {
        brief: 'Root directory to search (several may be given, none inside another)',
        parse: String,
        placeholder: 'root'
      }
    },
    flags: {
      config: {
        kind: 'parsed',
        brief: 'Path to configuration file',
        parse: String,
        optional: true
      },
      'min-size': {
        kind: 'parsed',
        brief: 'Minimum folder size (e.g. 1KB)',
        parse: String,
        optional: true
      },
      'max-size': {
        kind: 'parsed',
        brief: 'Maximum folder size (e.g. 10GB)',
        parse: String,
        optional: true
      },
      'min-files': {
        kind: 'parsed',
        brief: 'Minimum number of entries in a folder fingerprint',
        parse: parseNumber,
        optional: true
      },
      'min-similarity': {
        kind: 'parsed',
        brief: 'Minimum similarity percentage (0-100)',
        parse: parseNumber,
        optional: true
      },
      depth: {
        kind: 'parsed',
        brief: 'Levels of entry names compared (1 = immediate entries only)',
        parse: parseNumber,
        optional: true
      },
      sort: {
        kind: 'enum',
        brief: 'Result order',
        values: ['similarity', 'size', 'name'] as const,
        optional: true
      },
      concurrency: {
        kind: 'parsed',
        brief: 'Folder pairs compared at the same time',
        parse: parseNumber,
        optional: true
      },
      output: {
        kind: 'parsed',
        brief: 'CSV file to save the results to',
        parse: String,
        optional: true
      },
      print: {
        kind: 'boolean',
        brief: 'Print results to the console even when there are many',
        default: false
      },
      interactive: {
        kind: 'boolean',
        brief: 'Resolve the similar folders one pair at a time',
        default: false
      },
      'log-dir': {
        kind: 'parsed',
        brief: 'Directory of the deletion log (default: system temp directory)',
        parse: String,
        optional: true
      },
      verbose: {
        kind: 'boolean',
        brief: 'Print every progress step on its own line (slower)',
        default: false
      },
      silent: {
        kind: 'boolean',
        brief: 'Print no progress while scanning (faster)',
        default: false
      },
      debug: {
        kind: 'boolean',
        brief: 'Enable debug logging',
        default: false
      }
    },
    aliases: {
      c: 'config',
      f: 'min-files',
      s: 'min-similarity',
      D: 'depth',
      o: 'output',
      p: 'print',
      i: 'interactive',
      d: 'debug'
    }
  },
  async func(this: CommandContext, flags: FindFlags, ...roots: string[]): Promise<void> {
    try {
      await findSimilarFolders({
        configPath: flags.config,
        overrides: flagsToOverrides(flags, roots),
        debug: flags.debug
      });
    } catch (error) {
      logger.error(errorMessage(error));
      process.exitCode = 1;
    }
  }
});

const app = buildApplication(findCommand, {
  name: 'similar-folders',
  versionInfo: {
    currentVersion: '1.0.0'
  }
});

run(app, process.argv.slice(2), { process });
