import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import os from 'os';
import { loadConfig, mergeConfig, validateConfig } from './config.js';
import { defaultConfig } from './defaults.js';
import { ConfigurationError } from '../errors.js';
import type { SimilarFoldersConfig } from './types.js';

function configWith(overrides: Parameters<typeof mergeConfig>[1]): SimilarFoldersConfig {
  return mergeConfig(defaultConfig, { roots: ['/data/a', '/data/b'], ...overrides });
}

describe('loadConfig', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'similar-folders-config-test-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should return defaults without a config file', async () => {
    const config = await loadConfig();

    expect(config).toEqual(defaultConfig);
    expect(config.filters).not.toBe(defaultConfig.filters);
  });

  it('should merge a partial config with defaults', async () => {
    const configPath = path.join(tempDir, 'config.json');
    await fs.writeFile(
      configPath,
      JSON.stringify({
        roots: ['/media/one', '/media/two'],
        comparison: { minSimilarity: 80 },
        output: { sort: 'size' }
      })
    );

    const config = await loadConfig(configPath);

    expect(config.roots).toEqual(['/media/one', '/media/two']);
    expect(config.comparison.minSimilarity).toBe(80);
    expect(config.comparison.depth).toBe(1); // from defaults
    expect(config.output.sort).toBe('size');
    expect(config.output.displayLimit).toBe(200); // from defaults
    expect(config.filters.minEntries).toBe(1); // from defaults
  });

  it('should throw error for missing file', async () => {
    const configPath = path.join(tempDir, 'nonexistent.json');

    await expect(loadConfig(configPath)).rejects.toThrow('Configuration file not found');
  });

  it('should throw error for invalid JSON', async () => {
    const configPath = path.join(tempDir, 'invalid.json');
    await fs.writeFile(configPath, 'invalid json{{{');

    await expect(loadConfig(configPath)).rejects.toThrow();
  });
});

describe('mergeConfig', () => {
  it('should let overrides win section by section', () => {
    const base = mergeConfig(defaultConfig, { roots: ['/a'], filters: { minEntries: 5 } });
    const merged = mergeConfig(base, { filters: { minSizeBytes: 1024 }, verbose: true });

    expect(merged.roots).toEqual(['/a']);
    expect(merged.filters).toEqual({ minSizeBytes: 1024, maxSizeBytes: null, minEntries: 5 });
    expect(merged.verbose).toBe(true);
    expect(merged.silent).toBe(false);
  });
});

describe('validateConfig', () => {
  it('should resolve roots to absolute paths', () => {
    const config = validateConfig(configWith({ roots: ['relative/dir'] }));

    expect(config.roots).toEqual([path.resolve('relative/dir')]);
  });

  it('should require at least one root', () => {
    expect(() => validateConfig(configWith({ roots: [] }))).toThrow(
      'Configuration error: at least one root path is required'
    );
  });

  it('should reject a root inside another root', () => {
    expect(() => validateConfig(configWith({ roots: ['/a', '/a/b'] }))).toThrow(
      'Configuration error: root paths overlap: /a/b is inside /a'
    );
    expect(() => validateConfig(configWith({ roots: ['/a/b', '/a'] }))).toThrow(ConfigurationError);
  });

  it('should reject the same root twice', () => {
    expect(() => validateConfig(configWith({ roots: ['/a', '/a/'] }))).toThrow(
      'Configuration error: root path given twice: /a'
    );
  });

  it('should accept sibling roots sharing a name prefix', () => {
    expect(() => validateConfig(configWith({ roots: ['/data/photos', '/data/photos2'] }))).not.toThrow();
  });

  it('should validate depth', () => {
    expect(() => validateConfig(configWith({ comparison: { depth: 0 } }))).toThrow(
      'depth must be an integer of at least 1'
    );
    expect(() => validateConfig(configWith({ comparison: { depth: 1.5 } }))).toThrow(
      'depth must be an integer of at least 1'
    );
  });

  it('should validate minSimilarity range', () => {
    expect(() => validateConfig(configWith({ comparison: { minSimilarity: 101 } }))).toThrow(
      'minSimilarity must be between 0 and 100'
    );
    expect(() => validateConfig(configWith({ comparison: { minSimilarity: -1 } }))).toThrow(
      'minSimilarity must be between 0 and 100'
    );
  });

  it('should validate size bounds', () => {
    expect(() =>
      validateConfig(configWith({ filters: { minSizeBytes: 2048, maxSizeBytes: 1024 } }))
    ).toThrow('maxSizeBytes must not be smaller than minSizeBytes');
  });

  it('should validate concurrency', () => {
    expect(() => validateConfig(configWith({ comparison: { concurrency: 0 } }))).toThrow(
      'concurrency must be an integer of at least 1'
    );
  });

  it('should reject verbose combined with silent', () => {
    expect(() => validateConfig(configWith({ verbose: true, silent: true }))).toThrow(
      'verbose and silent cannot be combined'
    );
  });

  it('should reject an unknown sort mode from a config file', async () => {
    const tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'similar-folders-config-test-'));
    try {
      const configPath = path.join(tempDir, 'config.json');
      await fs.writeFile(configPath, JSON.stringify({ roots: ['/a'], output: { sort: 'date' } }));
      const config = await loadConfig(configPath);

      expect(() => validateConfig(config)).toThrow('sort must be one of: similarity, size, name');
    } finally {
      await fs.rm(tempDir, { recursive: true, force: true });
    }
  });

  it('should reject wrongly typed values from a config file', async () => {
    const tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'similar-folders-config-test-'));
    const cases: Array<[Record<string, unknown>, string]> = [
      [{ filters: { minSizeBytes: '1KB' } }, 'minSizeBytes must be a number'],
      [{ filters: { maxSizeBytes: '10MB' } }, 'maxSizeBytes must be a number'],
      [{ filters: { minEntries: '3' } }, 'minEntries must be a number'],
      [{ comparison: { minSimilarity: '80' } }, 'minSimilarity must be a number'],
      [{ output: { displayLimit: null } }, 'displayLimit must be a number'],
      [{ output: { print: 'yes' } }, 'print must be true or false'],
      [{ interactive: { deletionLogDir: 7 } }, 'deletionLogDir must be a path or null'],
      [{ roots: ['/a', 42] }, 'root paths must be strings']
    ];

    try {
      const configPath = path.join(tempDir, 'config.json');
      for (const [content, message] of cases) {
        await fs.writeFile(configPath, JSON.stringify({ roots: ['/a'], ...content }));
        const config = await loadConfig(configPath);

        expect(() => validateConfig(config)).toThrow(message);
      }
    } finally {
      await fs.rm(tempDir, { recursive: true, force: true });
    }
  });

  it('should accept a null maxSizeBytes from a config file', async () => {
    const tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'similar-folders-config-test-'));
    try {
      const configPath = path.join(tempDir, 'config.json');
      await fs.writeFile(configPath, JSON.stringify({ roots: ['/a'], filters: { maxSizeBytes: null } }));
      const config = await loadConfig(configPath);

      expect(validateConfig(config).filters.maxSizeBytes).toBeNull();
    } finally {
      await fs.rm(tempDir, { recursive: true, force: true });
    }
  });
});
