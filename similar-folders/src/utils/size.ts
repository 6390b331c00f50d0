import { ConfigurationError } from '../errors.js';

const UNITS = ['B', 'KB', 'MB', 'GB', 'TB'] as const;

type SizeUnit = (typeof UNITS)[number];

const MULTIPLIERS: Record<SizeUnit, number> = {
  B: 1,
  KB: 1024,
  MB: 1024 ** 2,
  GB: 1024 ** 3,
  TB: 1024 ** 4
};

const UNIT_NAMES: ReadonlySet<string> = new Set(UNITS);

function isSizeUnit(value: string): value is SizeUnit {
  return UNIT_NAMES.has(value);
}

/**
 * Parses a size with an optional unit suffix into bytes
 *
 * @example
 * parseSize('10MB')  // 10485760
 * parseSize('1.5 kb') // 1536
 * parseSize('512')   // 512
 */
export function parseSize(text: string): number {
  const match = text.trim().toUpperCase().match(/^(\d+(?:\.\d+)?)\s*([KMGT]?B)?$/);
  if (!match) {
    throw new ConfigurationError(`invalid size "${text}" (expected e.g. 512, 1KB, 10MB)`);
  }

  const [, amount, suffix = 'B'] = match;
  if (!isSizeUnit(suffix)) {
    throw new ConfigurationError(`unknown size unit "${suffix}"`);
  }

  return Math.floor(parseFloat(amount) * MULTIPLIERS[suffix]);
}

/**
 * Formats a byte count using the largest unit that keeps the value below 1024
 *
 * @example
 * humanReadableSize(1536) // '1.50 KB'
 */
export function humanReadableSize(bytes: number): string {
  let value = bytes;
  let unitIndex = 0;

  while (value >= 1024 && unitIndex < UNITS.length - 1) {
    value /= 1024;
    unitIndex++;
  }

  return `${value.toFixed(2)} ${UNITS[unitIndex]}`;
}
