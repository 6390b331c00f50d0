import chalk from 'chalk';

export type ProgressMode = 'silent' | 'verbose' | 'line';

/**
 * Receives progress notifications from the scanner and the comparison loop.
 * The sink decides how (and whether) they reach the terminal.
 */
export interface ProgressSink {
  notify(fraction: number, label: string): void;
  /** Clears any partially drawn line once a phase ends */
  done(): void;
}

export interface ProgressStream {
  write(chunk: string): boolean;
  columns?: number;
}

const CLEAR_LINE = '\x1b[2K';
const DEFAULT_COLUMNS = 80;

export function formatProgress(fraction: number, label: string): string {
  return `${(fraction * 100).toFixed(2)}% ${label}`;
}

/** Cuts text to at most `width` code points */
export function truncateToWidth(text: string, width: number): string {
  const chars = Array.from(text);
  if (chars.length <= width) {
    return text;
  }
  return chars.slice(0, Math.max(0, width)).join('');
}

export function modeFromFlags(verbose: boolean, silent: boolean): ProgressMode {
  if (silent) return 'silent';
  if (verbose) return 'verbose';
  return 'line';
}

/**
 * Creates a progress sink writing to the given stream (stdout by default)
 */
export function createProgressSink(
  mode: ProgressMode,
  stream: ProgressStream = process.stdout
): ProgressSink {
  switch (mode) {
    case 'silent':
      return {
        notify: () => undefined,
        done: () => undefined
      };

    case 'verbose':
      return {
        notify(fraction, label) {
          stream.write(`${chalk.gray(formatProgress(fraction, label))}\n`);
        },
        done: () => undefined
      };

    case 'line': {
      let drawn = false;
      return {
        notify(fraction, label) {
          const width = stream.columns ?? DEFAULT_COLUMNS;
          stream.write(`\r${CLEAR_LINE}${truncateToWidth(formatProgress(fraction, label), width - 1)}`);
          drawn = true;
        },
        done() {
          if (drawn) {
            stream.write(`\r${CLEAR_LINE}`);
            drawn = false;
          }
        }
      };
    }
  }
}
