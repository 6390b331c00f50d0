/**
 * Raised for invalid settings, such as overlapping root paths. Fatal: the run stops
 * before any scanning starts.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(`Configuration error: ${message}`);
    this.name = 'ConfigurationError';
  }
}

/**
 * Raised when a folder found during the scan no longer exists when it is compared
 * or merged.
 */
export class MissingPathError extends Error {
  constructor(public readonly path: string) {
    super(`Folder no longer exists: ${path}`);
    this.name = 'MissingPathError';
  }
}

/** Reads the errno code off a filesystem error, if it has one */
export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
