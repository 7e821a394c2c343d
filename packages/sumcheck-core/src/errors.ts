/**
 * Errors thrown by the core.
 *
 * Only whole-run failures escape as exceptions. Per-record failures are
 * carried as values in the result stream (see `ParseFailure` and
 * `HashFailure` in the digest and manifest types).
 */

/**
 * The manifest itself could not be resolved or read.
 * Nothing is verified when this is raised.
 */
export class ManifestUnavailableError extends Error {
  public readonly manifestPath: string;

  constructor(manifestPath: string, message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'ManifestUnavailableError';
    this.manifestPath = manifestPath;
  }
}

/**
 * A file could not be opened or fully read while hashing it.
 */
export class FileUnreadableError extends Error {
  public readonly path: string;
  /** System error code (ENOENT, EACCES, EISDIR, ...) when known */
  public readonly code?: string;

  constructor(path: string, message: string, code?: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'FileUnreadableError';
    this.path = path;
    this.code = code;
  }
}

/**
 * Pull the system error code off an unknown thrown value.
 */
export function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
