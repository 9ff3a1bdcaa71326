/**
 * Error taxonomy for a translation run.
 *
 * Only ConfigurationError aborts a run; the others are caught at the
 * per-file boundary and counted as failures.
 */

/** Missing credential or invalid setting, raised before any work starts */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/** A source file could not be read */
export class SourceIOError extends Error {
  readonly path: string;

  constructor(filePath: string, cause: unknown) {
    const reason = hasMessage(cause) ? cause.message : String(cause);
    super(`Cannot read source file ${filePath}: ${reason}`, { cause });
    this.name = 'SourceIOError';
    this.path = filePath;
  }
}

/** The remote service failed to produce a translation */
export class TranslationError extends Error {
  /** HTTP status, when the failure came from a response status */
  readonly status?: number;

  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'TranslationError';
    this.status = options.status;
  }
}

/**
 * `code` of a system error such as ENOENT. Errors raised by `fs` may come from
 * another realm, so this does not rely on `instanceof Error`.
 */
export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function hasMessage(error: unknown): error is { message: string } {
  return typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string';
}
