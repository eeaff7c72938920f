/**
 * unpak Error Codes for programmatic error handling
 */

/**
 * Error with a code property for programmatic handling
 */
export interface UnpakCodedError extends Error {
  code: string;
  cause?: unknown;
  /** Failure to remove a temporary file after the primary failure */
  cleanupError?: Error;
}

/**
 * unpak error codes for user-facing errors
 */
export const UnpakErrorCode = {
  /** A filter or ignore pattern is not a valid glob */
  PATTERN_INVALID: 'UNPAK_PATTERN_INVALID',
  /** The archive header or index is malformed */
  ARCHIVE_FORMAT: 'UNPAK_ARCHIVE_FORMAT',
  /** The archive could not produce the bytes of an entry */
  ARCHIVE_READ: 'UNPAK_ARCHIVE_READ',
  /** Directory creation, temporary file, write, close or rename failed */
  FILESYSTEM: 'UNPAK_FILESYSTEM',
  /** The output directory holds entries that are not ignored */
  PRECONDITION: 'UNPAK_PRECONDITION',
  /** A generated manifest does not describe the archive it was generated from */
  INTERNAL_CONSISTENCY: 'UNPAK_INTERNAL_CONSISTENCY',
  /** Invalid command line */
  USAGE: 'UNPAK_USAGE',
} as const;

export type UnpakErrorCodeValue = (typeof UnpakErrorCode)[keyof typeof UnpakErrorCode];

/**
 * Create an error with a code property
 *
 * @param message - Human-readable error message
 * @param code - Error code from UnpakErrorCode
 * @param cause - Underlying error, message appended after a colon
 */
export function createUnpakError(message: string, code: UnpakErrorCodeValue, cause?: unknown): UnpakCodedError {
  const detail = cause === undefined ? message : `${message}: ${cause instanceof Error ? cause.message : String(cause)}`;
  const err = new Error(detail) as UnpakCodedError;
  err.code = code;
  if (cause !== undefined) err.cause = cause;
  return err;
}

export function isUnpakError(err: unknown, code?: UnpakErrorCodeValue): err is UnpakCodedError {
  if (!(err instanceof Error) || !('code' in err) || typeof err.code !== 'string') return false;
  return code === undefined ? err.code.indexOf('UNPAK_') === 0 : err.code === code;
}
