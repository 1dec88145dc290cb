/**
 * Stack trace capture utility
 *
 * Used by every error class in ./errors.ts to drop constructor frames.
 */

/**
 * Captures a stack trace on `error`, omitting frames above `constructorOpt`.
 *
 * No-op outside V8; the Error constructor has already populated `stack`.
 */
export function captureStackTrace(
  error: Error,
  constructorOpt?: Function
): void {
  if (typeof Error.captureStackTrace === 'function') {
    Error.captureStackTrace(error, constructorOpt);
  }
}
