import type { Debugger } from 'debug';

/**
 * Operator-facing log sink.
 *
 * Library code reports progress and warnings through this interface; the CLI
 * supplies a coloured console implementation, everything else defaults to the
 * debug namespace of the caller.
 */
export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/** Route all levels to a debug namespace, prefixing warnings and errors. */
export function createDebugLogger(sink: Debugger): Logger {
  return {
    info: (message) => sink(message),
    warn: (message) => sink(`WARN: ${message}`),
    error: (message) => sink(`ERROR: ${message}`),
  };
}

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

/**
 * Errors are recognised by shape: those raised by `fs` or `dns` may come from
 * another realm, where `instanceof Error` is false.
 */
export function isErrorLike(error: unknown): error is Error {
  return (
    typeof error === 'object' &&
    error !== null &&
    'message' in error &&
    typeof error.message === 'string' &&
    'name' in error &&
    typeof error.name === 'string'
  );
}

/** `code` of a Node system error (`ENOENT`, `ECONNRESET`, ...) */
export function errorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('code' in error)) return undefined;
  return typeof error.code === 'string' ? error.code : undefined;
}

export function describeError(error: unknown): string {
  return isErrorLike(error) ? error.message : String(error);
}

export function toError(error: unknown): Error {
  return isErrorLike(error) ? error : new Error(String(error));
}
