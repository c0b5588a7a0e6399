export class InvalidArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}

export class NotFoundError extends InvalidArgumentError {
  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}

export class MissingInputError extends Error {
  constructor(
    message: string,
    readonly attemptedPaths: string[],
  ) {
    super(message);
    this.name = 'MissingInputError';
  }
}

export class CacheIOError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CacheIOError';
  }
}

/**
 * Failures the poster client may retry: timeouts, connection errors,
 * rate limiting and server-side statuses.
 */
export class TransientRemoteError extends Error {
  constructor(
    message: string,
    readonly status?: number,
    readonly retryAfterMs?: number,
  ) {
    super(message);
    this.name = 'TransientRemoteError';
  }
}

export class PermanentRemoteError extends Error {
  constructor(
    message: string,
    readonly status?: number,
  ) {
    super(message);
    this.name = 'PermanentRemoteError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
