/**
 * Base class for every error the shortener raises on purpose.
 */
export class ShortenerError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The storage backend could not be reached, at startup or during a call.
 */
export class ConnectionError extends ShortenerError {}

/**
 * The caller's deadline elapsed before the storage round trip finished.
 */
export class DeadlineExceededError extends ConnectionError {
  constructor(operation: string, options?: { cause?: unknown }) {
    super(`${operation} aborted: deadline exceeded`, options);
  }
}

/**
 * Malformed HTTP usage. Always a client error.
 */
export class ValidationError extends ShortenerError {
  constructor(
    message: string,
    public readonly status: 400 | 405 = 400
  ) {
    super(message);
  }
}

export class ConfigError extends ShortenerError {}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
