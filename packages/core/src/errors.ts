/**
 * Base error type for everything raised by the cache core.
 *
 * Callers can check `instanceof KeystrokeError` to tell cache problems apart
 * from bugs in their own fetchers or renderers.
 */
export class KeystrokeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'KeystrokeError';
  }
}

/**
 * The cache directory could not be read or written, or a stored record is
 * corrupt. Foreground callers degrade to "no cached data".
 */
export class StorageUnavailableError extends KeystrokeError {
  readonly key: string;

  constructor(key: string, message: string, options?: { cause?: unknown }) {
    super(`Cache storage unavailable for "${key}": ${message}`, options);
    this.name = 'StorageUnavailableError';
    this.key = key;
  }
}

/**
 * The data fetcher failed. The refresh is abandoned and the previous entry
 * stays in place.
 */
export class FetchFailedError extends KeystrokeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FetchFailedError';
  }
}

/**
 * Thrown when a fetch exceeds the configured timeout.
 */
export class FetchTimeoutError extends FetchFailedError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Fetch timed out after ${timeoutMs}ms`);
    this.name = 'FetchTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * The refresh lock could not be tested or set. Treated as "someone else is
 * refreshing".
 */
export class LockUnavailableError extends KeystrokeError {
  readonly key: string;

  constructor(key: string, options?: { cause?: unknown }) {
    super(`Refresh lock unavailable for "${key}"`, options);
    this.name = 'LockUnavailableError';
    this.key = key;
  }
}

/**
 * Invalid settings file, environment variable or command-line flag.
 */
export class ConfigError extends KeystrokeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

/**
 * Read the `code` of a Node.js system error, if there is one.
 */
export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined;
  }
  return undefined;
}

/**
 * Best-effort human-readable message for an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
