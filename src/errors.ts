/**
 * Error taxonomy for the sync loop.
 *
 * `retryable` drives `withRetry`: anything not explicitly marked `false` is
 * re-run as a whole iteration until attempts run out.
 */
export class SyncError extends Error {
  constructor(
    message: string,
    public readonly retryable: boolean,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class EcobeeApiError extends SyncError {
  constructor(
    message: string,
    public readonly statusCode?: number,
    options?: { cause?: unknown }
  ) {
    super(message, statusCode === undefined || statusCode === 429 || statusCode >= 500, options);
  }
}

/** The vendor answered, but not in a shape we can use. Re-run, then give up. */
export class MalformedResponseError extends SyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, true, options);
  }
}

export class AuthError extends SyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, false, options);
  }
}

export class ConfigError extends SyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, false, options);
  }
}

export class SyncFatalError extends SyncError {
  constructor(
    message: string,
    public readonly attempts: number,
    options?: { cause?: unknown }
  ) {
    super(message, false, options);
  }
}

export function isRetryable(err: unknown): boolean {
  if (err instanceof SyncError) return err.retryable;
  return true;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
