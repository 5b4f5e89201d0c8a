import { SyncFatalError, errorMessage, isRetryable } from "../errors.js";

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface RetryPolicy {
  attempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

/** Exponential: base, 2×base, 4×base, … capped at `maxDelayMs`. */
export function backoffMs(policy: RetryPolicy, attempt: number): number {
  return Math.min(policy.maxDelayMs, policy.baseDelayMs * Math.pow(2, attempt - 1));
}

/**
 * Runs `fn` up to `policy.attempts` times. Errors marked non-retryable are
 * rethrown at once; running out of attempts throws `SyncFatalError` with the
 * last error as its cause.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  hooks: {
    sleep?: Sleep;
    onRetry?: (info: { attempt: number; delayMs: number; err: unknown }) => void;
  } = {}
): Promise<T> {
  const wait = hooks.sleep ?? sleep;
  let attempt = 0;
  while (true) {
    attempt += 1;
    try {
      return await fn(attempt);
    } catch (err) {
      if (!isRetryable(err)) throw err;
      if (attempt >= policy.attempts) {
        throw new SyncFatalError(`Giving up after ${attempt} attempts: ${errorMessage(err)}`, attempt, { cause: err });
      }
      const delayMs = backoffMs(policy, attempt);
      hooks.onRetry?.({ attempt, delayMs, err });
      await wait(delayMs);
    }
  }
}
