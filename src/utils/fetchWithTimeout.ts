type FetchOptions = Parameters<typeof fetch>[1];

/**
 * `fetch` bounded by `timeoutMs`. This is the only bound on a stuck sync
 * iteration, so every vendor call goes through it.
 */
export async function fetchWithTimeout(url: string, opts: FetchOptions & { timeoutMs?: number } = {}) {
  const { timeoutMs = 10_000, signal, ...rest } = opts;

  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(new Error(`timeout after ${timeoutMs}ms`)), timeoutMs);
  const combined = signal ? AbortSignal.any([signal, controller.signal]) : controller.signal;

  try {
    return await fetch(url, { ...rest, signal: combined });
  } finally {
    clearTimeout(timeout);
  }
}
