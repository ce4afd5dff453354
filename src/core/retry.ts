import { CancelledError, isPinError, throwIfAborted } from "./errors.js";

export type RetryPolicy = {
  /** Extra attempts after the first one. */
  retries: number;
  /** Delay before the first retry; doubles on each subsequent one. */
  backoffMs: number;
};

export type RetryHooks = {
  signal?: AbortSignal;
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
};

/** Resolves after `ms`, or rejects with CancelledError if the signal fires first. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Run `fn`, retrying only errors marked retryable (TransportError) with
 * exponential backoff. Everything else propagates on the first attempt.
 */
export async function withRetry<T>(fn: () => Promise<T>, policy: RetryPolicy, hooks: RetryHooks = {}): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    throwIfAborted(hooks.signal);
    try {
      return await fn();
    } catch (e) {
      const retryable = isPinError(e) && e.retryable;
      if (!retryable || attempt >= policy.retries) throw e;
      const delayMs = policy.backoffMs * 2 ** attempt;
      hooks.onRetry?.(attempt + 1, e, delayMs);
      await sleep(delayMs, hooks.signal);
    }
  }
}
