import { CancelledError, isRetryable, RetryExhaustedError } from "../errors";

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface RetryAttemptContext {
  attempt: number;
  delayMs: number;
  error: unknown;
}

export interface RetryHooks {
  signal?: AbortSignal;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  onRetry?: (context: RetryAttemptContext) => void;
}

export const computeBackoffDelay = (policy: RetryPolicy, attempt: number): number =>
  Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (attempt - 1));

export const abortableSleep = (ms: number, signal?: AbortSignal): Promise<void> =>
  new Promise((resolve, reject) => {
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

export const throwIfCancelled = (signal?: AbortSignal) => {
  if (signal?.aborted) {
    throw new CancelledError();
  }
};

/**
 * Runs `task` until it succeeds, fails with a non-retryable error, or uses up
 * `policy.maxAttempts`. Only errors flagged `retryable` are retried; running
 * out of attempts turns the last one into a `RetryExhaustedError`.
 */
export async function runWithRetry<T>(
  task: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  hooks: RetryHooks = {},
): Promise<T> {
  const { signal, sleep = abortableSleep, onRetry } = hooks;
  const maxAttempts = Math.max(1, policy.maxAttempts);

  for (let attempt = 1; ; attempt += 1) {
    throwIfCancelled(signal);
    try {
      return await task(attempt);
    } catch (error) {
      if (!isRetryable(error)) {
        throw error;
      }
      if (attempt >= maxAttempts) {
        throw new RetryExhaustedError(attempt, error);
      }
      const delayMs = computeBackoffDelay(policy, attempt);
      onRetry?.({ attempt, delayMs, error });
      await sleep(delayMs, signal);
    }
  }
}
