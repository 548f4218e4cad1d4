/**
 * Bounded retry with a pluggable delay schedule.
 *
 * An attempt either yields a result (judged by `isSuccess`) or throws. Failed
 * results are retried until `maxAttempts` is reached, then the last result is
 * returned. Errors accepted by `isRetryableError` are retried the same way,
 * except on the final attempt, where they are rethrown.
 */
export interface RetryPolicy<T> {
  maxAttempts: number;
  /** Delay (ms) to wait after the given 1-based attempt fails. */
  delayMs: (attempt: number) => number;
  isSuccess: (result: T) => boolean;
  isRetryableError?: (error: unknown) => boolean;
  onRetry?: (info: RetryInfo) => void;
  sleep?: (ms: number) => Promise<void>;
}

export type RetryInfo = {
  attempt: number;
  delayMs: number;
  error?: unknown;
};

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** base, 2×base, 4×base, ... */
export function exponentialBackoff(baseDelayMs: number) {
  return (attempt: number): number => baseDelayMs * 2 ** (attempt - 1);
}

export async function executeWithRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy<T>,
): Promise<T> {
  if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1) {
    throw new RangeError(
      `maxAttempts must be a positive integer, got ${policy.maxAttempts}`,
    );
  }

  const wait = policy.sleep ?? sleep;
  const isRetryableError = policy.isRetryableError ?? (() => true);

  for (let attempt = 1; ; attempt++) {
    const isLast = attempt >= policy.maxAttempts;

    let failure: { error?: unknown };
    try {
      const result = await operation(attempt);
      if (policy.isSuccess(result) || isLast) return result;
      failure = {};
    } catch (error) {
      if (isLast || !isRetryableError(error)) throw error;
      failure = { error };
    }

    const delay = policy.delayMs(attempt);
    policy.onRetry?.({ attempt, delayMs: delay, ...failure });
    await wait(delay);
  }
}
