import { sleep as defaultSleep, type Sleep } from './async';

/**
 * Bounded retry policy shared by the discovery and reader clients.
 */
export interface RetryPolicy {
  /** Additional attempts after the first one. */
  readonly retries: number;
  /**
   * Delay before the next attempt, given the 1-based number of the attempt
   * that just failed. `null` marks the error as not retryable.
   */
  readonly backoffMs: (attempt: number, error: unknown) => number | null;
}

export interface RetryOptions {
  sleep?: Sleep;
  signal?: AbortSignal;
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
}

export const linearBackoff =
  (stepMs: number, capMs = Number.POSITIVE_INFINITY) =>
  (attempt: number): number =>
    Math.min(capMs, stepMs * attempt);

export const exponentialBackoffWithJitter =
  (options: { baseMs: number; capMs: number; jitterMs: number; random?: () => number }) =>
  (attempt: number): number => {
    const random = options.random ?? Math.random;
    const exponential = Math.min(options.capMs, options.baseMs * 2 ** Math.max(0, attempt - 1));
    return exponential + random() * options.jitterMs;
  };

export const retry = async <T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions = {},
): Promise<T> => {
  const wait = options.sleep ?? defaultSleep;
  const maxAttempts = 1 + Math.max(0, Math.floor(policy.retries));
  let attempt = 0;

  while (true) {
    attempt += 1;
    try {
      return await operation(attempt);
    } catch (error) {
      if (attempt >= maxAttempts) {
        throw error;
      }
      const delayMs = policy.backoffMs(attempt, error);
      if (delayMs == null) {
        throw error;
      }
      options.onRetry?.({ attempt, delayMs, error });
      await wait(delayMs, options.signal);
    }
  }
};
