export type Sleep = (ms: number, signal?: AbortSignal | null) => Promise<void>;

export class AbortedError extends Error {
  constructor() {
    super('Aborted');
    this.name = 'AbortedError';
  }
}

/** Resolves after `ms`, or rejects with `AbortedError` once `signal` fires. */
export const sleep: Sleep = (ms, signal) => {
  if (signal?.aborted) {
    return Promise.reject(new AbortedError());
  }
  return new Promise<void>((resolve, reject) => {
    const settle = (outcome: () => void) => () => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
      outcome();
    };
    const onAbort = settle(() => reject(new AbortedError()));
    const timer = setTimeout(settle(() => resolve()), Math.max(0, ms));
    signal?.addEventListener('abort', onAbort, { once: true });
  });
};

/**
 * Runs `task` with an AbortSignal that fires after `timeoutMs`. A timeout
 * rejects with `TimeoutError` regardless of how the task reacts to the abort.
 */
export const withTimeout = async <T>(
  timeoutMs: number,
  task: (signal: AbortSignal) => Promise<T>,
): Promise<T> => {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      reject(new TimeoutError(timeoutMs));
      controller.abort();
    }, timeoutMs);
  });

  try {
    return await Promise.race([task(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
};

export class TimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}
