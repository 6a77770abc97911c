import { AbortedError } from './async';

export type Release = () => void;

/**
 * Counting semaphore. Waiters are woken in arrival order; an aborted waiter
 * leaves the queue without taking a permit.
 */
export class Semaphore {
  readonly capacity: number;
  private active = 0;
  // Set iteration follows insertion order, which gives FIFO wake-ups.
  private readonly pending = new Set<() => void>();

  constructor(capacity: number) {
    this.capacity = Number.isFinite(capacity) ? Math.max(1, Math.floor(capacity)) : 1;
  }

  get inFlight(): number {
    return this.active;
  }

  get queued(): number {
    return this.pending.size;
  }

  acquire(signal?: AbortSignal): Promise<Release> {
    if (signal?.aborted) {
      return Promise.reject(new AbortedError());
    }
    if (this.active < this.capacity && this.pending.size === 0) {
      return Promise.resolve(this.take());
    }

    return new Promise<Release>((resolve, reject) => {
      const wake = () => {
        signal?.removeEventListener('abort', cancel);
        resolve(this.take());
      };
      const cancel = () => {
        this.pending.delete(wake);
        reject(new AbortedError());
      };
      this.pending.add(wake);
      signal?.addEventListener('abort', cancel, { once: true });
    });
  }

  async use<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const release = await this.acquire(signal);
    try {
      return await task();
    } finally {
      release();
    }
  }

  private take(): Release {
    this.active += 1;
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.active -= 1;
      this.wakeNext();
    };
  }

  private wakeNext() {
    if (this.active >= this.capacity) return;
    const [next] = this.pending;
    if (next) {
      this.pending.delete(next);
      next();
    }
  }
}
