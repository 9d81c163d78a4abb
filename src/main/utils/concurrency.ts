/**
 * Concurrency Primitives
 *
 * Small promise-based primitives used by the pending store and the batch
 * orchestrator. Waiters are released in FIFO order.
 */

/** Sleep function signature, injectable for tests */
export type SleepFn = (ms: number) => Promise<void>;

/** Resolves after `ms` milliseconds */
export const sleep: SleepFn = (ms: number): Promise<void> =>
  new Promise<void>((resolve) => setTimeout(resolve, ms));

// ─── Semaphore ───────────────────────────────────────────────────────────────

/**
 * Counting semaphore. `acquire()` resolves once a permit is free;
 * every acquire must be paired with exactly one `release()`.
 */
export class Semaphore {
  private available: number;
  private readonly waitQueue: Array<() => void> = [];

  constructor(permits: number) {
    if (!Number.isInteger(permits) || permits < 1) {
      throw new RangeError(`Semaphore needs at least one permit, got ${permits}`);
    }
    this.available = permits;
  }

  acquire(): Promise<void> {
    if (this.available > 0) {
      this.available--;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.waitQueue.push(resolve);
    });
  }

  /**
   * Hands the permit to the next waiter, or returns it to the pool.
   */
  release(): void {
    const next = this.waitQueue.shift();
    if (next) {
      next();
    } else {
      this.available++;
    }
  }

  /**
   * Runs `task` while holding a permit; the permit is released even if
   * the task throws.
   */
  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  /** Permits currently free */
  get availablePermits(): number {
    return this.available;
  }

  /** Callers waiting for a permit */
  get pendingCount(): number {
    return this.waitQueue.length;
  }
}

// ─── Mutex ───────────────────────────────────────────────────────────────────

/**
 * Async mutual exclusion: a semaphore with one permit.
 */
export class AsyncMutex {
  private readonly semaphore = new Semaphore(1);

  runExclusive<T>(task: () => Promise<T> | T): Promise<T> {
    return this.semaphore.run(async () => task());
  }

  get isLocked(): boolean {
    return this.semaphore.availablePermits === 0;
  }
}
