/**
 * Concurrency Limiter
 * In-process semaphore bounding how many browser sessions run at once
 */

export interface LimiterStats {
  maxConcurrent: number;
  active: number;
  queued: number;
}

export class ConcurrencyLimiter {
  private active = 0;
  private readonly waiters: Array<() => void> = [];

  constructor(readonly maxConcurrent: number) {
    if (!Number.isInteger(maxConcurrent) || maxConcurrent < 1) {
      throw new Error(`maxConcurrent must be a positive integer, got ${maxConcurrent}`);
    }
  }

  /**
   * Run a task once a slot is free; the slot is released however the task ends
   */
  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  getStats(): LimiterStats {
    return {
      maxConcurrent: this.maxConcurrent,
      active: this.active,
      queued: this.waiters.length,
    };
  }

  private acquire(): Promise<void> {
    if (this.active < this.maxConcurrent) {
      this.active++;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      // Slot is handed over directly by release(), so active stays unchanged
      this.waiters.push(resolve);
    });
  }

  private release(): void {
    const next = this.waiters.shift();
    if (next) {
      next();
      return;
    }
    this.active--;
  }
}

/**
 * Map items through an async task with at most `maxConcurrent` in flight, keeping input order
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  maxConcurrent: number,
  task: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const limiter = new ConcurrencyLimiter(maxConcurrent);
  return Promise.all(items.map((item, index) => limiter.run(() => task(item, index))));
}
