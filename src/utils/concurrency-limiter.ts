/**
 * Concurrency Limiter
 *
 * Caps the number of tasks in flight. Callers beyond the cap wait in a FIFO
 * queue and are admitted as running tasks release their slots.
 */

interface Waiter {
  resolve: (release: () => void) => void;
}

export interface ConcurrencyStats {
  /** Tasks currently holding a slot */
  active: number;
  /** Tasks waiting for a slot */
  queued: number;
  /** Configured maximum */
  limit: number;
}

export class ConcurrencyLimiter {
  private active = 0;
  private queue: Waiter[] = [];

  constructor(private readonly limit: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`Concurrency limit must be a positive integer, got ${limit}`);
    }
  }

  /**
   * Acquire a slot. Returns a release function to call when done;
   * calling it more than once has no further effect.
   */
  acquire(): Promise<() => void> {
    if (this.active < this.limit) {
      this.active++;
      return Promise.resolve(this.createRelease());
    }

    return new Promise((resolve) => {
      this.queue.push({ resolve });
    });
  }

  /**
   * Run a task inside a slot
   */
  async run<T>(task: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await task();
    } finally {
      release();
    }
  }

  getStats(): ConcurrencyStats {
    return {
      active: this.active,
      queued: this.queue.length,
      limit: this.limit,
    };
  }

  private createRelease(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;

      const next = this.queue.shift();
      if (next) {
        // Slot passes straight to the next waiter; active count is unchanged
        next.resolve(this.createRelease());
      } else {
        this.active--;
      }
    };
  }
}
