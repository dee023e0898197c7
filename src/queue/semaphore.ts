import { SchedulingError } from "../errors.js";

/**
 * Counting semaphore shared by every conversation's scheduling loop.
 * Waiters are woken in FIFO order; a released slot is handed straight to
 * the next waiter so it cannot be taken by a later acquire.
 */
export class Semaphore {
  private permits: number;
  private readonly waiters: Array<() => void> = [];

  constructor(readonly limit: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`semaphore limit must be a positive integer, got ${limit}`);
    }
    this.permits = limit;
  }

  get available(): number {
    return this.permits;
  }

  get waiting(): number {
    return this.waiters.length;
  }

  /** Slots currently held. */
  get inUse(): number {
    return this.limit - this.permits;
  }

  acquire(): Promise<void> {
    if (this.permits > 0) {
      this.permits -= 1;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  release(): void {
    const next = this.waiters.shift();
    if (next) {
      next();
      return;
    }
    if (this.permits >= this.limit) {
      throw new SchedulingError("semaphore released more times than acquired");
    }
    this.permits += 1;
  }

  async withPermit<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}
