export interface RateLimiterOptions {
  maxRequests?: number;
  windowMs?: number;
  now?: () => number;
}

/**
 * Sliding-window limiter keyed by user id. A rejected request is not
 * counted against the window. Idle users are dropped at most once per
 * window, from `check`.
 */
export class RateLimiter {
  readonly maxRequests: number;
  readonly windowMs: number;
  private readonly now: () => number;
  private readonly hits = new Map<string, number[]>();
  private lastPrune: number;

  constructor(options: RateLimiterOptions = {}) {
    this.maxRequests = options.maxRequests ?? 10;
    this.windowMs = options.windowMs ?? 60_000;
    this.now = options.now ?? Date.now;
    this.lastPrune = this.now();
  }

  /** True when the request is allowed (and recorded). */
  check(userId: string): boolean {
    const now = this.now();
    if (now - this.lastPrune >= this.windowMs) this.prune();
    const recent = (this.hits.get(userId) ?? []).filter((t) => now - t < this.windowMs);
    if (recent.length >= this.maxRequests) {
      this.hits.set(userId, recent);
      return false;
    }
    recent.push(now);
    this.hits.set(userId, recent);
    return true;
  }

  /** Drop users with no hits inside the window. */
  prune(): void {
    const now = this.now();
    this.lastPrune = now;
    for (const [userId, times] of this.hits) {
      if (times.every((t) => now - t >= this.windowMs)) this.hits.delete(userId);
    }
  }

  get trackedUsers(): number {
    return this.hits.size;
  }
}
