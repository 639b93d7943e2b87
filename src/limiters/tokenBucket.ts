export type TokenBucketConfig = {
  /** Maximum tokens held by the bucket. */
  capacity: number;
  /** Tokens added per second. */
  refillPerSecond: number;
};

/**
 * Continuous-refill token bucket. Timestamps are milliseconds and injectable
 * so callers (and tests) control the clock.
 */
export class TokenBucket {
  private tokens: number;
  private lastRefillAt: number;

  constructor(private readonly config: TokenBucketConfig, now = Date.now()) {
    this.tokens = config.capacity;
    this.lastRefillAt = now;
  }

  refill(now = Date.now()): void {
    const deltaSeconds = Math.max(0, (now - this.lastRefillAt) / 1000);
    this.tokens = Math.min(this.config.capacity, this.tokens + this.config.refillPerSecond * deltaSeconds);
    this.lastRefillAt = now;
  }

  tryAcquire(cost: number, now = Date.now()): boolean {
    this.refill(now);
    if (this.tokens < cost) return false;
    this.tokens -= cost;
    return true;
  }

  /** Seconds until `cost` tokens are available; Infinity when the bucket can never hold them. */
  timeUntil(cost: number, now = Date.now()): number {
    this.refill(now);
    const shortage = cost - this.tokens;
    if (shortage <= 0) return 0;
    if (cost > this.config.capacity || this.config.refillPerSecond <= 0) return Infinity;
    return shortage / this.config.refillPerSecond;
  }

  getState(): { tokens: number; capacity: number } {
    return { tokens: this.tokens, capacity: this.config.capacity };
  }
}
