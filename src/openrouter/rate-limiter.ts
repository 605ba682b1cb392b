import { setTimeout as delay } from "node:timers/promises";

export class TokenBucketRateLimiter {
  private readonly capacity: number;
  private readonly refillPerMs: number;
  private tokens: number;
  private lastRefillAt: number;

  constructor(requestsPerSecond: number, burst: number = requestsPerSecond) {
    if (!Number.isFinite(requestsPerSecond) || requestsPerSecond <= 0) {
      throw new Error("requestsPerSecond must be positive");
    }
    const normalizedBurst = Math.max(1, Math.floor(burst));
    this.capacity = normalizedBurst;
    this.refillPerMs = requestsPerSecond / 1000;
    this.tokens = normalizedBurst;
    this.lastRefillAt = Date.now();
  }

  async take(signal?: AbortSignal): Promise<void> {
    while (true) {
      this.refill();
      if (this.tokens >= 1) {
        this.tokens -= 1;
        return;
      }

      const missing = 1 - this.tokens;
      const waitMs = Math.max(1, Math.ceil(missing / this.refillPerMs));
      await delay(waitMs, undefined, signal ? { signal } : undefined);
    }
  }

  private refill(): void {
    const now = Date.now();
    if (now <= this.lastRefillAt) {
      return;
    }

    const elapsedMs = now - this.lastRefillAt;
    this.lastRefillAt = now;
    this.tokens = Math.min(this.capacity, this.tokens + elapsedMs * this.refillPerMs);
  }
}

export type RateLimiter = {
  take: (signal?: AbortSignal) => Promise<void>;
};

/** `null` (or a non-positive rate) disables pacing. */
export const createRateLimiter = (requestsPerSecond: number | null): RateLimiter => {
  if (requestsPerSecond === null || !Number.isFinite(requestsPerSecond) || requestsPerSecond <= 0) {
    return { take: async () => {} };
  }
  return new TokenBucketRateLimiter(requestsPerSecond);
};
