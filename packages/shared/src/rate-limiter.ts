import { type SendRateLimiter } from '@roomcast/domain';

interface Bucket {
  tokens: number;
  lastRefill: number;
  lastSeen: number;
}

/**
 * Per-user token bucket. Refill is computed lazily on each check: one token
 * per elapsed refill interval, capped at capacity. There is no background timer.
 */
export class TokenBucketRateLimiter implements SendRateLimiter {
  private readonly buckets = new Map<string, Bucket>();

  constructor(
    private readonly capacity: number = 30,
    private readonly refillIntervalMs: number = 60_000,
  ) {
    if (capacity < 1) throw new Error('capacity must be at least 1');
  }

  get size(): number {
    return this.buckets.size;
  }

  allow(userId: string, now: number = Date.now()): boolean {
    let bucket = this.buckets.get(userId);
    if (!bucket) {
      bucket = { tokens: this.capacity, lastRefill: now, lastSeen: now };
      this.buckets.set(userId, bucket);
    }
    bucket.lastSeen = now;

    const refills = Math.floor((now - bucket.lastRefill) / this.refillIntervalMs);
    if (refills > 0) {
      bucket.tokens = Math.min(this.capacity, bucket.tokens + refills);
      bucket.lastRefill = now;
    }

    if (bucket.tokens >= 1) {
      bucket.tokens--;
      return true;
    }
    return false;
  }

  sweepStale(maxIdleMs: number, now: number = Date.now()): number {
    let removed = 0;
    for (const [userId, bucket] of this.buckets) {
      if (now - bucket.lastSeen > maxIdleMs) {
        this.buckets.delete(userId);
        removed++;
      }
    }
    return removed;
  }
}
