import { TokenBucket, type TokenBucketOptions } from './tokenBucket.js';
import type { Clock } from './types.js';

type VisitorEntry = {
  bucket: TokenBucket;
  lastSeen: number; // epoch ms
}

/**
 * VisitorRegistry maps client keys to their token buckets.
 * Entries are created on a key's first admission check and evicted by sweep() once stale.
 *
 * Every method runs to completion synchronously, so a lookup-or-create-then-consume
 * can never interleave with another check or with a sweep.
 */
export class VisitorRegistry {
  private visitors: Map<string, VisitorEntry> = new Map();

  constructor(private bucketOptions: TokenBucketOptions, private clock: Clock = Date.now) {}

  /**
   * Records a visit from `key` and takes one token from its bucket
   * @returns True if the request is admitted, false if the key is over its limit
   */
  checkAndAdmit = (key: string): boolean => {
    const now = this.clock();
    let visitor = this.visitors.get(key);
    if (!visitor) {
      visitor = { bucket: new TokenBucket(this.bucketOptions, this.clock), lastSeen: now };
      this.visitors.set(key, visitor);
    } else {
      visitor.lastSeen = now;
    }
    return visitor.bucket.tryConsume();
  }

  /**
   * Evicts every visitor not seen for more than staleAfterMs
   * @returns Number of entries removed
   */
  sweep = (staleAfterMs: number): number => {
    const now = this.clock();
    let removed = 0;
    for (const [key, visitor] of this.visitors) {
      if (now - visitor.lastSeen > staleAfterMs) {
        this.visitors.delete(key);
        removed++;
      }
    }
    return removed;
  }

  has = (key: string): boolean => {
    return this.visitors.has(key);
  }

  get size(): number {
    return this.visitors.size;
  }
}
