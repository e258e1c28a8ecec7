import type { Clock } from './types.js';

// Refills accumulate in float steps; a balance this close to 1 counts as a whole token
const TOKEN_TOLERANCE = 1e-9;

export type TokenBucketOptions = {
  capacity: number;
  refillPerSec: number;
}

/**
 * Capacity-bounded permit pool refilled continuously at refillPerSec.
 * Starts full, so a fresh client gets a burst of `capacity` requests.
 */
export class TokenBucket {
  readonly capacity: number;
  readonly refillPerSec: number;
  private tokens: number;
  private lastRefill: number;

  constructor(options: TokenBucketOptions, private clock: Clock = Date.now) {
    if (!(options.capacity >= 1) || !(options.refillPerSec > 0)) {
      throw new Error(`Invalid token bucket: capacity ${options.capacity}, refill ${options.refillPerSec}/s`);
    }
    this.capacity = options.capacity;
    this.refillPerSec = options.refillPerSec;
    this.tokens = options.capacity;
    this.lastRefill = clock();
  }

  /**
   * Refills for the time elapsed since the last call, then takes one token if available.
   * The refill is applied on rejected calls too.
   */
  tryConsume = (): boolean => {
    this.refill();
    if (this.tokens >= 1 - TOKEN_TOLERANCE) {
      this.tokens = Math.max(0, this.tokens - 1);
      return true;
    }
    return false;
  }

  // Current token count after refill; may be fractional
  available = (): number => {
    this.refill();
    return this.tokens;
  }

  private refill(): void {
    const now = this.clock();
    // clock going backwards adds nothing
    const elapsedSec = Math.max(0, now - this.lastRefill) / 1000;
    this.tokens = Math.min(this.capacity, this.tokens + elapsedSec * this.refillPerSec);
    this.lastRefill = now;
  }
}
