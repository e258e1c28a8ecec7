import { TokenBucket } from '../src/tokenBucket.js';

describe('TokenBucket', () => {
  let now: number;
  const clock = () => now;

  beforeEach(() => {
    now = 1_700_000_000_000;
  });

  it('should admit a burst of `capacity` requests then reject', () => {
    const bucket = new TokenBucket({ capacity: 5, refillPerSec: 1 }, clock);

    const results = Array.from({ length: 5 }, () => bucket.tryConsume());

    expect(results).toEqual([true, true, true, true, true]);
    expect(bucket.tryConsume()).toBe(false);
  });

  it('should refill one token per second at rate 1/s', () => {
    const bucket = new TokenBucket({ capacity: 5, refillPerSec: 1 }, clock);
    for (let i = 0; i < 5; i++) bucket.tryConsume();
    expect(bucket.tryConsume()).toBe(false);

    now += 1000;
    expect(bucket.tryConsume()).toBe(true);
    expect(bucket.tryConsume()).toBe(false);
  });

  it('should accumulate partial refills across rejected calls', () => {
    const bucket = new TokenBucket({ capacity: 1, refillPerSec: 1 }, clock);
    expect(bucket.tryConsume()).toBe(true);

    now += 500;
    expect(bucket.tryConsume()).toBe(false);
    now += 500;
    expect(bucket.tryConsume()).toBe(true);
  });

  it('should admit after a full second of 100ms polls while empty', () => {
    const bucket = new TokenBucket({ capacity: 1, refillPerSec: 1 }, clock);
    expect(bucket.tryConsume()).toBe(true);

    const results: boolean[] = [];
    for (let i = 0; i < 10; i++) {
      now += 100;
      results.push(bucket.tryConsume());
    }

    expect(results).toEqual([false, false, false, false, false, false, false, false, false, true]);
    expect(bucket.available()).toBe(0);
  });

  it('should never hold more than capacity after a long idle period', () => {
    const bucket = new TokenBucket({ capacity: 5, refillPerSec: 1 }, clock);
    bucket.tryConsume();

    now += 60 * 60 * 1000;

    expect(bucket.available()).toBe(5);
    const results = Array.from({ length: 6 }, () => bucket.tryConsume());
    expect(results).toEqual([true, true, true, true, true, false]);
  });

  it('should not refill when the clock goes backwards', () => {
    const bucket = new TokenBucket({ capacity: 2, refillPerSec: 1 }, clock);
    bucket.tryConsume();
    bucket.tryConsume();

    now -= 10_000;

    expect(bucket.tryConsume()).toBe(false);
    expect(bucket.available()).toBe(0);
  });

  it('should reject invalid parameters', () => {
    expect(() => new TokenBucket({ capacity: 0, refillPerSec: 1 }, clock)).toThrow('Invalid token bucket');
    expect(() => new TokenBucket({ capacity: 5, refillPerSec: 0 }, clock)).toThrow('Invalid token bucket');
  });
});
