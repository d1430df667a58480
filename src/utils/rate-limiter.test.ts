import { describe, it, expect } from 'vitest';
import { RateLimiter } from './rate-limiter.js';

describe('RateLimiter', () => {
  it('lets the first call through immediately', async () => {
    const limiter = new RateLimiter(10_000);
    const start = Date.now();
    await limiter.waitForSlot();
    expect(Date.now() - start).toBeLessThan(1000);
  });

  it('spaces consecutive slots by the minimum interval', async () => {
    const limiter = new RateLimiter(60);
    await limiter.waitForSlot();
    const start = Date.now();
    await limiter.waitForSlot();
    expect(Date.now() - start).toBeGreaterThanOrEqual(50);
  });

  it('queues concurrent callers one interval apart', async () => {
    const limiter = new RateLimiter(40);
    const start = Date.now();
    const finished: number[] = [];

    await Promise.all(
      [0, 1, 2].map(async (n) => {
        await limiter.waitForSlot();
        finished[n] = Date.now() - start;
      })
    );

    expect(finished[2] ?? 0).toBeGreaterThanOrEqual(70);
  });
});
