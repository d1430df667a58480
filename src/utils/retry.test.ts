import { describe, it, expect, vi } from 'vitest';
import { backoffDelay, withRetry } from './retry.js';

const noDelay = { initialDelayMs: 0, maxDelayMs: 0 };

describe('withRetry', () => {
  it('returns the first successful result', async () => {
    const fn = vi.fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error('first'))
      .mockRejectedValueOnce(new Error('second'))
      .mockResolvedValueOnce('ok');

    await expect(withRetry(fn, { ...noDelay, maxAttempts: 3 })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('rethrows the last error once attempts are exhausted', async () => {
    const fn = vi.fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error('first'))
      .mockRejectedValueOnce(new Error('last'));

    await expect(withRetry(fn, { ...noDelay, maxAttempts: 2 })).rejects.toThrow('last');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('stops immediately when shouldRetry rejects the error', async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new Error('permanent'));

    await expect(
      withRetry(fn, { ...noDelay, maxAttempts: 5, shouldRetry: (error) => error.message !== 'permanent' })
    ).rejects.toThrow('permanent');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('passes the attempt number to the function', async () => {
    const attempts: number[] = [];

    await withRetry(
      async (attempt) => {
        attempts.push(attempt);
        if (attempt < 3) throw new Error('not yet');
        return attempt;
      },
      { ...noDelay, maxAttempts: 3 }
    );

    expect(attempts).toEqual([1, 2, 3]);
  });

  it('wraps non-Error rejections', async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue('plain string');

    await expect(withRetry(fn, { ...noDelay, maxAttempts: 1 })).rejects.toThrow('plain string');
  });
});

describe('backoffDelay', () => {
  it('grows by the factor up to the maximum', () => {
    const config = { initialDelayMs: 100, maxDelayMs: 350, factor: 2 };
    expect([1, 2, 3, 4].map((attempt) => backoffDelay(attempt, config))).toEqual([100, 200, 350, 350]);
  });

  it('is constant with a factor of 1', () => {
    const config = { initialDelayMs: 2000, maxDelayMs: 2000, factor: 1 };
    expect([1, 2, 3].map((attempt) => backoffDelay(attempt, config))).toEqual([2000, 2000, 2000]);
  });
});
