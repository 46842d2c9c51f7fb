import { describe, expect, it } from 'vitest';

import { RateLimiter } from '@/src/utils/rateLimiter';

const startTimes = async (limiter: RateLimiter, count: number): Promise<number[]> => {
  const origin = Date.now();
  return Promise.all(Array.from({ length: count }, () => limiter.execute(async () => Date.now() - origin)));
};

describe('RateLimiter', () => {
  it('returns the task result', async () => {
    const limiter = new RateLimiter({ calls: 2, perMs: 1_000 });

    await expect(limiter.execute(async () => 'done')).resolves.toBe('done');
  });

  it('starts calls within the limit straight away', async () => {
    const limiter = new RateLimiter({ calls: 3, perMs: 60_000 });

    const starts = await startTimes(limiter, 3);

    expect(Math.max(...starts)).toBeLessThan(50);
  });

  it('queues calls issued together once the limit is reached', async () => {
    const limiter = new RateLimiter({ calls: 1, perMs: 60 });

    const [first, second, third] = await startTimes(limiter, 3);

    expect(first).toBeLessThan(50);
    expect(second).toBeGreaterThanOrEqual(55);
    expect(third).toBeGreaterThanOrEqual(115);
  });

  it('propagates a failing task', async () => {
    const limiter = new RateLimiter({ calls: 1, perMs: 10 });

    await expect(limiter.execute(async () => Promise.reject(new Error('boom')))).rejects.toThrowError('boom');
  });
});
