import { Redis } from 'ioredis';
import { afterAll, afterEach, describe, expect, it, vi } from 'vitest';
import { RedisRateCounter } from '../rateLimit';

describe('RedisRateCounter', () => {
  // never connects: every command below is intercepted
  const redis = new Redis({ lazyConnect: true });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  afterAll(() => {
    redis.disconnect();
  });

  it('opens the window inside the same transaction as the increment', async () => {
    const tx = redis.multi();
    vi.spyOn(redis, 'multi').mockReturnValue(tx);
    const expire = vi.spyOn(tx, 'expire');
    const exec = vi.spyOn(tx, 'exec').mockResolvedValue([
      [null, 1],
      [null, 1],
      [null, 60],
    ]);
    const standalone = vi.spyOn(redis, 'expire');

    await expect(new RedisRateCounter(redis).hit('login:10.0.0.1', 60)).resolves.toEqual({ count: 1, ttl: 60 });

    expect(expire).toHaveBeenCalledWith('rl:login:10.0.0.1', 60, 'NX');
    expect(exec).toHaveBeenCalledTimes(1);
    expect(standalone).not.toHaveBeenCalled();
  });

  it('reports the remaining window on later hits', async () => {
    const tx = redis.multi();
    vi.spyOn(redis, 'multi').mockReturnValue(tx);
    vi.spyOn(tx, 'exec').mockResolvedValue([
      [null, 4],
      [null, 0],
      [null, 17],
    ]);

    await expect(new RedisRateCounter(redis).hit('login:10.0.0.1', 60)).resolves.toEqual({ count: 4, ttl: 17 });
  });
});
