import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  MemoryIdempotencyCache,
  RedisIdempotencyCache,
  type RedisSetNx,
} from '../../src/cache/idempotency.js';

const KEY = 'BTCUSDT:Buy:2025-08-05T18:30:00Z';

function clock(start = 1_000_000) {
  let t = start;
  return {
    now: () => t,
    advance(ms: number) {
      t += ms;
    },
  };
}

describe('MemoryIdempotencyCache', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('admits a key once per TTL window', async () => {
    const c = clock();
    const cache = new MemoryIdempotencyCache({ ttlMs: 300_000, now: c.now });

    expect(await cache.admit(KEY)).toBe(true);
    expect(await cache.admit(KEY)).toBe(false);
    c.advance(299_999);
    expect(await cache.admit(KEY)).toBe(false);
    c.advance(1);
    expect(await cache.admit(KEY)).toBe(true);
  });

  it('does not extend the window on a rejected duplicate', async () => {
    const c = clock();
    const cache = new MemoryIdempotencyCache({ ttlMs: 1000, now: c.now });

    await cache.admit(KEY);
    c.advance(900);
    expect(await cache.admit(KEY)).toBe(false);
    c.advance(100);
    expect(await cache.admit(KEY)).toBe(true);
  });

  it('keeps keys independent', async () => {
    const cache = new MemoryIdempotencyCache({ ttlMs: 1000 });
    expect(await cache.admit('BTCUSDT:Buy:t1')).toBe(true);
    expect(await cache.admit('BTCUSDT:Sell:t1')).toBe(true);
    expect(await cache.admit('ETHUSDT:Buy:t1')).toBe(true);
    expect(cache.size).toBe(3);
  });

  it('admits exactly one of many concurrent callers', async () => {
    const cache = new MemoryIdempotencyCache({ ttlMs: 60_000 });
    const results = await Promise.all(Array.from({ length: 50 }, () => cache.admit(KEY)));
    expect(results.filter(Boolean)).toHaveLength(1);
  });

  it('release lets the key be admitted again', async () => {
    const cache = new MemoryIdempotencyCache({ ttlMs: 60_000 });
    await cache.admit(KEY);
    await cache.release(KEY);
    expect(await cache.admit(KEY)).toBe(true);
  });

  it('sweep removes only expired entries', async () => {
    const c = clock();
    const cache = new MemoryIdempotencyCache({ ttlMs: 1000, now: c.now });
    await cache.admit('a');
    c.advance(500);
    await cache.admit('b');
    c.advance(500);

    expect(cache.sweep()).toBe(1);
    expect(cache.size).toBe(1);
    expect(await cache.admit('b')).toBe(false);
  });

  it('sweeps on its interval once started', async () => {
    vi.useFakeTimers();
    const cache = new MemoryIdempotencyCache({ ttlMs: 1000, sweepIntervalMs: 5000 });
    await cache.admit(KEY);
    cache.start();

    vi.advanceTimersByTime(4999);
    expect(cache.size).toBe(1);
    vi.advanceTimersByTime(1);
    expect(cache.size).toBe(0);

    cache.stop();
    await cache.admit(KEY);
    vi.advanceTimersByTime(10_000);
    expect(cache.size).toBe(1);
  });

  it('logs and keeps running when a sweep throws', () => {
    vi.useFakeTimers();
    const logger = { debug: vi.fn(), warn: vi.fn() };
    const cache = new MemoryIdempotencyCache({ ttlMs: 1000, sweepIntervalMs: 100, logger });
    vi.spyOn(cache, 'sweep').mockImplementationOnce(() => {
      throw new Error('boom');
    });
    cache.start();

    vi.advanceTimersByTime(100);
    expect(logger.warn).toHaveBeenCalledWith({ err: 'boom' }, 'idempotency sweep failed');
    vi.advanceTimersByTime(100);
    expect(logger.debug).toHaveBeenCalledWith({ removed: 0, size: 0 }, 'idempotency sweep');
    cache.stop();
  });
});

class FakeRedis implements RedisSetNx {
  readonly store = new Map<string, { value: string; ttlMs: number }>();

  async set(key: string, value: string, _px: 'PX', ttlMs: number, _nx: 'NX'): Promise<'OK' | null> {
    if (this.store.has(key)) return null;
    this.store.set(key, { value, ttlMs });
    return 'OK';
  }

  async del(key: string): Promise<number> {
    return this.store.delete(key) ? 1 : 0;
  }
}

describe('RedisIdempotencyCache', () => {
  it('uses SET NX PX under the key prefix', async () => {
    const redis = new FakeRedis();
    const cache = new RedisIdempotencyCache(redis, { ttlMs: 300_000 });

    expect(await cache.admit(KEY)).toBe(true);
    expect(await cache.admit(KEY)).toBe(false);
    expect(redis.store.get(`idem:${KEY}`)).toEqual({ value: '1', ttlMs: 300_000 });
  });

  it('honours a custom prefix and release', async () => {
    const redis = new FakeRedis();
    const cache = new RedisIdempotencyCache(redis, { ttlMs: 1000, prefix: 'relay:' });

    await cache.admit(KEY);
    expect(redis.store.has(`relay:${KEY}`)).toBe(true);
    await cache.release(KEY);
    expect(redis.store.size).toBe(0);
    expect(await cache.admit(KEY)).toBe(true);
  });

  it('propagates redis errors to the caller', async () => {
    const redis = new FakeRedis();
    vi.spyOn(redis, 'set').mockRejectedValueOnce(new Error('Command timed out'));
    const cache = new RedisIdempotencyCache(redis, { ttlMs: 1000 });
    await expect(cache.admit(KEY)).rejects.toThrow('Command timed out');
  });
});
