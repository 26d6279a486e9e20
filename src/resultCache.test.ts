import { afterEach, describe, expect, test, vi } from 'vitest';

import { MemoryResultCache, createResultCache } from './resultCache.js';

describe('MemoryResultCache', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  test('computes once per key', async () => {
    const cache = new MemoryResultCache(60, 10);
    const compute = vi.fn(() => ({ scores: { 'beta-flu': 4 } }));
    expect(await cache.getOrCompute('k', compute)).toBe('{"scores":{"beta-flu":4}}');
    expect(await cache.getOrCompute('k', compute)).toBe('{"scores":{"beta-flu":4}}');
    expect(compute).toHaveBeenCalledTimes(1);
  });

  test('evicts the oldest entry past capacity', async () => {
    const cache = new MemoryResultCache(60, 2);
    await cache.getOrCompute('a', () => 1);
    await cache.getOrCompute('b', () => 2);
    await cache.getOrCompute('c', () => 3);
    expect(cache.size).toBe(2);
    const recompute = vi.fn(() => 10);
    expect(await cache.getOrCompute('a', recompute)).toBe('10');
    expect(recompute).toHaveBeenCalledTimes(1);
  });

  test('recomputes after the ttl', async () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-01-01T00:00:00Z'));
    const cache = new MemoryResultCache(5, 10);
    const compute = vi.fn(() => 'x');
    await cache.getOrCompute('k', compute);
    vi.setSystemTime(new Date('2024-01-01T00:00:06Z'));
    await cache.getOrCompute('k', compute);
    expect(compute).toHaveBeenCalledTimes(2);
  });

  test('propagates a failing computation without caching it', async () => {
    const cache = new MemoryResultCache(60, 10);
    await expect(
      cache.getOrCompute('k', () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');
    expect(cache.size).toBe(0);
  });
});

describe('createResultCache', () => {
  test('uses memory when redis is disabled', async () => {
    const cache = createResultCache({ redisEnabled: false, ttlSeconds: 10, maxEntries: 3 });
    expect(cache.mode).toBe('memory');
    await cache.close();
  });
});
