import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { CacheKeyGenerator, InMemoryCacheService } from '../../src/infra/cache/index.js';

describe('InMemoryCacheService', () => {
  let cache: InMemoryCacheService;

  beforeEach(() => {
    vi.useFakeTimers();
    cache = new InMemoryCacheService(60);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should return stored values until they expire', async () => {
    await cache.set('products:id:1', { id: 1 }, 10);

    expect(await cache.get('products:id:1')).toEqual({ id: 1 });

    vi.advanceTimersByTime(10_000);

    expect(await cache.get('products:id:1')).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  it('should use the default ttl', async () => {
    await cache.set('k', 'v');

    vi.advanceTimersByTime(59_999);
    expect(await cache.get('k')).toBe('v');
    vi.advanceTimersByTime(1);
    expect(await cache.get('k')).toBeUndefined();
  });

  it('should invalidate by prefix pattern or exact key', async () => {
    await cache.set('products:id:1', 1);
    await cache.set('products:list:20:0', []);
    await cache.set('orders:id:1', 1);

    expect(await cache.invalidate('products:*')).toBe(2);
    expect(await cache.invalidate('orders:id:1')).toBe(1);
    expect(cache.size).toBe(0);
  });

  it('should track hits and misses', async () => {
    await cache.set('a', 1);
    await cache.get('a');
    await cache.get('a');
    await cache.get('b');
    await cache.get('c');

    expect(cache.getStats()).toEqual({ hits: 2, misses: 2, hitRate: 0.5 });
  });
});

describe('CacheKeyGenerator', () => {
  it('should build keys under one prefix', () => {
    expect(CacheKeyGenerator.forId('products', 5)).toBe('products:id:5');
    expect(CacheKeyGenerator.invalidationPattern('products')).toBe('products:*');
  });
});
