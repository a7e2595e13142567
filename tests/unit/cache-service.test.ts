import Redis from 'ioredis';
import { InMemoryCacheStore, RedisCacheStore, DEFAULT_CACHE_OPTIONS } from '../../src/cache/cache-service';
import { DependencyHealthTracker } from '../../src/resilience/dependency-health';

describe('InMemoryCacheStore', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should return stored values until they expire', async () => {
    const now = jest.spyOn(Date, 'now').mockReturnValue(1_000_000);
    const cache = new InMemoryCacheStore();
    await cache.set('product:p1', { title: 'Lamp' }, 10);

    now.mockReturnValue(1_009_000);
    expect(await cache.get('product:p1')).toEqual({ title: 'Lamp' });

    now.mockReturnValue(1_011_000);
    expect(await cache.get('product:p1')).toBeNull();
    expect(cache.stats()).toEqual({ hits: 1, misses: 1, size: 0 });
  });

  it('should delete entries', async () => {
    const cache = new InMemoryCacheStore();
    await cache.set('k', 1);
    await cache.del('k');
    expect(await cache.get('k')).toBeNull();
  });

  it('should evict the least recently used entry when full', async () => {
    const cache = new InMemoryCacheStore({ ttlSeconds: 60, maxEntries: 2, namespace: 'test:' });
    await cache.set('a', 1);
    await cache.set('b', 2);
    expect(await cache.get('a')).toBe(1);
    await cache.set('c', 3);

    expect(await cache.get('b')).toBeNull();
    expect(await cache.get('a')).toBe(1);
    expect(await cache.get('c')).toBe(3);
  });
});

describe('RedisCacheStore', () => {
  it('should namespace keys and store JSON with a TTL', async () => {
    const set = jest.fn().mockResolvedValue('OK');
    const get = jest.fn().mockResolvedValue('{"title":"Lamp"}');
    const redis = { set, get, del: jest.fn() } as unknown as Redis;
    const cache = new RedisCacheStore(redis, DEFAULT_CACHE_OPTIONS);

    await cache.set('product:p1', { title: 'Lamp' }, 30);
    expect(set).toHaveBeenCalledWith('cache:product:p1', '{"title":"Lamp"}', 'EX', 30);
    expect(await cache.get('product:p1')).toEqual({ title: 'Lamp' });
    expect(get).toHaveBeenCalledWith('cache:product:p1');
    expect(cache.stats()).toEqual({ hits: 1, misses: 0 });
  });

  it('should answer a miss and record the failure when Redis errors', async () => {
    const redis = {
      get: jest.fn().mockRejectedValue(new Error('connection reset')),
      set: jest.fn(),
      del: jest.fn(),
    } as unknown as Redis;
    const health = new DependencyHealthTracker();
    const cache = new RedisCacheStore(redis, DEFAULT_CACHE_OPTIONS, health);

    expect(await cache.get('product:p1')).toBeNull();
    expect(cache.stats()).toEqual({ hits: 0, misses: 1 });
    expect(health.report().redis.lastError).toBe('connection reset');
  });
});
