/**
 * Cache Service
 *
 * Redis when a connection is available, otherwise a bounded in-process LRU.
 * A Redis failure is logged and answered as a miss; it never fails a page.
 */

import Redis from 'ioredis';
import { CacheOptions, CacheStats, CacheStore } from './types';
import { logger } from '../observability/logger';
import { cacheLookups } from '../observability/metrics';
import { DependencyHealthTracker } from '../resilience/dependency-health';

export const DEFAULT_CACHE_OPTIONS: CacheOptions = {
  ttlSeconds: 300,
  maxEntries: 2_000,
  namespace: 'cache:',
};

export class RedisCacheStore implements CacheStore {
  private hits = 0;
  private misses = 0;
  private readonly log = logger.child({ component: 'cache-redis' });

  constructor(
    private readonly redis: Redis,
    private readonly options: CacheOptions,
    private readonly health?: DependencyHealthTracker,
  ) {}

  async get<T>(key: string): Promise<T | null> {
    let raw: string | null;
    try {
      raw = await this.redis.get(this.options.namespace + key);
      this.health?.recordSuccess('redis');
    } catch (err) {
      this.failed('get', key, err);
      raw = null;
    }
    return this.count(raw === null ? null : parseEntry<T>(raw));
  }

  async set<T>(key: string, value: T, ttlSeconds = this.options.ttlSeconds): Promise<void> {
    try {
      await this.redis.set(this.options.namespace + key, JSON.stringify(value), 'EX', ttlSeconds);
      this.health?.recordSuccess('redis');
    } catch (err) {
      this.failed('set', key, err);
    }
  }

  async del(key: string): Promise<void> {
    try {
      await this.redis.del(this.options.namespace + key);
    } catch (err) {
      this.failed('del', key, err);
    }
  }

  stats(): CacheStats {
    return { hits: this.hits, misses: this.misses };
  }

  private count<T>(value: T | null): T | null {
    if (value === null) this.misses++;
    else this.hits++;
    cacheLookups.inc({ store: 'redis', outcome: value === null ? 'miss' : 'hit' });
    return value;
  }

  private failed(op: string, key: string, err: unknown): void {
    const message = err instanceof Error ? err.message : String(err);
    this.health?.recordFailure('redis', message);
    this.log.warn({ op, key, err: message }, 'Redis cache operation failed');
  }
}

function parseEntry<T>(raw: string): T | null {
  try {
    return JSON.parse(raw) as T;
  } catch {
    // A value this process did not write; treat it as absent
    return null;
  }
}

interface MemoryEntry {
  value: unknown;
  expiresAt: number;
}

export class InMemoryCacheStore implements CacheStore {
  private readonly entries = new Map<string, MemoryEntry>();
  private hits = 0;
  private misses = 0;

  constructor(private readonly options: CacheOptions = DEFAULT_CACHE_OPTIONS) {}

  async get<T>(key: string): Promise<T | null> {
    const fullKey = this.options.namespace + key;
    const entry = this.entries.get(fullKey);
    if (!entry || entry.expiresAt <= Date.now()) {
      if (entry) this.entries.delete(fullKey);
      this.misses++;
      cacheLookups.inc({ store: 'memory', outcome: 'miss' });
      return null;
    }
    // Re-insert so Map order tracks recency
    this.entries.delete(fullKey);
    this.entries.set(fullKey, entry);
    this.hits++;
    cacheLookups.inc({ store: 'memory', outcome: 'hit' });
    return entry.value as T;
  }

  async set<T>(key: string, value: T, ttlSeconds = this.options.ttlSeconds): Promise<void> {
    const fullKey = this.options.namespace + key;
    this.entries.delete(fullKey);
    this.entries.set(fullKey, { value, expiresAt: Date.now() + ttlSeconds * 1000 });
    this.prune();
  }

  async del(key: string): Promise<void> {
    this.entries.delete(this.options.namespace + key);
  }

  stats(): CacheStats {
    return { hits: this.hits, misses: this.misses, size: this.entries.size };
  }

  private prune(): void {
    const now = Date.now();
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) this.entries.delete(key);
    }
    while (this.entries.size > this.options.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }
}

export function createCacheStore(
  redis?: Redis,
  options: Partial<CacheOptions> = {},
  health?: DependencyHealthTracker,
): CacheStore {
  const merged = { ...DEFAULT_CACHE_OPTIONS, ...options };
  if (redis) {
    logger.info({ namespace: merged.namespace }, 'Product cache: Redis');
    return new RedisCacheStore(redis, merged, health);
  }
  logger.info({ maxEntries: merged.maxEntries }, 'Product cache: in-memory');
  return new InMemoryCacheStore(merged);
}
