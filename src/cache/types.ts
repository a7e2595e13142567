/** Key-value cache for product metadata shown on the cart page */

export interface CacheOptions {
  /** Used when set() is called without a TTL */
  ttlSeconds: number;
  /** In-memory store only; least recently used entries go first */
  maxEntries: number;
  /** Prepended to every key */
  namespace: string;
}

export interface CacheStats {
  hits: number;
  misses: number;
  /** Entries held; undefined when the backing store does not report it */
  size?: number;
}

export interface CacheStore {
  get<T>(key: string): Promise<T | null>;
  set<T>(key: string, value: T, ttlSeconds?: number): Promise<void>;
  del(key: string): Promise<void>;
  stats(): CacheStats;
}
