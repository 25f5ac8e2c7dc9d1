import { LRUCache } from 'lru-cache';
import RedisCacheAdapter from './cache/redisAdapter';
import { CONFIG } from './config';
import logger from './logger';

export type CacheKey = string;

export interface CacheAdapter<V> {
  get(key: CacheKey): Promise<V | undefined>;
  set(key: CacheKey, value: V, ttlMillis?: number): Promise<void>;
  del(key: CacheKey): Promise<void>;
  /** Every key this adapter holds. */
  clear(): Promise<void>;
  /** Live entries currently held; evicted and expired ones are not counted. */
  size(): Promise<number>;
}

/**
 * In-memory LRU adapter using `lru-cache` v10+.
 */
export class InMemoryLRUAdapter<V extends {}> implements CacheAdapter<V> {
  private cache: LRUCache<CacheKey, V>;

  constructor(opts?: { max?: number; ttl?: number }) {
    this.cache = new LRUCache<CacheKey, V>({
      max: opts?.max ?? CONFIG.CACHE_MAX_ENTRIES,
      ttl: opts?.ttl ?? CONFIG.TTL.SOURCE_MS,
    });
  }

  async get(key: CacheKey): Promise<V | undefined> {
    return this.cache.get(key);
  }

  async set(key: CacheKey, value: V, ttlMillis?: number): Promise<void> {
    if (typeof ttlMillis === 'number') {
      this.cache.set(key, value, { ttl: ttlMillis });
    } else {
      this.cache.set(key, value);
    }
  }

  async del(key: CacheKey): Promise<void> {
    this.cache.delete(key);
  }

  async clear(): Promise<void> {
    this.cache.clear();
  }

  async size(): Promise<number> {
    this.cache.purgeStale();
    return this.cache.size;
  }
}

/**
 * Redis-backed cache when REDIS_URL is set, in-memory LRU otherwise.
 */
export function createDefaultCache<V extends {}>(): CacheAdapter<V> {
  if (process.env.REDIS_URL) {
    logger.info('using Redis source cache');
    return new RedisCacheAdapter<V>();
  }
  return new InMemoryLRUAdapter<V>();
}
