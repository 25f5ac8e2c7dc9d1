import type { CacheAdapter, CacheKey } from '../cache';
import { getRedisClient } from '../redisAdapter';
import logger from '../logger';
import { CONFIG } from '../config';

/**
 * JSON values under a key prefix. Every call degrades to a miss or a no-op
 * when Redis is unreachable.
 */
export class RedisCacheAdapter<V> implements CacheAdapter<V> {
  private prefix: string;
  constructor(prefix?: string) {
    this.prefix = prefix || CONFIG.CACHE_KEY_PREFIX;
  }

  private key(k: CacheKey) {
    return `${this.prefix}${k}`;
  }

  async get(key: CacheKey): Promise<V | undefined> {
    const r = await getRedisClient();
    if (!r) return undefined;
    try {
      const raw = await r.get(this.key(key));
      if (!raw) return undefined;
      const value: V = JSON.parse(raw);
      return value;
    } catch (err) {
      logger.debug({ err, key }, 'RedisCacheAdapter.get failed');
      return undefined;
    }
  }

  async set(key: CacheKey, value: V, ttlMillis?: number): Promise<void> {
    const r = await getRedisClient();
    if (!r) return;
    try {
      const raw = JSON.stringify(value);
      if (typeof ttlMillis === 'number' && ttlMillis > 0) {
        await r.set(this.key(key), raw, 'PX', Math.max(1000, Math.floor(ttlMillis)));
      } else {
        await r.set(this.key(key), raw);
      }
    } catch (err) {
      logger.warn({ err, key }, 'RedisCacheAdapter.set failed');
    }
  }

  async del(key: CacheKey): Promise<void> {
    const r = await getRedisClient();
    if (!r) return;
    try {
      await r.del(this.key(key));
    } catch (err) {
      logger.warn({ err, key }, 'RedisCacheAdapter.del failed');
    }
  }

  private async prefixedKeys(): Promise<string[]> {
    const r = await getRedisClient();
    if (!r) return [];
    try {
      return await r.keys(`${this.prefix}*`);
    } catch (err) {
      logger.warn({ err, prefix: this.prefix }, 'RedisCacheAdapter.keys failed');
      return [];
    }
  }

  async clear(): Promise<void> {
    const keys = await this.prefixedKeys();
    if (keys.length === 0) return;
    const r = await getRedisClient();
    if (!r) return;
    try {
      await r.del(...keys);
    } catch (err) {
      logger.warn({ err, prefix: this.prefix }, 'RedisCacheAdapter.clear failed');
    }
  }

  async size(): Promise<number> {
    return (await this.prefixedKeys()).length;
  }
}

export default RedisCacheAdapter;
