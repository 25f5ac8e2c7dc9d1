/**
 * Shared `ioredis` client for the source cache.
 *
 * `getRedisClient()` returns `null` when `REDIS_URL` is not set or the first
 * ping fails; callers then treat the cache as empty.
 */

import Redis from 'ioredis';
import logger from './logger';

let client: Redis | null = null;

export async function getRedisClient(): Promise<Redis | null> {
  if (client) return client;

  const url = process.env.REDIS_URL;
  if (!url) return null;

  const candidate = new Redis(url, {
    password: process.env.REDIS_PASSWORD || undefined,
    lazyConnect: true,
    maxRetriesPerRequest: 1,
  });

  try {
    await candidate.connect();
    await candidate.ping();
    client = candidate;
    return client;
  } catch (err) {
    candidate.disconnect();
    logger.warn({ err }, 'Redis not available, source cache disabled');
    return null;
  }
}

export async function closeRedisClient(): Promise<void> {
  if (!client) return;
  const c = client;
  client = null;
  await c.quit();
}

const redisUtils = { getRedisClient, closeRedisClient };
export default redisUtils;
