import { SourceCache, CacheEntry, cacheKey } from '../lib/sourceCache';
import { InMemoryLRUAdapter } from '../lib/cache';
import type { SourceRecord } from '../lib/types';
import { fakeClock } from './helpers/stubHttp';

const TTL = 10_000;
const FALLBACK_TTL = 1_000;

function setup() {
  const clock = fakeClock(0);
  const cache = new SourceCache({
    adapter: new InMemoryLRUAdapter<CacheEntry>({ max: 10 }),
    clock,
    ttlMs: TTL,
    fallbackTtlMs: FALLBACK_TTL,
  });
  return { clock, cache };
}

function counter(record: SourceRecord) {
  return jest.fn(async (): Promise<SourceRecord> => ({ ...record }));
}

describe('SourceCache', () => {
  test('cacheKey joins method and argument', () => {
    expect(cacheKey('getBgpStats')).toBe('getBgpStats');
    expect(cacheKey('queryAsn', 'AS64500')).toBe('queryAsn:AS64500');
  });

  test('calls within TTL return the same record with one load', async () => {
    const { cache } = setup();
    const loader = counter({ source: 'test' });

    const first = await cache.getOrLoad('k', loader);
    const second = await cache.getOrLoad('k', loader);

    expect(second).toBe(first);
    expect(loader).toHaveBeenCalledTimes(1);
  });

  test('entry is served up to the TTL and reloaded once after it', async () => {
    const { cache, clock } = setup();
    const loader = counter({ source: 'test' });

    await cache.getOrLoad('k', loader);
    clock.advance(TTL);
    await cache.getOrLoad('k', loader);
    expect(loader).toHaveBeenCalledTimes(1);

    clock.advance(1);
    await cache.getOrLoad('k', loader);
    await cache.getOrLoad('k', loader);
    expect(loader).toHaveBeenCalledTimes(2);
  });

  test('fallback records expire after the fallback TTL', async () => {
    const { cache, clock } = setup();
    const loader = counter({ source: 'test (fallback)', error: 'HTTP 503' });

    await cache.getOrLoad('k', loader);
    clock.advance(FALLBACK_TTL + 1);
    await cache.getOrLoad('k', loader);

    expect(loader).toHaveBeenCalledTimes(2);
  });

  test('concurrent callers share one load', async () => {
    const { cache } = setup();
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => { release = resolve; });
    const loader = jest.fn(async (): Promise<SourceRecord> => {
      await gate;
      return { source: 'shared' };
    });

    const a = cache.getOrLoad('k', loader);
    const b = cache.getOrLoad('k', loader);
    release();

    const [ra, rb] = await Promise.all([a, b]);
    expect(ra).toBe(rb);
    expect(loader).toHaveBeenCalledTimes(1);
  });

  test('a rejected load propagates and is not stored', async () => {
    const { cache } = setup();
    const loader = jest
      .fn<Promise<SourceRecord>, []>()
      .mockRejectedValueOnce(new Error('loader failed'))
      .mockResolvedValueOnce({ source: 'ok' });

    await expect(cache.getOrLoad('k', loader)).rejects.toThrow('loader failed');
    await expect(cache.getOrLoad('k', loader)).resolves.toEqual({ source: 'ok' });
    expect(loader).toHaveBeenCalledTimes(2);
  });

  test('invalidate drops one key or all keys', async () => {
    const { cache } = setup();
    const a = counter({ source: 'a' });
    const b = counter({ source: 'b' });
    await cache.getOrLoad('a', a);
    await cache.getOrLoad('b', b);

    await cache.invalidate('a');
    await cache.getOrLoad('a', a);
    await cache.getOrLoad('b', b);
    expect(a).toHaveBeenCalledTimes(2);
    expect(b).toHaveBeenCalledTimes(1);

    await cache.invalidate();
    expect((await cache.stats()).size).toBe(0);
    await cache.getOrLoad('b', b);
    expect(b).toHaveBeenCalledTimes(2);
  });

  test('stats count hits and misses', async () => {
    const { cache } = setup();
    const loader = counter({ source: 'test' });
    await cache.getOrLoad('k', loader);
    await cache.getOrLoad('k', loader);
    await cache.getOrLoad('other', loader);

    await expect(cache.stats()).resolves.toEqual({ hits: 1, misses: 2, size: 2 });
  });

  test('size follows the adapter as the LRU evicts', async () => {
    const cache = new SourceCache({
      adapter: new InMemoryLRUAdapter<CacheEntry>({ max: 5 }),
      clock: fakeClock(0),
      ttlMs: TTL,
    });
    for (let i = 0; i < 100; i++) {
      await cache.getOrLoad(cacheKey('queryAsn', `AS${64500 + i}`), counter({ source: 'whois' }));
    }

    await expect(cache.stats()).resolves.toEqual({ hits: 0, misses: 100, size: 5 });
  });

  test('a load that finishes after invalidation is returned but not stored', async () => {
    const { cache } = setup();
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => { release = resolve; });
    const stale = jest.fn(async (): Promise<SourceRecord> => {
      await gate;
      return { source: 'before refresh' };
    });
    const fresh = counter({ source: 'after refresh' });

    const pending = cache.getOrLoad('k', stale);
    await cache.invalidate('k');
    const reloaded = cache.getOrLoad('k', fresh);
    release();

    await expect(pending).resolves.toEqual({ source: 'before refresh' });
    await expect(reloaded).resolves.toEqual({ source: 'after refresh' });
    await expect(cache.getOrLoad('k', stale)).resolves.toEqual({ source: 'after refresh' });
    expect(stale).toHaveBeenCalledTimes(1);
    expect(fresh).toHaveBeenCalledTimes(1);
  });
});
