import { CacheAdapter, createDefaultCache } from './cache';
import { CONFIG } from './config';
import { setCacheHitRatio } from './metrics';
import { Clock, isFallback, SourceRecord, systemClock } from './types';

export interface CacheEntry {
  value: SourceRecord;
  storedAt: number;
  ttlMs: number;
}

export interface SourceCacheOptions {
  adapter?: CacheAdapter<CacheEntry>;
  clock?: Clock;
  ttlMs?: number;
  fallbackTtlMs?: number;
}

export interface SourceCacheStats {
  hits: number;
  misses: number;
  size: number;
}

/** `"<method>"` or `"<method>:<arg>"` */
export function cacheKey(method: string, arg?: string): string {
  return arg === undefined ? method : `${method}:${arg}`;
}

/**
 * One memo slot per key. An entry is served while `now - storedAt <= ttlMs`
 * by the injected clock; fallback records get the shorter fallback TTL.
 * Concurrent loads of a key share one promise. Loader rejections propagate
 * and are not stored. A load that finishes after its key was invalidated is
 * returned to its callers but not stored.
 */
export class SourceCache {
  private readonly adapter: CacheAdapter<CacheEntry>;
  private readonly clock: Clock;
  private readonly ttlMs: number;
  private readonly fallbackTtlMs: number;
  private readonly inFlight = new Map<string, Promise<SourceRecord>>();
  private hits = 0;
  private misses = 0;

  constructor(opts: SourceCacheOptions = {}) {
    this.adapter = opts.adapter ?? createDefaultCache<CacheEntry>();
    this.clock = opts.clock ?? systemClock;
    this.ttlMs = opts.ttlMs ?? CONFIG.TTL.SOURCE_MS;
    this.fallbackTtlMs = opts.fallbackTtlMs ?? CONFIG.TTL.FALLBACK_MS;
  }

  getOrLoad(key: string, loader: () => Promise<SourceRecord>): Promise<SourceRecord> {
    const pending = this.inFlight.get(key);
    if (pending) return pending;

    const p: Promise<SourceRecord> = this.lookup(key, loader, () => this.inFlight.get(key) === p).finally(() => {
      if (this.inFlight.get(key) === p) this.inFlight.delete(key);
    });
    this.inFlight.set(key, p);
    return p;
  }

  private async lookup(
    key: string,
    loader: () => Promise<SourceRecord>,
    current: () => boolean,
  ): Promise<SourceRecord> {
    const entry = await this.adapter.get(key);
    if (entry && this.clock() - entry.storedAt <= entry.ttlMs) {
      this.track(true);
      return entry.value;
    }
    this.track(false);

    const value = await loader();
    if (!current()) return value;
    const ttlMs = isFallback(value) ? this.fallbackTtlMs : this.ttlMs;
    await this.adapter.set(key, { value, storedAt: this.clock(), ttlMs }, ttlMs);
    return value;
  }

  async invalidate(key?: string): Promise<void> {
    if (key === undefined) {
      this.inFlight.clear();
      await this.adapter.clear();
      return;
    }
    this.inFlight.delete(key);
    await this.adapter.del(key);
  }

  async stats(): Promise<SourceCacheStats> {
    return { hits: this.hits, misses: this.misses, size: await this.adapter.size() };
  }

  private track(hit: boolean) {
    if (hit) this.hits++; else this.misses++;
    setCacheHitRatio(this.hits / (this.hits + this.misses));
  }
}

export default SourceCache;
