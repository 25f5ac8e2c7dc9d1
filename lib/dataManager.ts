import { DataCollector } from './collector';
import { runKeyedTasks } from './net/worker';
import { CONFIG } from './config';
import { incTaskFailure } from './metrics';
import { Clock, SourceRecord, systemClock } from './types';
import logger from './logger';

/** Dashboard data keys and the collector method behind each. */
export const DATA_SOURCES = {
  google_stats: 'getGoogleIpv6Stats',
  google_country: 'getGoogleCountryStats',
  facebook_stats: 'getFacebookStats',
  cloudflare_stats: 'getCloudflareRadarStats',
  apnic_stats: 'getApnicStats',
  cisco_6lab: 'getCisco6labStats',
  nist_usgv6: 'getNistUsgv6Stats',
  bgp_stats: 'getCurrentBgpStats',
  arin_stats: 'getArinStatistics',
  ripe_stats: 'getRipeAllocations',
  lacnic_stats: 'getLacnicStats',
  afrinic_stats: 'getAfrinicStats',
} as const satisfies Record<string, keyof DataCollector>;

export type DataKey = keyof typeof DATA_SOURCES;

export const PAGE_REQUIREMENTS: Record<string, string[]> = {
  Overview: ['google_stats', 'facebook_stats', 'cloudflare_stats', 'bgp_stats'],
  'Global Adoption': ['google_country', 'apnic_stats', 'cisco_6lab'],
  'Cloud Services': ['cloudflare_stats', 'facebook_stats'],
  'BGP Statistics': ['bgp_stats'],
  'Extended Data': ['arin_stats', 'ripe_stats', 'lacnic_stats', 'afrinic_stats', 'nist_usgv6'],
};

const COMMON_KEYS = ['google_stats', 'facebook_stats', 'cloudflare_stats'];

export type Loader = () => Promise<SourceRecord>;
export type LoadedData = Record<string, SourceRecord | null>;

export interface DataManagerOptions {
  collector?: DataCollector;
  /** Replaces the default key -> collector method table. */
  loaders?: Record<string, Loader>;
  clock?: Clock;
  concurrency?: number;
  taskTimeoutMs?: number;
}

export interface CacheStats {
  cachedItems: number;
  loadedPages: string[];
  allDataLoaded: boolean;
  cacheKeys: string[];
  oldestData: string | null;
  newestData: string | null;
  sourceCache: { hits: number; misses: number; size: number };
}

interface Loaded {
  record: SourceRecord;
  loadedAt: number;
}

function collectorLoaders(collector: DataCollector): Record<string, Loader> {
  const loaders: Record<string, Loader> = {};
  for (const key of Object.keys(DATA_SOURCES)) {
    if (!isDataKey(key)) continue;
    const method = DATA_SOURCES[key];
    loaders[key] = () => collector[method]();
  }
  return loaders;
}

function isDataKey(key: string): key is DataKey {
  return Object.prototype.hasOwnProperty.call(DATA_SOURCES, key);
}

/**
 * Dashboard-facing store of Source Records keyed by data key. Loads fan out
 * through a bounded pool; each key has at most one load in flight and the
 * map is written only from a settled load.
 */
export class DataManager {
  readonly collector: DataCollector;
  private readonly loaders: Record<string, Loader>;
  private readonly clock: Clock;
  private readonly concurrency: number;
  private readonly taskTimeoutMs: number;

  private readonly data = new Map<string, Loaded>();
  private readonly inFlight = new Map<string, Promise<SourceRecord>>();
  private readonly loadedPages = new Set<string>();
  private allDataLoaded = false;
  private epoch = 0;

  constructor(opts: DataManagerOptions = {}) {
    this.clock = opts.clock ?? systemClock;
    this.collector = opts.collector ?? new DataCollector({ clock: this.clock });
    this.loaders = opts.loaders ?? collectorLoaders(this.collector);
    this.concurrency = opts.concurrency ?? CONFIG.LOADING.CONCURRENCY;
    this.taskTimeoutMs = opts.taskTimeoutMs ?? CONFIG.LOADING.TASK_TIMEOUT_MS;
  }

  private loadShared(key: string, loader: Loader): Promise<SourceRecord> {
    const pending = this.inFlight.get(key);
    if (pending) return pending;

    const op: Promise<SourceRecord> = this.runLoad(key, loader, () => this.inFlight.get(key) === op).finally(() => {
      if (this.inFlight.get(key) === op) this.inFlight.delete(key);
    });
    this.inFlight.set(key, op);
    return op;
  }

  // `current` turns false once the key is invalidated mid-load; the late record is not stored.
  private async runLoad(key: string, loader: Loader, current: () => boolean): Promise<SourceRecord> {
    logger.info({ key }, 'loading data');
    const record = await loader();
    if (current()) this.data.set(key, { record, loadedAt: this.clock() });
    else logger.debug({ key }, 'discarding load that finished after invalidation');
    return record;
  }

  /** Single-key load; a failed load is logged and yields null. */
  async getOrLoadData(key: string, loader: Loader, forceReload = false): Promise<SourceRecord | null> {
    const cached = this.data.get(key);
    if (!forceReload && cached) {
      logger.debug({ key }, 'data cache hit');
      return cached.record;
    }
    try {
      return await this.loadShared(key, loader);
    } catch (err) {
      logger.error({ err, key }, 'error loading data');
      incTaskFailure(key);
      return null;
    }
  }

  /**
   * Load every source through the pool. Failed or timed-out keys are `null`
   * in the result. Once everything has been loaded the stored map is returned.
   */
  async loadAllData(): Promise<LoadedData> {
    if (this.allDataLoaded) {
      logger.info('all data already loaded');
      return this.snapshot();
    }

    const epoch = this.epoch;
    const outcomes = await runKeyedTasks(
      Object.entries(this.loaders).map(([key, loader]) => ({ key, run: () => this.loadShared(key, loader) })),
      { concurrency: this.concurrency, timeoutMs: this.taskTimeoutMs },
    );

    const loaded: LoadedData = {};
    for (const outcome of outcomes) {
      if (outcome.ok) {
        loaded[outcome.key] = outcome.value;
      } else {
        logger.error({ err: outcome.error, key: outcome.key }, 'error loading data');
        incTaskFailure(outcome.key);
        loaded[outcome.key] = null;
      }
    }
    if (epoch === this.epoch) this.allDataLoaded = true;
    return loaded;
  }

  /** Data for one dashboard page, loading missing keys one at a time. */
  async loadPageData(pageName: string): Promise<LoadedData> {
    const pageData: LoadedData = {};
    for (const key of PAGE_REQUIREMENTS[pageName] ?? []) {
      const cached = this.data.get(key);
      if (cached) {
        pageData[key] = cached.record;
        continue;
      }
      const loader = this.loaders[key];
      if (loader) pageData[key] = await this.getOrLoadData(key, loader);
    }
    this.loadedPages.add(pageName);
    return pageData;
  }

  getCachedData(key: string): SourceRecord | null {
    return this.data.get(key)?.record ?? null;
  }

  /** Forget one key or everything, including the collector's source cache. */
  async invalidateCache(key?: string): Promise<void> {
    if (key !== undefined) {
      this.data.delete(key);
      this.inFlight.delete(key);
      if (isDataKey(key)) await this.collector.invalidate(DATA_SOURCES[key]);
      logger.info({ key }, 'invalidated cache');
      return;
    }
    this.epoch++;
    this.data.clear();
    this.inFlight.clear();
    this.loadedPages.clear();
    this.allDataLoaded = false;
    await this.collector.invalidate();
    logger.info('invalidated all cache');
  }

  async getCacheStats(): Promise<CacheStats> {
    const times = Array.from(this.data.values()).map((d) => d.loadedAt);
    const iso = (t: number) => new Date(t).toISOString();
    return {
      cachedItems: this.data.size,
      loadedPages: Array.from(this.loadedPages),
      allDataLoaded: this.allDataLoaded,
      cacheKeys: Array.from(this.data.keys()),
      oldestData: times.length > 0 ? iso(Math.min(...times)) : null,
      newestData: times.length > 0 ? iso(Math.max(...times)) : null,
      sourceCache: await this.collector.cacheStats(),
    };
  }

  async preloadCommonData(): Promise<void> {
    for (const key of COMMON_KEYS) {
      const loader = this.loaders[key];
      if (loader && !this.data.has(key)) await this.getOrLoadData(key, loader);
    }
  }

  private snapshot(): LoadedData {
    const out: LoadedData = {};
    for (const [key, { record }] of this.data) out[key] = record;
    return out;
  }
}

let manager: DataManager | null = null;

export function getDataManager(): DataManager {
  if (!manager) manager = new DataManager();
  return manager;
}

/** Page data when `conditional` and a page is given, otherwise everything. */
export function loadDashboardData(conditional = true, pageName?: string): Promise<LoadedData> {
  const m = getDataManager();
  if (conditional && pageName) return m.loadPageData(pageName);
  return m.loadAllData();
}

export function getData(key: string): SourceRecord | null {
  return getDataManager().getCachedData(key);
}

export function refreshData(key?: string): Promise<void> {
  return getDataManager().invalidateCache(key);
}

export default DataManager;
