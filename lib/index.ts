export { DataCollector } from './collector';
export type { DataCollectorOptions } from './collector';
export {
  DataManager,
  DATA_SOURCES,
  PAGE_REQUIREMENTS,
  getDataManager,
  loadDashboardData,
  getData,
  refreshData,
} from './dataManager';
export type { CacheStats, DataKey, DataManagerOptions, LoadedData, Loader } from './dataManager';
export { SourceCache, cacheKey } from './sourceCache';
export type { CacheEntry, SourceCacheOptions, SourceCacheStats } from './sourceCache';
export { InMemoryLRUAdapter, createDefaultCache } from './cache';
export type { CacheAdapter } from './cache';
export { createHttpClient } from './net/http';
export { fetchWithRetry, fetchTextWithRetry } from './net/fetchWithRetry';
export type { FetchedText, FetchLike, FetchRetryOptions } from './net/fetchWithRetry';
export type { HttpClient, HttpClientOptions, RequestOptions } from './net/http';
export { parseDelegation, aggregateAllocations, normalizedBlocks, topCountries } from './delegation';
export { SourceError, FetchError, ParseError, TimeoutError } from './errors';
export { isFallback, systemClock } from './types';
export type { Clock, CountryAllocation, SourceRecord, SourceValue } from './types';
export { register } from './metrics';
export { CONFIG } from './config';
