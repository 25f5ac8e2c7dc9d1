import { createHttpClient, HttpClient } from './net/http';
import { SourceCache, cacheKey, CacheEntry } from './sourceCache';
import type { CacheAdapter } from './cache';
import { resolveSourceRecord, SourceContext, SourceDefinition } from './sources/fetchSource';
import { googleIpv6Source } from './sources/google';
import { apnicIpv6Source } from './sources/apnic';
import { cisco6labSource } from './sources/cisco';
import { bgpSource, bgpHistoricalRecord, deriveCurrentBgpStats } from './sources/bgp';
import { pulseSource } from './sources/pulse';
import { nistUsgv6Source } from './sources/nist';
import { asnFallbackFields, asnSource } from './sources/asn';
import { afrinicSource, arinSource, lacnicSource, ripeSource } from './sources/registries';
import {
  akamaiSource,
  apnicSource,
  arinCurrentSource,
  arinHistoricalSource,
  cloudflareDnsSource,
  cloudflareRadarSource,
  facebookSource,
  ipv6MatrixSource,
  ipv6TestSource,
  pulseTechnologySource,
  rirHistoricalSource,
  vynckeSource,
} from './sources/pages';
import { staticRecord } from './registry';
import { Clock, SourceRecord, systemClock } from './types';

const DERIVED_FROM: Record<string, string> = {
  getCurrentBgpStats: 'getBgpStats',
};

export interface DataCollectorOptions {
  http?: HttpClient;
  clock?: Clock;
  cache?: SourceCache;
  cacheAdapter?: CacheAdapter<CacheEntry>;
}

/**
 * One method per upstream source. Every method is cached and resolves to a
 * Source Record (live or fallback); none rejects.
 */
export class DataCollector {
  private readonly ctx: SourceContext;
  private readonly cache: SourceCache;

  constructor(opts: DataCollectorOptions = {}) {
    const clock = opts.clock ?? systemClock;
    this.ctx = { http: opts.http ?? createHttpClient(), clock };
    this.cache = opts.cache ?? new SourceCache({ clock, adapter: opts.cacheAdapter });
  }

  private cached(key: string, load: () => Promise<SourceRecord>): Promise<SourceRecord> {
    return this.cache.getOrLoad(key, load);
  }

  private fromSource(method: string, def: SourceDefinition): Promise<SourceRecord> {
    return this.cached(method, () => resolveSourceRecord(def, this.ctx));
  }

  private fromRegistry(method: string, name: string): Promise<SourceRecord> {
    return this.cached(method, async () => staticRecord(name, this.ctx.clock));
  }

  getGoogleIpv6Stats() {
    return this.fromSource('getGoogleIpv6Stats', googleIpv6Source);
  }

  getGoogleCountryStats() {
    return this.fromRegistry('getGoogleCountryStats', 'google_country');
  }

  getApnicStats() {
    return this.fromSource('getApnicStats', apnicSource);
  }

  getApnicIpv6Stats() {
    return this.fromSource('getApnicIpv6Stats', apnicIpv6Source);
  }

  getCisco6labStats() {
    return this.fromSource('getCisco6labStats', cisco6labSource);
  }

  getBgpStats() {
    return this.fromSource('getBgpStats', bgpSource);
  }

  getCurrentBgpStats() {
    return this.cached('getCurrentBgpStats', async () => deriveCurrentBgpStats(await this.getBgpStats(), this.ctx));
  }

  getBgpHistoricalData() {
    return this.cached('getBgpHistoricalData', async () => bgpHistoricalRecord(this.ctx));
  }

  getPrefixSizeDistribution() {
    return this.fromRegistry('getPrefixSizeDistribution', 'prefix_distribution');
  }

  getTopAsnsByPrefixes() {
    return this.fromRegistry('getTopAsnsByPrefixes', 'top_asns');
  }

  getInternetSocietyPulseStats() {
    return this.fromSource('getInternetSocietyPulseStats', pulseSource);
  }

  getPulseTechnologyStats() {
    return this.fromSource('getPulseTechnologyStats', pulseTechnologySource);
  }

  getAkamaiStats() {
    return this.fromSource('getAkamaiStats', akamaiSource);
  }

  getVynckeStats() {
    return this.fromSource('getVynckeStats', vynckeSource);
  }

  getCloudflareRadarStats() {
    return this.fromSource('getCloudflareRadarStats', cloudflareRadarSource);
  }

  getCloudflareDnsStats() {
    return this.fromSource('getCloudflareDnsStats', cloudflareDnsSource);
  }

  getFacebookStats() {
    return this.fromSource('getFacebookStats', facebookSource);
  }

  getNistUsgv6Stats() {
    return this.fromSource('getNistUsgv6Stats', nistUsgv6Source);
  }

  getRirHistoricalStats() {
    return this.fromSource('getRirHistoricalStats', rirHistoricalSource);
  }

  getIpv6MatrixData() {
    return this.fromSource('getIpv6MatrixData', ipv6MatrixSource);
  }

  getIpv6TestStats() {
    return this.fromSource('getIpv6TestStats', ipv6TestSource);
  }

  getRipeAllocations() {
    return this.fromSource('getRipeAllocations', ripeSource);
  }

  getArinStatistics() {
    return this.fromSource('getArinStatistics', arinSource);
  }

  getLacnicStats() {
    return this.fromSource('getLacnicStats', lacnicSource);
  }

  getAfrinicStats() {
    return this.fromSource('getAfrinicStats', afrinicSource);
  }

  getArinCurrentStats() {
    return this.fromSource('getArinCurrentStats', arinCurrentSource);
  }

  getArinHistoricalStats() {
    return this.fromSource('getArinHistoricalStats', arinHistoricalSource);
  }

  getIpv6DeploymentStats() {
    return this.fromRegistry('getIpv6DeploymentStats', 'deployment');
  }

  /** IPv6 support for an AS number ("AS15169") or organization name. */
  queryAsn(query: string) {
    return this.cached(cacheKey('queryAsn', query), () =>
      resolveSourceRecord(asnSource(query), this.ctx, asnFallbackFields(query))
    );
  }

  /** Drop one cached method result (and what it derives from), or all. */
  async invalidate(key?: string): Promise<void> {
    await this.cache.invalidate(key);
    const base = key === undefined ? undefined : DERIVED_FROM[key];
    if (base) await this.cache.invalidate(base);
  }

  cacheStats() {
    return this.cache.stats();
  }
}

export default DataCollector;
