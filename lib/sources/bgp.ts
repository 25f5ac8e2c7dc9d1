import { SourceContext, SourceDefinition, SourceFields } from './fetchSource';
import { matchNumber } from './patterns';
import { fallbackNumber, getSourceEntry, sourceUrl } from '../registry';
import { ParseError, toSourceError } from '../errors';
import { roundTo } from '../delegation';
import { isoTimestamp, SourceRecord } from '../types';
import logger from '../logger';

const NAME = 'bgp';
export const POTAROO_URL = 'https://bgp.potaroo.net/v6/as2.0/index.html';

const IPV6_PREFIXES = /(\d+(?:,\d+)*)\s*IPv6\s*prefixes/i;
const IPV4_PREFIXES = /(\d+(?:,\d+)*)\s*IPv4\s*prefixes/i;
const POTAROO_PREFIXES = /(\d+(?:,\d+)*)\s*(?:prefixes|routes)/i;

/** Totals as printed by bgpstuff.net, e.g. "228,748 IPv6 prefixes". */
export function parseBgpTotals(text: string): { ipv6: number | null; ipv4: number | null } {
  return { ipv6: matchNumber(text, IPV6_PREFIXES), ipv4: matchNumber(text, IPV4_PREFIXES) };
}

async function fromPotaroo(ctx: SourceContext): Promise<SourceFields> {
  const text = await ctx.http.getPageText(POTAROO_URL);
  const prefixes = matchNumber(text, POTAROO_PREFIXES);
  if (prefixes === null) throw new ParseError('no prefix count on potaroo page', NAME);
  return {
    total_prefixes: prefixes,
    total_ipv4_prefixes: fallbackNumber(NAME, 'total_ipv4_prefixes'),
    source: 'BGP Potaroo',
    url: POTAROO_URL,
  };
}

/** Live IPv6 table size: bgpstuff.net totals, then the potaroo report. */
export const bgpSource: SourceDefinition = {
  name: NAME,
  async load(ctx): Promise<SourceFields> {
    try {
      const { ipv6, ipv4 } = parseBgpTotals(await ctx.http.getPageText(sourceUrl(NAME)));
      if (ipv6 === null) throw new ParseError('no IPv6 prefix total on page', NAME);
      return {
        total_prefixes: ipv6,
        total_ipv4_prefixes: ipv4 ?? fallbackNumber(NAME, 'total_ipv4_prefixes'),
        source: 'BGP Stuff (Real-time)',
      };
    } catch (e) {
      logger.debug({ err: toSourceError(e, NAME) }, 'bgpstuff unavailable, trying potaroo');
      return fromPotaroo(ctx);
    }
  },
};

function numberField(record: SourceRecord, field: string): number {
  const v = record[field];
  return typeof v === 'number' ? v : fallbackNumber(NAME, field);
}

/**
 * Summary derived from the BGP totals. A fallback base record keeps its
 * `error`, so the derived record is recognisable as a fallback too.
 */
export function deriveCurrentBgpStats(base: SourceRecord, ctx: Pick<SourceContext, 'clock'>): SourceRecord {
  const profile = getSourceEntry('bgp_current').profile;
  const prefixes = numberField(base, 'total_prefixes');
  const ipv4 = numberField(base, 'total_ipv4_prefixes');
  const asns = typeof profile.total_asns === 'number' ? profile.total_asns : 65000;
  return {
    ...profile,
    total_prefixes: prefixes,
    total_ipv4_prefixes: ipv4,
    total_asns: asns,
    avg_prefixes_per_as: roundTo(prefixes / asns, 2),
    ipv6_vs_ipv4_ratio: roundTo((prefixes / Math.max(ipv4, 1)) * 100, 2),
    source: base.source,
    ...(typeof base.error === 'string' ? { error: base.error } : {}),
    last_updated: isoTimestamp(ctx.clock),
  };
}

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Monthly IPv6 table sizes going back `months` from the current size under
 * a linear growth model. Oldest point first.
 */
export function bgpGrowthSeries(
  now: number,
  opts: { currentPrefixes: number; yearlyGrowth: number; months: number },
): Array<{ date: string; prefixes: number }> {
  const points: Array<{ date: string; prefixes: number }> = [];
  for (let m = opts.months - 1; m >= 0; m--) {
    points.push({
      date: new Date(now - m * 30 * DAY_MS).toISOString().slice(0, 10),
      prefixes: Math.round(opts.currentPrefixes - (m / 12) * opts.yearlyGrowth),
    });
  }
  return points;
}

export function bgpHistoricalRecord(ctx: Pick<SourceContext, 'clock'>): SourceRecord {
  const entry = getSourceEntry('bgp_historical');
  const num = (field: string, dflt: number): number => {
    const v = entry.profile[field];
    return typeof v === 'number' ? v : dflt;
  };
  const points = bgpGrowthSeries(ctx.clock(), {
    currentPrefixes: num('current_prefixes', 185000),
    yearlyGrowth: num('yearly_growth', 26000),
    months: num('months', 24),
  });
  return {
    ...entry.profile,
    source: entry.source,
    points,
    last_updated: isoTimestamp(ctx.clock),
  };
}

export default bgpSource;
