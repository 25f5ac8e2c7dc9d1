import { resolveSourceRecord, fetchSourceRecord, SourceContext } from '../lib/sources/fetchSource';
import { googleIpv6Source } from '../lib/sources/google';
import { bgpSource, bgpGrowthSeries, deriveCurrentBgpStats, parseBgpTotals, POTAROO_URL } from '../lib/sources/bgp';
import { pulseSource } from '../lib/sources/pulse';
import { cisco6labSource } from '../lib/sources/cisco';
import { nistUsgv6Source } from '../lib/sources/nist';
import { ripeSource, arinSource } from '../lib/sources/registries';
import { akamaiSource, cloudflareRadarSource, facebookSource } from '../lib/sources/pages';
import { ParseError } from '../lib/errors';
import { FIXED_NOW, stubHttp } from './helpers/stubHttp';

const GOOGLE_URL = 'https://www.google.com/intl/en/ipv6/statistics.html';
const BGPSTUFF_URL = 'https://bgpstuff.net/totals';
const RIPE_URL = 'https://ftp.ripe.net/pub/stats/ripencc/delegated-ripencc-latest';
const clock = () => FIXED_NOW;
const NOW_ISO = '2025-08-11T12:00:00.000Z';

function ctx(routes: Record<string, string> = {}): SourceContext {
  return { http: stubHttp(routes), clock };
}

describe('fetchSourceRecord', () => {
  test('wraps a thrown error as Err', async () => {
    const result = await fetchSourceRecord(
      { name: 'google_ipv6', load: async () => { throw new ParseError('boom'); } },
      ctx(),
    );
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toBe('boom');
  });

  test('wraps non-Error throws as SourceError', async () => {
    const result = await fetchSourceRecord(
      { name: 'google_ipv6', load: () => Promise.reject('plain string') },
      ctx(),
    );
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.name).toBe('SourceError');
      expect(result.error.source).toBe('google_ipv6');
    }
  });
});

describe('google', () => {
  test('parses the first percentage followed by IPv6', async () => {
    const record = await resolveSourceRecord(
      googleIpv6Source,
      ctx({ [GOOGLE_URL]: 'Statistics\nAbout 46.72% of users access Google over IPv6' }),
    );
    expect(record).toEqual({
      measurement_type: 'Users reaching Google over IPv6',
      source: 'Google IPv6 Statistics',
      url: GOOGLE_URL,
      global_percentage: 46.72,
      last_updated: NOW_ISO,
    });
  });

  test('page without a percentage gives an estimated record', async () => {
    const record = await resolveSourceRecord(googleIpv6Source, ctx({ [GOOGLE_URL]: 'Nothing to see' }));
    expect(record.source).toBe('Google IPv6 Statistics (estimated)');
    expect(record.global_percentage).toBe(47);
    expect(record.error).toBeUndefined();
  });

  test('unreachable page gives the fallback record', async () => {
    const record = await resolveSourceRecord(googleIpv6Source, ctx());
    expect(record.source).toBe('Google IPv6 Statistics (fallback)');
    expect(record.error).toBe('HTTP 503');
    expect(record.global_percentage).toBe(47);
    expect(record.url).toBe(GOOGLE_URL);
    expect(record.last_updated).toBe(NOW_ISO);
  });
});

describe('bgp', () => {
  test('parseBgpTotals strips digit grouping', () => {
    expect(parseBgpTotals('228,748 IPv6 prefixes\n1,014,404 IPv4 prefixes')).toEqual({
      ipv6: 228748,
      ipv4: 1014404,
    });
  });

  test('reads bgpstuff totals', async () => {
    const record = await resolveSourceRecord(
      bgpSource,
      ctx({ [BGPSTUFF_URL]: 'Totals\n228,748 IPv6 prefixes\n1,014,404 IPv4 prefixes' }),
    );
    expect(record).toMatchObject({
      total_prefixes: 228748,
      total_ipv4_prefixes: 1014404,
      estimated_growth_yearly: 26000,
      source: 'BGP Stuff (Real-time)',
      url: BGPSTUFF_URL,
    });
    expect(record.error).toBeUndefined();
  });

  test('falls back to potaroo when bgpstuff is down', async () => {
    const record = await resolveSourceRecord(bgpSource, ctx({ [POTAROO_URL]: 'Total 201,234 routes' }));
    expect(record).toMatchObject({
      total_prefixes: 201234,
      total_ipv4_prefixes: 1014404,
      source: 'BGP Potaroo',
      url: POTAROO_URL,
    });
  });

  test('both upstreams down gives the fallback totals', async () => {
    const record = await resolveSourceRecord(bgpSource, ctx());
    expect(record).toMatchObject({
      total_prefixes: 228748,
      total_ipv4_prefixes: 1014404,
      source: 'BGP Stuff (fallback)',
      error: 'HTTP 503',
    });
  });

  test('derived statistics', () => {
    const current = deriveCurrentBgpStats(
      { source: 'BGP Stuff (Real-time)', total_prefixes: 228748, total_ipv4_prefixes: 1014404 },
      { clock },
    );
    expect(current).toEqual({
      total_prefixes: 228748,
      total_ipv4_prefixes: 1014404,
      total_asns: 65000,
      monthly_growth: 2100,
      new_asns: 150,
      avg_prefixes_per_as: 3.52,
      ipv6_vs_ipv4_ratio: 22.55,
      source: 'BGP Stuff (Real-time)',
      last_updated: NOW_ISO,
    });
  });

  test('derived statistics keep the base error', () => {
    const current = deriveCurrentBgpStats(
      { source: 'BGP Stuff (fallback)', error: 'HTTP 503', total_prefixes: 228748, total_ipv4_prefixes: 1014404 },
      { clock },
    );
    expect(current.error).toBe('HTTP 503');
  });

  test('growth series is linear and ends at the current size', () => {
    const points = bgpGrowthSeries(Date.parse('2025-08-11T00:00:00.000Z'), {
      currentPrefixes: 185000,
      yearlyGrowth: 26000,
      months: 24,
    });
    expect(points).toHaveLength(24);
    expect(points[0]).toEqual({ date: '2023-09-21', prefixes: 135167 });
    expect(points[11]).toEqual({ date: '2024-08-16', prefixes: 159000 });
    expect(points[23]).toEqual({ date: '2025-08-11', prefixes: 185000 });
  });
});

describe('pulse', () => {
  test('reads adoption figures and named regions', async () => {
    const record = await resolveSourceRecord(
      pulseSource,
      ctx({
        'https://pulse.internetsociety.org/technologies':
          'Technologies\nIPv6 adoption 51%\nHTTPS 96%\nTLS 1.3 88%\nEurope and Asia',
      }),
    );
    expect(record).toMatchObject({
      global_ipv6_websites: 51,
      global_https_websites: 96,
      global_tls13_websites: 88,
      regional_data: { Asia: 39, Europe: 32 },
    });
  });

  test('missing figures default to the last published ones', async () => {
    const record = await resolveSourceRecord(
      pulseSource,
      ctx({ 'https://pulse.internetsociety.org/technologies': 'Technologies' }),
    );
    expect(record.global_ipv6_websites).toBe(49);
    expect(record.global_tls13_websites).toBe(86);
    expect(record.regional_data).toEqual({ Africa: 6, Americas: 44, Asia: 39, Europe: 32, Oceania: 30 });
  });
});

describe('cisco 6lab', () => {
  const url = 'https://6lab.cisco.com/stats/index.php?option=users';

  test('reports regions named on the page', async () => {
    const record = await resolveSourceRecord(cisco6labSource, ctx({ [url]: 'Users per region: RIPE ARIN APNIC' }));
    expect(record.regional_data).toEqual({ RIPE: 65, ARIN: 52, APNIC: 45 });
    expect(record.measurement_types).toEqual(['users', 'prefixes', 'content', 'network']);
  });

  test('page naming no region is a parse failure', async () => {
    const record = await resolveSourceRecord(cisco6labSource, ctx({ [url]: 'Maintenance' }));
    expect(record.error).toBe('no RIR regions found on page');
    expect(record.source).toBe('Cisco 6lab (fallback)');
  });
});

describe('percentage pages', () => {
  test('cloudflare radar reads the percentage after IPv6', async () => {
    const record = await resolveSourceRecord(
      cloudflareRadarSource,
      ctx({ 'https://radar.cloudflare.com/reports/ipv6': 'IPv6 traffic share 37.4% worldwide' }),
    );
    expect(record.global_ipv6_percentage).toBe(37.4);
    expect(record.error).toBeUndefined();
  });

  test('facebook reads the percentage before IPv6', async () => {
    const record = await resolveSourceRecord(
      facebookSource,
      ctx({
        'https://www.facebook.com/ipv6/?tab=ipv6_total_adoption': 'Around 41.2% of people access Facebook over IPv6',
      }),
    );
    expect(record.ipv6_percentage).toBe(41.2);
  });

  test('facebook fallback', async () => {
    const record = await resolveSourceRecord(facebookSource, ctx());
    expect(record).toMatchObject({ ipv6_percentage: 40, source: 'Facebook IPv6 Adoption (fallback)' });
  });
});

describe('reachable pages', () => {
  test('reachable page reports the published snapshot', async () => {
    const record = await resolveSourceRecord(akamaiSource, ctx({ 'http://www.akamai.com/ipv6/': 'IPv6 adoption' }));
    expect(record.top_networks).toHaveLength(8);
    expect(record.error).toBeUndefined();
  });

  test('unreachable page reports empty tables', async () => {
    const record = await resolveSourceRecord(akamaiSource, ctx());
    expect(record.top_countries).toEqual([]);
    expect(record.top_networks).toEqual([]);
    expect(record.error).toBe('HTTP 503');
  });
});

describe('nist usgv6', () => {
  test('first endpoint answering 2xx wins', async () => {
    const live = 'https://usgv6-deploymon.nist.gov/cgi-bin/generate-all.www';
    const context = ctx({ [live]: 'report' });
    const record = await resolveSourceRecord(nistUsgv6Source, context);

    expect(record.url).toBe(live);
    expect(record.program_name).toBe('NIST USGv6 Deployment Monitor');
    expect(record.error).toBeUndefined();
  });

  test('every endpoint failing gives the fallback', async () => {
    const record = await resolveSourceRecord(nistUsgv6Source, ctx());
    expect(record.source).toBe('NIST USGv6 Deployment Monitor (fallback)');
    expect(record.error).toBe('HTTP 503');
    expect(record.key_agencies).toBeDefined();
  });
});

describe('delegation sources', () => {
  const ripeFile = [
    '2|ripencc|20250811|3|19830705|20250811|+0200',
    'ripencc|DE|ipv6|2001:db8::|29|20100101|allocated',
    'ripencc|GB|ipv6|2001:db9::|32|20100101|allocated',
    'ripencc|DE|ipv6|2001:dba::|48|20100101|assigned',
  ].join('\n');

  test('summarizes a delegation file', async () => {
    const record = await resolveSourceRecord(ripeSource, ctx({ [RIPE_URL]: ripeFile }));
    expect(record).toMatchObject({
      source: 'RIPE NCC Official Delegation Data',
      measurement_unit: '/32 equivalent blocks',
      total_addresses: 9 + 1 / 65536,
      total_countries: 2,
      data_date: new Date(FIXED_NOW).toDateString(),
    });
    expect(record.top_countries).toEqual({
      DE: { allocations: 8 + 1 / 65536, percentage: 88.89, entries: 2 },
      GB: { allocations: 1, percentage: 11.11, entries: 1 },
    });
  });

  test('file without ipv6 lines gives the fallback', async () => {
    const record = await resolveSourceRecord(ripeSource, ctx({ [RIPE_URL]: '2|ripencc|20250811|0' }));
    expect(record.error).toBe('no ipv6 records for ripencc');
    expect(record.total_addresses).toBe(182113);
  });

  test('ARIN fallback keeps membership statistics', async () => {
    const record = await resolveSourceRecord(arinSource, ctx());
    expect(record.membership_stats).toEqual({ general_members: 5234, service_members: 21058, total_members: 26292 });
    expect(record.source).toBe('ARIN Official Delegation Data (fallback)');
  });
});
