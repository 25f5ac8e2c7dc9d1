import { SourceDefinition, SourceFields } from './fetchSource';
import { percentageNear } from './patterns';
import { sourceUrl } from '../registry';
import { ParseError } from '../errors';

/**
 * Sources whose figures are published as charts or prose. The page is
 * fetched to confirm the source is live; the record then carries the
 * registry profile and snapshot.
 */
export function reachablePageSource(name: string): SourceDefinition {
  return {
    name,
    async load({ http }): Promise<SourceFields> {
      await http.getPageText(sourceUrl(name));
      return {};
    },
  };
}

/** First percentage next to "IPv6" on the page, reported as `field`. */
export function ipv6PercentageSource(name: string, field: string): SourceDefinition {
  return {
    name,
    async load({ http }): Promise<SourceFields> {
      const text = await http.getPageText(sourceUrl(name));
      const pct = percentageNear(text, 'IPv6');
      if (pct === null) throw new ParseError('no IPv6 percentage on page', name);
      return { [field]: pct };
    },
  };
}

export const apnicSource = reachablePageSource('apnic');
export const pulseTechnologySource = reachablePageSource('pulse_technology');
export const akamaiSource = reachablePageSource('akamai');
export const vynckeSource = reachablePageSource('vyncke');
export const cloudflareDnsSource = reachablePageSource('cloudflare_dns');
export const rirHistoricalSource = reachablePageSource('rir_historical');
export const ipv6MatrixSource = reachablePageSource('ipv6_matrix');
export const ipv6TestSource = reachablePageSource('ipv6_test');
export const arinCurrentSource = reachablePageSource('arin_current');
export const arinHistoricalSource = reachablePageSource('arin_historical');

export const cloudflareRadarSource = ipv6PercentageSource('cloudflare_radar', 'global_ipv6_percentage');
export const facebookSource = ipv6PercentageSource('facebook', 'ipv6_percentage');
