import { SourceDefinition, SourceFields } from './fetchSource';
import { matchNumber } from './patterns';
import { fallbackNumber, getSourceEntry, sourceUrl } from '../registry';

const NAME = 'google_ipv6';

/**
 * Google publishes the share of users reaching it over IPv6 as the first
 * percentage on the statistics page. A page without it yields an estimate
 * from the last known figure rather than an error.
 */
export const googleIpv6Source: SourceDefinition = {
  name: NAME,
  async load({ http }): Promise<SourceFields> {
    const entry = getSourceEntry(NAME);
    const text = await http.getPageText(sourceUrl(NAME));
    const pct = matchNumber(text, /(\d+(?:\.\d+)?)%.*?IPv6/i);
    if (pct === null) {
      return {
        source: `${entry.source} (estimated)`,
        global_percentage: fallbackNumber(NAME, 'global_percentage'),
        note: 'Percentage not found on page, using latest known value',
      };
    }
    return { global_percentage: pct };
  },
};

export default googleIpv6Source;
