import { SourceDefinition, SourceFields } from './fetchSource';
import { matchNumber } from './patterns';
import { fallbackNumber, getSourceEntry, sourceUrl } from '../registry';
import { isFieldMap, SourceValue } from '../types';

const NAME = 'pulse';

/**
 * Internet Society Pulse technology page: IPv6, HTTPS and TLS 1.3 adoption.
 * Figures missing from the page default to the last published ones.
 */
export const pulseSource: SourceDefinition = {
  name: NAME,
  async load({ http }): Promise<SourceFields> {
    const text = await http.getPageText(sourceUrl(NAME));
    const figure = (re: RegExp, field: string): number => matchNumber(text, re) ?? fallbackNumber(NAME, field);

    const known = getSourceEntry(NAME).fallback.regional_data;
    const regional: Record<string, SourceValue> = {};
    if (isFieldMap(known)) {
      for (const [region, value] of Object.entries(known)) {
        if (text.includes(region)) regional[region] = value;
      }
    }

    return {
      global_ipv6_websites: figure(/IPv6.*?(\d+)%/i, 'global_ipv6_websites'),
      global_https_websites: figure(/HTTPS.*?(\d+)%/i, 'global_https_websites'),
      global_tls13_websites: figure(/TLS\s*1\.3.*?(\d+)%/i, 'global_tls13_websites'),
      regional_data: Object.keys(regional).length > 0 ? regional : isFieldMap(known) ? known : {},
    };
  },
};

export default pulseSource;
