import { SourceDefinition, SourceFields } from './fetchSource';
import { firstPercentage, lineMentioning } from './patterns';
import { sourceUrl } from '../registry';
import { ParseError } from '../errors';

const NAME = 'apnic_ipv6';

/** APNIC Labs per-ASN IPv6 capability: first percentage on the page. */
export const apnicIpv6Source: SourceDefinition = {
  name: NAME,
  async load({ http }): Promise<SourceFields> {
    const text = await http.getPageText(sourceUrl(NAME));
    const pct = firstPercentage(text);
    if (pct === null) throw new ParseError('no capability percentage on page', NAME);
    const insight = lineMentioning(text, 'deployment');
    return {
      ipv6_capability_percentage: pct,
      ...(insight ? { deployment_insights: insight } : {}),
    };
  },
};

export default apnicIpv6Source;
