import { SourceDefinition, SourceFields } from './fetchSource';
import { aggregateAllocations, parseDelegation, topCountries } from '../delegation';
import { sourceUrl } from '../registry';
import { ParseError } from '../errors';
import { CONFIG } from '../config';

/**
 * Source backed by an RIR delegation file. `registry` is the first field of
 * each line (e.g. "ripencc"); allocations are counted in /`normalizedLength`
 * blocks.
 */
export function delegationSource(name: string, registry: string, normalizedLength: number): SourceDefinition {
  return {
    name,
    async load({ http, clock }): Promise<SourceFields> {
      const content = await http.getText(sourceUrl(name), { timeoutMs: CONFIG.HTTP.DELEGATION_TIMEOUT_MS });
      const records = parseDelegation(content, registry);
      if (records.length === 0) throw new ParseError(`no ipv6 records for ${registry}`, name);
      const summary = aggregateAllocations(records, normalizedLength);
      return {
        total_addresses: summary.total,
        total_countries: summary.countries.size,
        top_countries: topCountries(summary, 10),
        data_date: new Date(clock()).toDateString(),
        description: `IPv6 allocations from ${records.length} delegation records`,
      };
    },
  };
}

export const ripeSource = delegationSource('ripe', 'ripencc', 32);
export const arinSource = delegationSource('arin', 'arin', 32);
export const lacnicSource = delegationSource('lacnic', 'lacnic', 48);
export const afrinicSource = delegationSource('afrinic', 'afrinic', 32);
