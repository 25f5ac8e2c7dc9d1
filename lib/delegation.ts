/**
 * RIR delegation files ("delegated-<rir>-latest"): one record per line,
 * `registry|cc|type|start|value|date|status[|opaque-id|...]`. For `ipv6`
 * records `value` is the prefix length.
 */
import type { CountryAllocation } from './types';

/** Prefix length assumed when the field is missing or not numeric. */
export const DEFAULT_PREFIX_LENGTH = 48;

export interface DelegationRecord {
  registry: string;
  country: string;
  start: string;
  prefixLength: number;
  date: string;
  status: string;
}

export interface AllocationSummary {
  total: number;
  countries: Map<string, { allocations: number; entries: number }>;
}

export function parseDelegation(content: string, registry: string): DelegationRecord[] {
  const prefix = `${registry}|`;
  const records: DelegationRecord[] = [];
  for (const rawLine of content.split('\n')) {
    const line = rawLine.replace(/\r$/, '');
    if (!line.startsWith(prefix)) continue;
    const parts = line.split('|');
    if (parts.length < 7 || parts[2] !== 'ipv6') continue;
    const value = parts[4].trim();
    records.push({
      registry,
      country: parts[1],
      start: parts[3],
      prefixLength: /^\d+$/.test(value) ? parseInt(value, 10) : DEFAULT_PREFIX_LENGTH,
      date: parts[5],
      status: parts[6],
    });
  }
  return records;
}

/**
 * Number of /`normalizedLength` blocks covered by one prefix; fractional for
 * prefixes longer than the normalization length.
 */
export function normalizedBlocks(prefixLength: number, normalizedLength: number): number {
  if (prefixLength <= normalizedLength) return Math.pow(2, normalizedLength - prefixLength);
  return 1 / Math.pow(2, prefixLength - normalizedLength);
}

export function aggregateAllocations(records: DelegationRecord[], normalizedLength: number): AllocationSummary {
  const countries = new Map<string, { allocations: number; entries: number }>();
  let total = 0;
  for (const r of records) {
    const blocks = normalizedBlocks(r.prefixLength, normalizedLength);
    total += blocks;
    const stats = countries.get(r.country) ?? { allocations: 0, entries: 0 };
    stats.allocations += blocks;
    stats.entries += 1;
    countries.set(r.country, stats);
  }
  return { total, countries };
}

export function roundTo(n: number, decimals: number): number {
  const f = Math.pow(10, decimals);
  return Math.round(n * f) / f;
}

/**
 * Largest `n` countries by allocation, descending; ties keep first-seen order.
 */
export function topCountries(summary: AllocationSummary, n = 10): Record<string, CountryAllocation> {
  const sorted = Array.from(summary.countries.entries()).sort((a, b) => b[1].allocations - a[1].allocations);
  const top: Record<string, CountryAllocation> = {};
  for (const [country, stats] of sorted.slice(0, n)) {
    const percentage = summary.total > 0 ? (stats.allocations / summary.total) * 100 : 0;
    top[country] = {
      allocations: stats.allocations,
      percentage: roundTo(percentage, 2),
      entries: stats.entries,
    };
  }
  return top;
}
