export type SourceValue =
  | string
  | number
  | boolean
  | null
  | SourceValue[]
  | { [key: string]: SourceValue };

/**
 * String-keyed record produced by every source. Conventional keys:
 * `source`, `url`, `error` (fallback only) and `last_updated` (ISO timestamp).
 */
export interface SourceRecord {
  source: string;
  [key: string]: SourceValue;
}

export type CountryAllocation = {
  allocations: number; // blocks normalized to the source's prefix length
  percentage: number; // share of the source total, 2 decimals
  entries: number; // delegation lines seen for the country
};

/** Milliseconds since epoch. Injected so tests can move time. */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

export function isoTimestamp(clock: Clock): string {
  return new Date(clock()).toISOString();
}

export function isFallback(record: SourceRecord): boolean {
  return typeof record.error === 'string';
}

export function isFieldMap(v: SourceValue | undefined): v is { [key: string]: SourceValue } {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}
