import { z } from 'zod';
import registryJson from '../data/sources.json';
import { Clock, isoTimestamp, SourceRecord, SourceValue } from './types';

const sourceValue: z.ZodType<SourceValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(sourceValue), z.record(sourceValue)])
);

const fields = z.record(sourceValue);

/**
 * One upstream source.
 * - `profile`: fields present on both the live and the fallback record
 * - `snapshot`: published figures reported once the page is confirmed reachable
 * - `fallback`: last known values used when the source fails
 */
const entrySchema = z.object({
  source: z.string().min(1),
  url: z.string().url().optional(),
  profile: fields.default({}),
  snapshot: fields.default({}),
  fallback: fields.default({}),
});

export const registrySchema = z.record(entrySchema);

export type SourceEntry = z.infer<typeof entrySchema>;
export type SourceRegistry = z.infer<typeof registrySchema>;

export function parseRegistry(input: unknown): SourceRegistry {
  return registrySchema.parse(input);
}

let registry: SourceRegistry | null = null;

export function getRegistry(): SourceRegistry {
  if (!registry) registry = parseRegistry(registryJson);
  return registry;
}

export function getSourceEntry(name: string): SourceEntry {
  const entry = getRegistry()[name];
  if (!entry) throw new Error(`unknown source "${name}"`);
  return entry;
}

type Fields = Record<string, SourceValue>;

function withUrl(entry: SourceEntry): Fields {
  return entry.url ? { url: entry.url } : {};
}

/**
 * Live record: profile, then snapshot, then parsed fields. Parsed fields may
 * override `source` and `url` (e.g. when a secondary upstream answered).
 */
export function liveRecord(name: string, parsed: Fields, clock: Clock): SourceRecord {
  const entry = getSourceEntry(name);
  return {
    ...entry.profile,
    ...entry.snapshot,
    source: entry.source,
    ...withUrl(entry),
    ...parsed,
    last_updated: isoTimestamp(clock),
  };
}

export function fallbackRecord(name: string, error: string, clock: Clock, extra: Fields = {}): SourceRecord {
  const entry = getSourceEntry(name);
  return {
    ...entry.profile,
    ...entry.fallback,
    ...extra,
    source: `${entry.source} (fallback)`,
    ...withUrl(entry),
    error,
    last_updated: isoTimestamp(clock),
  };
}

/** Record for a source with no upstream: profile only. */
export function staticRecord(name: string, clock: Clock): SourceRecord {
  return liveRecord(name, {}, clock);
}

/** Numeric fallback value, for parsers that default a missing figure. */
export function fallbackNumber(name: string, field: string): number {
  const v = getSourceEntry(name).fallback[field];
  if (typeof v !== 'number') throw new Error(`source "${name}" has no numeric fallback "${field}"`);
  return v;
}

export function sourceUrl(name: string): string {
  const url = getSourceEntry(name).url;
  if (!url) throw new Error(`source "${name}" has no url`);
  return url;
}
