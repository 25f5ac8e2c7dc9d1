import { HttpClient } from '../net/http';
import { Result, ok, err } from '../result';
import { SourceError, toSourceError } from '../errors';
import { fallbackRecord, liveRecord } from '../registry';
import { Clock, SourceRecord, SourceValue } from '../types';
import { recordSourceFetch } from '../metrics';
import logger from '../logger';

export interface SourceContext {
  http: HttpClient;
  clock: Clock;
}

export type SourceFields = Record<string, SourceValue>;

/**
 * An upstream source. `load` fetches and parses, returning the live fields
 * (merged over the registry profile) or throwing; it never builds fallbacks.
 */
export interface SourceDefinition {
  name: string;
  load(ctx: SourceContext): Promise<SourceFields>;
}

/**
 * Common wrapper for source loads: timing, metrics and error normalization
 * in one place.
 */
export async function fetchSourceRecord(
  def: SourceDefinition,
  ctx: SourceContext,
): Promise<Result<SourceRecord, SourceError>> {
  const started = ctx.clock();
  try {
    const fields = await def.load(ctx);
    recordSourceFetch(def.name, 'live', (ctx.clock() - started) / 1000);
    return ok(liveRecord(def.name, fields, ctx.clock));
  } catch (e) {
    recordSourceFetch(def.name, 'fallback', (ctx.clock() - started) / 1000);
    return err(toSourceError(e, def.name));
  }
}

/** Live record, or the registry fallback carrying the failure message. */
export async function resolveSourceRecord(
  def: SourceDefinition,
  ctx: SourceContext,
  extra?: SourceFields,
): Promise<SourceRecord> {
  const result = await fetchSourceRecord(def, ctx);
  if (result.ok) return result.value;
  logger.warn({ err: result.error, source: def.name }, 'source failed, serving fallback');
  return fallbackRecord(def.name, result.error.message, ctx.clock, extra);
}

export default resolveSourceRecord;
