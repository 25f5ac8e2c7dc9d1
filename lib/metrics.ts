/**
 * Prometheus metrics using `prom-client`.
 *
 * Metrics:
 * - `ipv6stats_source_fetch_total` (Counter, labels: source, outcome)
 * - `ipv6stats_source_fetch_seconds` (Histogram, label: source)
 * - `ipv6stats_cache_hit_ratio` (Gauge)
 * - `ipv6stats_manager_task_failures_total` (Counter, label: key)
 *
 * Expose `register.metrics()` from whatever process hosts the collector.
 */

import { Counter, Gauge, Histogram, register } from 'prom-client';

export type FetchOutcome = 'live' | 'fallback';

export const sourceFetchTotal = new Counter({
  name: 'ipv6stats_source_fetch_total',
  help: 'Upstream source loads by outcome (live data or fallback record)',
  labelNames: ['source', 'outcome'] as const,
});

export const sourceFetchSeconds = new Histogram({
  name: 'ipv6stats_source_fetch_seconds',
  help: 'Time spent fetching and parsing one upstream source',
  labelNames: ['source'] as const,
  buckets: [0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10, 30],
});

export const cacheHitRatio = new Gauge({
  name: 'ipv6stats_cache_hit_ratio',
  help: 'Source cache hit ratio (0.0 - 1.0)',
});

export const managerTaskFailures = new Counter({
  name: 'ipv6stats_manager_task_failures_total',
  help: 'Data manager loads that failed or timed out',
  labelNames: ['key'] as const,
});

export function recordSourceFetch(source: string, outcome: FetchOutcome, seconds: number): void {
  sourceFetchTotal.inc({ source, outcome });
  if (isFinite(seconds) && seconds >= 0) sourceFetchSeconds.observe({ source }, seconds);
}

/**
 * Set cache hit ratio (0..1). `null` or NaN is a no-op.
 */
export function setCacheHitRatio(ratio: number | null): void {
  if (ratio == null || Number.isNaN(ratio)) return;
  cacheHitRatio.set(Math.max(0, Math.min(1, ratio)));
}

export function incTaskFailure(key: string): void {
  managerTaskFailures.inc({ key });
}

export { register };
const metrics = { register, recordSourceFetch, setCacheHitRatio, incTaskFailure };
export default metrics;
