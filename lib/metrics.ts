/**
 * Per-run Prometheus metrics using `prom-client`.
 *
 * Each run gets its own `Registry`, so counters start at zero every invocation
 * and tests never see each other's values.
 *
 * Metrics:
 * - `cache_warmer_lookups_total{record_type,outcome}` (Counter)
 * - `cache_warmer_lookup_duration_seconds{record_type}` (Histogram)
 */

import { Counter, Histogram, Registry } from 'prom-client';
import type { RecordType } from './types';

export type LookupOutcome = 'answered' | 'failed';

export interface WarmMetrics {
  registry: Registry;
  lookupsTotal: Counter<'record_type' | 'outcome'>;
  lookupDuration: Histogram<'record_type'>;
}

export function createWarmMetrics(): WarmMetrics {
  const registry = new Registry();

  const lookupsTotal = new Counter({
    name: 'cache_warmer_lookups_total',
    help: 'Lookups issued against the target resolver',
    labelNames: ['record_type', 'outcome'] as const,
    registers: [registry],
  });

  const lookupDuration = new Histogram({
    name: 'cache_warmer_lookup_duration_seconds',
    help: 'Histogram of resolver lookup latency in seconds',
    labelNames: ['record_type'] as const,
    buckets: [0.001, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2, 5],
    registers: [registry],
  });

  return { registry, lookupsTotal, lookupDuration };
}

/**
 * Record one lookup.
 */
export function observeLookup(metrics: WarmMetrics, type: RecordType, outcome: LookupOutcome, seconds: number): void {
  metrics.lookupsTotal.inc({ record_type: type, outcome });
  if (!isFinite(seconds) || seconds < 0) return;
  metrics.lookupDuration.observe({ record_type: type }, seconds);
}

