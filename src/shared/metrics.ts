/**
 * shared/metrics.ts — Run counters via prom-client
 *
 * Every failure the core absorbs locally is counted here, so a run that
 * degrades quietly still shows where. Written out as Prometheus text when
 * METRICS_FILE is set.
 *
 * Metrics:
 *   gap_responses_total            — Counter by channel/outcome
 *   gap_navigation_total           — Counter by operation/outcome
 *   gap_detail_total               — Counter by outcome
 *   gap_detail_duration_seconds    — Histogram per detail fetch
 *   gap_session_size               — Gauge for session buffer sizes
 */
import { Registry, Counter, Histogram, Gauge } from 'prom-client';
import { writeFile } from 'fs/promises';

export const registry = new Registry();

// ── Ingestion ──

export const responsesTotal = new Counter({
  name: 'gap_responses_total',
  help: 'Backend responses seen while capture was active',
  labelNames: ['channel', 'outcome'] as const, // ingested, malformed_payload, unreadable_body
  registers: [registry],
});

// ── Navigation ──

export const navigationTotal = new Counter({
  name: 'gap_navigation_total',
  help: 'Convergence loops and UI lookups by result',
  labelNames: ['operation', 'outcome'] as const, // wheel/drag/locate × converged/gave_up/found/not_found
  registers: [registry],
});

// ── Detail phase ──

export const detailTotal = new Counter({
  name: 'gap_detail_total',
  help: 'Detail fetches by result',
  labelNames: ['outcome'] as const, // candidate, filtered, skipped, failed, redirect_retry
  registers: [registry],
});

export const detailDuration = new Histogram({
  name: 'gap_detail_duration_seconds',
  help: 'Wall time of one detail fetch including the tab switch',
  buckets: [0.25, 0.5, 1, 2, 4, 8, 16, 32],
  registers: [registry],
});

// ── Session ──

export const sessionSize = new Gauge({
  name: 'gap_session_size',
  help: 'Records held by the collection session',
  labelNames: ['store'] as const, // markers, listings, price_history
  registers: [registry],
});

/** Write the Prometheus text exposition to a file. */
export async function writeMetricsFile(path: string): Promise<void> {
  await writeFile(path, await registry.metrics(), 'utf8');
}
