import client from 'prom-client';
import type { GenerationMetricsTracker } from './services/metricsService.js';

export const metricsRegistry = new client.Registry();

/** Process metrics (memory, CPU, event loop); called once by the long-running scheduler. */
export function registerDefaultMetrics(): void {
  client.collectDefaultMetrics({
    register: metricsRegistry,
    labels: { app: 'uk-grid-generation-pipeline' },
  });
}

export const elexonRequestDurationSeconds = new client.Histogram({
  name: 'elexon_request_duration_seconds',
  help: 'Duration of Elexon API requests in seconds',
  labelNames: ['outcome'],
  buckets: [0.1, 0.25, 0.5, 1, 2, 5, 10, 30],
  registers: [metricsRegistry],
});

export const elexonRequestsTotal = new client.Counter({
  name: 'elexon_requests_total',
  help: 'Total number of Elexon API requests',
  labelNames: ['outcome'],
  registers: [metricsRegistry],
});

export const generationRecordsKeptTotal = new client.Counter({
  name: 'generation_records_kept_total',
  help: 'Generation records that passed the quality filter',
  registers: [metricsRegistry],
});

export const generationRecordsDroppedTotal = new client.Counter({
  name: 'generation_records_dropped_total',
  help: 'Generation records dropped because their period total was below the threshold',
  registers: [metricsRegistry],
});

export const generationPeriodsDroppedTotal = new client.Counter({
  name: 'generation_periods_dropped_total',
  help: 'Settlement periods dropped as incomplete',
  registers: [metricsRegistry],
});

export const lastSuccessfulRefreshGauge = new client.Gauge({
  name: 'generation_last_successful_refresh_timestamp_seconds',
  help: 'Unix time of the last refresh cycle that stored data',
  registers: [metricsRegistry],
});

export const refreshCyclesTotal = new client.Counter({
  name: 'generation_refresh_cycles_total',
  help: 'Scheduled refresh cycles by status',
  labelNames: ['status'],
  registers: [metricsRegistry],
});

function requestOutcome(ok: boolean, timedOut: boolean, httpStatus: number | null): string {
  if (ok) return 'success';
  if (timedOut) return 'timeout';
  return httpStatus === null ? 'network_error' : 'http_error';
}

export const prometheusMetricsTracker: GenerationMetricsTracker = {
  recordApiCall(details) {
    const outcome = requestOutcome(details.ok, details.timedOut, details.httpStatus);
    elexonRequestDurationSeconds.observe({ outcome }, details.latencyMs / 1000);
    elexonRequestsTotal.inc({ outcome });
  },
  recordQualityFilter(details) {
    generationRecordsKeptTotal.inc(details.keptRecords);
    generationRecordsDroppedTotal.inc(details.droppedRecords);
    generationPeriodsDroppedTotal.inc(details.droppedPeriods);
  },
};
