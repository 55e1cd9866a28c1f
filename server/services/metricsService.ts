/**
 * Observability hooks for the fetch pipeline. The client and the quality
 * filter report through a GenerationMetricsTracker instead of global state;
 * `server/metrics.ts` provides the Prometheus-backed implementation.
 */

export interface ApiCallDetails {
  label: string;
  attempt: number;
  latencyMs: number;
  ok: boolean;
  httpStatus: number | null;
  timedOut: boolean;
}

export interface QualityFilterDetails {
  inputRecords: number;
  keptRecords: number;
  droppedRecords: number;
  totalPeriods: number;
  droppedPeriods: number;
  thresholdMw: number;
}

export interface GenerationMetricsTracker {
  recordApiCall(details: ApiCallDetails): void;
  recordQualityFilter(details: QualityFilterDetails): void;
}

export const noopMetricsTracker: GenerationMetricsTracker = {
  recordApiCall() {},
  recordQualityFilter() {},
};

/** Fans each report out to every tracker given. */
export function combineMetricsTrackers(...trackers: GenerationMetricsTracker[]): GenerationMetricsTracker {
  return {
    recordApiCall(details) {
      for (const tracker of trackers) tracker.recordApiCall(details);
    },
    recordQualityFilter(details) {
      for (const tracker of trackers) tracker.recordQualityFilter(details);
    },
  };
}

export interface RunMetricsSummary {
  api: { calls: number; successes: number; failures: number; timedOut: number; avgLatencyMs: number; maxLatencyMs: number };
  quality: { inputRecords: number; keptRecords: number; droppedRecords: number; droppedPeriods: number };
}

export interface RunMetricsTracker extends GenerationMetricsTracker {
  summary(): RunMetricsSummary;
}

/** In-memory totals for a single CLI run or refresh cycle. */
export function createRunMetricsTracker(): RunMetricsTracker {
  const api = { calls: 0, successes: 0, failures: 0, timedOut: 0, totalLatencyMs: 0, maxLatencyMs: 0 };
  const quality = { inputRecords: 0, keptRecords: 0, droppedRecords: 0, droppedPeriods: 0 };

  return {
    recordApiCall(details) {
      api.calls += 1;
      if (details.ok) api.successes += 1;
      else api.failures += 1;
      if (details.timedOut) api.timedOut += 1;
      api.totalLatencyMs += details.latencyMs;
      api.maxLatencyMs = Math.max(api.maxLatencyMs, details.latencyMs);
    },
    recordQualityFilter(details) {
      quality.inputRecords += details.inputRecords;
      quality.keptRecords += details.keptRecords;
      quality.droppedRecords += details.droppedRecords;
      quality.droppedPeriods += details.droppedPeriods;
    },
    summary() {
      return {
        api: {
          calls: api.calls,
          successes: api.successes,
          failures: api.failures,
          timedOut: api.timedOut,
          avgLatencyMs: api.calls > 0 ? Math.round(api.totalLatencyMs / api.calls) : 0,
          maxLatencyMs: Math.round(api.maxLatencyMs),
        },
        quality: { ...quality },
      };
    },
  };
}
