/**
 * Drops settlement periods whose summed fuel mix is implausibly low.
 *
 * The API sometimes returns a partial snapshot in which only some fuel types
 * (typically renewables) have reported. Such a period shows an inflated
 * renewable share and a national total far below real demand, so any period
 * under the minimum total is discarded as a whole.
 */

import { MIN_TOTAL_GENERATION_MW } from '../config.js';
import { createSilentLogger, type Logger } from '../logger.js';
import type { GenerationRecord } from './generationParser.js';
import { noopMetricsTracker, type GenerationMetricsTracker } from './metricsService.js';

export interface PeriodQualitySummary {
  timestamp: Date;
  totalGenerationMw: number;
  isValid: boolean;
}

export interface QualityFilterOptions {
  minTotalGenerationMw?: number;
  logger?: Logger;
  metricsTracker?: GenerationMetricsTracker;
}

/** One summary per distinct timestamp, in order of first appearance. */
export function summarizePeriods(
  records: readonly GenerationRecord[],
  minTotalGenerationMw: number = MIN_TOTAL_GENERATION_MW,
): PeriodQualitySummary[] {
  const totals = new Map<number, { timestamp: Date; total: number }>();
  for (const record of records) {
    const key = record.timestamp.getTime();
    const group = totals.get(key);
    if (group) {
      group.total += record.generationMw;
    } else {
      totals.set(key, { timestamp: record.timestamp, total: record.generationMw });
    }
  }
  return Array.from(totals.values(), ({ timestamp, total }) => ({
    timestamp,
    totalGenerationMw: total,
    isValid: total >= minTotalGenerationMw,
  }));
}

/**
 * Returns the records of valid periods in input order. Never throws for
 * rejected periods; an all-invalid input yields an empty list.
 */
export function applyQualityFilter(
  records: readonly GenerationRecord[],
  options: QualityFilterOptions = {},
): GenerationRecord[] {
  const thresholdMw = options.minTotalGenerationMw ?? MIN_TOTAL_GENERATION_MW;
  const log = options.logger ?? createSilentLogger();
  const metricsTracker = options.metricsTracker ?? noopMetricsTracker;

  const summaries = summarizePeriods(records, thresholdMw);
  const validTimestamps = new Set<number>();
  for (const summary of summaries) {
    if (summary.isValid) validTimestamps.add(summary.timestamp.getTime());
  }

  const kept = records.filter((record) => validTimestamps.has(record.timestamp.getTime()));
  const droppedRecords = records.length - kept.length;
  const droppedPeriods = summaries.length - validTimestamps.size;

  if (droppedRecords > 0) {
    log.warn(
      { droppedRecords, droppedPeriods, thresholdMw },
      `Filtering out ${droppedPeriods} time periods (${droppedRecords} records) with incomplete fuel-mix data`,
    );
  }
  metricsTracker.recordQualityFilter({
    inputRecords: records.length,
    keptRecords: kept.length,
    droppedRecords,
    totalPeriods: summaries.length,
    droppedPeriods,
    thresholdMw,
  });

  return kept;
}
