import test from 'node:test';
import assert from 'node:assert/strict';
import pino from 'pino';

import { applyQualityFilter, summarizePeriods } from '../server/services/qualityFilter.js';
import { parseGenerationPayload } from '../server/services/generationParser.js';
import { createRunMetricsTracker, type QualityFilterDetails } from '../server/services/metricsService.js';
import { createSilentLogger } from '../server/logger.js';
import { captureStream, mixedQualityPayload, record } from './fixtures.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function detailsRecorder() {
  const reports: QualityFilterDetails[] = [];
  return {
    reports,
    tracker: {
      recordApiCall() {},
      recordQualityFilter(details: QualityFilterDetails) {
        reports.push(details);
      },
    },
  };
}

const silent = createSilentLogger();

// ---------------------------------------------------------------------------
// Filtering
// ---------------------------------------------------------------------------

test('applyQualityFilter keeps the complete period and drops the partial one', () => {
  const { reports, tracker } = detailsRecorder();
  const records = parseGenerationPayload(mixedQualityPayload());

  const kept = applyQualityFilter(records, { minTotalGenerationMw: 25000, logger: silent, metricsTracker: tracker });

  assert.deepEqual(
    kept.map((r) => r.fuelType),
    ['Fossil Gas', 'Wind Onshore', 'Nuclear'],
  );
  assert.ok(kept.every((r) => r.timestamp.toISOString() === '2024-03-01T00:00:00.000Z'));
  assert.deepEqual(reports, [
    { inputRecords: 5, keptRecords: 3, droppedRecords: 2, totalPeriods: 2, droppedPeriods: 1, thresholdMw: 25000 },
  ]);
});

test('applyQualityFilter logs dropped record and period counts', () => {
  const stream = captureStream();
  const logger = pino({ level: 'warn' }, stream);
  applyQualityFilter(parseGenerationPayload(mixedQualityPayload()), { minTotalGenerationMw: 25000, logger });

  assert.equal(stream.lines.length, 1);
  assert.equal(stream.lines[0].droppedRecords, 2);
  assert.equal(stream.lines[0].droppedPeriods, 1);
  assert.equal(stream.lines[0].level, 40);
});

test('applyQualityFilter does not log when nothing is dropped', () => {
  const stream = captureStream();
  const logger = pino({ level: 'warn' }, stream);
  applyQualityFilter([record('2024-03-01T00:00:00Z', 'Fossil Gas', 30000)], { minTotalGenerationMw: 25000, logger });
  assert.equal(stream.lines.length, 0);
});

test('applyQualityFilter keeps a period whose total equals the threshold', () => {
  const records = [
    record('2024-03-01T00:00:00Z', 'Fossil Gas', 20000),
    record('2024-03-01T00:00:00Z', 'Nuclear', 5000),
  ];
  assert.equal(applyQualityFilter(records, { minTotalGenerationMw: 25000, logger: silent }).length, 2);
});

test('applyQualityFilter preserves input order across interleaved timestamps', () => {
  const records = [
    record('2024-03-01T00:30:00Z', 'Fossil Gas', 30000),
    record('2024-03-01T00:00:00Z', 'Solar', 100),
    record('2024-03-01T00:30:00Z', 'Nuclear', 4000),
    record('2024-03-01T01:00:00Z', 'Fossil Gas', 26000),
  ];
  const kept = applyQualityFilter(records, { minTotalGenerationMw: 25000, logger: silent });
  assert.deepEqual(kept, [records[0], records[2], records[3]]);
});

test('applyQualityFilter returns an empty list when every period is invalid', () => {
  const records = [
    record('2024-03-01T00:00:00Z', 'Solar', 100),
    record('2024-03-01T00:30:00Z', 'Wind Offshore', 9000),
  ];
  assert.deepEqual(applyQualityFilter(records, { minTotalGenerationMw: 25000, logger: silent }), []);
});

test('applyQualityFilter on empty input returns empty output and reports zeros', () => {
  const { reports, tracker } = detailsRecorder();
  assert.deepEqual(applyQualityFilter([], { logger: silent, metricsTracker: tracker }), []);
  assert.equal(reports[0].droppedRecords, 0);
  assert.equal(reports[0].droppedPeriods, 0);
  assert.equal(reports[0].totalPeriods, 0);
});

test('applyQualityFilter honours a custom threshold', () => {
  const records = parseGenerationPayload(mixedQualityPayload());
  assert.equal(applyQualityFilter(records, { minTotalGenerationMw: 5000, logger: silent }).length, 5);
  assert.equal(applyQualityFilter(records, { minTotalGenerationMw: 40000, logger: silent }).length, 0);
});

test('applyQualityFilter is idempotent', () => {
  const inputs = [
    parseGenerationPayload(mixedQualityPayload()),
    [
      record('2024-03-01T00:00:00Z', 'Fossil Gas', 24999),
      record('2024-03-01T00:30:00Z', 'Fossil Gas', 25001),
      record('2024-03-01T00:30:00Z', 'Other', 0),
    ],
    [],
  ];
  for (const input of inputs) {
    const once = applyQualityFilter(input, { minTotalGenerationMw: 25000, logger: silent });
    const twice = applyQualityFilter(once, { minTotalGenerationMw: 25000, logger: silent });
    assert.deepEqual(twice, once);
  }
});

test('every period left after filtering meets the threshold', () => {
  const records = [
    record('2024-03-01T00:00:00Z', 'Fossil Gas', 12000),
    record('2024-03-01T00:00:00Z', 'Nuclear', 13000),
    record('2024-03-01T00:30:00Z', 'Solar', 8000),
    record('2024-03-01T01:00:00Z', 'Wind Onshore', 31000),
  ];
  const kept = applyQualityFilter(records, { minTotalGenerationMw: 25000, logger: silent });
  const summaries = summarizePeriods(kept, 25000);
  assert.equal(summaries.length, 2);
  assert.ok(summaries.every((s) => s.isValid && s.totalGenerationMw >= 25000));
});

test('applyQualityFilter feeds run metrics totals', () => {
  const tracker = createRunMetricsTracker();
  applyQualityFilter(parseGenerationPayload(mixedQualityPayload()), {
    minTotalGenerationMw: 25000,
    logger: silent,
    metricsTracker: tracker,
  });
  assert.deepEqual(tracker.summary().quality, { inputRecords: 5, keptRecords: 3, droppedRecords: 2, droppedPeriods: 1 });
});

// ---------------------------------------------------------------------------
// summarizePeriods
// ---------------------------------------------------------------------------

test('summarizePeriods sums each timestamp once in order of first appearance', () => {
  const summaries = summarizePeriods(parseGenerationPayload(mixedQualityPayload()), 25000);
  assert.deepEqual(summaries, [
    { timestamp: new Date('2024-03-01T00:00:00Z'), totalGenerationMw: 30000, isValid: true },
    { timestamp: new Date('2024-03-01T00:30:00Z'), totalGenerationMw: 10000, isValid: false },
  ]);
});
