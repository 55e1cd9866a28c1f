import test from 'node:test';
import assert from 'node:assert/strict';

import { parseGenerationBody, parseGenerationPayload } from '../server/services/generationParser.js';
import { MalformedRecordError } from '../server/lib/errors.js';
import { period } from './fixtures.js';

test('parseGenerationPayload flattens periods into records', () => {
  const records = parseGenerationPayload({
    data: [period('2024-03-01T00:00:00Z', [['Fossil Gas', 12000.5], ['Nuclear', 4000]])],
  });
  assert.deepEqual(records, [
    { timestamp: new Date('2024-03-01T00:00:00Z'), fuelType: 'Fossil Gas', generationMw: 12000.5 },
    { timestamp: new Date('2024-03-01T00:00:00Z'), fuelType: 'Nuclear', generationMw: 4000 },
  ]);
});

test('parseGenerationPayload sorts by timestamp and keeps entry order within a period', () => {
  const records = parseGenerationPayload({
    data: [
      period('2024-03-01T01:00:00Z', [['Solar', 1], ['Biomass', 2]]),
      period('2024-03-01T00:00:00Z', [['Wind Onshore', 3], ['Fossil Gas', 4], ['Nuclear', 5]]),
      period('2024-03-01T00:30:00Z', [['Other', 6]]),
    ],
  });
  assert.deepEqual(
    records.map((r) => `${r.timestamp.toISOString().slice(11, 16)} ${r.fuelType}`),
    ['00:00 Wind Onshore', '00:00 Fossil Gas', '00:00 Nuclear', '00:30 Other', '01:00 Solar', '01:00 Biomass'],
  );
});

test('parseGenerationPayload returns no records for an empty period list', () => {
  assert.deepEqual(parseGenerationPayload({ data: [] }), []);
});

test('parseGenerationPayload treats an empty or absent fuel list as zero records', () => {
  const records = parseGenerationPayload({
    data: [
      { startTime: '2024-03-01T00:00:00Z', data: [] },
      { startTime: '2024-03-01T00:30:00Z' },
      period('2024-03-01T01:00:00Z', [['Nuclear', 5000]]),
    ],
  });
  assert.equal(records.length, 1);
  assert.equal(records[0].fuelType, 'Nuclear');
});

test('parseGenerationPayload rejects an entry without psrType', () => {
  assert.throws(
    () =>
      parseGenerationPayload({
        data: [{ startTime: '2024-03-01T00:00:00Z', data: [{ quantity: 10 }] }],
      }),
    (err: unknown) => err instanceof MalformedRecordError && err.issues[0] === 'data.0.data.0.psrType: Required',
  );
});

test('parseGenerationPayload rejects the whole response when one entry is bad', () => {
  assert.throws(
    () =>
      parseGenerationPayload({
        data: [
          period('2024-03-01T00:00:00Z', [['Nuclear', 5000]]),
          { startTime: '2024-03-01T00:30:00Z', data: [{ psrType: 'Solar', quantity: '12' }] },
        ],
      }),
    MalformedRecordError,
  );
});

test('parseGenerationPayload rejects negative quantities', () => {
  assert.throws(
    () => parseGenerationPayload({ data: [period('2024-03-01T00:00:00Z', [['Solar', -1]])] }),
    MalformedRecordError,
  );
});

test('parseGenerationPayload rejects an unparseable startTime', () => {
  assert.throws(
    () => parseGenerationPayload({ data: [period('yesterday-ish', [['Solar', 1]])] }),
    MalformedRecordError,
  );
});

test('parseGenerationPayload rejects a body without a data array', () => {
  assert.throws(() => parseGenerationPayload({ results: [] }), MalformedRecordError);
  assert.throws(() => parseGenerationPayload(null), MalformedRecordError);
});

test('parseGenerationBody parses JSON text', () => {
  const text = JSON.stringify({ data: [period('2024-03-01T00:00:00Z', [['Nuclear', 5000]])] });
  assert.equal(parseGenerationBody(text).length, 1);
});

test('parseGenerationBody rejects empty and non-JSON bodies', () => {
  assert.throws(() => parseGenerationBody('   '), MalformedRecordError);
  assert.throws(() => parseGenerationBody('<html>maintenance</html>'), MalformedRecordError);
});
