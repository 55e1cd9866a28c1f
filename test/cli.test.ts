import test from 'node:test';
import assert from 'node:assert/strict';

import { defaultCsvFilename, parseCliArgs } from '../server/cli.js';
import { FETCH_RETRY_ATTEMPTS, HISTORICAL_DAYS } from '../server/config.js';

test('parseCliArgs falls back to help', () => {
  assert.deepEqual(parseCliArgs([]), { kind: 'help' });
  assert.deepEqual(parseCliArgs(['current', '-h']), { kind: 'help' });
});

test('parseCliArgs applies defaults for current', () => {
  assert.deepEqual(parseCliArgs(['current']), {
    kind: 'current',
    sink: 'csv',
    out: null,
    attempts: FETCH_RETRY_ATTEMPTS,
  });
});

test('parseCliArgs reads historical options', () => {
  assert.deepEqual(parseCliArgs(['historical', '--days', '30', '--sink', 'postgres', '--attempts', '5']), {
    kind: 'historical',
    days: 30,
    sink: 'postgres',
    out: null,
    attempts: 5,
  });
  const defaults = parseCliArgs(['historical']);
  assert.equal(defaults.kind === 'historical' && defaults.days, HISTORICAL_DAYS);
});

test('parseCliArgs parses an explicit range', () => {
  const command = parseCliArgs(['range', '--from', '2024-01-01T00:00:00Z', '--to', '2024-01-15', '--out', 'jan.csv']);
  assert.equal(command.kind, 'range');
  if (command.kind !== 'range') return;
  assert.equal(command.from.toISOString(), '2024-01-01T00:00:00.000Z');
  assert.equal(command.to.toISOString(), '2024-01-15T00:00:00.000Z');
  assert.equal(command.out, 'jan.csv');
});

test('parseCliArgs rejects bad input', () => {
  assert.throws(() => parseCliArgs(['historical', '--days', '0']), {
    message: '--days must be a positive integer (received: 0)',
  });
  assert.throws(() => parseCliArgs(['current', '--attempts', '1.5']), {
    message: '--attempts must be a positive integer (received: 1.5)',
  });
  assert.throws(() => parseCliArgs(['range', '--from', '2024-01-01']), {
    message: '--to must be an ISO-8601 timestamp (received: nothing)',
  });
  assert.throws(() => parseCliArgs(['current', '--sink', 'sqlite']), /Unknown sink "sqlite"/);
  assert.throws(() => parseCliArgs(['backfill']), /^Error: Unknown command "backfill"/);
  assert.throws(() => parseCliArgs(['current', '--verbose']));
});

test('parseCliArgs accepts migrate and schedule', () => {
  assert.deepEqual(parseCliArgs(['migrate']), { kind: 'migrate' });
  assert.equal(parseCliArgs(['schedule', '--sink', 'postgres']).kind, 'schedule');
});

test('defaultCsvFilename stamps the file with compact UTC seconds', () => {
  assert.equal(
    defaultCsvFilename('current', new Date('2024-03-01T12:30:45.678Z')),
    'generation_current_20240301T123045Z.csv',
  );
  assert.equal(
    defaultCsvFilename('historical_7d', new Date('2024-12-31T23:59:59Z')),
    'generation_historical_7d_20241231T235959Z.csv',
  );
});
