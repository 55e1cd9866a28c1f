import { parseArgs } from 'util';
import {
  DATABASE_URL,
  DATA_REFRESH_INTERVAL_MS,
  ENABLE_PROMETHEUS,
  FETCH_RETRY_ATTEMPTS,
  HISTORICAL_CHUNK_DAYS,
  HISTORICAL_CHUNK_DELAY_MS,
  HISTORICAL_DAYS,
  METRICS_PORT,
  parseSinkKind,
  validateStartupEnvironment,
  type SinkKind,
} from './config.js';
import { createGenerationDatabase, type GenerationDatabase } from './db.js';
import { runMigrations } from './db/migrate.js';
import { formatUtcSeconds, parseIsoTimestamp } from './lib/dateUtils.js';
import logger, { errorMessage } from './logger.js';
import { metricsRegistry, prometheusMetricsTracker, registerDefaultMetrics } from './metrics.js';
import { fetchHistoricalDays, runHistoricalFetch } from './orchestrators/historicalFetchOrchestrator.js';
import { buildMonitoringServer } from './routes/healthRoutes.js';
import { ElexonGenerationClient } from './services/elexonApi.js';
import type { GenerationRecord } from './services/generationParser.js';
import { CsvGenerationSink, PostgresGenerationSink, type GenerationSink } from './services/generationSink.js';
import { combineMetricsTrackers, createRunMetricsTracker } from './services/metricsService.js';
import { GenerationRefreshScheduler } from './services/schedulerService.js';

const log = logger.child({ module: 'cli' });

export const USAGE = `Usage: uk-grid-generation <command> [options]

Commands:
  current                      Fetch the last 24 hours
  historical [--days N]        Fetch the last N days in weekly chunks
  range --from ISO --to ISO    Fetch an explicit UTC window in weekly chunks
  schedule                     Refresh the current window on an interval
  migrate                      Create or update the database schema

Options:
  --sink csv|postgres          Where cleaned records go (default: csv)
  --out <file>                 CSV file name inside RAW_DATA_DIR
  --attempts <n>               Attempts per request (default: ${FETCH_RETRY_ATTEMPTS})
  -h, --help                   Show this message`;

export type CliCommand =
  | { kind: 'help' }
  | { kind: 'current'; sink: SinkKind; out: string | null; attempts: number }
  | { kind: 'historical'; days: number; sink: SinkKind; out: string | null; attempts: number }
  | { kind: 'range'; from: Date; to: Date; sink: SinkKind; out: string | null; attempts: number }
  | { kind: 'schedule'; sink: SinkKind; out: string | null; attempts: number }
  | { kind: 'migrate' };

function parsePositiveInt(raw: string | undefined, name: string, fallback: number): number {
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new Error(`--${name} must be a positive integer (received: ${raw})`);
  }
  return value;
}

function parseTimestampOption(raw: string | undefined, name: string): Date {
  const parsed = raw === undefined ? null : parseIsoTimestamp(raw);
  if (!parsed) {
    throw new Error(`--${name} must be an ISO-8601 timestamp (received: ${raw ?? 'nothing'})`);
  }
  return parsed;
}

export function parseCliArgs(argv: string[]): CliCommand {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      sink: { type: 'string' },
      out: { type: 'string' },
      days: { type: 'string' },
      from: { type: 'string' },
      to: { type: 'string' },
      attempts: { type: 'string' },
      help: { type: 'boolean', short: 'h' },
    },
  });
  const command = positionals[0];
  if (values.help || !command) return { kind: 'help' };

  const sink = parseSinkKind(values.sink);
  const out = values.out ?? null;
  const attempts = parsePositiveInt(values.attempts, 'attempts', FETCH_RETRY_ATTEMPTS);
  switch (command) {
    case 'current':
      return { kind: 'current', sink, out, attempts };
    case 'historical':
      return { kind: 'historical', days: parsePositiveInt(values.days, 'days', HISTORICAL_DAYS), sink, out, attempts };
    case 'range':
      return {
        kind: 'range',
        from: parseTimestampOption(values.from, 'from'),
        to: parseTimestampOption(values.to, 'to'),
        sink,
        out,
        attempts,
      };
    case 'schedule':
      return { kind: 'schedule', sink, out, attempts };
    case 'migrate':
      return { kind: 'migrate' };
    default:
      throw new Error(`Unknown command "${command}"\n\n${USAGE}`);
  }
}

/** `generation_<label>_<YYYYMMDDTHHMMSSZ>.csv` */
export function defaultCsvFilename(label: string, now: Date): string {
  return `generation_${label}_${formatUtcSeconds(now).replace(/[-:]/g, '')}.csv`;
}

function openSink(kind: SinkKind, filename: string): { sink: GenerationSink; database: GenerationDatabase | null } {
  if (kind === 'postgres') {
    const database = createGenerationDatabase(DATABASE_URL);
    return { sink: new PostgresGenerationSink({ db: database.db }), database };
  }
  return { sink: new CsvGenerationSink({ filename }), database: null };
}

async function fetchAndStore(
  label: string,
  kind: SinkKind,
  out: string | null,
  fetch: () => Promise<GenerationRecord[]>,
): Promise<void> {
  const records = await fetch();
  // Nothing is opened until every window succeeded, so a failed run leaves no file or rows behind.
  const { sink, database } = openSink(kind, out ?? defaultCsvFilename(label, new Date()));
  try {
    const result = await sink.write(records);
    log.info({ ...result }, `Stored ${result.rows} records`);
  } finally {
    await database?.close();
  }
}

export async function runCli(argv: string[]): Promise<number> {
  const command = parseCliArgs(argv);
  if (command.kind === 'help') {
    process.stdout.write(`${USAGE}\n`);
    return 0;
  }

  if (command.kind === 'migrate') {
    validateStartupEnvironment('postgres');
    const database = createGenerationDatabase(DATABASE_URL);
    try {
      await runMigrations(database.db);
    } finally {
      await database.close();
    }
    return 0;
  }

  const { warnings } = validateStartupEnvironment(command.sink);
  for (const warning of warnings) log.warn(`[startup-env] ${warning}`);

  const runMetrics = createRunMetricsTracker();
  const client = new ElexonGenerationClient({
    maxAttempts: command.attempts,
    metricsTracker: combineMetricsTrackers(runMetrics, prometheusMetricsTracker),
  });

  if (command.kind === 'schedule') {
    await runScheduler(client, command.sink, command.out);
    return 0;
  }

  try {
    if (command.kind === 'current') {
      await fetchAndStore('current', command.sink, command.out, () => client.fetchCurrentGeneration());
    } else if (command.kind === 'historical') {
      await fetchAndStore(`historical_${command.days}d`, command.sink, command.out, () =>
        fetchHistoricalDays(command.days, {
          fetchWindow: (start, end) => client.fetchWindow(start, end),
          chunkDays: HISTORICAL_CHUNK_DAYS,
          chunkDelayMs: HISTORICAL_CHUNK_DELAY_MS,
        }),
      );
    } else {
      const { from, to } = command;
      await fetchAndStore('range', command.sink, command.out, () =>
        runHistoricalFetch({
          start: from,
          end: to,
          fetchWindow: (start, end) => client.fetchWindow(start, end),
          chunkDays: HISTORICAL_CHUNK_DAYS,
          chunkDelayMs: HISTORICAL_CHUNK_DELAY_MS,
        }),
      );
    }
  } finally {
    log.info(runMetrics.summary(), 'Run summary');
    await client.close();
  }
  return 0;
}

async function runScheduler(client: ElexonGenerationClient, kind: SinkKind, out: string | null): Promise<void> {
  registerDefaultMetrics();
  const database = kind === 'postgres' ? createGenerationDatabase(DATABASE_URL) : null;
  const sink: GenerationSink = database
    ? new PostgresGenerationSink({ db: database.db })
    : new CsvGenerationSink({ filename: out ?? 'generation_latest.csv' });

  const scheduler = new GenerationRefreshScheduler({
    fetchCurrent: () => client.fetchCurrentGeneration(),
    sink,
    intervalMs: DATA_REFRESH_INTERVAL_MS,
  });
  const monitoring = ENABLE_PROMETHEUS
    ? buildMonitoringServer({
        registry: metricsRegistry,
        getRefreshStatus: () => scheduler.getStatus(),
        staleAfterMs: DATA_REFRESH_INTERVAL_MS * 2,
      })
    : null;
  if (monitoring) {
    await monitoring.listen({ port: METRICS_PORT, host: '0.0.0.0' });
    log.info({ port: METRICS_PORT }, 'Monitoring endpoints listening');
  }

  scheduler.start();

  await new Promise<void>((resolve) => {
    const shutdown = (signal: string) => {
      log.info({ signal }, 'Shutting down');
      scheduler.stop();
      resolve();
    };
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));
  });

  const closing = await Promise.allSettled([
    monitoring ? monitoring.close() : Promise.resolve(),
    client.close(),
    database ? database.close() : Promise.resolve(),
  ]);
  for (const outcome of closing) {
    if (outcome.status === 'rejected') {
      log.error(`Shutdown step failed: ${errorMessage(outcome.reason)}`);
    }
  }
}
