import 'dotenv/config';
import * as path from 'path';

// --- Upstream API ---
export const ELEXON_API_BASE_URL = String(
  process.env.ELEXON_API_BASE_URL || 'https://data.elexon.co.uk/bmrs/api/v1',
).trim();
export const ELEXON_USER_AGENT = String(process.env.ELEXON_USER_AGENT || 'uk-grid-generation-pipeline/1.0').trim();
export const FETCH_TIMEOUT_MS = Math.max(1_000, Number(process.env.FETCH_TIMEOUT_MS) || 30_000);
export const FETCH_RETRY_ATTEMPTS = Math.max(1, Math.floor(Number(process.env.FETCH_RETRY_ATTEMPTS) || 3));

// --- Data quality ---
/**
 * Lowest plausible national total (MW) for one settlement period. Periods
 * below it are partial fuel-mix snapshots and get dropped. Grid baselines
 * drift over the years, hence the override.
 */
export const MIN_TOTAL_GENERATION_MW = Math.max(0, Number(process.env.MIN_TOTAL_GENERATION_MW) || 25_000);

// --- Historical fetch ---
export const HISTORICAL_DAYS = Math.max(1, Math.floor(Number(process.env.HISTORICAL_DAYS) || 7));
export const HISTORICAL_CHUNK_DAYS = Math.max(1, Math.floor(Number(process.env.HISTORICAL_CHUNK_DAYS) || 7));
// 0 is a legitimate delay, so the usual `|| default` idiom does not apply here.
const rawChunkDelayMs = Number(process.env.HISTORICAL_CHUNK_DELAY_MS || 1_000);
export const HISTORICAL_CHUNK_DELAY_MS = Number.isFinite(rawChunkDelayMs) ? Math.max(0, rawChunkDelayMs) : 1_000;
export const CURRENT_WINDOW_HOURS = Math.max(1, Number(process.env.CURRENT_WINDOW_HOURS) || 24);

// --- Sinks ---
export const RAW_DATA_DIR = path.resolve(String(process.env.RAW_DATA_DIR || path.join('data', 'raw')).trim());
export const DATABASE_URL = String(process.env.DATABASE_URL || '').trim();
export const DATA_SOURCE_LABEL = 'elexon';

// --- Scheduler / monitoring ---
export const DATA_REFRESH_INTERVAL_MS = Math.max(60_000, Number(process.env.DATA_REFRESH_INTERVAL_MS) || 30 * 60 * 1000);
export const ENABLE_PROMETHEUS = String(process.env.ENABLE_PROMETHEUS || 'false').toLowerCase() === 'true';
export const METRICS_PORT = Math.max(1, Math.floor(Number(process.env.METRICS_PORT) || 9464));

export type SinkKind = 'csv' | 'postgres';

export function parseSinkKind(raw: unknown): SinkKind {
  const value = String(raw || 'csv')
    .trim()
    .toLowerCase();
  if (value === 'csv' || value === 'postgres') return value;
  throw new Error(`Unknown sink "${String(raw)}" (expected csv or postgres)`);
}

// --- Startup validation ---
export function validateStartupEnvironment(
  sink: SinkKind,
  env: NodeJS.ProcessEnv = process.env,
): { warnings: string[] } {
  const errors: string[] = [];
  const warnings: string[] = [];
  const warnIfInvalidPositiveNumber = (name: string) => {
    const raw = env[name];
    if (raw === undefined || raw === '') return;
    const numeric = Number(raw);
    if (!Number.isFinite(numeric) || numeric <= 0) {
      warnings.push(`${name} should be a positive number (received: ${String(raw)})`);
    }
  };
  const warnIfInvalidNonNegativeNumber = (name: string) => {
    const raw = env[name];
    if (raw === undefined || raw === '') return;
    const numeric = Number(raw);
    if (!Number.isFinite(numeric) || numeric < 0) {
      warnings.push(`${name} should be a non-negative number (received: ${String(raw)})`);
    }
  };

  if (sink === 'postgres' && !String(env.DATABASE_URL || '').trim()) {
    errors.push('DATABASE_URL is required for the postgres sink');
  }
  const baseUrl = String(env.ELEXON_API_BASE_URL || '').trim();
  if (baseUrl && !/^https?:\/\//i.test(baseUrl)) {
    errors.push(`ELEXON_API_BASE_URL must be an http(s) URL (received: ${baseUrl})`);
  }

  [
    'FETCH_TIMEOUT_MS',
    'FETCH_RETRY_ATTEMPTS',
    'MIN_TOTAL_GENERATION_MW',
    'HISTORICAL_DAYS',
    'HISTORICAL_CHUNK_DAYS',
    'CURRENT_WINDOW_HOURS',
    'DATA_REFRESH_INTERVAL_MS',
    'METRICS_PORT',
  ].forEach(warnIfInvalidPositiveNumber);
  ['HISTORICAL_CHUNK_DELAY_MS'].forEach(warnIfInvalidNonNegativeNumber);

  if (errors.length > 0) {
    throw new Error(`Startup environment validation failed: ${errors.join('; ')}`);
  }
  return { warnings };
}
