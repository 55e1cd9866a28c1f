/**
 * Query timing for the pg pool behind the PostgreSQL sink. Slow queries are
 * logged at warn, failed ones at error, both with the first 200 chars of SQL.
 */

import type { Pool } from 'pg';
import type { Logger } from '../logger.js';

export const SLOW_QUERY_THRESHOLD_MS = Math.max(0, Number(process.env.SLOW_QUERY_THRESHOLD_MS) || 500);

export function extractSql(args: unknown[]): string {
  const first = args[0];
  let raw = '';
  if (typeof first === 'string') {
    raw = first;
  } else if (first && typeof first === 'object' && 'text' in first) {
    raw = String(first.text || '');
  }
  return raw.replace(/\s+/g, ' ').trim().slice(0, 200);
}

type QueryFn = (...args: unknown[]) => Promise<unknown>;

export function instrumentPool(pool: Pool, log: Logger, slowQueryThresholdMs: number = SLOW_QUERY_THRESHOLD_MS): Pool {
  const originalQuery = pool.query.bind(pool) as unknown as QueryFn;

  // pg's Pool.query is not redefinable through the public interface; patching
  // the instance keeps kysely's PostgresDialect unaware of the timing layer.
  (pool as unknown as { query: QueryFn }).query = async function monitoredQuery(...args: unknown[]) {
    const start = performance.now();
    try {
      const result = await originalQuery(...args);
      const durationMs = performance.now() - start;
      if (durationMs >= slowQueryThresholdMs) {
        log.warn({ durationMs: Math.round(durationMs), sql: extractSql(args) }, 'Slow query');
      }
      return result;
    } catch (err: unknown) {
      const durationMs = performance.now() - start;
      log.error(
        { durationMs: Math.round(durationMs), sql: extractSql(args), error: err instanceof Error ? err.message : String(err) },
        'Query failed',
      );
      throw err;
    }
  };

  return pool;
}
