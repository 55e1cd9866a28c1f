import { Pool } from 'pg';
import { Kysely, PostgresDialect } from 'kysely';
import { instrumentPool } from './lib/dbMonitor.js';
import type { Database } from './db/types.js';
import logger from './logger.js';

export interface GenerationDatabase {
  pool: Pool;
  db: Kysely<Database>;
  close(): Promise<void>;
}

/** Pool + kysely instance for the PostgreSQL sink. `db.destroy()` also ends the pool. */
export function createGenerationDatabase(connectionString: string): GenerationDatabase {
  const url = String(connectionString || '').trim();
  if (!url) {
    throw new Error('DATABASE_URL is not configured');
  }
  const log = logger.child({ module: 'db' });
  const pool = new Pool({
    connectionString: url,
    max: 5,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 5000,
    statement_timeout: 30000,
  });
  pool.on('error', (err) => {
    log.error({ error: err.message }, 'Unexpected idle pool client error');
  });
  instrumentPool(pool, log);

  const db = new Kysely<Database>({
    dialect: new PostgresDialect({ pool }),
  });
  return {
    pool,
    db,
    close: () => db.destroy(),
  };
}
