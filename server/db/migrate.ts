import { promises as fs } from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { Migrator, FileMigrationProvider, Kysely } from 'kysely';
import logger from '../logger.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const log = logger.child({ module: 'migrate' });

/** Migrates to the latest version and returns the names of the migrations it executed. */
export async function runMigrations(db: Kysely<any>): Promise<string[]> {
  const migrator = new Migrator({
    db,
    provider: new FileMigrationProvider({
      fs,
      path,
      // The migrations folder sits next to this file
      migrationFolder: path.join(__dirname, 'migrations'),
    }),
  });

  const { error, results } = await migrator.migrateToLatest();

  const executed: string[] = [];
  for (const it of results ?? []) {
    if (it.status === 'Success') {
      executed.push(it.migrationName);
      log.info({ migration: it.migrationName }, 'Migration executed');
    } else if (it.status === 'Error') {
      log.error({ migration: it.migrationName }, 'Migration failed');
    }
  }

  if (error) {
    throw error instanceof Error ? error : new Error(`Failed to run migrations: ${String(error)}`);
  }
  if (executed.length === 0) {
    log.info('Schema already up to date');
  }
  return executed;
}
