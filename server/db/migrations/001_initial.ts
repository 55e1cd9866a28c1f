import { Kysely, sql } from 'kysely';

export async function up(db: Kysely<any>): Promise<void> {
  await db.schema
    .createTable('generation_data')
    .ifNotExists()
    .addColumn('id', 'serial', (col) => col.primaryKey())
    .addColumn('timestamp', 'timestamptz', (col) => col.notNull())
    .addColumn('fuel_type', 'varchar(50)', (col) => col.notNull())
    .addColumn('generation_mw', 'double precision', (col) => col.notNull())
    .addColumn('data_source', 'varchar(50)')
    .addColumn('created_at', 'timestamptz', (col) => col.defaultTo(sql`NOW()`))
    .execute();

  await db.schema
    .createIndex('idx_generation_data_timestamp')
    .ifNotExists()
    .on('generation_data')
    .columns(['timestamp', 'fuel_type'])
    .execute();
}

export async function down(db: Kysely<any>): Promise<void> {
  await db.schema.dropTable('generation_data').ifExists().execute();
}
