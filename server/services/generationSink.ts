/**
 * Sink adapters that hand cleaned generation records to durable storage.
 *
 * Both sinks are all-or-nothing per write: the CSV sink renames a finished
 * temp file into place, the PostgreSQL sink inserts inside one transaction.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import type { Insertable, Kysely } from 'kysely';
import { DATA_SOURCE_LABEL, RAW_DATA_DIR } from '../config.js';
import type { Database, GenerationData } from '../db/types.js';
import logger, { type Logger } from '../logger.js';
import type { GenerationRecord } from './generationParser.js';

export interface SinkWriteResult {
  sink: string;
  rows: number;
  location: string;
}

export interface GenerationSink {
  readonly name: string;
  write(records: readonly GenerationRecord[]): Promise<SinkWriteResult>;
}

// ---------------------------------------------------------------------------
// CSV
// ---------------------------------------------------------------------------

export const CSV_HEADER = ['timestamp', 'fuel_type', 'generation_mw'] as const;

function escapeCsvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/** Header plus one line per record, `\n`-terminated, timestamps in ISO UTC. */
export function toCsv(records: readonly GenerationRecord[]): string {
  const lines = [CSV_HEADER.join(',')];
  for (const record of records) {
    lines.push(
      [record.timestamp.toISOString(), escapeCsvField(record.fuelType), String(record.generationMw)].join(','),
    );
  }
  return `${lines.join('\n')}\n`;
}

export interface CsvSinkOptions {
  filename: string;
  directory?: string;
  logger?: Logger;
}

export class CsvGenerationSink implements GenerationSink {
  readonly name = 'csv';
  private readonly directory: string;
  private readonly filename: string;
  private readonly log: Logger;

  constructor(options: CsvSinkOptions) {
    const filename = String(options.filename || '').trim();
    if (!filename || path.basename(filename) !== filename) {
      throw new Error(`CSV filename must be a plain file name (received: "${options.filename}")`);
    }
    this.filename = filename;
    this.directory = options.directory ?? RAW_DATA_DIR;
    this.log = options.logger ?? logger.child({ module: 'csv-sink' });
  }

  async write(records: readonly GenerationRecord[]): Promise<SinkWriteResult> {
    await fs.mkdir(this.directory, { recursive: true });
    const target = path.join(this.directory, this.filename);
    const temp = `${target}.${process.pid}.tmp`;
    try {
      await fs.writeFile(temp, toCsv(records), 'utf8');
      await fs.rename(temp, target);
    } catch (err: unknown) {
      await fs.rm(temp, { force: true });
      throw err;
    }
    this.log.info({ rows: records.length, path: target }, `Data saved to ${target}`);
    return { sink: this.name, rows: records.length, location: target };
  }
}

// ---------------------------------------------------------------------------
// PostgreSQL
// ---------------------------------------------------------------------------

export const INSERT_BATCH_SIZE = 1000;

export function toGenerationRows(
  records: readonly GenerationRecord[],
  dataSource: string = DATA_SOURCE_LABEL,
): Insertable<GenerationData>[] {
  return records.map((record) => ({
    timestamp: record.timestamp,
    fuel_type: record.fuelType,
    generation_mw: record.generationMw,
    data_source: dataSource,
  }));
}

export interface PostgresSinkOptions {
  db: Kysely<Database>;
  dataSource?: string;
  batchSize?: number;
  logger?: Logger;
}

export class PostgresGenerationSink implements GenerationSink {
  readonly name = 'postgres';
  private readonly db: Kysely<Database>;
  private readonly dataSource: string;
  private readonly batchSize: number;
  private readonly log: Logger;

  constructor(options: PostgresSinkOptions) {
    this.db = options.db;
    this.dataSource = options.dataSource ?? DATA_SOURCE_LABEL;
    this.batchSize = Math.max(1, Math.floor(Number(options.batchSize) || INSERT_BATCH_SIZE));
    this.log = options.logger ?? logger.child({ module: 'postgres-sink' });
  }

  async write(records: readonly GenerationRecord[]): Promise<SinkWriteResult> {
    const rows = toGenerationRows(records, this.dataSource);
    if (rows.length > 0) {
      await this.db.transaction().execute(async (trx) => {
        for (let offset = 0; offset < rows.length; offset += this.batchSize) {
          await trx
            .insertInto('generation_data')
            .values(rows.slice(offset, offset + this.batchSize))
            .execute();
        }
      });
    }
    this.log.info({ rows: rows.length }, `Inserted ${rows.length} rows into generation_data`);
    return { sink: this.name, rows: rows.length, location: 'generation_data' };
  }
}
