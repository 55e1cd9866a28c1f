import type { ColumnType } from 'kysely';

export type Timestamp = ColumnType<Date, Date | string, Date | string>;

export type Generated<T> =
  T extends ColumnType<infer S, infer I, infer U> ? ColumnType<S, I | undefined, U> : ColumnType<T, T | undefined, T>;

export interface GenerationData {
  id: Generated<number>;
  timestamp: Timestamp;
  fuel_type: string;
  generation_mw: number;
  data_source: string | null;
  created_at: Generated<Timestamp>;
}

export interface Database {
  generation_data: GenerationData;
}
