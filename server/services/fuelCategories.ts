import type { GenerationRecord } from './generationParser.js';

export type FuelCategory = 'renewable' | 'fossil' | 'nuclear' | 'other';

export const FUEL_CATEGORIES: readonly FuelCategory[] = ['renewable', 'fossil', 'nuclear', 'other'];

/** BMRS `psrType` → category. Fuel types missing here count as `other`. */
export const FUEL_CATEGORY_MAP: Readonly<Record<string, FuelCategory>> = Object.freeze({
  Biomass: 'renewable',
  'Fossil Gas': 'fossil',
  'Fossil Hard coal': 'fossil',
  'Fossil Oil': 'fossil',
  'Hydro Pumped Storage': 'renewable',
  'Hydro Run-of-river and poundage': 'renewable',
  Nuclear: 'nuclear',
  Other: 'other',
  Solar: 'renewable',
  'Wind Offshore': 'renewable',
  'Wind Onshore': 'renewable',
});

export function categorizeFuelType(fuelType: string): FuelCategory {
  return Object.prototype.hasOwnProperty.call(FUEL_CATEGORY_MAP, fuelType) ? FUEL_CATEGORY_MAP[fuelType] : 'other';
}

export interface GenerationMixRow {
  timestamp: Date;
  totalMw: number;
  byCategory: Record<FuelCategory, number>;
  /** Renewable share of the total, 0–100, two decimals. 0 when the total is 0. */
  renewablePercent: number;
}

/** Per-timestamp totals by category, ordered by timestamp. */
export function aggregateGenerationMix(records: readonly GenerationRecord[]): GenerationMixRow[] {
  const rows = new Map<number, GenerationMixRow>();
  for (const record of records) {
    const key = record.timestamp.getTime();
    let row = rows.get(key);
    if (!row) {
      row = {
        timestamp: record.timestamp,
        totalMw: 0,
        byCategory: { renewable: 0, fossil: 0, nuclear: 0, other: 0 },
        renewablePercent: 0,
      };
      rows.set(key, row);
    }
    row.totalMw += record.generationMw;
    row.byCategory[categorizeFuelType(record.fuelType)] += record.generationMw;
  }

  return Array.from(rows.values())
    .sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime())
    .map((row) => ({
      ...row,
      renewablePercent: row.totalMw > 0 ? Math.round((row.byCategory.renewable / row.totalMw) * 10_000) / 100 : 0,
    }));
}
