/**
 * Shared date/time helpers. All functions are pure and work in UTC.
 */

export const MS_PER_HOUR = 60 * 60 * 1000;
export const MS_PER_DAY = 24 * MS_PER_HOUR;

export function isValidDate(value: unknown): value is Date {
  return value instanceof Date && Number.isFinite(value.getTime());
}

export function addUtcDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * MS_PER_DAY);
}

export function addUtcHours(date: Date, hours: number): Date {
  return new Date(date.getTime() + hours * MS_PER_HOUR);
}

/** `YYYY-MM-DDTHH:MM:SSZ`; sub-second precision is truncated. */
export function formatUtcSeconds(date: Date): string {
  return `${date.toISOString().slice(0, 19)}Z`;
}

/** `YYYY-MM-DD` of the UTC calendar day. */
export function formatDateUTC(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/** Parses an ISO-8601 string; returns null when it is not a date. */
export function parseIsoTimestamp(value: string): Date | null {
  const ms = Date.parse(String(value || '').trim());
  return Number.isFinite(ms) ? new Date(ms) : null;
}
