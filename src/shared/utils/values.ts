/**
 * Helpers for turning driver values into plain record fields.
 */

export function toNumber(value: unknown): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value.trim() !== '') return Number(value);
  return 0;
}

export function toNullableNumber(value: unknown): number | null {
  return value === null || value === undefined ? null : toNumber(value);
}

/**
 * DATE columns arrive as 'YYYY-MM-DD' strings from `pg` (see connection.ts)
 * and as Date objects from other drivers.
 */
export function toIsoDate(value: unknown): string {
  if (value instanceof Date) return value.toISOString().slice(0, 10);
  return String(value).slice(0, 10);
}

export function toIsoTimestamp(value: unknown): string {
  if (value instanceof Date) return value.toISOString();
  return new Date(String(value)).toISOString();
}

/** 'HH:MM' from a TIME column, or null. */
export function toTime(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  return String(value).slice(0, 5);
}

export function roundMoney(value: number): number {
  return Math.round((value + Number.EPSILON) * 100) / 100;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function todayIso(now: Date = new Date()): string {
  return now.toISOString().slice(0, 10);
}

export function firstDayOfMonthIso(now: Date = new Date()): string {
  return `${now.toISOString().slice(0, 7)}-01`;
}
