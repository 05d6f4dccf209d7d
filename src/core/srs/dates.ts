/**
 * Calendar date helpers. Review dates are whole days, stored as YYYY-MM-DD
 * and computed in UTC so the same instant maps to the same day everywhere.
 */

const MS_PER_DAY = 24 * 60 * 60 * 1000;

export function toDateKey(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Parses a YYYY-MM-DD key as UTC midnight. Returns null for anything else,
 * including dates that do not exist (2024-02-30).
 */
export function parseDateKey(value: string): Date | null {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) return null;
  const date = new Date(`${value}T00:00:00.000Z`);
  if (Number.isNaN(date.getTime()) || toDateKey(date) !== value) return null;
  return date;
}

export function addDays(date: Date, days: number): string {
  const start = Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate());
  return toDateKey(new Date(start + days * MS_PER_DAY));
}

/** Whole days from `from` to the YYYY-MM-DD `dateKey` (negative if past). */
export function daysUntil(dateKey: string, from: Date): number {
  const target = Date.parse(`${dateKey}T00:00:00.000Z`);
  const start = Date.UTC(from.getUTCFullYear(), from.getUTCMonth(), from.getUTCDate());
  return Math.round((target - start) / MS_PER_DAY);
}
