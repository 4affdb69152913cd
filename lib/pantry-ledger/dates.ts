/**
 * Calendar helpers. Dates are plain YYYY-MM-DD strings throughout the ledger;
 * arithmetic happens in UTC so no local offset can shift a day.
 */

import { invalidAmount } from './errors';
import type { DateRange } from './db/client';

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

const MS_PER_DAY = 1000 * 60 * 60 * 24;

function toUtcMs(date: string): number {
  const match = ISO_DATE.exec(date);
  if (!match) {
    return NaN;
  }
  return Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3]));
}

/**
 * True for real calendar dates only (rejects 2024-02-30).
 */
export function isIsoDate(value: string): boolean {
  const ms = toUtcMs(value);
  if (isNaN(ms)) return false;
  return new Date(ms).toISOString().slice(0, 10) === value;
}

export function assertIsoDate(value: string, field: string): void {
  if (!isIsoDate(value)) {
    throw invalidAmount(`${field} must be a YYYY-MM-DD date, got "${value}"`);
  }
}

/**
 * Whole days from `from` to `to` (negative when `to` is earlier).
 */
export function daysBetween(from: string, to: string): number {
  return Math.round((toUtcMs(to) - toUtcMs(from)) / MS_PER_DAY);
}

export function addDays(date: string, days: number): string {
  return new Date(toUtcMs(date) + days * MS_PER_DAY).toISOString().slice(0, 10);
}

const MIN_YEAR = 1000;
const MAX_YEAR = 9999;

/**
 * [first day of month, first day of next month)
 */
export function monthRange(year: number, month: number): DateRange {
  if (!Number.isInteger(year) || !Number.isInteger(month) || month < 1 || month > 12) {
    throw invalidAmount(`invalid month: ${year}-${month}`);
  }
  // Date.UTC maps years 0-99 onto 1900-1999; the range end must stay a 4-digit year
  if (year < MIN_YEAR || year > MAX_YEAR || (year === MAX_YEAR && month === 12)) {
    throw invalidAmount(`year out of range: ${year}-${month}`);
  }
  const start = new Date(Date.UTC(year, month - 1, 1)).toISOString().slice(0, 10);
  const end = new Date(Date.UTC(year, month, 1)).toISOString().slice(0, 10);
  return { start, end };
}

export function dayRange(date: string): DateRange {
  return { start: date, end: addDays(date, 1) };
}

export function todayIso(now: Date = new Date()): string {
  return now.toISOString().slice(0, 10);
}
