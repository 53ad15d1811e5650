import { addDays, addMonths, addWeeks, format, isValid, parse } from 'date-fns';
import type { Frequency, YearMonth } from '../types/series';

const MS_PER_DAY = 86_400_000;

// date-fns works on local calendar fields. Timestamps here are UTC instants,
// so every operation goes through a local date carrying the same Y/M/D.
function toCalendarDate(ts: Date): Date {
  return new Date(ts.getUTCFullYear(), ts.getUTCMonth(), ts.getUTCDate());
}

function fromCalendarDate(local: Date): Date {
  return new Date(Date.UTC(local.getFullYear(), local.getMonth(), local.getDate()));
}

/** First day of a calendar month, 00:00 UTC. */
export function monthStart(year: number, month: number): Date {
  return new Date(Date.UTC(year, month - 1, 1));
}

/** Number of months from `a` to `b` (b - a). */
export function monthsBetween(a: YearMonth, b: YearMonth): number {
  return (b.year - a.year) * 12 + (b.month - a.month);
}

/**
 * Move `ts` by `steps` periods of `freq`. Month steps use civil months and clamp
 * to the last day of shorter months (Jan 31 + 1 month = Feb 28/29).
 */
export function shiftTimestamp(ts: Date, freq: Frequency, steps: number): Date {
  const local = toCalendarDate(ts);
  switch (freq) {
    case 'monthly':
      return fromCalendarDate(addMonths(local, steps));
    case 'weekly':
      return fromCalendarDate(addWeeks(local, steps));
    case 'daily':
      return fromCalendarDate(addDays(local, steps));
  }
}

/** Days since 1970-01-01 (fractional for intra-day instants). */
export function toEpochDays(ts: Date): number {
  return ts.getTime() / MS_PER_DAY;
}

export function formatMonth(ts: Date): string {
  return format(toCalendarDate(ts), 'yyyy-MM');
}

export function formatDay(ts: Date): string {
  return format(toCalendarDate(ts), 'yyyy-MM-dd');
}

/** Parse a strict `yyyy-MM-dd` string as 00:00 UTC. Returns null when invalid. */
export function parseDay(value: string): Date | null {
  const trimmed = value.trim();
  if (!/^\d{4}-\d{2}-\d{2}$/.test(trimmed)) return null;
  const local = parse(trimmed, 'yyyy-MM-dd', new Date());
  return isValid(local) ? fromCalendarDate(local) : null;
}
