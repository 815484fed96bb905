/**
 * Analysis Date Ranges
 *
 * Pure functions to build and compare the calendar-day ranges the
 * insights engine analyses. Both ends are inclusive whole days.
 */

import {
  addMonths,
  differenceInCalendarDays,
  endOfMonth,
  format,
  isValid,
  parseISO,
  startOfDay,
  startOfMonth,
  subDays,
} from 'date-fns';
import { LedgerContractError } from '../insights/errors.js';

export interface AnalysisDateRange {
  startDate: Date;
  endDate: Date;
}

/**
 * Build a range from two dates, truncated to whole days.
 * Throws LedgerContractError when start is after end.
 */
export function createDateRange(start: Date, end: Date): AnalysisDateRange {
  const startDate = startOfDay(start);
  const endDate = startOfDay(end);
  if (startDate.getTime() > endDate.getTime()) {
    throw new LedgerContractError(
      `Start date ${formatDay(startDate)} is after end date ${formatDay(endDate)}`
    );
  }
  return { startDate, endDate };
}

/** Inclusive number of days covered by the range. */
export function dayCount(range: AnalysisDateRange): number {
  return differenceInCalendarDays(range.endDate, range.startDate) + 1;
}

/** Same-length range ending the day before this one starts. */
export function previousPeriod(range: AnalysisDateRange): AnalysisDateRange {
  const endDate = subDays(range.startDate, 1);
  return { startDate: subDays(endDate, dayCount(range) - 1), endDate };
}

/**
 * The last `days` days ending on `now` (inclusive).
 * Used by: analysis tools when no explicit dates are given
 */
export function lastNDaysRange(days: number, now: Date = new Date()): AnalysisDateRange {
  const endDate = startOfDay(now);
  return createDateRange(subDays(endDate, Math.max(1, days) - 1), endDate);
}

/** From the first of the current month through `now`. */
export function monthToDateRange(now: Date = new Date()): AnalysisDateRange {
  return createDateRange(startOfMonth(now), now);
}

/**
 * The calendar month after the one containing `reference`.
 * Used by: forecast tracking, which scores forecasts per month
 */
export function nextMonthRange(reference: Date): AnalysisDateRange {
  const first = startOfMonth(addMonths(reference, 1));
  return createDateRange(first, endOfMonth(first));
}

// ─── Day Comparisons ────────────────────────────────────────

function dayValue(date: Date): number {
  return startOfDay(date).getTime();
}

/** True when `date` falls on a day inside [from, to]. */
export function isWithinDays(date: Date, from: Date, to: Date): boolean {
  const day = dayValue(date);
  return day >= dayValue(from) && day <= dayValue(to);
}

export function isInRange(date: Date, range: AnalysisDateRange): boolean {
  return isWithinDays(date, range.startDate, range.endDate);
}

/** True when `date` falls on a day inside [from, before). */
export function isBeforeDay(date: Date, from: Date, before: Date): boolean {
  const day = dayValue(date);
  return day >= dayValue(from) && day < dayValue(before);
}

/** Days from `earlier` to `later`, counted in whole calendar days. */
export function daysBetween(earlier: Date, later: Date): number {
  return differenceInCalendarDays(later, earlier);
}

// ─── Parsing ────────────────────────────────────────────────

/**
 * Parse a YYYY-MM-DD (or full ISO 8601) string as a local date.
 * Throws LedgerContractError on anything unparseable.
 */
export function parseDay(value: string): Date {
  const parsed = parseISO(value);
  if (!isValid(parsed)) {
    throw new LedgerContractError(`Invalid date: "${value}"`);
  }
  return parsed;
}

export function formatDay(date: Date): string {
  return format(date, 'yyyy-MM-dd');
}

export interface DateRangeOptions {
  startDate?: string;
  endDate?: string;
  days?: number;
  monthToDate?: boolean;
}

/**
 * Build a range from optional CLI/tool arguments.
 * Explicit dates win, then month-to-date, then the last `days` (default 30).
 */
export function resolveDateRange(opts: DateRangeOptions, now: Date = new Date()): AnalysisDateRange {
  if (opts.startDate || opts.endDate) {
    const end = opts.endDate ? parseDay(opts.endDate) : now;
    const start = opts.startDate
      ? parseDay(opts.startDate)
      : subDays(startOfDay(end), (opts.days ?? 30) - 1);
    return createDateRange(start, end);
  }
  if (opts.monthToDate) {
    return monthToDateRange(now);
  }
  return lastNDaysRange(opts.days ?? 30, now);
}
