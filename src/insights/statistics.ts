/**
 * Statistics Primitives
 *
 * Guarded wrappers over simple-statistics plus the grouping helpers the
 * analyzers share. Every function returns a safe default on empty or
 * degenerate input instead of NaN or Infinity.
 */

import { mean as ssMean, variance as ssVariance } from 'simple-statistics';
import { getDayOfYear } from 'date-fns';

export interface SeriesStatistics {
  mean: number;
  /** Population variance. */
  variance: number;
  standardDeviation: number;
}

const EMPTY_STATS: SeriesStatistics = { mean: 0, variance: 0, standardDeviation: 0 };

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return ssMean([...values]);
}

export function describeSeries(values: readonly number[]): SeriesStatistics {
  if (values.length === 0) return { ...EMPTY_STATS };
  const copy = [...values];
  const variance = ssVariance(copy);
  return { mean: ssMean(copy), variance, standardDeviation: Math.sqrt(variance) };
}

/**
 * Percent change from `previous` to `current`.
 * A zero baseline reads as 100% when anything appeared, else 0%.
 */
export function calculatePercentChange(previous: number, current: number): number {
  if (previous === 0) return current > 0 ? 100 : 0;
  return ((current - previous) * 100) / Math.abs(previous);
}

/**
 * Population standard deviation over mean.
 * 0 for fewer than two points; 1 when the mean is zero.
 */
export function coefficientOfVariation(values: readonly number[]): number {
  if (values.length < 2) return 0;
  const stats = describeSeries(values);
  if (stats.mean === 0) return 1;
  return stats.standardDeviation / Math.abs(stats.mean);
}

/** Null when the reference series is flat; nothing can be anomalous against it. */
export function zScore(value: number, stats: SeriesStatistics): number | null {
  if (stats.standardDeviation <= 0) return null;
  return (value - stats.mean) / stats.standardDeviation;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

// ─── Grouping ───────────────────────────────────────────────

/** Group items by key, preserving first-seen key order. */
export function groupBy<T, K>(items: Iterable<T>, keyFn: (item: T) => K): Map<K, T[]> {
  const groups = new Map<K, T[]>();
  for (const item of items) {
    const key = keyFn(item);
    const bucket = groups.get(key);
    if (bucket) {
      bucket.push(item);
    } else {
      groups.set(key, [item]);
    }
  }
  return groups;
}

/**
 * Week bucket key: year * 100 + floor(dayOfYear / 7).
 * Day 1-6 of January land in week 0, so buckets straddle calendar weeks.
 */
export function weekKey(date: Date): number {
  return date.getFullYear() * 100 + Math.floor(getDayOfYear(date) / 7);
}

export function dayKey(date: Date): number {
  return date.getFullYear() * 1000 + getDayOfYear(date);
}

export function monthKey(date: Date): number {
  return date.getFullYear() * 100 + date.getMonth() + 1;
}
