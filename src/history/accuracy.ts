/**
 * Forecast Accuracy
 *
 * Scores validated forecast records against their actuals.
 * Pure functions — no I/O.
 */

import type {
  AccuracyTrend,
  ForecastAccuracyData,
  ForecastRecord,
  RecentAccuracy,
} from './types.js';
import { mean } from '../insights/statistics.js';

export const NO_VALIDATED_FORECASTS =
  'No validated forecasts yet. Check back after the current forecast period ends.';

/** Points of average accuracy the recent half must move by to count as a trend. */
const TREND_MARGIN = 5;

/** 100 minus the absolute percentage error, floored at 0. Null without a non-zero actual. */
export function accuracyPercent(forecast: number, actual: number | null): number | null {
  if (actual === null || actual === 0) return null;
  return Math.max(0, 100 - (Math.abs(forecast - actual) * 100) / Math.abs(actual));
}

/** Absolute percentage error. Null without a non-zero actual. */
export function absolutePercentageError(forecast: number, actual: number | null): number | null {
  if (actual === null || actual === 0) return null;
  return (Math.abs(forecast - actual) * 100) / Math.abs(actual);
}

export function revenueAccuracy(record: ForecastRecord): number | null {
  return accuracyPercent(record.forecastedRevenue, record.actualRevenue);
}

export function expensesAccuracy(record: ForecastRecord): number | null {
  return accuracyPercent(record.forecastedExpenses, record.actualExpenses);
}

/**
 * Aggregate statistics over `records` (newest period first).
 * The trend compares the older half of revenue accuracies with the newer half.
 */
export function summarizeAccuracy(records: ForecastRecord[]): ForecastAccuracyData {
  const validated = records.filter((r) => r.isValidated);
  const base: ForecastAccuracyData = {
    records,
    averageRevenueAccuracy: 0,
    averageExpensesAccuracy: 0,
    overallRevenueMape: 0,
    validatedCount: validated.length,
    totalCount: records.length,
    trend: 'stable',
    description: NO_VALIDATED_FORECASTS,
  };
  if (validated.length === 0) return base;

  const revenue = present(validated.map(revenueAccuracy));
  const expenses = present(validated.map(expensesAccuracy));
  const mapes = present(
    validated.map((r) => absolutePercentageError(r.forecastedRevenue, r.actualRevenue))
  );

  const averageRevenueAccuracy = mean(revenue);
  const averageExpensesAccuracy = mean(expenses);

  return {
    ...base,
    averageRevenueAccuracy,
    averageExpensesAccuracy,
    overallRevenueMape: mean(mapes),
    trend: accuracyTrend([...revenue].reverse()),
    description: describeAccuracy((averageRevenueAccuracy + averageExpensesAccuracy) / 2),
  };
}

/** Compare the older half of a chronological series with the newer half. */
export function accuracyTrend(chronological: number[]): AccuracyTrend {
  if (chronological.length < 4) return 'stable';
  const half = Math.floor(chronological.length / 2);
  const older = mean(chronological.slice(0, half));
  const newer = mean(chronological.slice(half));
  if (newer > older + TREND_MARGIN) return 'improving';
  if (newer < older - TREND_MARGIN) return 'declining';
  return 'stable';
}

export function describeAccuracy(overall: number): string {
  const error = (100 - overall).toFixed(0);
  if (overall >= 90) {
    return `Excellent accuracy! Forecasts are within ±${error}% of actual values on average.`;
  }
  if (overall >= 80) {
    return `Good accuracy. Forecasts average ±${error}% deviation from actual values.`;
  }
  if (overall >= 70) {
    return `Moderate accuracy. Forecasts average ±${error}% deviation. Consider reviewing data patterns.`;
  }
  return `Low accuracy (±${error}% average error). More historical data may improve predictions.`;
}

/**
 * Average accuracies over validated records (most recent first).
 * Null when none of them has a scorable actual.
 */
export function recentAccuracy(validated: ForecastRecord[]): RecentAccuracy | null {
  const revenue = present(validated.map(revenueAccuracy));
  const expenses = present(validated.map(expensesAccuracy));
  if (revenue.length === 0 && expenses.length === 0) return null;
  return { revenueAccuracy: mean(revenue), expenseAccuracy: mean(expenses) };
}

/** The single accuracy figure fed into forecast confidence. */
export function combinedAccuracy(recent: RecentAccuracy | null): number | null {
  return recent ? (recent.revenueAccuracy + recent.expenseAccuracy) / 2 : null;
}

function present(values: Array<number | null>): number[] {
  return values.filter((v): v is number => v !== null);
}
