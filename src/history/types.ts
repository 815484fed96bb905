/**
 * History Types
 *
 * Forecasts recorded for a future period and, once that period has
 * passed, the actual figures they are scored against.
 */

export interface ForecastRecord {
  id: string;
  /** ISO timestamp of when the forecast was made. */
  forecastDate: string;
  /** YYYY-MM-DD, inclusive */
  periodStart: string;
  /** YYYY-MM-DD, inclusive */
  periodEnd: string;

  forecastedRevenue: number;
  actualRevenue: number | null;
  forecastedExpenses: number;
  actualExpenses: number | null;
  forecastedProfit: number;
  actualProfit: number | null;
  forecastedNewCustomers: number;
  actualNewCustomers: number | null;

  confidenceScore: number;
  forecastMethod: string;
  isValidated: boolean;
}

export type AccuracyTrend = 'improving' | 'stable' | 'declining';

export interface ForecastAccuracyData {
  /** Newest period first. */
  records: ForecastRecord[];
  averageRevenueAccuracy: number;
  averageExpensesAccuracy: number;
  overallRevenueMape: number;
  validatedCount: number;
  totalCount: number;
  trend: AccuracyTrend;
  description: string;
}

export interface RecentAccuracy {
  revenueAccuracy: number;
  expenseAccuracy: number;
}
