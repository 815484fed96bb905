/**
 * Insight Types
 *
 * Data structures produced by trend analysis, anomaly detection,
 * forecasting, and recommendations.
 */

export const INSIGHT_SEVERITIES = ['info', 'success', 'warning', 'critical'] as const;
export type InsightSeverity = (typeof INSIGHT_SEVERITIES)[number];

export const INSIGHT_CATEGORIES = [
  'revenue_trend',
  'expense_trend',
  'anomaly',
  'forecast',
  'inventory',
  'product',
  'customer',
  'payment',
  'recommendation',
] as const;
export type InsightCategory = (typeof INSIGHT_CATEGORIES)[number];

/** A single finding, ready for presentation. Never mutated after creation. */
export interface InsightItem {
  title: string;
  description: string;
  recommendation?: string;
  severity: InsightSeverity;
  category: InsightCategory;
  metricValue?: number;
  percentageChange?: number;
}

export type ConfidenceLevel = 'low' | 'medium' | 'high';
export type TrendDirection = 'increasing' | 'stable' | 'decreasing';

export interface ForecastData {
  forecastedRevenue: number;
  forecastedExpenses: number;
  forecastedProfit: number;
  revenueGrowthPercent: number;
  expenseGrowthPercent: number;
  profitGrowthPercent: number;
  expectedNewCustomers: number;
  customerGrowthPercent: number;
  confidenceScore: number; // 0-100
  confidenceLevel: ConfidenceLevel;
  dataMonthsUsed: number;
  forecastMethod: string;
}

export interface SeasonalPattern {
  seasonLength: number;
  /** One factor per season position; additive offsets or multiplicative ratios. */
  seasonalFactors: number[];
  seasonalStrength: number; // 0-1
  trendDirection: TrendDirection;
  trendSlope: number;
  isMultiplicative: boolean;
  description: string;
}

export interface InsightsSummary {
  totalInsights: number;
  trendsDetected: number;
  anomaliesDetected: number;
  opportunities: number;
  monthsOfData: number;
}

export interface InsightsData {
  hasSufficientData: boolean;
  insufficientDataMessage?: string;
  revenueTrends: InsightItem[];
  anomalies: InsightItem[];
  forecasts: InsightItem[];
  recommendations: InsightItem[];
  forecast: ForecastData;
  summary: InsightsSummary;
  generatedAt: string;
}
