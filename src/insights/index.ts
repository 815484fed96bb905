/**
 * LedgerLens engine
 *
 * Library entry point: the five analyses, the async service, the
 * enhanced forecaster and the types they share.
 */

export { generateInsights, assertAnalysisInput } from './insights-engine.js';
export { InsightsService } from './insights-service.js';
export { analyzeTrends } from './trend-analyzer.js';
export { detectAnomalies } from './anomaly-detector.js';
export {
  generateForecast,
  generateForecastInsights,
  generateRevenueOutlook,
  monthlyRevenueHistory,
  emptyForecast,
} from './business-forecast.js';
export type { MonthlyPoint, RevenueOutlookOptions } from './business-forecast.js';
export { generateRecommendations, findOverdueInvoices } from './recommendation-engine.js';
export { checkDataSufficiency } from './data-sufficiency.js';
export type { SufficiencyResult } from './data-sufficiency.js';
export { calculatePercentChange, coefficientOfVariation, describeSeries, zScore } from './statistics.js';
export { resolveContext } from './context.js';
export type { AnalysisContext, AnalysisOptions } from './context.js';
export { LedgerContractError, ForecastMethodError } from './errors.js';
export {
  generateEnhancedForecast,
  detectSeasonality,
  FORECAST_METHODS,
} from './forecast/forecast-engine.js';
export type {
  EnhancedForecastOptions,
  EnhancedForecastResult,
  ForecastMethod,
} from './forecast/forecast-engine.js';
export * from './types.js';

export {
  createDateRange,
  previousPeriod,
  nextMonthRange,
  lastNDaysRange,
  monthToDateRange,
} from '../orchestrator/date-range.js';
export type { AnalysisDateRange } from '../orchestrator/date-range.js';
export * from '../types/ledger.js';
export { LedgerSnapshot } from '../ledger/ledger-snapshot.js';
export type { ThresholdConfig } from '../config/thresholds.js';
export { DEFAULT_THRESHOLDS } from '../config/thresholds.js';
