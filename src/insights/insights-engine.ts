/**
 * Insights Engine
 *
 * Runs the sufficiency gate, then each analyzer independently, and merges
 * their findings with a summary. Synchronous; see insights-service.ts for
 * the promise-returning entry points.
 */

import { isValid } from 'date-fns';
import type { CompanyData } from '../types/ledger.js';
import type { InsightsData, InsightsSummary } from './types.js';
import type { AnalysisDateRange } from '../orchestrator/date-range.js';
import type { AnalysisOptions } from './context.js';
import { resolveContext } from './context.js';
import { LedgerContractError } from './errors.js';
import { checkDataSufficiency } from './data-sufficiency.js';
import { analyzeTrends } from './trend-analyzer.js';
import { detectAnomalies } from './anomaly-detector.js';
import { emptyForecast, generateForecast, generateForecastInsights } from './business-forecast.js';
import { generateRecommendations } from './recommendation-engine.js';

const COLLECTIONS = ['sales', 'purchases', 'returns', 'invoices', 'inventory'] as const;
const LOOKUPS = ['getProduct', 'getCustomer', 'getSupplier'] as const;

/**
 * Fail fast on input no analysis can run against. Well-typed callers only
 * hit this with data that came through an untyped boundary.
 */
export function assertAnalysisInput(data: CompanyData, range: AnalysisDateRange): void {
  for (const name of COLLECTIONS) {
    if (!Array.isArray(data[name])) {
      throw new LedgerContractError(`Company data is missing the "${name}" collection`);
    }
  }
  for (const name of LOOKUPS) {
    if (typeof data[name] !== 'function') {
      throw new LedgerContractError(`Company data is missing the ${name}() lookup`);
    }
  }
  if (!isValid(range.startDate) || !isValid(range.endDate)) {
    throw new LedgerContractError('Date range has an invalid start or end date');
  }
  if (range.startDate.getTime() > range.endDate.getTime()) {
    throw new LedgerContractError('Date range starts after it ends');
  }
}

/**
 * Full analysis of the period. With too few transactions every list is
 * empty and the forecast is all zeros.
 */
export function generateInsights(
  data: CompanyData,
  range: AnalysisDateRange,
  opts: AnalysisOptions = {}
): InsightsData {
  const { signal } = opts;
  signal?.throwIfAborted();
  assertAnalysisInput(data, range);

  const ctx = resolveContext(opts);
  const generatedAt = new Date().toISOString();
  const sufficiency = checkDataSufficiency(data, range, ctx.t);

  if (!sufficiency.hasSufficientData) {
    return {
      hasSufficientData: false,
      insufficientDataMessage: sufficiency.message ?? undefined,
      revenueTrends: [],
      anomalies: [],
      forecasts: [],
      recommendations: [],
      forecast: emptyForecast(),
      summary: summarize(0, 0, 0, 0, 0),
      generatedAt,
    };
  }

  signal?.throwIfAborted();
  const revenueTrends = analyzeTrends(data, range, ctx);
  signal?.throwIfAborted();
  const anomalies = detectAnomalies(data, range, ctx);
  signal?.throwIfAborted();
  const forecast = generateForecast(data, range, ctx);
  const forecasts = generateForecastInsights(data, range, forecast, ctx);
  signal?.throwIfAborted();
  const recommendations = generateRecommendations(data, range, ctx);

  return {
    hasSufficientData: true,
    revenueTrends,
    anomalies,
    forecasts,
    recommendations,
    forecast,
    summary: summarize(
      revenueTrends.length,
      anomalies.length,
      forecasts.length,
      recommendations.length,
      sufficiency.monthsOfData
    ),
    generatedAt,
  };
}

function summarize(
  trends: number,
  anomalies: number,
  forecasts: number,
  recommendations: number,
  monthsOfData: number
): InsightsSummary {
  return {
    totalInsights: trends + anomalies + forecasts + recommendations,
    trendsDetected: trends,
    anomaliesDetected: anomalies,
    opportunities: recommendations,
    monthsOfData,
  };
}
