/**
 * Insights Service
 *
 * Promise-returning entry points over the synchronous engine. Each call
 * yields to the event loop once before computing so a burst of requests
 * cannot starve I/O, and honours an AbortSignal at entry, after the
 * yield, and between sub-analyses.
 */

import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import type { CompanyData } from '../types/ledger.js';
import type { ForecastData, InsightItem, InsightsData } from './types.js';
import type { AnalysisDateRange } from '../orchestrator/date-range.js';
import type { AnalysisContext, AnalysisOptions } from './context.js';
import { resolveContext } from './context.js';
import { assertAnalysisInput, generateInsights } from './insights-engine.js';
import { analyzeTrends } from './trend-analyzer.js';
import { detectAnomalies } from './anomaly-detector.js';
import { generateForecast, generateRevenueOutlook } from './business-forecast.js';
import type { RevenueOutlookOptions } from './business-forecast.js';
import type { EnhancedForecastResult } from './forecast/forecast-engine.js';
import { generateRecommendations } from './recommendation-engine.js';

export class InsightsService {
  constructor(private defaults: AnalysisOptions = {}) {}

  async generateInsights(
    data: CompanyData,
    range: AnalysisDateRange,
    opts: AnalysisOptions = {}
  ): Promise<InsightsData> {
    const merged = { ...this.defaults, ...opts };
    await enter(merged.signal);
    return generateInsights(data, range, merged);
  }

  async generateForecast(
    data: CompanyData,
    range: AnalysisDateRange,
    opts: AnalysisOptions = {}
  ): Promise<ForecastData> {
    return this.run(data, range, opts, generateForecast);
  }

  async generateRevenueOutlook(
    data: CompanyData,
    range: AnalysisDateRange,
    outlook: RevenueOutlookOptions = {},
    opts: AnalysisOptions = {}
  ): Promise<EnhancedForecastResult> {
    return this.run(data, range, opts, (d, r, ctx) => generateRevenueOutlook(d, r, ctx, outlook));
  }

  async detectAnomalies(
    data: CompanyData,
    range: AnalysisDateRange,
    opts: AnalysisOptions = {}
  ): Promise<InsightItem[]> {
    return this.run(data, range, opts, detectAnomalies);
  }

  async analyzeTrends(
    data: CompanyData,
    range: AnalysisDateRange,
    opts: AnalysisOptions = {}
  ): Promise<InsightItem[]> {
    return this.run(data, range, opts, analyzeTrends);
  }

  async generateRecommendations(
    data: CompanyData,
    range: AnalysisDateRange,
    opts: AnalysisOptions = {}
  ): Promise<InsightItem[]> {
    return this.run(data, range, opts, generateRecommendations);
  }

  private async run<T>(
    data: CompanyData,
    range: AnalysisDateRange,
    opts: AnalysisOptions,
    analysis: (data: CompanyData, range: AnalysisDateRange, ctx: AnalysisContext) => T
  ): Promise<T> {
    const merged = { ...this.defaults, ...opts };
    await enter(merged.signal);
    assertAnalysisInput(data, range);
    return analysis(data, range, resolveContext(merged));
  }
}

async function enter(signal: AbortSignal | undefined): Promise<void> {
  signal?.throwIfAborted();
  await yieldToEventLoop();
  signal?.throwIfAborted();
}
