/**
 * Analysis Runner
 *
 * Coordinates one analysis request end to end for the MCP server and the
 * CLI: config, ledger, date range, forecast history, rendering. History
 * store errors are logged to stderr and never fail an analysis.
 */

import type { CompanyData } from '../types/ledger.js';
import type { ForecastData, InsightItem, InsightsData } from '../insights/types.js';
import type { AnalysisOptions } from '../insights/context.js';
import { resolveContext } from '../insights/context.js';
import { InsightsService } from '../insights/insights-service.js';
import type { EnhancedForecastResult } from '../insights/forecast/forecast-engine.js';
import type { LedgerLensConfig } from '../config/types.js';
import { loadConfig } from '../config/settings.js';
import { loadLedger, resolveLedgerPath } from '../ledger/ledger-loader.js';
import { ForecastStore } from '../history/forecast-store.js';
import type { ForecastAccuracyData } from '../history/types.js';
import type { AnalysisArgs, ForecastArgs } from '../validators.js';
import type { CurrencyFormatter } from '../generators/report-generator.js';
import {
  generateAccuracyReport,
  generateForecastReport,
  generateInsightListReport,
  generateInsightsReport,
} from '../generators/report-generator.js';
import type { AnalysisDateRange } from './date-range.js';
import { nextMonthRange, resolveDateRange } from './date-range.js';

export interface RunnerOptions {
  /** Used instead of ~/.ledgerlens/config.json. */
  config?: LedgerLensConfig;
  loadLedger?: (path: string) => CompanyData;
  /** Opened on first use and kept until close(). */
  openStore?: () => ForecastStore;
  now?: () => Date;
}

/** Structured result plus its Markdown rendering. */
export interface RunResult<T> {
  data: T;
  markdown: string;
}

export interface ForecastRun {
  forecast: ForecastData;
  /** The month the forecast is for. */
  period: AnalysisDateRange;
  outlook: EnhancedForecastResult;
  /** History record id, or null when nothing was recorded. */
  recordId: string | null;
}

interface PreparedRun {
  ledger: CompanyData;
  range: AnalysisDateRange;
  options: AnalysisOptions;
  fmt: CurrencyFormatter;
}

type ListAnalysis = 'detectAnomalies' | 'analyzeTrends' | 'generateRecommendations';

export class AnalysisRunner {
  private readonly service = new InsightsService();
  private store: ForecastStore | null = null;

  constructor(private readonly opts: RunnerOptions = {}) {}

  async insights(args: AnalysisArgs): Promise<RunResult<InsightsData>> {
    const run = this.prepare(args, true);
    const data = await this.service.generateInsights(run.ledger, run.range, run.options);
    return { data, markdown: generateInsightsReport(data, run.range, run.fmt) };
  }

  /**
   * Next-month forecast plus a multi-month revenue outlook. The next-month
   * figures are recorded so they can be scored once the month has passed.
   */
  async forecast(args: ForecastArgs): Promise<RunResult<ForecastRun>> {
    const run = this.prepare(args, true);
    const forecast = await this.service.generateForecast(run.ledger, run.range, run.options);
    const outlook = await this.service.generateRevenueOutlook(
      run.ledger,
      run.range,
      { periods: args.periods, method: args.method },
      run.options
    );
    const period = nextMonthRange(run.range.endDate);

    const recordId =
      forecast.dataMonthsUsed > 0
        ? this.withStore((store) => store.saveForecast(forecast, period, this.now()))
        : null;

    return {
      data: { forecast, period, outlook, recordId },
      markdown: generateForecastReport(forecast, period, run.fmt, outlook),
    };
  }

  async anomalies(args: AnalysisArgs): Promise<RunResult<InsightItem[]>> {
    return this.list(args, 'detectAnomalies', 'Anomalies');
  }

  async trends(args: AnalysisArgs): Promise<RunResult<InsightItem[]>> {
    return this.list(args, 'analyzeTrends', 'Trends');
  }

  async recommendations(args: AnalysisArgs): Promise<RunResult<InsightItem[]>> {
    return this.list(args, 'generateRecommendations', 'Recommendations');
  }

  /**
   * Score past forecasts against the ledger, prune old records, and report.
   * Unlike the analyses, store errors propagate here.
   */
  accuracy(args: Pick<AnalysisArgs, 'ledgerPath'>): RunResult<ForecastAccuracyData> {
    const config = this.config();
    const ledger = this.load(args.ledgerPath, config);
    const store = this.openStore();
    const today = this.now();

    store.validatePastForecasts(ledger, today);
    store.cleanupOldRecords();
    const data = store.getAccuracyData(ledger, today);

    const fmt = resolveContext(moneyOptions(config)).formatCurrency;
    return { data, markdown: generateAccuracyReport(data, fmt) };
  }

  close(): void {
    this.store?.close();
    this.store = null;
  }

  // ─── Internals ──────────────────────────────────────────

  private async list(
    args: AnalysisArgs,
    analysis: ListAnalysis,
    title: string
  ): Promise<RunResult<InsightItem[]>> {
    const run = this.prepare(args, false);
    const items = await this.service[analysis](run.ledger, run.range, run.options);
    return { data: items, markdown: generateInsightListReport(title, items, run.range) };
  }

  private prepare(args: AnalysisArgs, withAccuracy: boolean): PreparedRun {
    const config = this.config();
    const now = this.now();
    const ledger = this.load(args.ledgerPath, config);
    const range = resolveDateRange(args, now);

    const options: AnalysisOptions = {
      ...moneyOptions(config),
      now,
      thresholds: config.settings.thresholds,
      historicalAccuracy: withAccuracy
        ? this.withStore((store) => store.getHistoricalAccuracy())
        : null,
    };
    return { ledger, range, options, fmt: resolveContext(options).formatCurrency };
  }

  private config(): LedgerLensConfig {
    return this.opts.config ?? loadConfig();
  }

  private load(explicit: string | undefined, config: LedgerLensConfig): CompanyData {
    const path = resolveLedgerPath(explicit, config);
    return (this.opts.loadLedger ?? loadLedger)(path);
  }

  private now(): Date {
    return this.opts.now ? this.opts.now() : new Date();
  }

  private openStore(): ForecastStore {
    if (!this.store) {
      this.store = this.opts.openStore ? this.opts.openStore() : new ForecastStore();
    }
    return this.store;
  }

  private withStore<T>(fn: (store: ForecastStore) => T): T | null {
    try {
      return fn(this.openStore());
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[ledgerlens] Forecast history unavailable: ${message}`);
      return null;
    }
  }
}

function moneyOptions(config: LedgerLensConfig): Pick<AnalysisOptions, 'money'> {
  return { money: { locale: config.settings.locale, currency: config.settings.currency } };
}
