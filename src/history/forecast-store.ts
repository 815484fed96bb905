/**
 * Forecast Store
 *
 * SQLite-backed record of next-month forecasts, scored against the ledger
 * once each forecast period has passed. Uses better-sqlite3 for synchronous
 * local storage. Database lives at ~/.ledgerlens/history.db by default.
 *
 * Only aggregated figures are stored, never individual transactions.
 */

import { randomUUID } from 'node:crypto';
import Database from 'better-sqlite3';
import type { CompanyData } from '../types/ledger.js';
import type { ForecastData } from '../insights/types.js';
import type { AnalysisDateRange } from '../orchestrator/date-range.js';
import { formatDay, isWithinDays, parseDay } from '../orchestrator/date-range.js';
import { sumMoney } from '../insights/money.js';
import { ensureParentDir, resolvePaths } from '../config/paths.js';
import type { ForecastAccuracyData, ForecastRecord, RecentAccuracy } from './types.js';
import {
  NO_VALIDATED_FORECASTS,
  combinedAccuracy,
  recentAccuracy,
  summarizeAccuracy,
} from './accuracy.js';

export const DEFAULT_MAX_RECORDS = 24;
export const DEFAULT_RECENT_COUNT = 6;

export class ForecastStore {
  private db: Database.Database;

  constructor(dbPath?: string) {
    const path = dbPath ?? resolvePaths().historyDb;
    if (path !== ':memory:') {
      ensureParentDir(path);
    }
    this.db = new Database(path);
    this.db.pragma('journal_mode = WAL');
    this.migrate();
  }

  /**
   * Record a forecast for `period`. An unvalidated forecast for the same
   * period is overwritten; validated ones are never touched.
   * Returns the record ID.
   */
  saveForecast(forecast: ForecastData, period: AnalysisDateRange, now: Date = new Date()): string {
    const periodStart = formatDay(period.startDate);
    const periodEnd = formatDay(period.endDate);

    const existing = this.db
      .prepare<[string, string], { id: string }>(
        `SELECT id FROM forecast_records
         WHERE period_start = ? AND period_end = ? AND is_validated = 0
         LIMIT 1`
      )
      .get(periodStart, periodEnd);

    const values = {
      forecastDate: now.toISOString(),
      forecastedRevenue: forecast.forecastedRevenue,
      forecastedExpenses: forecast.forecastedExpenses,
      forecastedProfit: forecast.forecastedProfit,
      forecastedNewCustomers: forecast.expectedNewCustomers,
      confidenceScore: forecast.confidenceScore,
      forecastMethod: forecast.forecastMethod,
    };

    if (existing) {
      this.db
        .prepare(
          `UPDATE forecast_records SET
             forecast_date = @forecastDate,
             forecasted_revenue = @forecastedRevenue,
             forecasted_expenses = @forecastedExpenses,
             forecasted_profit = @forecastedProfit,
             forecasted_new_customers = @forecastedNewCustomers,
             confidence_score = @confidenceScore,
             forecast_method = @forecastMethod
           WHERE id = @id`
        )
        .run({ ...values, id: existing.id });
      return existing.id;
    }

    const id = randomUUID();
    this.db
      .prepare(
        `INSERT INTO forecast_records (
           id, forecast_date, period_start, period_end,
           forecasted_revenue, forecasted_expenses, forecasted_profit,
           forecasted_new_customers, confidence_score, forecast_method, is_validated
         ) VALUES (
           @id, @forecastDate, @periodStart, @periodEnd,
           @forecastedRevenue, @forecastedExpenses, @forecastedProfit,
           @forecastedNewCustomers, @confidenceScore, @forecastMethod, 0
         )`
      )
      .run({ ...values, id, periodStart, periodEnd });
    return id;
  }

  /**
   * Fill in actuals for every unvalidated forecast whose period ended
   * before `today`. Returns how many records were validated.
   */
  validatePastForecasts(data: CompanyData, today: Date = new Date()): number {
    const due = this.db
      .prepare<[string], ForecastRow>(
        `SELECT * FROM forecast_records WHERE is_validated = 0 AND period_end < ?`
      )
      .all(formatDay(today))
      .map(mapRow);
    if (due.length === 0) return 0;

    const firstSales = firstSaleDates(data);
    const update = this.db.prepare(
      `UPDATE forecast_records SET
         actual_revenue = @actualRevenue,
         actual_expenses = @actualExpenses,
         actual_profit = @actualProfit,
         actual_new_customers = @actualNewCustomers,
         is_validated = 1
       WHERE id = @id`
    );

    const validateAll = this.db.transaction((records: ForecastRecord[]) => {
      for (const record of records) {
        const from = parseDay(record.periodStart);
        const to = parseDay(record.periodEnd);
        const actualRevenue = sumMoney(
          data.sales.filter((s) => isWithinDays(s.date, from, to)),
          (s) => s.effectiveAmountUSD
        );
        const actualExpenses = sumMoney(
          data.purchases.filter((p) => isWithinDays(p.date, from, to)),
          (p) => p.effectiveAmountUSD
        );
        update.run({
          id: record.id,
          actualRevenue,
          actualExpenses,
          actualProfit: actualRevenue - actualExpenses,
          actualNewCustomers: firstSales.filter((d) => isWithinDays(d, from, to)).length,
        });
      }
    });

    validateAll(due);
    return due.length;
  }

  /**
   * Validate what can be validated, then return every record (newest
   * period first) with aggregate statistics.
   */
  getAccuracyData(data: CompanyData, today: Date = new Date()): ForecastAccuracyData {
    this.validatePastForecasts(data, today);
    return summarizeAccuracy(this.getRecords());
  }

  /** All records, newest period first. */
  getRecords(): ForecastRecord[] {
    return this.db
      .prepare<[], ForecastRow>(
        `SELECT * FROM forecast_records ORDER BY period_start DESC, forecast_date DESC`
      )
      .all()
      .map(mapRow);
  }

  /** Average accuracy over the most recent validated forecasts, or null when there are none. */
  getRecentAccuracy(count = DEFAULT_RECENT_COUNT): RecentAccuracy | null {
    const rows = this.db
      .prepare<[number], ForecastRow>(
        `SELECT * FROM forecast_records WHERE is_validated = 1
         ORDER BY period_end DESC LIMIT ?`
      )
      .all(count);
    if (rows.length === 0) return null;
    return recentAccuracy(rows.map(mapRow));
  }

  /** Mean of recent revenue and expense accuracy, for forecast confidence. */
  getHistoricalAccuracy(count = DEFAULT_RECENT_COUNT): number | null {
    return combinedAccuracy(this.getRecentAccuracy(count));
  }

  getAccuracySummary(): string {
    const recent = this.getRecentAccuracy();
    if (!recent) return NO_VALIDATED_FORECASTS;

    const row = this.db
      .prepare<[], { n: number }>(`SELECT COUNT(*) AS n FROM forecast_records WHERE is_validated = 1`)
      .get();
    const validated = row?.n ?? 0;
    const error = 100 - (recent.revenueAccuracy + recent.expenseAccuracy) / 2;
    return `Based on ${validated} validated forecast(s), predictions were within ±${error.toFixed(0)}% of actual values on average.`;
  }

  /**
   * Keep at most `maxRecords`, validated records first, then the newest
   * periods. Returns the number deleted.
   */
  cleanupOldRecords(maxRecords = DEFAULT_MAX_RECORDS): number {
    const result = this.db
      .prepare(
        `DELETE FROM forecast_records WHERE id NOT IN (
           SELECT id FROM forecast_records
           ORDER BY is_validated DESC, period_start DESC, forecast_date DESC
           LIMIT ?
         )`
      )
      .run(Math.max(0, maxRecords));
    return result.changes;
  }

  /**
   * Close the database connection.
   */
  close(): void {
    this.db.close();
  }

  // ─── Schema Migration ─────────────────────────────────────

  private migrate(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS forecast_records (
        id                        TEXT PRIMARY KEY,
        forecast_date             TEXT NOT NULL,
        period_start              TEXT NOT NULL,
        period_end                TEXT NOT NULL,

        forecasted_revenue        REAL NOT NULL DEFAULT 0,
        actual_revenue            REAL,
        forecasted_expenses       REAL NOT NULL DEFAULT 0,
        actual_expenses           REAL,
        forecasted_profit         REAL NOT NULL DEFAULT 0,
        actual_profit             REAL,
        forecasted_new_customers  INTEGER NOT NULL DEFAULT 0,
        actual_new_customers      INTEGER,

        confidence_score          REAL NOT NULL DEFAULT 0,
        forecast_method           TEXT NOT NULL,
        is_validated              INTEGER NOT NULL DEFAULT 0
      );

      CREATE INDEX IF NOT EXISTS idx_forecast_records_validated_period
        ON forecast_records(is_validated, period_end);
    `);
  }
}

/** Date of each known customer's first-ever sale. */
function firstSaleDates(data: CompanyData): Date[] {
  const first = new Map<string, Date>();
  for (const sale of data.sales) {
    if (sale.customerId === null) continue;
    const seen = first.get(sale.customerId);
    if (!seen || sale.date < seen) first.set(sale.customerId, sale.date);
  }
  return [...first.values()];
}

// ─── Row Mapping ────────────────────────────────────────────

interface ForecastRow {
  id: string;
  forecast_date: string;
  period_start: string;
  period_end: string;
  forecasted_revenue: number;
  actual_revenue: number | null;
  forecasted_expenses: number;
  actual_expenses: number | null;
  forecasted_profit: number;
  actual_profit: number | null;
  forecasted_new_customers: number;
  actual_new_customers: number | null;
  confidence_score: number;
  forecast_method: string;
  is_validated: number;
}

function mapRow(row: ForecastRow): ForecastRecord {
  return {
    id: row.id,
    forecastDate: row.forecast_date,
    periodStart: row.period_start,
    periodEnd: row.period_end,
    forecastedRevenue: row.forecasted_revenue,
    actualRevenue: row.actual_revenue,
    forecastedExpenses: row.forecasted_expenses,
    actualExpenses: row.actual_expenses,
    forecastedProfit: row.forecasted_profit,
    actualProfit: row.actual_profit,
    forecastedNewCustomers: row.forecasted_new_customers,
    actualNewCustomers: row.actual_new_customers,
    confidenceScore: row.confidence_score,
    forecastMethod: row.forecast_method,
    isValidated: row.is_validated === 1,
  };
}
