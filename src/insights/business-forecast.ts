/**
 * Business Forecast
 *
 * Next-month revenue, expenses, profit and new customers from the trailing
 * twelve calendar months, plus the forecast insights shown alongside them.
 * Pure functions — no I/O, all data passed in.
 */

import {
  addMonths,
  differenceInCalendarDays,
  differenceInCalendarMonths,
  startOfMonth,
  subDays,
  subMonths,
} from 'date-fns';
import type { CompanyData, Sale, Transaction } from '../types/ledger.js';
import type { ForecastData, InsightItem } from './types.js';
import type { AnalysisDateRange } from '../orchestrator/date-range.js';
import { isWithinDays } from '../orchestrator/date-range.js';
import type { AnalysisContext } from './context.js';
import { resolveContext } from './context.js';
import { calculatePercentChange, groupBy, monthKey } from './statistics.js';
import { sumMoney } from './money.js';
import { forecastNextPeriod } from './forecast/regression.js';
import { calculateConfidenceScore, confidenceLevel } from './forecast/confidence.js';
import { detectSeasonality, generateEnhancedForecast } from './forecast/forecast-engine.js';
import type { EnhancedForecastResult, ForecastMethod } from './forecast/forecast-engine.js';

export const FORECAST_METHOD_NAME = 'Regression + Smoothing';

/** Days of sales used to measure product velocity. */
const VELOCITY_WINDOW_DAYS = 30;

export interface MonthlyPoint {
  /** year * 100 + month (1-12) */
  month: number;
  value: number;
}

// ─── Monthly Series ─────────────────────────────────────────

/** First day of the twelve-month window ending with the month of `end`. */
export function trailingYearStart(end: Date): Date {
  return startOfMonth(subMonths(end, 11));
}

/**
 * Totals per calendar month over the trailing year ending on `end`,
 * chronological. Months without transactions are omitted.
 */
export function monthlyTotals(transactions: readonly Transaction[], end: Date): MonthlyPoint[] {
  const from = trailingYearStart(end);
  const inWindow = transactions.filter((t) => isWithinDays(t.date, from, end));
  return [...groupBy(inWindow, (t) => monthKey(t.date)).entries()]
    .map(([month, group]) => ({ month, value: sumMoney(group, (t) => t.effectiveAmountUSD) }))
    .sort((a, b) => a.month - b.month);
}

/** Customers counted in the month of their first-ever sale, over the trailing year. */
export function monthlyNewCustomers(sales: readonly Sale[], end: Date): MonthlyPoint[] {
  const firstSale = new Map<string, Date>();
  for (const sale of sales) {
    if (sale.customerId === null) continue;
    const seen = firstSale.get(sale.customerId);
    if (!seen || sale.date < seen) firstSale.set(sale.customerId, sale.date);
  }

  const from = trailingYearStart(end);
  const firsts = [...firstSale.values()].filter((d) => isWithinDays(d, from, end));
  return [...groupBy(firsts, monthKey).entries()]
    .map(([month, group]) => ({ month, value: group.length }))
    .sort((a, b) => a.month - b.month);
}

/**
 * Every calendar month from the first sale through the month of `end`,
 * with empty months as zero. Sales after `end` are ignored.
 */
export function monthlyRevenueHistory(sales: readonly Sale[], end: Date): MonthlyPoint[] {
  const included = sales.filter((s) => differenceInCalendarDays(end, s.date) >= 0);
  if (included.length === 0) return [];

  const first = included.reduce((min, s) => (s.date < min ? s.date : min), included[0]!.date);
  const totals = new Map(
    [...groupBy(included, (s) => monthKey(s.date)).entries()].map(([month, group]) => [
      month,
      sumMoney(group, (s) => s.effectiveAmountUSD),
    ])
  );

  const months = differenceInCalendarMonths(end, first) + 1;
  const out: MonthlyPoint[] = [];
  for (let i = 0; i < months; i++) {
    const month = monthKey(addMonths(startOfMonth(first), i));
    out.push({ month, value: totals.get(month) ?? 0 });
  }
  return out;
}

// ─── Forecast ───────────────────────────────────────────────

/**
 * Forecast the month after the analysis range.
 * With fewer than two months of revenue, confidence is 0.
 */
export function generateForecast(
  data: CompanyData,
  range: AnalysisDateRange,
  ctx: AnalysisContext = resolveContext()
): ForecastData {
  const end = range.endDate;
  const revenuePoints = monthlyTotals(data.sales, end);
  const revenue = revenuePoints.map((p) => p.value);
  const expenses = monthlyTotals(data.purchases, end).map((p) => p.value);
  const newCustomers = monthlyNewCustomers(data.sales, end).map((p) => p.value);

  const lastRevenue = revenue[revenue.length - 1] ?? 0;
  const lastExpenses = expenses[expenses.length - 1] ?? 0;
  const lastNewCustomers = newCustomers[newCustomers.length - 1] ?? 0;

  const forecastedRevenue = Math.max(0, forecastNextPeriod(revenue).value);
  const forecastedExpenses = Math.max(0, forecastNextPeriod(expenses).value);
  const forecastedProfit = forecastedRevenue - forecastedExpenses;
  const expectedNewCustomers = Math.max(0, Math.round(forecastNextPeriod(newCustomers).value));

  const currentProfit = lastRevenue - lastExpenses;

  const confidenceScore =
    revenue.length < 2
      ? 0
      : calculateConfidenceScore({
          values: revenue,
          seasonalPattern: detectSeasonality(revenue, calendarMonth(revenuePoints[0])),
          historicalAccuracy: ctx.historicalAccuracy,
        });

  return {
    forecastedRevenue,
    forecastedExpenses,
    forecastedProfit,
    revenueGrowthPercent: growthFrom(lastRevenue, forecastedRevenue),
    expenseGrowthPercent: growthFrom(lastExpenses, forecastedExpenses),
    profitGrowthPercent: currentProfit !== 0 ? calculatePercentChange(currentProfit, forecastedProfit) : 0,
    expectedNewCustomers,
    customerGrowthPercent: growthFrom(lastNewCustomers, expectedNewCustomers),
    confidenceScore,
    confidenceLevel: confidenceLevel(confidenceScore),
    dataMonthsUsed: Math.max(revenue.length, expenses.length),
    forecastMethod: FORECAST_METHOD_NAME,
  };
}

export interface RevenueOutlookOptions {
  periods?: number;
  method?: ForecastMethod;
}

/** Multi-month revenue projection over the full monthly history up to the range end. */
export function generateRevenueOutlook(
  data: CompanyData,
  range: AnalysisDateRange,
  ctx: AnalysisContext = resolveContext(),
  opts: RevenueOutlookOptions = {}
): EnhancedForecastResult {
  const history = monthlyRevenueHistory(data.sales, range.endDate);
  return generateEnhancedForecast(
    history.map((p) => p.value),
    {
      periods: opts.periods,
      method: opts.method,
      historicalAccuracy: ctx.historicalAccuracy,
      startMonth: calendarMonth(history[0]),
    }
  );
}

/** The forecast reported when analysis is skipped for lack of data. */
export function emptyForecast(): ForecastData {
  return {
    forecastedRevenue: 0,
    forecastedExpenses: 0,
    forecastedProfit: 0,
    revenueGrowthPercent: 0,
    expenseGrowthPercent: 0,
    profitGrowthPercent: 0,
    expectedNewCustomers: 0,
    customerGrowthPercent: 0,
    confidenceScore: 0,
    confidenceLevel: 'low',
    dataMonthsUsed: 0,
    forecastMethod: FORECAST_METHOD_NAME,
  };
}

/** 0-11 month of a monthly point, for naming seasonal peaks. */
function calendarMonth(point: MonthlyPoint | undefined): number | undefined {
  return point ? (point.month % 100) - 1 : undefined;
}

/** Percent change against a positive last actual; 0 otherwise. */
function growthFrom(lastActual: number, forecast: number): number {
  return lastActual > 0 ? calculatePercentChange(lastActual, forecast) : 0;
}

// ─── Forecast Insights ──────────────────────────────────────

export function generateForecastInsights(
  data: CompanyData,
  range: AnalysisDateRange,
  forecast: ForecastData,
  ctx: AnalysisContext = resolveContext()
): InsightItem[] {
  const insights: InsightItem[] = [];

  if (forecast.forecastedRevenue > 0) {
    const band = forecast.confidenceScore >= 70 ? 10 : 20;
    const low = forecast.forecastedRevenue * (1 - band / 100);
    const high = forecast.forecastedRevenue * (1 + band / 100);
    insights.push({
      title: 'Next Month Revenue Forecast',
      description: `Based on ${forecast.dataMonthsUsed} months of historical data, expected revenue for next month is ${ctx.formatCurrency(low)} - ${ctx.formatCurrency(high)} (±${band}%).`,
      severity: 'info',
      category: 'forecast',
      metricValue: forecast.forecastedRevenue,
    });
  }

  if (forecast.forecastedProfit !== 0) {
    const positive = forecast.forecastedProfit > 0;
    insights.push({
      title: 'Cash Flow Projection',
      description: `Projected cash flow for the next 30 days is ${positive ? 'positive' : 'negative'}. Expected ${positive ? 'surplus' : 'shortfall'}: ${ctx.formatCurrency(Math.abs(forecast.forecastedProfit))}.`,
      severity: positive ? 'success' : 'warning',
      category: 'forecast',
      metricValue: forecast.forecastedProfit,
    });
  }

  const depleting = findDepletingProducts(data, range, ctx);
  if (depleting.length > 0) {
    const names = depleting
      .map((id) => data.getProduct(id)?.name)
      .filter((name): name is string => name !== undefined)
      .slice(0, 3);
    insights.push({
      title: 'Inventory Depletion Alert',
      description: `At current sales velocity, ${depleting.length} product(s) will reach reorder point within 2 weeks.`,
      recommendation:
        names.length > 0
          ? `Review and place orders for low-stock items: ${names.join(', ')}`
          : 'Review and place orders for low-stock items.',
      severity: 'warning',
      category: 'inventory',
      metricValue: depleting.length,
    });
  }

  return insights;
}

/**
 * Product ids whose stock lasts no more than the runway threshold at the
 * daily velocity of the 30 days ending on the range end. Stock is summed
 * across inventory records; products out of stock are skipped.
 */
export function findDepletingProducts(
  data: CompanyData,
  range: AnalysisDateRange,
  ctx: AnalysisContext
): string[] {
  const end = range.endDate;
  const from = subDays(end, VELOCITY_WINDOW_DAYS);
  const lines = data.sales
    .filter((s) => isWithinDays(s.date, from, end))
    .flatMap((s) => s.lineItems);

  const stock = new Map<string, number>();
  for (const item of data.inventory) {
    stock.set(item.productId, (stock.get(item.productId) ?? 0) + item.inStock);
  }

  const atRisk: string[] = [];
  for (const [productId, group] of groupBy(lines, (li) => li.productId)) {
    if (productId === null) continue;
    const velocity = group.reduce((acc, li) => acc + li.quantity, 0) / VELOCITY_WINDOW_DAYS;
    const inStock = stock.get(productId) ?? 0;
    if (velocity > 0 && inStock > 0 && inStock / velocity <= ctx.t.inventoryRunwayDays) {
      atRisk.push(productId);
    }
  }
  return atRisk;
}
