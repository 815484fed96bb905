/**
 * Anomaly Detector
 *
 * Z-score checks for unusual expense weeks, revenue drops, return rates
 * and single outsized sales. A flat reference series (zero standard
 * deviation) never produces an anomaly.
 * Pure functions — no I/O, all data passed in.
 */

import { format, subDays, subMonths } from 'date-fns';
import type { CompanyData, Sale } from '../types/ledger.js';
import type { InsightItem } from './types.js';
import type { AnalysisDateRange } from '../orchestrator/date-range.js';
import { dayCount, isBeforeDay, isInRange, isWithinDays } from '../orchestrator/date-range.js';
import type { AnalysisContext } from './context.js';
import { resolveContext } from './context.js';
import { dayKey, describeSeries, groupBy, weekKey, zScore } from './statistics.js';
import { sumMoney } from './money.js';

/**
 * Run every detector over the analysis period.
 * Returns at most one insight per detector.
 */
export function detectAnomalies(
  data: CompanyData,
  range: AnalysisDateRange,
  ctx: AnalysisContext = resolveContext()
): InsightItem[] {
  const anomalies: InsightItem[] = [];

  detectExpenseSpike(data, range, ctx, anomalies);
  detectReturnRate(data, range, ctx, anomalies);
  detectRevenueDrop(data, range, ctx, anomalies);
  detectLargeTransaction(data, range, ctx, anomalies);

  return anomalies;
}

// ─── Expense Spike ──────────────────────────────────────────

/**
 * Baseline: weekly purchase totals over the 12 weeks before the current
 * week. Current week: the 7 days ending on the range end.
 */
function detectExpenseSpike(
  data: CompanyData,
  range: AnalysisDateRange,
  ctx: AnalysisContext,
  out: InsightItem[]
): void {
  const end = range.endDate;
  const currentWeekStart = subDays(end, 7);
  const baselineStart = subDays(end, 84);

  const baseline = data.purchases.filter((p) => isBeforeDay(p.date, baselineStart, currentWeekStart));
  const weeklyTotals = [...groupBy(baseline, (p) => weekKey(p.date)).values()].map((week) =>
    sumMoney(week, (p) => p.effectiveAmountUSD)
  );
  if (weeklyTotals.length < ctx.t.expenseBaselineMinWeeks) return;

  const currentWeek = sumMoney(
    data.purchases.filter((p) => isWithinDays(p.date, currentWeekStart, end)),
    (p) => p.effectiveAmountUSD
  );

  const stats = describeSeries(weeklyTotals);
  const z = zScore(currentWeek, stats);
  if (z === null || z <= ctx.t.zScoreThreshold || stats.mean <= 0) return;

  const percentAbove = (currentWeek / stats.mean - 1) * 100;
  out.push({
    title: 'Unusual Expense Spike Detected',
    description: `This week's expenses (${ctx.formatCurrency(currentWeek)}) are ${percentAbove.toFixed(0)}% above your typical weekly average (${ctx.formatCurrency(stats.mean)}).`,
    recommendation:
      'Review recent expense entries for any errors, unexpected costs, or one-time purchases.',
    severity: 'warning',
    category: 'anomaly',
    metricValue: currentWeek,
    percentageChange: percentAbove,
  });
}

// ─── Return Rate ────────────────────────────────────────────

function detectReturnRate(
  data: CompanyData,
  range: AnalysisDateRange,
  ctx: AnalysisContext,
  out: InsightItem[]
): void {
  const currentSales = data.sales.filter((s) => isInRange(s.date, range)).length;
  if (currentSales < ctx.t.returnRateMinSales) return;

  const since = subMonths(range.startDate, 6);
  const historicalSales = data.sales.filter((s) =>
    isBeforeDay(s.date, since, range.startDate)
  ).length;
  if (historicalSales < ctx.t.returnRateMinSales) return;

  const currentReturns = data.returns.filter((r) => isInRange(r.returnDate, range));
  const historicalReturns = data.returns.filter((r) =>
    isBeforeDay(r.returnDate, since, range.startDate)
  ).length;

  const currentRate = (currentReturns.length / currentSales) * 100;
  const historicalRate = (historicalReturns / historicalSales) * 100;
  if (currentRate <= historicalRate + ctx.t.returnRateMarginPoints) return;

  // Most-returned product by number of returned lines
  let productNote = '';
  const items = currentReturns.flatMap((r) => r.items);
  let topId: string | null = null;
  let topCount = 0;
  for (const [productId, group] of groupBy(items, (i) => i.productId)) {
    if (productId !== null && group.length > topCount) {
      topId = productId;
      topCount = group.length;
    }
  }
  if (topId !== null) {
    const product = data.getProduct(topId);
    if (product) productNote = ` Most returns are for: ${product.name}.`;
  }

  out.push({
    title: 'Return Rate Above Normal',
    description: `Current return rate is ${currentRate.toFixed(1)}% compared to historical average of ${historicalRate.toFixed(1)}%.${productNote}`,
    recommendation:
      'Investigate product quality, description accuracy, or shipping issues for affected items.',
    severity: 'warning',
    category: 'anomaly',
    metricValue: currentRate,
    percentageChange: currentRate - historicalRate,
  });
}

// ─── Revenue Drop ───────────────────────────────────────────

/**
 * Baseline: daily totals (weekly for periods over 30 days) across the
 * three period-lengths before the range. Reports the first low bucket only.
 */
function detectRevenueDrop(
  data: CompanyData,
  range: AnalysisDateRange,
  ctx: AnalysisContext,
  out: InsightItem[]
): void {
  const days = dayCount(range);
  const bucketKey = days > 30 ? weekKey : dayKey;
  const baselineStart = subDays(range.startDate, days * 3);

  const baseline = data.sales.filter((s) => isBeforeDay(s.date, baselineStart, range.startDate));
  const baselineTotals = bucketTotals(baseline, bucketKey).map(([, total]) => total);
  if (baselineTotals.length < ctx.t.revenueBaselineMinPoints) return;

  const stats = describeSeries(baselineTotals);
  const current = bucketTotals(
    data.sales.filter((s) => isInRange(s.date, range)),
    bucketKey
  );

  for (const [, total] of current) {
    const z = zScore(total, stats);
    if (z === null) return;
    if (z < -ctx.t.zScoreThreshold) {
      const percentBelow = (1 - total / stats.mean) * 100;
      out.push({
        title: 'Unusual Revenue Drop',
        description: `Revenue for a recent period (${ctx.formatCurrency(total)}) was ${percentBelow.toFixed(0)}% below typical levels.`,
        recommendation:
          'Check for any operational issues, competitor activity, or external factors that may have affected sales.',
        severity: 'critical',
        category: 'anomaly',
        metricValue: total,
        percentageChange: -percentBelow,
      });
      return;
    }
  }
}

/** Bucket totals in chronological key order. */
function bucketTotals(sales: Sale[], keyFn: (date: Date) => number): Array<[number, number]> {
  return [...groupBy(sales, (s) => keyFn(s.date)).entries()]
    .map(([key, group]): [number, number] => [key, sumMoney(group, (s) => s.effectiveAmountUSD)])
    .sort((a, b) => a[0] - b[0]);
}

// ─── Large Single Transaction ───────────────────────────────

function detectLargeTransaction(
  data: CompanyData,
  range: AnalysisDateRange,
  ctx: AnalysisContext,
  out: InsightItem[]
): void {
  const sales = data.sales.filter((s) => isInRange(s.date, range));
  if (sales.length < ctx.t.largeTransactionMinSales) return;

  const stats = describeSeries(sales.map((s) => s.effectiveAmountUSD));
  let largest = sales[0]!;
  for (const sale of sales) {
    if (sale.effectiveAmountUSD > largest.effectiveAmountUSD) largest = sale;
  }

  const z = zScore(largest.effectiveAmountUSD, stats);
  if (z === null || z <= ctx.t.largeTransactionZScore) return;

  const customer = largest.customerId ? data.getCustomer(largest.customerId) : null;
  const customerName = customer?.name ?? 'a customer';

  out.push({
    title: 'Unusually Large Transaction',
    description: `A sale of ${ctx.formatCurrency(largest.effectiveAmountUSD)} to ${customerName} on ${format(largest.date, 'MMM d')} is significantly larger than your typical transaction size (${ctx.formatCurrency(stats.mean)}).`,
    recommendation:
      'Verify this transaction is correct and consider nurturing this high-value customer relationship.',
    severity: 'info',
    category: 'anomaly',
    metricValue: largest.effectiveAmountUSD,
  });
}
