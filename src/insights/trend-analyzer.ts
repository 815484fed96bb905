/**
 * Trend Analyzer
 *
 * Compares the analysis period against the equal-length period before it
 * and looks for weekday and calendar-month patterns in sales.
 * No I/O — all data passed in, results returned.
 */

import { format, getDay, subMonths } from 'date-fns';
import type { CompanyData, Sale } from '../types/ledger.js';
import type { InsightItem } from './types.js';
import type { AnalysisDateRange } from '../orchestrator/date-range.js';
import { isInRange, previousPeriod } from '../orchestrator/date-range.js';
import type { AnalysisContext } from './context.js';
import { resolveContext } from './context.js';
import { calculatePercentChange, groupBy, mean } from './statistics.js';
import { sumMoney } from './money.js';

/**
 * Analyze period-over-period trends.
 * Emits revenue, expense, weekday, seasonal and volume insights, in that order.
 * Period comparisons need a previous period with activity to compare against.
 */
export function analyzeTrends(
  data: CompanyData,
  range: AnalysisDateRange,
  ctx: AnalysisContext = resolveContext()
): InsightItem[] {
  const prev = previousPeriod(range);
  const insights: InsightItem[] = [];

  const currentSales = data.sales.filter((s) => isInRange(s.date, range));
  const previousSales = data.sales.filter((s) => isInRange(s.date, prev));
  const currentPurchases = data.purchases.filter((p) => isInRange(p.date, range));
  const previousPurchases = data.purchases.filter((p) => isInRange(p.date, prev));

  // Revenue
  const revenue = compareAmounts(
    sumMoney(previousSales, (s) => s.effectiveAmountUSD),
    sumMoney(currentSales, (s) => s.effectiveAmountUSD),
    ctx,
    {
      noun: 'revenue',
      upTitle: 'Revenue Growth Detected',
      downTitle: 'Revenue Decline Detected',
      upGood: true,
      category: 'revenue_trend',
      upAdvice: 'Consider analyzing which products or services drove this growth to replicate success.',
      downAdvice:
        'Review recent changes that may have impacted revenue and consider promotional strategies.',
    }
  );
  if (revenue) insights.push(revenue);

  // Expenses (up is bad)
  const expenses = compareAmounts(
    sumMoney(previousPurchases, (p) => p.effectiveAmountUSD),
    sumMoney(currentPurchases, (p) => p.effectiveAmountUSD),
    ctx,
    {
      noun: 'expenses',
      upTitle: 'Expense Increase Detected',
      downTitle: 'Expense Reduction Achieved',
      upGood: false,
      category: 'expense_trend',
      upAdvice: 'Review expense categories to identify areas where costs can be optimized.',
      downAdvice:
        'Good job on cost management! Document what strategies worked for future reference.',
    }
  );
  if (expenses) insights.push(expenses);

  const weekday = analyzeDayOfWeekPattern(currentSales, ctx);
  if (weekday) insights.push(weekday);

  const seasonal = analyzeSeasonalPattern(data.sales, ctx);
  if (seasonal) insights.push(seasonal);

  const volume = analyzeVolumeTrend(previousSales.length, currentSales.length, ctx);
  if (volume) insights.push(volume);

  return insights;
}

// ─── Period Comparison ──────────────────────────────────────

interface CompareOptions {
  noun: 'revenue' | 'expenses';
  upTitle: string;
  downTitle: string;
  upGood: boolean;
  category: InsightItem['category'];
  upAdvice: string;
  downAdvice: string;
}

function compareAmounts(
  previous: number,
  current: number,
  ctx: AnalysisContext,
  opts: CompareOptions
): InsightItem | null {
  if (previous <= 0) return null;
  const change = calculatePercentChange(previous, current);
  if (change === 0 || Math.abs(change) < ctx.t.significantChangePercent) return null;

  const isUp = change > 0;
  const verb = opts.noun === 'revenue' ? 'has' : 'have';
  return {
    title: isUp ? opts.upTitle : opts.downTitle,
    description: `Your ${opts.noun} ${verb} ${isUp ? 'increased' : 'decreased'} by ${Math.abs(change).toFixed(1)}% compared to the previous period (${ctx.formatCurrency(previous)} → ${ctx.formatCurrency(current)}).`,
    recommendation: isUp ? opts.upAdvice : opts.downAdvice,
    severity: isUp === opts.upGood ? 'success' : 'warning',
    category: opts.category,
    metricValue: current,
    percentageChange: change,
  };
}

function analyzeVolumeTrend(
  previousCount: number,
  currentCount: number,
  ctx: AnalysisContext
): InsightItem | null {
  if (previousCount === 0) return null;
  const change = calculatePercentChange(previousCount, currentCount);
  if (change === 0 || Math.abs(change) < ctx.t.volumeChangePercent) return null;

  const isUp = change > 0;
  return {
    title: isUp ? 'Transaction Volume Increasing' : 'Transaction Volume Declining',
    description: `Number of transactions has ${isUp ? 'increased' : 'decreased'} by ${Math.abs(change).toFixed(0)}% (${previousCount} → ${currentCount} transactions).`,
    recommendation: isUp
      ? 'Ensure operational capacity can handle increased demand.'
      : 'Consider outreach campaigns to re-engage customers.',
    severity: isUp ? 'success' : 'warning',
    category: 'revenue_trend',
    percentageChange: change,
  };
}

// ─── Patterns ───────────────────────────────────────────────

interface BucketTotal {
  label: string;
  total: number;
}

/** The best bucket and its lift over the bucket average, or null when the average is not positive. */
function bestBucket(buckets: BucketTotal[]): { best: BucketTotal; average: number } | null {
  if (buckets.length === 0) return null;
  const average = mean(buckets.map((b) => b.total));
  if (average <= 0) return null;
  let best = buckets[0]!;
  for (const b of buckets) {
    if (b.total > best.total) best = b;
  }
  return { best, average };
}

function analyzeDayOfWeekPattern(sales: Sale[], ctx: AnalysisContext): InsightItem | null {
  if (sales.length < ctx.t.dayOfWeekMinSales) return null;

  const buckets = [...groupBy(sales, (s) => getDay(s.date)).values()].map((group) => ({
    label: format(group[0]!.date, 'EEEE'),
    total: sumMoney(group, (s) => s.effectiveAmountUSD),
  }));

  const result = bestBucket(buckets);
  if (!result || result.best.total <= result.average * ctx.t.dayOfWeekLiftRatio) return null;

  const { best, average } = result;
  const percentAbove = (best.total / average - 1) * 100;
  return {
    title: `${best.label} Sales Performance`,
    description: `${best.label}s generate ${percentAbove.toFixed(0)}% more revenue than average daily sales (${ctx.formatCurrency(best.total)} vs ${ctx.formatCurrency(average)} average).`,
    recommendation: `Consider running promotions or increasing staffing on ${best.label}s to maximize this opportunity.`,
    severity: 'info',
    category: 'revenue_trend',
    percentageChange: percentAbove,
  };
}

/** Calendar-month totals over the trailing twelve months from `now`. */
function analyzeSeasonalPattern(sales: readonly Sale[], ctx: AnalysisContext): InsightItem | null {
  const since = subMonths(ctx.now, 12);
  const recent = sales.filter((s) => s.date >= since);

  const buckets = [...groupBy(recent, (s) => s.date.getMonth()).entries()].map(
    ([month, group]) => ({
      label: format(new Date(2024, month, 1), 'MMMM'),
      total: sumMoney(group, (s) => s.effectiveAmountUSD),
    })
  );
  if (buckets.length < ctx.t.seasonalMinMonths) return null;

  const result = bestBucket(buckets);
  if (!result || result.best.total <= result.average * ctx.t.seasonalLiftRatio) return null;

  const { best, average } = result;
  const percentAbove = (best.total / average - 1) * 100;
  return {
    title: 'Seasonal Pattern Identified',
    description: `Historical data shows ${best.label} generates ${percentAbove.toFixed(0)}% more revenue than average months.`,
    recommendation: `Plan inventory and marketing campaigns ahead of ${best.label} to capitalize on this seasonal trend.`,
    severity: 'info',
    category: 'revenue_trend',
    percentageChange: percentAbove,
  };
}
