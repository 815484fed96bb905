/**
 * Report Generator
 *
 * Renders analysis results as Markdown for the CLI and MCP tools.
 * All functions are synchronous — no I/O, no analysis.
 */

import { addMonths, format } from 'date-fns';
import type {
  ForecastData,
  InsightCategory,
  InsightItem,
  InsightSeverity,
  InsightsData,
} from '../insights/types.js';
import type { EnhancedForecastResult } from '../insights/forecast/forecast-engine.js';
import type { AnalysisDateRange } from '../orchestrator/date-range.js';
import { formatDay } from '../orchestrator/date-range.js';
import type { AccuracyTrend, ForecastAccuracyData, ForecastRecord } from '../history/types.js';
import { revenueAccuracy } from '../history/accuracy.js';

export type CurrencyFormatter = (amount: number) => string;

export const SEVERITY_LABELS: Record<InsightSeverity, { label: string; icon: string }> = {
  info: { label: 'Info', icon: '[i]' },
  success: { label: 'Good', icon: '[+]' },
  warning: { label: 'Warning', icon: '[!]' },
  critical: { label: 'Critical', icon: '[!!]' },
};

export const CATEGORY_LABELS: Record<InsightCategory, string> = {
  revenue_trend: 'Revenue Trend',
  expense_trend: 'Expense Trend',
  anomaly: 'Anomaly',
  forecast: 'Forecast',
  inventory: 'Inventory',
  product: 'Product',
  customer: 'Customer',
  payment: 'Payment',
  recommendation: 'Recommendation',
};

const ACCURACY_TREND_LABEL: Record<AccuracyTrend, string> = {
  improving: 'Improving',
  stable: 'Stable',
  declining: 'Declining',
};

/** Signed, one decimal: "+12.5%", "0.0%", "-3.0%". */
export function formatPercent(value: number): string {
  return `${value > 0 ? '+' : ''}${value.toFixed(1)}%`;
}

function rangeLabel(range: AnalysisDateRange): string {
  return `${formatDay(range.startDate)} to ${formatDay(range.endDate)}`;
}

/** "- [!] **Title** (Payment): description", plus an indented recommendation. */
export function formatInsightLine(item: InsightItem): string[] {
  const { icon } = SEVERITY_LABELS[item.severity];
  const lines = [`- ${icon} **${item.title}** (${CATEGORY_LABELS[item.category]}): ${item.description}`];
  if (item.recommendation) {
    lines.push(`  - Recommendation: ${item.recommendation}`);
  }
  return lines;
}

function renderInsights(parts: string[], heading: string, items: InsightItem[]): void {
  if (items.length === 0) return;
  parts.push(`## ${heading}`);
  parts.push('');
  for (const item of items) {
    parts.push(...formatInsightLine(item));
  }
  parts.push('');
}

function renderForecastTable(parts: string[], forecast: ForecastData, fmt: CurrencyFormatter): void {
  parts.push('| Metric | Forecast | Change |');
  parts.push('|--------|----------|--------|');
  parts.push(
    `| Revenue | ${fmt(forecast.forecastedRevenue)} | ${formatPercent(forecast.revenueGrowthPercent)} |`
  );
  parts.push(
    `| Expenses | ${fmt(forecast.forecastedExpenses)} | ${formatPercent(forecast.expenseGrowthPercent)} |`
  );
  parts.push(
    `| Profit | ${fmt(forecast.forecastedProfit)} | ${formatPercent(forecast.profitGrowthPercent)} |`
  );
  parts.push(
    `| New Customers | ${forecast.expectedNewCustomers} | ${formatPercent(forecast.customerGrowthPercent)} |`
  );
  parts.push('');
  parts.push(
    `**Confidence:** ${forecast.confidenceScore}/100 (${forecast.confidenceLevel}), ${forecast.dataMonthsUsed} month(s) of data, ${forecast.forecastMethod}`
  );
  parts.push('');
}

// ─── Insights ───────────────────────────────────────────────

/**
 * Full insights report.
 * Structure: Summary → Next Month → Revenue Trends → Anomalies → Forecasts → Recommendations
 */
export function generateInsightsReport(
  data: InsightsData,
  range: AnalysisDateRange,
  fmt: CurrencyFormatter
): string {
  const parts: string[] = [];
  parts.push(`# Financial Insights - ${rangeLabel(range)}`);
  parts.push('');

  if (!data.hasSufficientData) {
    parts.push(`> ${data.insufficientDataMessage ?? 'Not enough data for insights.'}`);
    return parts.join('\n');
  }

  const s = data.summary;
  parts.push('## Summary');
  parts.push('');
  parts.push('| Metric | Count |');
  parts.push('|--------|-------|');
  parts.push(`| Insights | ${s.totalInsights} |`);
  parts.push(`| Trends | ${s.trendsDetected} |`);
  parts.push(`| Anomalies | ${s.anomaliesDetected} |`);
  parts.push(`| Opportunities | ${s.opportunities} |`);
  parts.push(`| Months of Data | ${s.monthsOfData} |`);
  parts.push('');

  parts.push('## Next Month');
  parts.push('');
  renderForecastTable(parts, data.forecast, fmt);

  renderInsights(parts, 'Revenue Trends', data.revenueTrends);
  renderInsights(parts, 'Anomalies', data.anomalies);
  renderInsights(parts, 'Forecasts', data.forecasts);
  renderInsights(parts, 'Recommendations', data.recommendations);

  return parts.join('\n').trimEnd();
}

/** A titled list of findings, used for the single-analysis tools. */
export function generateInsightListReport(
  title: string,
  items: InsightItem[],
  range: AnalysisDateRange
): string {
  const parts: string[] = [];
  parts.push(`# ${title} - ${rangeLabel(range)}`);
  parts.push('');
  if (items.length === 0) {
    parts.push('No findings for this period.');
    return parts.join('\n');
  }
  for (const item of items) {
    parts.push(...formatInsightLine(item));
  }
  return parts.join('\n');
}

// ─── Forecast ───────────────────────────────────────────────

/**
 * Next-month forecast for `period`, with an optional multi-month revenue
 * outlook starting in the same month.
 */
export function generateForecastReport(
  forecast: ForecastData,
  period: AnalysisDateRange,
  fmt: CurrencyFormatter,
  outlook?: EnhancedForecastResult
): string {
  const parts: string[] = [];
  parts.push(`# Forecast - ${format(period.startDate, 'MMMM yyyy')}`);
  parts.push('');
  renderForecastTable(parts, forecast, fmt);

  if (outlook) {
    parts.push('## Revenue Outlook');
    parts.push('');
    parts.push('| Month | Forecast | Low | High |');
    parts.push('|-------|----------|-----|------|');
    outlook.forecastedValues.forEach((value, i) => {
      const month = format(addMonths(period.startDate, i), 'MMM yyyy');
      const low = outlook.lowerBounds[i] ?? value;
      const high = outlook.upperBounds[i] ?? value;
      parts.push(`| ${month} | ${fmt(value)} | ${fmt(low)} | ${fmt(high)} |`);
    });
    parts.push('');
    parts.push(
      `**Method:** ${outlook.methodUsed} over ${outlook.dataPointsUsed} month(s), confidence ${outlook.confidenceScore}/100 (${outlook.confidenceLevel})`
    );
    if (outlook.degradedMethods.length > 0) {
      parts.push(`**Fell back from:** ${outlook.degradedMethods.join(', ')}`);
    }
    parts.push(`**Seasonality:** ${outlook.seasonalPattern.description}`);
    parts.push('');
  }

  return parts.join('\n').trimEnd();
}

// ─── Accuracy ───────────────────────────────────────────────

function formatActual(value: number | null, fmt: CurrencyFormatter): string {
  return value === null ? '-' : fmt(value);
}

function formatRecordLine(record: ForecastRecord, fmt: CurrencyFormatter): string {
  const accuracy = revenueAccuracy(record);
  const status = record.isValidated ? 'Validated' : 'Pending';
  return `| ${record.periodStart} | ${fmt(record.forecastedRevenue)} | ${formatActual(record.actualRevenue, fmt)} | ${accuracy === null ? '-' : `${accuracy.toFixed(1)}%`} | ${status} |`;
}

export function generateAccuracyReport(data: ForecastAccuracyData, fmt: CurrencyFormatter): string {
  const parts: string[] = [];
  parts.push('# Forecast Accuracy');
  parts.push('');
  parts.push(data.description);
  parts.push('');

  if (data.validatedCount > 0) {
    parts.push('| Metric | Value |');
    parts.push('|--------|-------|');
    parts.push(`| Revenue Accuracy | ${data.averageRevenueAccuracy.toFixed(1)}% |`);
    parts.push(`| Expense Accuracy | ${data.averageExpensesAccuracy.toFixed(1)}% |`);
    parts.push(`| Revenue MAPE | ${data.overallRevenueMape.toFixed(1)}% |`);
    parts.push(`| Validated | ${data.validatedCount} of ${data.totalCount} |`);
    parts.push(`| Trend | ${ACCURACY_TREND_LABEL[data.trend]} |`);
    parts.push('');
  }

  if (data.records.length > 0) {
    parts.push('## Forecast History');
    parts.push('');
    parts.push('| Period | Forecast | Actual | Accuracy | Status |');
    parts.push('|--------|----------|--------|----------|--------|');
    for (const record of data.records) {
      parts.push(formatRecordLine(record, fmt));
    }
    parts.push('');
  }

  return parts.join('\n').trimEnd();
}
