/**
 * Recommendation Engine
 *
 * Independent business rules over the analysis period. Each rule emits at
 * most one insight; rules that cannot resolve a name leave it out.
 * Pure functions — no I/O, all data passed in.
 */

import type { CompanyData, Invoice } from '../types/ledger.js';
import { lineItemAmount } from '../types/ledger.js';
import type { InsightItem } from './types.js';
import type { AnalysisDateRange } from '../orchestrator/date-range.js';
import { daysBetween, isInRange } from '../orchestrator/date-range.js';
import type { AnalysisContext } from './context.js';
import { resolveContext } from './context.js';
import { groupBy } from './statistics.js';
import { sumMoney } from './money.js';

type Rule = (data: CompanyData, range: AnalysisDateRange, ctx: AnalysisContext) => InsightItem | null;

const RULES: Rule[] = [
  topProduct,
  inactiveCustomers,
  overdueInvoices,
  supplierConcentration,
  customerConcentration,
  profitMargin,
];

export function generateRecommendations(
  data: CompanyData,
  range: AnalysisDateRange,
  ctx: AnalysisContext = resolveContext()
): InsightItem[] {
  const out: InsightItem[] = [];
  for (const rule of RULES) {
    const insight = rule(data, range, ctx);
    if (insight) out.push(insight);
  }
  return out;
}

// ─── Products ───────────────────────────────────────────────

/** Highest margin among products sold this period with a known cost. */
function topProduct(data: CompanyData, range: AnalysisDateRange, ctx: AnalysisContext): InsightItem | null {
  const lines = data.sales.filter((s) => isInRange(s.date, range)).flatMap((s) => s.lineItems);

  let best: { name: string; revenue: number; margin: number } | null = null;
  for (const [productId, group] of groupBy(lines, (li) => li.productId)) {
    if (productId === null) continue;
    const product = data.getProduct(productId);
    if (!product) continue;

    const revenue = sumMoney(group, lineItemAmount);
    const cost = sumMoney(group, (li) => li.quantity * product.costPrice);
    if (cost <= 0 || revenue <= 0) continue;

    const margin = ((revenue - cost) * 100) / revenue;
    if (!best || margin > best.margin) best = { name: product.name, revenue, margin };
  }
  if (!best) return null;

  return {
    title: 'Top Performing Product',
    description: `"${best.name}" has the highest profit margin at ${best.margin.toFixed(0)}%. Revenue this period: ${ctx.formatCurrency(best.revenue)}.`,
    recommendation:
      'Consider featuring this product more prominently in marketing or bundling it with other items.',
    severity: 'info',
    category: 'product',
    metricValue: best.revenue,
    percentageChange: best.margin,
  };
}

// ─── Customers ──────────────────────────────────────────────

/** Repeat customers whose last sale is more than the inactivity window before the range end. */
function inactiveCustomers(
  data: CompanyData,
  range: AnalysisDateRange,
  ctx: AnalysisContext
): InsightItem | null {
  const days = ctx.t.inactiveCustomerDays;
  let count = 0;
  for (const [customerId, sales] of groupBy(data.sales, (s) => s.customerId)) {
    if (customerId === null || sales.length < 2) continue;
    const last = sales.reduce((latest, s) => (s.date > latest ? s.date : latest), sales[0]!.date);
    if (daysBetween(last, range.endDate) > days) count++;
  }
  if (count === 0) return null;

  return {
    title: 'Customer Retention Opportunity',
    description: `${count} previously active customer(s) haven't made a purchase in over ${days} days.`,
    recommendation:
      'Consider sending re-engagement emails, special offers, or conducting a satisfaction survey.',
    severity: 'info',
    category: 'customer',
    metricValue: count,
  };
}

function customerConcentration(
  data: CompanyData,
  range: AnalysisDateRange,
  ctx: AnalysisContext
): InsightItem | null {
  const sales = data.sales.filter((s) => isInRange(s.date, range));
  const total = sumMoney(sales, (s) => s.effectiveAmountUSD);
  if (total <= 0) return null;

  const top = topShare(groupBy(sales, (s) => s.customerId), (s) => s.effectiveAmountUSD);
  if (!top || top.groups < 3) return null;

  const percent = (top.amount * 100) / total;
  if (percent <= ctx.t.customerConcentrationPercent) return null;

  const name = data.getCustomer(top.id)?.name ?? 'your top customer';
  return {
    title: 'Revenue Concentration Risk',
    description: `${percent.toFixed(0)}% of revenue comes from ${name}. This creates business risk if that relationship changes.`,
    recommendation:
      'Work on diversifying your customer base through acquisition and marketing efforts.',
    severity: 'warning',
    category: 'customer',
    percentageChange: percent,
  };
}

// ─── Payments ───────────────────────────────────────────────

/** Invoices not paid or cancelled, with a balance, whose due date is before `now`. */
export function findOverdueInvoices(invoices: readonly Invoice[], now: Date): Invoice[] {
  return invoices.filter(
    (i) =>
      i.status !== 'paid' &&
      i.status !== 'cancelled' &&
      i.balance > 0 &&
      daysBetween(i.dueDate, now) > 0
  );
}

function overdueInvoices(
  data: CompanyData,
  _range: AnalysisDateRange,
  ctx: AnalysisContext
): InsightItem | null {
  const overdue = findOverdueInvoices(data.invoices, ctx.now);
  if (overdue.length === 0) return null;

  const total = sumMoney(overdue, (i) => i.effectiveBalanceUSD);
  const oldest = overdue.reduce((max, i) => Math.max(max, daysBetween(i.dueDate, ctx.now)), 0);

  return {
    title: 'Payment Collection Needed',
    description: `${overdue.length} invoice(s) totaling ${ctx.formatCurrency(total)} are overdue. Oldest is ${oldest} days past due.`,
    recommendation:
      'Send payment reminders and follow up with these customers to improve cash flow.',
    severity: oldest > ctx.t.overdueWarningDays ? 'warning' : 'info',
    category: 'payment',
    metricValue: total,
  };
}

// ─── Suppliers ──────────────────────────────────────────────

function supplierConcentration(
  data: CompanyData,
  range: AnalysisDateRange,
  ctx: AnalysisContext
): InsightItem | null {
  const purchases = data.purchases.filter((p) => isInRange(p.date, range));
  const total = sumMoney(purchases, (p) => p.effectiveAmountUSD);
  if (total <= 0) return null;

  const top = topShare(groupBy(purchases, (p) => p.supplierId), (p) => p.effectiveAmountUSD);
  if (!top || top.groups < 2) return null;

  const percent = (top.amount * 100) / total;
  if (percent <= ctx.t.supplierConcentrationPercent) return null;

  const supplier = data.getSupplier(top.id);
  if (!supplier) return null;

  return {
    title: 'Supplier Concentration Risk',
    description: `${percent.toFixed(0)}% of your purchases (${ctx.formatCurrency(top.amount)}) are from ${supplier.name}.`,
    recommendation:
      'Consider diversifying suppliers to reduce risk and potentially negotiate better terms.',
    severity: 'info',
    category: 'recommendation',
    percentageChange: percent,
  };
}

// ─── Margin ─────────────────────────────────────────────────

function profitMargin(
  data: CompanyData,
  range: AnalysisDateRange,
  ctx: AnalysisContext
): InsightItem | null {
  const revenue = sumMoney(
    data.sales.filter((s) => isInRange(s.date, range)),
    (s) => s.effectiveAmountUSD
  );
  if (revenue === 0) return null;
  const expenses = sumMoney(
    data.purchases.filter((p) => isInRange(p.date, range)),
    (p) => p.effectiveAmountUSD
  );

  const margin = ((revenue - expenses) * 100) / revenue;

  if (margin < ctx.t.lowMarginPercent) {
    return {
      title: 'Low Profit Margin Alert',
      description: `Your current profit margin is ${margin.toFixed(1)}%. Industry benchmarks typically suggest 15-20% for healthy businesses.`,
      recommendation:
        'Review pricing strategy and look for cost reduction opportunities to improve profitability.',
      severity: 'warning',
      category: 'recommendation',
      percentageChange: margin,
    };
  }

  if (margin > ctx.t.strongMarginPercent) {
    return {
      title: 'Strong Profit Margins',
      description: `Your profit margin of ${margin.toFixed(1)}% is excellent. You're maintaining healthy profitability.`,
      severity: 'success',
      category: 'recommendation',
      percentageChange: margin,
    };
  }

  return null;
}

// ─── Helpers ────────────────────────────────────────────────

/**
 * Largest group by amount among known ids, with the number of known ids.
 * Transactions without an id count toward totals but never rank.
 */
function topShare<T>(
  groups: Map<string | null, T[]>,
  amountFn: (item: T) => number
): { id: string; amount: number; groups: number } | null {
  let best: { id: string; amount: number } | null = null;
  let known = 0;
  for (const [id, items] of groups) {
    if (id === null) continue;
    known++;
    const amount = sumMoney(items, amountFn);
    if (!best || amount > best.amount) best = { id, amount };
  }
  return best ? { ...best, groups: known } : null;
}
