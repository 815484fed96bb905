import { describe, it, expect } from 'vitest';
import { generateInsights } from './insights-engine.js';
import { LedgerContractError } from './errors.js';
import { createDateRange } from '../orchestrator/date-range.js';
import type { CompanyData } from '../types/ledger.js';
import { makeCompany, makePurchase, makeSale } from './test-fixtures.js';

const june = createDateRange(new Date(2026, 5, 1), new Date(2026, 5, 30));
const now = new Date(2026, 5, 30);

/**
 * Five months of $10,000 revenue against $8,000 expenses, then a June of
 * twelve $500 sales plus one $10,000 sale against $12,800 expenses.
 */
function spikeLedger() {
  const sales = [0, 1, 2, 3, 4].map((m) =>
    makeSale({ date: new Date(2026, m, 15), effectiveAmountUSD: 10_000 })
  );
  for (let day = 1; day <= 12; day++) {
    sales.push(makeSale({ date: new Date(2026, 5, day), effectiveAmountUSD: 500 }));
  }
  sales.push(makeSale({ date: new Date(2026, 5, 15), effectiveAmountUSD: 10_000 }));

  const purchases = [0, 1, 2, 3, 4].map((m) =>
    makePurchase({ date: new Date(2026, m, 10), effectiveAmountUSD: 8_000 })
  );
  purchases.push(makePurchase({ date: new Date(2026, 5, 10), effectiveAmountUSD: 12_800 }));

  return makeCompany({ sales, purchases });
}

describe('generateInsights', () => {
  it('flags the spike, reports growth and forecasts revenue', () => {
    const result = generateInsights(spikeLedger(), june, { now });

    expect(result.hasSufficientData).toBe(true);
    expect(result.insufficientDataMessage).toBeUndefined();

    const spike = result.anomalies.find((i) => i.title === 'Unusually Large Transaction');
    expect(spike).toMatchObject({ severity: 'info', category: 'anomaly', metricValue: 10_000 });

    const growth = result.revenueTrends.find((i) => i.title === 'Revenue Growth Detected');
    expect(growth?.description).toBe(
      'Your revenue has increased by 60.0% compared to the previous period ($10,000 → $16,000).'
    );

    // 20% margin sits inside the quiet band
    expect(result.recommendations).toEqual([]);
    expect(result.forecast.forecastedRevenue).toBeGreaterThan(0);
  });

  it('summarizes counts per list', () => {
    const result = generateInsights(spikeLedger(), june, { now });

    expect(result.summary).toEqual({
      totalInsights:
        result.revenueTrends.length +
        result.anomalies.length +
        result.forecasts.length +
        result.recommendations.length,
      trendsDetected: result.revenueTrends.length,
      anomaliesDetected: result.anomalies.length,
      opportunities: 0,
      monthsOfData: 1,
    });
  });

  it('returns identical output for identical input', () => {
    const data = spikeLedger();
    const { generatedAt: _first, ...first } = generateInsights(data, june, { now });
    const { generatedAt: _second, ...second } = generateInsights(data, june, { now });

    expect(second).toEqual(first);
  });

  it('skips analysis below five transactions', () => {
    const data = makeCompany({
      sales: [1, 2, 3].map((day) => makeSale({ date: new Date(2026, 5, day) })),
      purchases: [makePurchase({ date: new Date(2026, 5, 4) })],
    });

    const result = generateInsights(data, june, { now });

    expect(result).toMatchObject({
      hasSufficientData: false,
      insufficientDataMessage:
        'Need at least 5 transactions for meaningful insights. Currently have 4.',
      revenueTrends: [],
      anomalies: [],
      forecasts: [],
      recommendations: [],
      summary: {
        totalInsights: 0,
        trendsDetected: 0,
        anomaliesDetected: 0,
        opportunities: 0,
        monthsOfData: 0,
      },
    });
    expect(result.forecast.forecastedRevenue).toBe(0);
    expect(result.forecast.confidenceLevel).toBe('low');
  });

  it('honours configured thresholds', () => {
    const data = makeCompany({
      sales: [1, 2, 3].map((day) => makeSale({ date: new Date(2026, 5, day) })),
    });

    const result = generateInsights(data, june, { now, thresholds: { minimumTransactions: 3 } });

    expect(result.hasSufficientData).toBe(true);
  });

  it('throws the abort reason when cancelled', () => {
    const controller = new AbortController();
    controller.abort();

    expect(() => generateInsights(spikeLedger(), june, { now, signal: controller.signal })).toThrow(
      'This operation was aborted'
    );
  });

  it('rejects data without its collections', () => {
    const broken: CompanyData = JSON.parse('{"sales":[],"purchases":null}');

    expect(() => generateInsights(broken, june, { now })).toThrow(LedgerContractError);
    expect(() => generateInsights(broken, june, { now })).toThrow(
      'Company data is missing the "purchases" collection'
    );
  });

  it('rejects an inverted range', () => {
    const inverted = { startDate: new Date(2026, 5, 30), endDate: new Date(2026, 5, 1) };

    expect(() => generateInsights(makeCompany(), inverted, { now })).toThrow(
      'Date range starts after it ends'
    );
  });
});
