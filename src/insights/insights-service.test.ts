import { describe, it, expect } from 'vitest';
import { InsightsService } from './insights-service.js';
import { generateRecommendations } from './recommendation-engine.js';
import { generateRevenueOutlook } from './business-forecast.js';
import { resolveContext } from './context.js';
import { LedgerContractError } from './errors.js';
import { createDateRange } from '../orchestrator/date-range.js';
import type { CompanyData } from '../types/ledger.js';
import { makeCompany, makeInvoice, makePurchase, makeSale } from './test-fixtures.js';

const june = createDateRange(new Date(2026, 5, 1), new Date(2026, 5, 30));
const now = new Date(2026, 5, 30);

function ledger() {
  return makeCompany({
    sales: [1, 2, 3, 4, 5].map((day) =>
      makeSale({ date: new Date(2026, 5, day), effectiveAmountUSD: 200 })
    ),
    purchases: [makePurchase({ date: new Date(2026, 5, 6), effectiveAmountUSD: 950 })],
    invoices: [makeInvoice({ dueDate: new Date(2026, 5, 20) })],
  });
}

describe('InsightsService', () => {
  it('resolves to the synchronous result', async () => {
    const service = new InsightsService({ now });
    const data = ledger();

    await expect(service.generateRecommendations(data, june)).resolves.toEqual(
      generateRecommendations(data, june, resolveContext({ now }))
    );
  });

  it('lets per-call options override the defaults', async () => {
    const service = new InsightsService({ now });

    const recs = await service.generateRecommendations(ledger(), june, {
      now: new Date(2026, 5, 21),
    });

    const overdue = recs.find((i) => i.title === 'Payment Collection Needed');
    expect(overdue?.description).toBe(
      '1 invoice(s) totaling $500 are overdue. Oldest is 1 days past due.'
    );
  });

  it('runs every entry point', async () => {
    const service = new InsightsService({ now });
    const data = ledger();

    const [insights, forecast, anomalies, trends] = await Promise.all([
      service.generateInsights(data, june),
      service.generateForecast(data, june),
      service.detectAnomalies(data, june),
      service.analyzeTrends(data, june),
    ]);

    expect(insights.hasSufficientData).toBe(true);
    expect(insights.forecast).toEqual(forecast);
    expect(insights.anomalies).toEqual(anomalies);
    expect(insights.revenueTrends).toEqual(trends);
  });

  it('rejects when already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const service = new InsightsService({ now });

    await expect(
      service.detectAnomalies(ledger(), june, { signal: controller.signal })
    ).rejects.toThrow('This operation was aborted');
  });

  it('rejects when aborted while waiting for its turn', async () => {
    const controller = new AbortController();
    const service = new InsightsService({ now });

    const pending = service.generateInsights(ledger(), june, { signal: controller.signal });
    controller.abort();

    await expect(pending).rejects.toThrow('This operation was aborted');
  });

  it('rejects invalid input with a contract error', async () => {
    const broken: CompanyData = JSON.parse('{}');
    const service = new InsightsService({ now });

    await expect(service.analyzeTrends(broken, june)).rejects.toThrow(LedgerContractError);
  });

  it('passes outlook options through', async () => {
    const service = new InsightsService({ now });
    const data = ledger();

    const outlook = await service.generateRevenueOutlook(data, june, { periods: 4 });

    expect(outlook.forecastedValues).toHaveLength(4);
    expect(outlook).toEqual(generateRevenueOutlook(data, june, resolveContext({ now }), { periods: 4 }));
  });
});
