import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ForecastStore } from './forecast-store.js';
import { NO_VALIDATED_FORECASTS } from './accuracy.js';
import { emptyForecast } from '../insights/business-forecast.js';
import { createDateRange } from '../orchestrator/date-range.js';
import type { ForecastData } from '../insights/types.js';
import { makeCompany, makePurchase, makeSale } from '../insights/test-fixtures.js';

function makeForecast(overrides: Partial<ForecastData> = {}): ForecastData {
  return {
    ...emptyForecast(),
    forecastedRevenue: 900,
    forecastedExpenses: 600,
    forecastedProfit: 300,
    expectedNewCustomers: 2,
    confidenceScore: 55,
    ...overrides,
  };
}

function monthRange(month: number) {
  return createDateRange(new Date(2026, month, 1), new Date(2026, month + 1, 0));
}

const june = monthRange(5);

/** June actuals: revenue 1000, expenses 500, one first-time customer. */
function juneLedger() {
  return makeCompany({
    sales: [
      makeSale({ date: new Date(2026, 4, 30), effectiveAmountUSD: 700, customerId: 'C2' }),
      makeSale({ date: new Date(2026, 5, 5), effectiveAmountUSD: 600, customerId: 'C1' }),
      makeSale({ date: new Date(2026, 5, 20), effectiveAmountUSD: 400, customerId: 'C2' }),
      makeSale({ date: new Date(2026, 6, 1), effectiveAmountUSD: 999, customerId: 'C3' }),
    ],
    purchases: [makePurchase({ date: new Date(2026, 5, 10), effectiveAmountUSD: 500 })],
  });
}

describe('ForecastStore', () => {
  let store: ForecastStore;

  beforeEach(() => {
    store = new ForecastStore(':memory:');
  });

  afterEach(() => {
    store.close();
  });

  describe('saveForecast', () => {
    it('stores an unvalidated record for the period', () => {
      const id = store.saveForecast(makeForecast(), june, new Date('2026-05-31T12:00:00Z'));

      expect(store.getRecords()).toEqual([
        {
          id,
          forecastDate: '2026-05-31T12:00:00.000Z',
          periodStart: '2026-06-01',
          periodEnd: '2026-06-30',
          forecastedRevenue: 900,
          actualRevenue: null,
          forecastedExpenses: 600,
          actualExpenses: null,
          forecastedProfit: 300,
          actualProfit: null,
          forecastedNewCustomers: 2,
          actualNewCustomers: null,
          confidenceScore: 55,
          forecastMethod: 'Regression + Smoothing',
          isValidated: false,
        },
      ]);
    });

    it('overwrites an unvalidated forecast for the same period', () => {
      const first = store.saveForecast(makeForecast(), june);
      const second = store.saveForecast(makeForecast({ forecastedRevenue: 950 }), june);

      expect(second).toBe(first);
      const records = store.getRecords();
      expect(records).toHaveLength(1);
      expect(records[0]!.forecastedRevenue).toBe(950);
    });

    it('never overwrites a validated forecast', () => {
      store.saveForecast(makeForecast(), june, new Date('2026-05-31T12:00:00Z'));
      store.validatePastForecasts(juneLedger(), new Date(2026, 6, 1));

      store.saveForecast(makeForecast(), june, new Date('2026-07-02T12:00:00Z'));

      expect(store.getRecords().map((r) => r.isValidated)).toEqual([false, true]);
    });
  });

  describe('validatePastForecasts', () => {
    it('fills in actuals once the period has ended', () => {
      store.saveForecast(makeForecast(), june);

      expect(store.validatePastForecasts(juneLedger(), new Date(2026, 6, 1))).toBe(1);

      expect(store.getRecords()[0]).toMatchObject({
        actualRevenue: 1000,
        actualExpenses: 500,
        actualProfit: 500,
        actualNewCustomers: 1,
        isValidated: true,
      });
    });

    it('waits until the day after the period ends', () => {
      store.saveForecast(makeForecast(), june);

      expect(store.validatePastForecasts(juneLedger(), new Date(2026, 5, 30))).toBe(0);
      expect(store.getRecords()[0]!.isValidated).toBe(false);
    });

    it('validates each record only once', () => {
      store.saveForecast(makeForecast(), june);
      store.validatePastForecasts(juneLedger(), new Date(2026, 6, 1));

      expect(store.validatePastForecasts(juneLedger(), new Date(2026, 6, 2))).toBe(0);
    });
  });

  describe('accuracy', () => {
    it('reports nothing before any validation', () => {
      store.saveForecast(makeForecast(), june);

      expect(store.getRecentAccuracy()).toBeNull();
      expect(store.getHistoricalAccuracy()).toBeNull();
      expect(store.getAccuracySummary()).toBe(NO_VALIDATED_FORECASTS);
    });

    it('scores validated forecasts', () => {
      store.saveForecast(makeForecast(), june);

      const data = store.getAccuracyData(juneLedger(), new Date(2026, 6, 1));

      expect(data).toMatchObject({
        averageRevenueAccuracy: 90,
        averageExpensesAccuracy: 80,
        overallRevenueMape: 10,
        validatedCount: 1,
        totalCount: 1,
        trend: 'stable',
        description: 'Good accuracy. Forecasts average ±15% deviation from actual values.',
      });
      expect(store.getRecentAccuracy()).toEqual({ revenueAccuracy: 90, expenseAccuracy: 80 });
      expect(store.getHistoricalAccuracy()).toBe(85);
      expect(store.getAccuracySummary()).toBe(
        'Based on 1 validated forecast(s), predictions were within ±15% of actual values on average.'
      );
    });
  });

  describe('cleanupOldRecords', () => {
    it('keeps validated records first, then the newest periods', () => {
      for (const month of [3, 4, 5, 6]) {
        store.saveForecast(makeForecast(), monthRange(month));
      }
      // April and May have ended by June 1
      store.validatePastForecasts(juneLedger(), new Date(2026, 5, 1));

      expect(store.cleanupOldRecords(3)).toBe(1);
      expect(store.getRecords().map((r) => r.periodStart)).toEqual([
        '2026-07-01',
        '2026-05-01',
        '2026-04-01',
      ]);
    });

    it('does nothing under the limit', () => {
      store.saveForecast(makeForecast(), june);
      expect(store.cleanupOldRecords()).toBe(0);
    });
  });
});
