import { describe, it, expect } from 'vitest';
import { findOverdueInvoices, generateRecommendations } from './recommendation-engine.js';
import { resolveContext } from './context.js';
import { createDateRange } from '../orchestrator/date-range.js';
import {
  makeCompany,
  makeCustomer,
  makeInvoice,
  makeLineItem,
  makeProduct,
  makePurchase,
  makeSale,
  makeSupplier,
} from './test-fixtures.js';

const june = createDateRange(new Date(2026, 5, 1), new Date(2026, 5, 30));
const ctx = resolveContext({ now: new Date(2026, 5, 30) });
const inJune = (day: number) => new Date(2026, 5, day);

describe('generateRecommendations', () => {
  describe('top product', () => {
    it('reports the highest-margin product with a known cost', () => {
      const data = makeCompany({
        products: [
          makeProduct({ id: 'P1', name: 'Blue Kettle', costPrice: 60 }),
          makeProduct({ id: 'P2', name: 'Mug', costPrice: 5 }),
          makeProduct({ id: 'P5', name: 'Gift Card', costPrice: 0 }),
        ],
        sales: [
          makeSale({
            date: inJune(10),
            lineItems: [
              makeLineItem({ productId: 'P1', quantity: 2, unitPrice: 100 }),
              makeLineItem({ productId: 'P2', quantity: 10, unitPrice: 10 }),
              makeLineItem({ productId: 'P5', quantity: 1, unitPrice: 500 }),
              makeLineItem({ productId: 'P404', quantity: 1, unitPrice: 900 }),
            ],
          }),
        ],
      });

      const top = generateRecommendations(data, june, ctx).find(
        (i) => i.title === 'Top Performing Product'
      );

      expect(top).toEqual({
        title: 'Top Performing Product',
        description: '"Mug" has the highest profit margin at 50%. Revenue this period: $100.',
        recommendation:
          'Consider featuring this product more prominently in marketing or bundling it with other items.',
        severity: 'info',
        category: 'product',
        metricValue: 100,
        percentageChange: 50,
      });
    });

    it('stays quiet when no product has a cost', () => {
      const data = makeCompany({
        products: [makeProduct({ id: 'P5', name: 'Gift Card', costPrice: 0 })],
        sales: [
          makeSale({ date: inJune(10), lineItems: [makeLineItem({ productId: 'P5' })] }),
        ],
      });

      const titles = generateRecommendations(data, june, ctx).map((i) => i.title);
      expect(titles).not.toContain('Top Performing Product');
    });
  });

  describe('inactive customers', () => {
    it('counts repeat customers silent for more than 60 days', () => {
      const data = makeCompany({
        sales: [
          // C1: last sale Apr 1, 90 days before the range end
          makeSale({ date: new Date(2026, 2, 1), customerId: 'C1' }),
          makeSale({ date: new Date(2026, 3, 1), customerId: 'C1' }),
          // C2: only one sale
          makeSale({ date: new Date(2026, 2, 1), customerId: 'C2' }),
          // C3: last sale May 15, 46 days
          makeSale({ date: new Date(2026, 3, 1), customerId: 'C3' }),
          makeSale({ date: new Date(2026, 4, 15), customerId: 'C3' }),
          // C4: last sale May 1, exactly 60 days
          makeSale({ date: new Date(2026, 3, 1), customerId: 'C4' }),
          makeSale({ date: new Date(2026, 4, 1), customerId: 'C4' }),
        ],
      });

      expect(generateRecommendations(data, june, ctx)).toEqual([
        {
          title: 'Customer Retention Opportunity',
          description: "1 previously active customer(s) haven't made a purchase in over 60 days.",
          recommendation:
            'Consider sending re-engagement emails, special offers, or conducting a satisfaction survey.',
          severity: 'info',
          category: 'customer',
          metricValue: 1,
        },
      ]);
    });
  });

  describe('overdue invoices', () => {
    function invoices() {
      return [
        makeInvoice({ dueDate: inJune(20), effectiveBalanceUSD: 500 }),
        makeInvoice({ dueDate: new Date(2026, 4, 1), status: 'overdue', effectiveBalanceUSD: 250.25 }),
        makeInvoice({ dueDate: new Date(2026, 0, 31), status: 'paid' }),
        makeInvoice({ dueDate: new Date(2026, 0, 31), status: 'cancelled' }),
        makeInvoice({ dueDate: inJune(30) }),
        makeInvoice({ dueDate: new Date(2026, 0, 31), balance: 0, effectiveBalanceUSD: 0 }),
      ];
    }

    it('selects unpaid invoices past due with a balance', () => {
      const overdue = findOverdueInvoices(invoices(), inJune(30));
      expect(overdue.map((i) => i.effectiveBalanceUSD)).toEqual([500, 250.25]);
    });

    it('warns when the oldest is more than 30 days late', () => {
      const [insight] = generateRecommendations(makeCompany({ invoices: invoices() }), june, ctx);

      expect(insight).toEqual({
        title: 'Payment Collection Needed',
        description: '2 invoice(s) totaling $750 are overdue. Oldest is 60 days past due.',
        recommendation:
          'Send payment reminders and follow up with these customers to improve cash flow.',
        severity: 'warning',
        category: 'payment',
        metricValue: 750.25,
      });
    });

    it('is informational at 30 days or less', () => {
      const data = makeCompany({
        invoices: [makeInvoice({ dueDate: new Date(2026, 4, 31), effectiveBalanceUSD: 500 })],
      });

      const [insight] = generateRecommendations(data, june, ctx);

      expect(insight!.description).toBe(
        '1 invoice(s) totaling $500 are overdue. Oldest is 30 days past due.'
      );
      expect(insight!.severity).toBe('info');
    });

    it('handles a very long overdue list', () => {
      const recent = makeInvoice({ dueDate: new Date(2026, 4, 31), effectiveBalanceUSD: 1 });
      const data = makeCompany({
        invoices: [
          ...Array.from({ length: 200_000 }, () => recent),
          makeInvoice({ dueDate: new Date(2026, 4, 1), effectiveBalanceUSD: 1 }),
        ],
      });

      const [insight] = generateRecommendations(data, june, ctx);

      expect(insight!.description).toBe(
        '200001 invoice(s) totaling $200,001 are overdue. Oldest is 60 days past due.'
      );
    });
  });

  describe('supplier concentration', () => {
    const suppliers = [makeSupplier('S1', 'Acme Supplies'), makeSupplier('S2', 'Northwind')];

    function ledger(topId: string, topAmount: number, otherAmount: number) {
      return makeCompany({
        suppliers,
        purchases: [
          makePurchase({ date: inJune(5), supplierId: topId, effectiveAmountUSD: topAmount }),
          makePurchase({ date: inJune(6), supplierId: 'S2', effectiveAmountUSD: otherAmount }),
        ],
      });
    }

    it('flags a supplier above 60% of spend', () => {
      expect(generateRecommendations(ledger('S1', 700, 300), june, ctx)).toEqual([
        {
          title: 'Supplier Concentration Risk',
          description: '70% of your purchases ($700) are from Acme Supplies.',
          recommendation:
            'Consider diversifying suppliers to reduce risk and potentially negotiate better terms.',
          severity: 'info',
          category: 'recommendation',
          percentageChange: 70,
        },
      ]);
    });

    it('does not flag exactly 60%', () => {
      expect(generateRecommendations(ledger('S1', 600, 400), june, ctx)).toEqual([]);
    });

    it('stays quiet when the dominant supplier is unknown', () => {
      expect(generateRecommendations(ledger('S9', 700, 300), june, ctx)).toEqual([]);
    });

    it('needs two suppliers', () => {
      const data = makeCompany({
        suppliers,
        purchases: [makePurchase({ date: inJune(5), supplierId: 'S1', effectiveAmountUSD: 900 })],
      });
      expect(generateRecommendations(data, june, ctx)).toEqual([]);
    });
  });

  describe('customer concentration', () => {
    // 500 + 300 + 200 of sales and 700 of purchases: 30% margin, no margin insight.
    function ledger(topId: string, customers = ['C2', 'C3']) {
      return makeCompany({
        customers: [makeCustomer('C1', 'Acme Ltd')],
        sales: [
          makeSale({ date: inJune(3), customerId: topId, effectiveAmountUSD: 500 }),
          makeSale({ date: inJune(4), customerId: customers[0]!, effectiveAmountUSD: 300 }),
          makeSale({ date: inJune(5), customerId: customers[1]!, effectiveAmountUSD: 200 }),
        ],
        purchases: [makePurchase({ date: inJune(5), effectiveAmountUSD: 700 })],
      });
    }

    it('warns when one customer brings more than 40% of revenue', () => {
      expect(generateRecommendations(ledger('C1'), june, ctx)).toEqual([
        {
          title: 'Revenue Concentration Risk',
          description:
            '50% of revenue comes from Acme Ltd. This creates business risk if that relationship changes.',
          recommendation:
            'Work on diversifying your customer base through acquisition and marketing efforts.',
          severity: 'warning',
          category: 'customer',
          percentageChange: 50,
        },
      ]);
    });

    it('falls back to a generic name', () => {
      const [insight] = generateRecommendations(ledger('C9'), june, ctx);
      expect(insight!.description).toMatch(/^50% of revenue comes from your top customer\./);
    });

    it('needs three customers', () => {
      expect(generateRecommendations(ledger('C1', ['C2', 'C2']), june, ctx)).toEqual([]);
    });
  });

  describe('profit margin', () => {
    function ledger(expenses: number) {
      return makeCompany({
        sales: [makeSale({ date: inJune(10), effectiveAmountUSD: 1000 })],
        purchases: [makePurchase({ date: inJune(11), effectiveAmountUSD: expenses })],
      });
    }

    it('warns below 10%', () => {
      expect(generateRecommendations(ledger(950), june, ctx)).toEqual([
        {
          title: 'Low Profit Margin Alert',
          description:
            'Your current profit margin is 5.0%. Industry benchmarks typically suggest 15-20% for healthy businesses.',
          recommendation:
            'Review pricing strategy and look for cost reduction opportunities to improve profitability.',
          severity: 'warning',
          category: 'recommendation',
          percentageChange: 5,
        },
      ]);
    });

    it('celebrates above 30%', () => {
      const [insight] = generateRecommendations(ledger(600), june, ctx);

      expect(insight).toEqual({
        title: 'Strong Profit Margins',
        description: "Your profit margin of 40.0% is excellent. You're maintaining healthy profitability.",
        severity: 'success',
        category: 'recommendation',
        percentageChange: 40,
      });
    });

    it('says nothing from 10% to 30% inclusive', () => {
      expect(generateRecommendations(ledger(900), june, ctx)).toEqual([]);
      expect(generateRecommendations(ledger(800), june, ctx)).toEqual([]);
      expect(generateRecommendations(ledger(700), june, ctx)).toEqual([]);
    });

    it('skips a period without revenue', () => {
      const data = makeCompany({
        purchases: [makePurchase({ date: inJune(11), effectiveAmountUSD: 400 })],
      });
      expect(generateRecommendations(data, june, ctx)).toEqual([]);
    });
  });
});
