/**
 * Money Helpers
 *
 * Ledger amounts carry at most two decimals. Sums are accumulated in
 * integer cents so repeated addition never drifts by a penny.
 */

export function toCents(amount: number): number {
  return Math.round(amount * 100);
}

export function fromCents(cents: number): number {
  return cents / 100;
}

export function sumMoney<T>(items: Iterable<T>, amountFn: (item: T) => number): number {
  let cents = 0;
  for (const item of items) {
    cents += toCents(amountFn(item));
  }
  return fromCents(cents);
}

export interface MoneyFormat {
  locale: string;
  currency: string;
}

export const DEFAULT_MONEY_FORMAT: MoneyFormat = { locale: 'en-US', currency: 'USD' };

/** Whole-unit currency string, e.g. "$12,345". */
export function formatMoney(amount: number, fmt: MoneyFormat = DEFAULT_MONEY_FORMAT): string {
  return new Intl.NumberFormat(fmt.locale, {
    style: 'currency',
    currency: fmt.currency,
    minimumFractionDigits: 0,
    maximumFractionDigits: 0,
  }).format(amount);
}
