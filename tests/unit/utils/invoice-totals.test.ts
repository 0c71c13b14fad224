/**
 * Invoice Totals Tests
 * Exact line arithmetic, with half-even rounding only for the amount due
 */

import { describe, it, expect } from 'vitest';
import type { InvoiceItem } from '../../../src/models/invoice-item';
import { addDecimals, formatExact, parseDecimal } from '../../../src/utils/decimal';
import {
  computeLineAmounts,
  computeTotal,
  computeTotalsBreakdown,
  toItemView,
} from '../../../src/utils/invoice-totals';
import type { TotalsLine } from '../../../src/utils/invoice-totals';

const line = (quantity: string, unit_price: string, tax_rate: string): TotalsLine => ({
  quantity,
  unit_price,
  tax_rate,
});

const addTotals = (a: string, b: string): string =>
  formatExact(addDecimals(parseDecimal(a), parseDecimal(b)));

describe('computeTotal', () => {
  it('should return 0.00 for an invoice without items', () => {
    expect(computeTotal([])).toBe('0.00');
  });

  it('should add tax on top of quantity times unit price', () => {
    expect(computeTotal([line('10', '50.00', '21')])).toBe('605.00');
  });

  it('should equal quantity times unit price when tax is zero', () => {
    expect(computeTotal([line('2', '19.99', '0')])).toBe('39.98');
    expect(computeTotal([line('1', '0.005', '0')])).toBe('0.005');
  });

  it('should support fractional quantities', () => {
    expect(computeTotal([line('1.5', '10', '10')])).toBe('16.50');
  });

  it('should keep digits below a cent', () => {
    // 3 x 0.10 = 0.30, tax 15% = 0.045
    expect(computeTotal([line('3', '0.10', '15')])).toBe('0.345');
    // 2 x 4.995 = 9.99, tax 7.5% = 0.749250
    expect(computeTotal([line('2', '4.995', '7.5')])).toBe('10.73925');
  });

  it('should not depend on item order', () => {
    const lines = [line('3', '19.99', '21'), line('0.5', '7.333', '9'), line('12', '0.01', '0')];
    const expected = computeTotal(lines);

    expect(computeTotal([...lines].reverse())).toBe(expected);
    expect(computeTotal([lines[1], lines[2], lines[0]])).toBe(expected);
  });

  it('should be additive over a split of the items', () => {
    const half = [line('1', '0.005', '0')];
    expect(addTotals(computeTotal(half), computeTotal(half))).toBe(computeTotal([...half, ...half]));
    expect(computeTotal([...half, ...half])).toBe('0.01');

    const taxed = [line('1', '0.10', '15')];
    expect(computeTotal(taxed)).toBe('0.115');
    expect(addTotals(computeTotal(taxed), computeTotal(taxed))).toBe(computeTotal([...taxed, ...taxed]));
    expect(computeTotal([...taxed, ...taxed])).toBe('0.23');

    const first = [line('3', '19.99', '21'), line('0.5', '7.333', '9')];
    const second = [line('12', '0.01', '0'), line('1', '0.125', '0')];
    expect(addTotals(computeTotal(first), computeTotal(second))).toBe(computeTotal([...first, ...second]));
  });
});

describe('computeTotalsBreakdown', () => {
  it('should split the total into subtotal and tax', () => {
    expect(computeTotalsBreakdown([line('10', '50.00', '21')])).toEqual({
      subtotal: '500.00',
      tax_total: '105.00',
      grand_total: '605.00',
      amount_due: '605.00',
    });
  });

  it('should return zeros for no items', () => {
    expect(computeTotalsBreakdown([])).toEqual({
      subtotal: '0.00',
      tax_total: '0.00',
      grand_total: '0.00',
      amount_due: '0.00',
    });
  });

  it('should round only the amount due, half to even', () => {
    expect(computeTotalsBreakdown([line('3', '0.10', '15')])).toEqual({
      subtotal: '0.30',
      tax_total: '0.045',
      grand_total: '0.345',
      amount_due: '0.34',
    });
    expect(computeTotalsBreakdown([line('1', '0.355', '0')]).amount_due).toBe('0.36');
  });

  it('should round the amount due from the exact sum, not each line', () => {
    expect(computeTotalsBreakdown([line('1', '0.005', '0')]).amount_due).toBe('0.00');
    expect(computeTotalsBreakdown([line('1', '0.005', '0'), line('1', '0.005', '0')]).amount_due).toBe('0.01');
  });

  it('should agree with computeTotal on the grand total', () => {
    const lines = [line('3', '0.10', '15'), line('2', '4.995', '7.5')];
    expect(computeTotalsBreakdown(lines).grand_total).toBe(computeTotal(lines));
  });
});

describe('computeLineAmounts', () => {
  it('should return exact line amounts', () => {
    expect(computeLineAmounts(line('3', '0.10', '15'))).toEqual({
      subtotal: '0.30',
      tax_amount: '0.045',
      total: '0.345',
    });
  });

  it('should attach amounts to an item view', () => {
    const item: InvoiceItem = {
      id: 1,
      invoice_id: 7,
      description: 'Consulting',
      quantity: '10',
      unit_price: '50.00',
      tax_rate: '21',
      created_at: new Date('2024-01-01T00:00:00Z'),
    };

    expect(toItemView(item)).toEqual({
      ...item,
      subtotal: '500.00',
      tax_amount: '105.00',
      total: '605.00',
    });
  });
});
