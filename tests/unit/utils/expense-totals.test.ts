/**
 * Expense Totals Tests
 * Exact sums of amounts and VAT
 */

import { describe, it, expect } from 'vitest';
import { sumExpenses, toExpenseTotals } from '../../../src/utils/expense-totals';

const expense = (amount: string, vat_amount: string) => ({ amount, vat_amount });

describe('sumExpenses', () => {
  it('should add amounts without rounding', () => {
    expect(sumExpenses([expense('12.10', '2.10'), expense('0.005', '0')])).toEqual({
      count: 2,
      amount: '12.105',
      vat_amount: '2.10',
    });
  });

  it('should return zero sums for no expenses', () => {
    expect(sumExpenses([])).toEqual({ count: 0, amount: '0', vat_amount: '0' });
  });
});

describe('toExpenseTotals', () => {
  it('should derive the net amount exactly', () => {
    expect(toExpenseTotals({ count: 2, amount: '12.105', vat_amount: '2.10' })).toEqual({
      count: 2,
      amount: '12.105',
      vat_amount: '2.10',
      net_amount: '10.005',
    });
  });

  it('should print zeros with two places', () => {
    expect(toExpenseTotals(sumExpenses([]))).toEqual({
      count: 0,
      amount: '0.00',
      vat_amount: '0.00',
      net_amount: '0.00',
    });
  });

  it('should be additive over a split of the expenses', () => {
    const half = [expense('0.005', '0')];

    expect(toExpenseTotals(sumExpenses(half)).amount).toBe('0.005');
    expect(toExpenseTotals(sumExpenses([...half, ...half])).amount).toBe('0.01');
  });
});
