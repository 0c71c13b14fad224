import type { Expense, ExpenseSums, ExpenseTotals } from '../models/expense';
import { formatDecimal, formatExact, parseDecimal, subtractDecimals, sumDecimals } from './decimal';

export function sumExpenses(expenses: readonly Pick<Expense, 'amount' | 'vat_amount'>[]): ExpenseSums {
  return {
    count: expenses.length,
    amount: formatDecimal(sumDecimals(expenses.map(expense => parseDecimal(expense.amount, 'amount')))),
    vat_amount: formatDecimal(sumDecimals(expenses.map(expense => parseDecimal(expense.vat_amount, 'vat_amount')))),
  };
}

/** Exact, like invoice totals: nothing is rounded. */
export function toExpenseTotals(sums: ExpenseSums): ExpenseTotals {
  const amount = parseDecimal(sums.amount, 'amount');
  const vat = parseDecimal(sums.vat_amount, 'vat_amount');
  return {
    count: sums.count,
    amount: formatExact(amount),
    vat_amount: formatExact(vat),
    net_amount: formatExact(subtractDecimals(amount, vat)),
  };
}
