import type { InvoiceItem, InvoiceItemView } from '../models/invoice-item';
import type { InvoiceTotals } from '../models/invoice';
import type { FixedDecimal } from './decimal';
import {
  addDecimals,
  formatExact,
  formatMoney,
  multiplyDecimals,
  parseDecimal,
  shiftDecimal,
  sumDecimals,
  ZERO,
} from './decimal';

/**
 * Invoice totals.
 *
 * Per line: subtotal = quantity * unit_price, tax = subtotal * tax_rate / 100.
 * The invoice total is the sum of subtotal + tax over all lines. Totals are
 * exact decimals shown with at least 2 places, so totals of split item lists
 * add up to the total of the whole list. Only `amount_due` is rounded
 * (half-even, to cents) and only from the exact grand total.
 *
 * Inputs are expected to have passed item validation. Nothing here does I/O.
 */
export type TotalsLine = Pick<InvoiceItem, 'quantity' | 'unit_price' | 'tax_rate'>;

interface ExactLineAmounts {
  subtotal: FixedDecimal;
  tax: FixedDecimal;
  total: FixedDecimal;
}

function exactLineAmounts(line: TotalsLine): ExactLineAmounts {
  const subtotal = multiplyDecimals(parseDecimal(line.quantity, 'quantity'), parseDecimal(line.unit_price, 'unit_price'));
  const tax = shiftDecimal(multiplyDecimals(subtotal, parseDecimal(line.tax_rate, 'tax_rate')), 2);
  return { subtotal, tax, total: addDecimals(subtotal, tax) };
}

function sumLineTotals(lines: readonly TotalsLine[]): FixedDecimal {
  return sumDecimals(lines.map(line => exactLineAmounts(line).total));
}

export function computeTotal(lines: readonly TotalsLine[]): string {
  return formatExact(sumLineTotals(lines));
}

export function computeTotalsBreakdown(lines: readonly TotalsLine[]): InvoiceTotals {
  let subtotal = ZERO;
  let tax = ZERO;
  for (const line of lines) {
    const amounts = exactLineAmounts(line);
    subtotal = addDecimals(subtotal, amounts.subtotal);
    tax = addDecimals(tax, amounts.tax);
  }
  const grand = addDecimals(subtotal, tax);
  return {
    subtotal: formatExact(subtotal),
    tax_total: formatExact(tax),
    grand_total: formatExact(grand),
    amount_due: formatMoney(grand),
  };
}

export function computeLineAmounts(line: TotalsLine): { subtotal: string; tax_amount: string; total: string } {
  const amounts = exactLineAmounts(line);
  return {
    subtotal: formatExact(amounts.subtotal),
    tax_amount: formatExact(amounts.tax),
    total: formatExact(amounts.total),
  };
}

export function toItemView(item: InvoiceItem): InvoiceItemView {
  return { ...item, ...computeLineAmounts(item) };
}
