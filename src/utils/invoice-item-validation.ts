import type { CreateInvoiceItemDTO, InvoiceItemRecordInput } from '../models/invoice-item';
import { formatDecimal, parseDecimal } from './decimal';
import type { ValidationResult } from './validation';
import { checkAmount, checkLength, requiredText } from './validation';

const ITEM_DEFAULTS = {
  quantity: '1',
  tax_rate: '0',
} as const;

export function validateInvoiceItem(data: CreateInvoiceItemDTO): ValidationResult {
  const errors: string[] = [];

  const description = requiredText(data.description);
  if (!description) {
    errors.push('description is required');
  } else {
    checkLength(errors, 'description', description, 200);
  }

  checkAmount(errors, 'quantity', data.quantity, false);
  checkAmount(errors, 'unit_price', data.unit_price, true);
  checkAmount(errors, 'tax_rate', data.tax_rate, false);

  return {
    valid: errors.length === 0,
    errors,
  };
}

/** Canonical plain-notation strings; call only on data that passed validation. */
export function normalizeInvoiceItemData(data: CreateInvoiceItemDTO): InvoiceItemRecordInput {
  return {
    description: requiredText(data.description),
    quantity: data.quantity === undefined ? ITEM_DEFAULTS.quantity : formatDecimal(parseDecimal(data.quantity, 'quantity')),
    unit_price: formatDecimal(parseDecimal(data.unit_price, 'unit_price')),
    tax_rate: data.tax_rate === undefined ? ITEM_DEFAULTS.tax_rate : formatDecimal(parseDecimal(data.tax_rate, 'tax_rate')),
  };
}
