import type { CreateInvoiceDTO, InvoiceRecordInput, InvoiceStatus } from '../models/invoice';
import { INVOICE_STATUSES } from '../models/invoice';
import type { ValidationResult } from './validation';
import { checkLength, isIsoDate, isPositiveInteger, optionalText, parseIdentifier, requiredText, todayIsoDate } from './validation';

export function isInvoiceStatus(value: unknown): value is InvoiceStatus {
  return INVOICE_STATUSES.some(status => status === value);
}

function optionalDate(value: unknown): string | null {
  return optionalText(value);
}

export function normalizeInvoiceData(data: CreateInvoiceDTO, today: string = todayIsoDate()): InvoiceRecordInput {
  return {
    invoice_number: requiredText(data.invoice_number),
    client_id: parseIdentifier(data.client_id),
    invoice_date: optionalDate(data.invoice_date) ?? today,
    due_date: optionalDate(data.due_date),
    payment_date: optionalDate(data.payment_date),
    status: data.status ?? 'pending',
    notes: optionalText(data.notes),
  };
}

export function validateInvoice(data: InvoiceRecordInput): ValidationResult {
  const errors: string[] = [];

  if (!data.invoice_number) {
    errors.push('invoice_number is required');
  } else {
    checkLength(errors, 'invoice_number', data.invoice_number, 50);
  }

  if (!isPositiveInteger(data.client_id)) {
    errors.push('client_id must be a positive integer');
  }

  if (!isIsoDate(data.invoice_date)) {
    errors.push('invoice_date must be a date in YYYY-MM-DD format');
  }

  if (data.due_date !== null) {
    if (!isIsoDate(data.due_date)) {
      errors.push('due_date must be a date in YYYY-MM-DD format');
    } else if (isIsoDate(data.invoice_date) && data.due_date < data.invoice_date) {
      errors.push('due_date cannot be before invoice_date');
    }
  }

  if (data.payment_date !== null && !isIsoDate(data.payment_date)) {
    errors.push('payment_date must be a date in YYYY-MM-DD format');
  }

  if (!isInvoiceStatus(data.status)) {
    errors.push(`status must be one of: ${INVOICE_STATUSES.join(', ')}`);
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}
