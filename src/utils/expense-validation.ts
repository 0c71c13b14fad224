import type { CreateExpenseDTO, ExpenseCategory, ExpenseFilter, ExpenseRecordInput } from '../models/expense';
import { EXPENSE_CATEGORIES } from '../models/expense';
import { compareDecimals, formatDecimal, parseDecimal } from './decimal';
import type { ValidationResult } from './validation';
import { checkAmount, checkLength, isIsoDate, optionalText, requiredText, todayIsoDate } from './validation';

export function isExpenseCategory(value: unknown): value is ExpenseCategory {
  return EXPENSE_CATEGORIES.some(category => category === value);
}

function checkDate(errors: string[], field: string, value: unknown): void {
  if (value === undefined || value === null) {
    return;
  }
  const text = optionalText(value);
  if (text === null || !isIsoDate(text)) {
    errors.push(`${field} must be a date in YYYY-MM-DD format`);
  }
}

export function validateExpense(data: CreateExpenseDTO): ValidationResult {
  const errors: string[] = [];

  checkDate(errors, 'date', data.date);

  if (data.category === undefined) {
    errors.push('category is required');
  } else if (!isExpenseCategory(data.category)) {
    errors.push(`category must be one of: ${EXPENSE_CATEGORIES.join(', ')}`);
  }

  const vendor = requiredText(data.vendor);
  if (!vendor) {
    errors.push('vendor is required');
  } else {
    checkLength(errors, 'vendor', vendor, 100);
  }

  const amount = checkAmount(errors, 'amount', data.amount, true);
  const vat = checkAmount(errors, 'vat_amount', data.vat_amount, false);
  if (amount !== null && vat !== null && compareDecimals(vat, amount) > 0) {
    errors.push('vat_amount cannot exceed amount');
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

/** Call only on data that passed validation. */
export function normalizeExpenseData(data: CreateExpenseDTO, today: string = todayIsoDate()): ExpenseRecordInput {
  return {
    date: optionalText(data.date) ?? today,
    category: data.category,
    vendor: requiredText(data.vendor),
    amount: formatDecimal(parseDecimal(data.amount, 'amount')),
    vat_amount: data.vat_amount === undefined ? '0' : formatDecimal(parseDecimal(data.vat_amount, 'vat_amount')),
    description: optionalText(data.description),
  };
}

export function validateExpenseFilter(filter: ExpenseFilter): ValidationResult {
  const errors: string[] = [];

  checkDate(errors, 'date_from', filter.date_from);
  checkDate(errors, 'date_to', filter.date_to);
  if (
    filter.date_from !== undefined &&
    filter.date_to !== undefined &&
    isIsoDate(filter.date_from) &&
    isIsoDate(filter.date_to) &&
    filter.date_to < filter.date_from
  ) {
    errors.push('date_to cannot be before date_from');
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}
