import type { DecimalInput } from '../utils/decimal';

export const EXPENSE_CATEGORIES = ['food', 'transport', 'rent', 'utilities', 'office', 'services', 'other'] as const;
export type ExpenseCategory = (typeof EXPENSE_CATEGORIES)[number];

/** `amount` includes VAT; both are NUMERIC strings in plain notation. */
export interface Expense {
  id: number;
  date: string;
  category: ExpenseCategory;
  vendor: string;
  amount: string;
  vat_amount: string;
  description: string | null;
  created_at: Date;
  updated_at: Date;
}

export interface CreateExpenseDTO {
  date?: string;
  category: ExpenseCategory;
  vendor: string;
  amount: DecimalInput;
  vat_amount?: DecimalInput;
  description?: string | null;
}

export type UpdateExpenseDTO = Partial<CreateExpenseDTO>;

export interface ExpenseRecordInput {
  date: string;
  category: ExpenseCategory;
  vendor: string;
  amount: string;
  vat_amount: string;
  description: string | null;
}

export const EXPENSE_SORT_FIELDS = ['id', 'date', 'category', 'vendor', 'amount', 'created_at'] as const;
export type ExpenseSortField = (typeof EXPENSE_SORT_FIELDS)[number];

/** Date bounds are inclusive. */
export interface ExpenseFilter {
  category?: ExpenseCategory;
  date_from?: string;
  date_to?: string;
  search?: string;
}

export interface ExpenseSearchParams extends ExpenseFilter {
  sortBy?: ExpenseSortField;
  sortOrder?: 'asc' | 'desc';
  page?: number;
  limit?: number;
  offset?: number;
}

export interface ExpenseListResponse {
  expenses: Expense[];
  total: number;
  page: number;
  limit: number;
  offset: number;
}

/** Raw exact sums as the repository computes them. */
export interface ExpenseSums {
  count: number;
  amount: string;
  vat_amount: string;
}

export interface ExpenseTotals {
  count: number;
  amount: string;
  vat_amount: string;
  /** amount minus vat_amount */
  net_amount: string;
}
