import type {
  Expense,
  ExpenseFilter,
  ExpenseListResponse,
  ExpenseRecordInput,
  ExpenseSearchParams,
  ExpenseSums,
} from '../models/expense';

export interface ExpenseRepository {
  create(expense: ExpenseRecordInput): Promise<Expense>;
  findById(id: number): Promise<Expense | null>;
  findAll(params: ExpenseSearchParams): Promise<ExpenseListResponse>;
  /** Exact sums over every expense the filter matches, ignoring paging. */
  sum(filter: ExpenseFilter): Promise<ExpenseSums>;
  update(id: number, expense: ExpenseRecordInput): Promise<Expense | null>;
  delete(id: number): Promise<boolean>;
}
