import type {
  CreateExpenseDTO,
  Expense,
  ExpenseFilter,
  ExpenseListResponse,
  ExpenseSearchParams,
  ExpenseTotals,
  UpdateExpenseDTO,
} from '../models/expense';
import type { ExpenseRepository } from '../repositories';
import { ValidationError } from '../utils/errors';
import { normalizeExpenseData, validateExpense, validateExpenseFilter } from '../utils/expense-validation';
import { toExpenseTotals } from '../utils/expense-totals';
import { Logger } from '../utils/logger';

function toExpenseDTO(expense: Expense): CreateExpenseDTO {
  return {
    date: expense.date,
    category: expense.category,
    vendor: expense.vendor,
    amount: expense.amount,
    vat_amount: expense.vat_amount,
    description: expense.description,
  };
}

export class ExpenseService {
  constructor(private readonly repository: ExpenseRepository) {}

  async createExpense(data: CreateExpenseDTO): Promise<Expense> {
    const validation = validateExpense(data);
    if (!validation.valid) {
      throw new ValidationError(validation.errors);
    }

    const expense = await this.repository.create(normalizeExpenseData(data));
    Logger.debug('Expense created', { expenseId: expense.id, category: expense.category });
    return expense;
  }

  async getExpenseById(id: number): Promise<Expense | null> {
    return this.repository.findById(id);
  }

  async listExpenses(params: ExpenseSearchParams): Promise<ExpenseListResponse> {
    this.assertFilter(params);
    return this.repository.findAll(params);
  }

  async updateExpense(id: number, data: UpdateExpenseDTO): Promise<Expense | null> {
    const existing = await this.repository.findById(id);
    if (!existing) {
      return null;
    }

    const merged: CreateExpenseDTO = { ...toExpenseDTO(existing), ...data };
    const validation = validateExpense(merged);
    if (!validation.valid) {
      throw new ValidationError(validation.errors);
    }

    return this.repository.update(id, normalizeExpenseData(merged));
  }

  async deleteExpense(id: number): Promise<boolean> {
    const deleted = await this.repository.delete(id);
    if (deleted) {
      Logger.debug('Expense deleted', { expenseId: id });
    }
    return deleted;
  }

  /** Totals over every matching expense; an empty match gives zeros. */
  async getExpenseTotals(filter: ExpenseFilter = {}): Promise<ExpenseTotals> {
    this.assertFilter(filter);
    return toExpenseTotals(await this.repository.sum(filter));
  }

  private assertFilter(filter: ExpenseFilter): void {
    const validation = validateExpenseFilter(filter);
    if (!validation.valid) {
      throw new ValidationError(validation.errors);
    }
  }
}
