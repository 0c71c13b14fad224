import type {
  Expense,
  ExpenseFilter,
  ExpenseListResponse,
  ExpenseRecordInput,
  ExpenseSearchParams,
  ExpenseSums,
} from '../models/expense';
import type { ExpenseRepository } from './expense.repository';
import type { InMemoryStore } from '../database/in-memory';
import { compareDecimals, parseDecimal } from '../utils/decimal';
import { sumExpenses } from '../utils/expense-totals';
import { resolvePagination } from '../utils/pagination';
import { compareSortable } from '../utils/sort';

export class InMemoryExpenseRepository implements ExpenseRepository {
  constructor(private readonly store: InMemoryStore) {}

  private matching(filter: ExpenseFilter): Expense[] {
    let filtered = [...this.store.expenses];

    if (filter.category) {
      filtered = filtered.filter(expense => expense.category === filter.category);
    }
    const { date_from: from, date_to: to } = filter;
    if (from !== undefined) {
      filtered = filtered.filter(expense => expense.date >= from);
    }
    if (to !== undefined) {
      filtered = filtered.filter(expense => expense.date <= to);
    }
    if (filter.search) {
      const searchLower = filter.search.toLowerCase();
      filtered = filtered.filter(expense => {
        return [expense.vendor, expense.description]
          .some(value => value !== null && value.toLowerCase().includes(searchLower));
      });
    }

    return filtered;
  }

  async create(expense: ExpenseRecordInput): Promise<Expense> {
    const now = new Date();
    const newExpense: Expense = {
      id: this.store.nextId('expenses'),
      ...expense,
      created_at: now,
      updated_at: now,
    };
    this.store.expenses.push(newExpense);
    return { ...newExpense };
  }

  async findById(id: number): Promise<Expense | null> {
    const expense = this.store.expenses.find(e => e.id === id);
    return expense ? { ...expense } : null;
  }

  async findAll(params: ExpenseSearchParams): Promise<ExpenseListResponse> {
    const filtered = this.matching(params);

    const sortBy = params.sortBy ?? 'date';
    const direction = params.sortOrder === 'asc' ? 1 : -1;
    filtered.sort((a, b) => {
      const order =
        sortBy === 'amount'
          ? compareDecimals(parseDecimal(a.amount, 'amount'), parseDecimal(b.amount, 'amount'))
          : compareSortable(a[sortBy], b[sortBy]);
      return order * direction || a.id - b.id;
    });

    const { page, limit, offset } = resolvePagination(params);

    return {
      expenses: filtered.slice(offset, offset + limit).map(expense => ({ ...expense })),
      total: filtered.length,
      page,
      limit,
      offset,
    };
  }

  async sum(filter: ExpenseFilter): Promise<ExpenseSums> {
    return sumExpenses(this.matching(filter));
  }

  async update(id: number, expense: ExpenseRecordInput): Promise<Expense | null> {
    const index = this.store.expenses.findIndex(e => e.id === id);
    if (index === -1) return null;

    const updated: Expense = {
      ...this.store.expenses[index],
      ...expense,
      updated_at: new Date(),
    };
    this.store.expenses[index] = updated;
    return { ...updated };
  }

  async delete(id: number): Promise<boolean> {
    const before = this.store.expenses.length;
    this.store.expenses = this.store.expenses.filter(expense => expense.id !== id);
    return this.store.expenses.length < before;
  }
}
