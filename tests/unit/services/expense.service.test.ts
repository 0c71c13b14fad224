/**
 * Expense Service Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { InMemoryStore } from '../../../src/database/in-memory';
import { createInMemoryRepositories } from '../../../src/repositories';
import { ExpenseService } from '../../../src/services/expense.service';
import { ValidationError } from '../../../src/utils/errors';

describe('ExpenseService', () => {
  let store: InMemoryStore;
  let service: ExpenseService;

  beforeEach(() => {
    store = new InMemoryStore();
    service = new ExpenseService(createInMemoryRepositories(store).expenses);
  });

  async function seed(): Promise<void> {
    await service.createExpense({ date: '2024-05-02', category: 'office', vendor: 'Paper Co', amount: '12.10', vat_amount: '2.10', description: 'A4 paper' });
    await service.createExpense({ date: '2024-05-10', category: 'transport', vendor: 'Fuel Station', amount: '60.50', vat_amount: '10.50' });
    await service.createExpense({ date: '2024-06-01', category: 'office', vendor: 'Ink Shop', amount: '30' });
  }

  describe('createExpense', () => {
    it('should store a normalized expense', async () => {
      const expense = await service.createExpense({
        date: '2024-05-02',
        category: 'office',
        vendor: ' Paper Co ',
        amount: 12.1,
        vat_amount: '2.10',
        description: 'A4 paper',
      });

      expect(expense).toMatchObject({
        id: 1,
        date: '2024-05-02',
        category: 'office',
        vendor: 'Paper Co',
        amount: '12.1',
        vat_amount: '2.10',
        description: 'A4 paper',
      });
    });

    it('should default the date to today', async () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date('2024-07-04T10:00:00Z'));
      try {
        const expense = await service.createExpense({ category: 'food', vendor: 'Cafe', amount: '4.20' });
        expect(expense.date).toBe('2024-07-04');
        expect(expense.vat_amount).toBe('0');
      } finally {
        vi.useRealTimers();
      }
    });

    it('should reject invalid input without storing it', async () => {
      await expect(service.createExpense({ category: 'office', vendor: '', amount: '5' })).rejects.toThrow(
        'Validation failed: vendor is required',
      );
      expect(store.expenses).toEqual([]);
    });
  });

  describe('listExpenses', () => {
    beforeEach(seed);

    it('should list the newest expenses first', async () => {
      const page = await service.listExpenses({});

      expect(page.expenses.map(e => e.id)).toEqual([3, 2, 1]);
      expect(page).toMatchObject({ total: 3, page: 1, limit: 50, offset: 0 });
    });

    it('should sort amounts numerically', async () => {
      const page = await service.listExpenses({ sortBy: 'amount', sortOrder: 'asc' });

      expect(page.expenses.map(e => e.amount)).toEqual(['12.10', '30', '60.50']);
    });

    it('should filter by category, date range and search term', async () => {
      expect((await service.listExpenses({ category: 'office' })).expenses.map(e => e.id)).toEqual([3, 1]);
      expect(
        (await service.listExpenses({ date_from: '2024-05-01', date_to: '2024-05-31' })).expenses.map(e => e.id),
      ).toEqual([2, 1]);
      expect((await service.listExpenses({ search: 'fuel' })).expenses.map(e => e.id)).toEqual([2]);
    });

    it('should reject malformed date bounds', async () => {
      await expect(service.listExpenses({ date_to: '31/05/2024' })).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('getExpenseTotals', () => {
    beforeEach(seed);

    it('should total every expense', async () => {
      expect(await service.getExpenseTotals()).toEqual({
        count: 3,
        amount: '102.60',
        vat_amount: '12.60',
        net_amount: '90.00',
      });
    });

    it('should total only the matching expenses', async () => {
      expect(await service.getExpenseTotals({ category: 'office' })).toEqual({
        count: 2,
        amount: '42.10',
        vat_amount: '2.10',
        net_amount: '40.00',
      });
      expect(await service.getExpenseTotals({ date_from: '2024-05-01', date_to: '2024-05-31' })).toMatchObject({
        count: 2,
        amount: '72.60',
      });
    });

    it('should return zeros when nothing matches', async () => {
      expect(await service.getExpenseTotals({ category: 'rent' })).toEqual({
        count: 0,
        amount: '0.00',
        vat_amount: '0.00',
        net_amount: '0.00',
      });
    });

    it('should reject a reversed date range', async () => {
      await expect(service.getExpenseTotals({ date_from: '2024-06-01', date_to: '2024-05-01' })).rejects.toThrow(
        'Validation failed: date_to cannot be before date_from',
      );
    });
  });

  describe('updateExpense', () => {
    beforeEach(seed);

    it('should merge changes over the stored expense', async () => {
      const updated = await service.updateExpense(2, { vat_amount: '0' });

      expect(updated).toMatchObject({ id: 2, vendor: 'Fuel Station', amount: '60.50', vat_amount: '0' });
    });

    it('should validate the merged expense', async () => {
      await expect(service.updateExpense(1, { amount: '1' })).rejects.toThrow(
        'Validation failed: vat_amount cannot exceed amount',
      );
      expect((await service.getExpenseById(1))?.amount).toBe('12.10');
    });

    it('should return null for a missing expense', async () => {
      expect(await service.updateExpense(42, { vendor: 'x' })).toBeNull();
    });
  });

  describe('deleteExpense', () => {
    it('should delete once', async () => {
      await seed();

      expect(await service.deleteExpense(1)).toBe(true);
      expect(await service.deleteExpense(1)).toBe(false);
      expect((await service.getExpenseTotals()).count).toBe(2);
    });
  });
});
