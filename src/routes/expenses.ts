import { Router } from 'express';
import type { Request, Response } from 'express';
import type { CreateExpenseDTO, ExpenseFilter, ExpenseSearchParams, UpdateExpenseDTO } from '../models/expense';
import { EXPENSE_CATEGORIES, EXPENSE_SORT_FIELDS } from '../models/expense';
import type { ExpenseService } from '../services/expense.service';
import { queryInteger, queryOption, queryString, requireId, sendError } from '../utils/http';
import { Logger } from '../utils/logger';

/**
 * @swagger
 * components:
 *   schemas:
 *     Expense:
 *       type: object
 *       properties:
 *         id:
 *           type: integer
 *         date:
 *           type: string
 *           format: date
 *         category:
 *           type: string
 *           enum: [food, transport, rent, utilities, office, services, other]
 *         vendor:
 *           type: string
 *           maxLength: 100
 *         amount:
 *           type: string
 *           description: Amount including VAT
 *         vat_amount:
 *           type: string
 *         description:
 *           type: string
 *           nullable: true
 *         created_at:
 *           type: string
 *           format: date-time
 *         updated_at:
 *           type: string
 *           format: date-time
 *     CreateExpense:
 *       type: object
 *       required:
 *         - category
 *         - vendor
 *         - amount
 *       properties:
 *         date:
 *           type: string
 *           format: date
 *           description: Defaults to today
 *         category:
 *           type: string
 *           enum: [food, transport, rent, utilities, office, services, other]
 *         vendor:
 *           type: string
 *         amount:
 *           oneOf:
 *             - type: string
 *             - type: number
 *         vat_amount:
 *           oneOf:
 *             - type: string
 *             - type: number
 *           default: 0
 *         description:
 *           type: string
 *     ExpenseTotals:
 *       type: object
 *       properties:
 *         count:
 *           type: integer
 *         amount:
 *           type: string
 *         vat_amount:
 *           type: string
 *         net_amount:
 *           type: string
 *           description: amount minus vat_amount
 */

function readFilter(req: Request): ExpenseFilter {
  return {
    category: queryOption(req.query.category, EXPENSE_CATEGORIES),
    date_from: queryString(req.query.date_from),
    date_to: queryString(req.query.date_to),
    search: queryString(req.query.search),
  };
}

export function createExpenseRouter(expenseService: ExpenseService): Router {
  const expenseRouter = Router();

  /**
   * @swagger
   * /expenses:
   *   post:
   *     summary: Record an expense
   *     tags: [Expenses]
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             $ref: '#/components/schemas/CreateExpense'
   *     responses:
   *       201:
   *         description: Expense created
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/Expense'
   *       422:
   *         description: Validation error
   */
  expenseRouter.post('/', async (req: Request, res: Response) => {
    try {
      const expenseData: CreateExpenseDTO = req.body;
      res.status(201).json(await expenseService.createExpense(expenseData));
    } catch (error) {
      sendError(res, error, 'Failed to create expense', { method: 'POST', url: '/expenses' });
    }
  });

  /**
   * @swagger
   * /expenses:
   *   get:
   *     summary: List expenses, newest first by default
   *     tags: [Expenses]
   *     parameters:
   *       - in: query
   *         name: category
   *         schema:
   *           type: string
   *       - in: query
   *         name: date_from
   *         schema:
   *           type: string
   *           format: date
   *       - in: query
   *         name: date_to
   *         schema:
   *           type: string
   *           format: date
   *       - in: query
   *         name: search
   *         schema:
   *           type: string
   *         description: Matches vendor and description
   *       - in: query
   *         name: sortBy
   *         schema:
   *           type: string
   *           enum: [id, date, category, vendor, amount, created_at]
   *           default: date
   *       - in: query
   *         name: sortOrder
   *         schema:
   *           type: string
   *           enum: [asc, desc]
   *           default: desc
   *       - in: query
   *         name: page
   *         schema:
   *           type: integer
   *       - in: query
   *         name: limit
   *         schema:
   *           type: integer
   *       - in: query
   *         name: offset
   *         schema:
   *           type: integer
   *     responses:
   *       200:
   *         description: List of expenses
   *       422:
   *         description: Malformed date bounds
   */
  expenseRouter.get('/', async (req: Request, res: Response) => {
    try {
      const params: ExpenseSearchParams = {
        ...readFilter(req),
        sortBy: queryOption(req.query.sortBy, EXPENSE_SORT_FIELDS),
        sortOrder: queryOption(req.query.sortOrder, ['asc', 'desc'] as const) ?? 'desc',
        page: queryInteger(req.query.page),
        limit: queryInteger(req.query.limit),
        offset: queryInteger(req.query.offset),
      };
      res.json(await expenseService.listExpenses(params));
    } catch (error) {
      sendError(res, error, 'Failed to list expenses', { method: 'GET', url: '/expenses', query: req.query });
    }
  });

  /**
   * @swagger
   * /expenses/categories:
   *   get:
   *     summary: List the expense categories
   *     tags: [Expenses]
   *     responses:
   *       200:
   *         description: Category names
   */
  expenseRouter.get('/categories', (req: Request, res: Response) => {
    res.json(EXPENSE_CATEGORIES);
  });

  /**
   * @swagger
   * /expenses/total:
   *   get:
   *     summary: Exact totals of the matching expenses
   *     tags: [Expenses]
   *     parameters:
   *       - in: query
   *         name: category
   *         schema:
   *           type: string
   *       - in: query
   *         name: date_from
   *         schema:
   *           type: string
   *           format: date
   *       - in: query
   *         name: date_to
   *         schema:
   *           type: string
   *           format: date
   *       - in: query
   *         name: search
   *         schema:
   *           type: string
   *     responses:
   *       200:
   *         description: Totals
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/ExpenseTotals'
   */
  expenseRouter.get('/total', async (req: Request, res: Response) => {
    try {
      res.json(await expenseService.getExpenseTotals(readFilter(req)));
    } catch (error) {
      sendError(res, error, 'Failed to total expenses', { method: 'GET', url: '/expenses/total', query: req.query });
    }
  });

  /**
   * @swagger
   * /expenses/{id}:
   *   get:
   *     summary: Get an expense
   *     tags: [Expenses]
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: integer
   *     responses:
   *       200:
   *         description: Expense found
   *       404:
   *         description: Expense not found
   */
  expenseRouter.get('/:id', async (req: Request, res: Response) => {
    try {
      const id = requireId(req.params.id);
      const expense = await expenseService.getExpenseById(id);
      if (!expense) {
        Logger.warn('Expense not found', { method: 'GET', url: `/expenses/${id}`, expenseId: id });
        res.status(404).json({ error: 'Expense not found', code: 'NOT_FOUND' });
        return;
      }
      res.json(expense);
    } catch (error) {
      sendError(res, error, 'Failed to get expense', { method: 'GET', url: `/expenses/${req.params.id}` });
    }
  });

  /**
   * @swagger
   * /expenses/{id}:
   *   put:
   *     summary: Update an expense
   *     tags: [Expenses]
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: integer
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             $ref: '#/components/schemas/CreateExpense'
   *     responses:
   *       200:
   *         description: Expense updated
   *       404:
   *         description: Expense not found
   *       422:
   *         description: Validation error
   */
  expenseRouter.put('/:id', async (req: Request, res: Response) => {
    try {
      const id = requireId(req.params.id);
      const expenseData: UpdateExpenseDTO = req.body;
      const expense = await expenseService.updateExpense(id, expenseData);
      if (!expense) {
        Logger.warn('Expense not found for update', { method: 'PUT', url: `/expenses/${id}`, expenseId: id });
        res.status(404).json({ error: 'Expense not found', code: 'NOT_FOUND' });
        return;
      }
      res.json(expense);
    } catch (error) {
      sendError(res, error, 'Failed to update expense', { method: 'PUT', url: `/expenses/${req.params.id}` });
    }
  });

  /**
   * @swagger
   * /expenses/{id}:
   *   delete:
   *     summary: Delete an expense
   *     tags: [Expenses]
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: integer
   *     responses:
   *       200:
   *         description: Expense deleted
   *       404:
   *         description: Expense not found
   */
  expenseRouter.delete('/:id', async (req: Request, res: Response) => {
    try {
      const id = requireId(req.params.id);
      if (!(await expenseService.deleteExpense(id))) {
        Logger.warn('Expense not found for deletion', { method: 'DELETE', url: `/expenses/${id}`, expenseId: id });
        res.status(404).json({ error: 'Expense not found', code: 'NOT_FOUND' });
        return;
      }
      res.json({ message: 'Expense deleted successfully' });
    } catch (error) {
      sendError(res, error, 'Failed to delete expense', { method: 'DELETE', url: `/expenses/${req.params.id}` });
    }
  });

  return expenseRouter;
}
