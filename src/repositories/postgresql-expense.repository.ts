import type { DatabaseAdapter } from '../database/adapter';
import { likePattern } from '../database/sql';
import type {
  Expense,
  ExpenseFilter,
  ExpenseListResponse,
  ExpenseRecordInput,
  ExpenseSearchParams,
  ExpenseSums,
} from '../models/expense';
import { EXPENSE_SORT_FIELDS } from '../models/expense';
import type { ExpenseRepository } from './expense.repository';
import { resolvePagination } from '../utils/pagination';

const EXPENSE_COLUMNS = `
  id, date, category, vendor,
  amount::text AS amount, vat_amount::text AS vat_amount,
  description, created_at, updated_at
`;

function buildWhere(filter: ExpenseFilter): { whereClause: string; queryParams: unknown[] } {
  const conditions: string[] = [];
  const queryParams: unknown[] = [];

  if (filter.category) {
    queryParams.push(filter.category);
    conditions.push(`category = $${queryParams.length}`);
  }
  if (filter.date_from !== undefined) {
    queryParams.push(filter.date_from);
    conditions.push(`date >= $${queryParams.length}`);
  }
  if (filter.date_to !== undefined) {
    queryParams.push(filter.date_to);
    conditions.push(`date <= $${queryParams.length}`);
  }
  if (filter.search) {
    queryParams.push(likePattern(filter.search));
    const p = `$${queryParams.length}`;
    conditions.push(`(vendor ILIKE ${p} ESCAPE '\\' OR description ILIKE ${p} ESCAPE '\\')`);
  }

  return {
    whereClause: conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '',
    queryParams,
  };
}

export class PostgreSQLExpenseRepository implements ExpenseRepository {
  constructor(private readonly db: DatabaseAdapter) {}

  async create(expense: ExpenseRecordInput): Promise<Expense> {
    const query = `
      INSERT INTO expenses (date, category, vendor, amount, vat_amount, description, created_at, updated_at)
      VALUES ($1, $2, $3, $4, $5, $6, NOW(), NOW())
      RETURNING ${EXPENSE_COLUMNS}
    `;
    const result = await this.db.query<Expense>(query, [
      expense.date,
      expense.category,
      expense.vendor,
      expense.amount,
      expense.vat_amount,
      expense.description,
    ]);
    return result.rows[0];
  }

  async findById(id: number): Promise<Expense | null> {
    const result = await this.db.query<Expense>(`SELECT ${EXPENSE_COLUMNS} FROM expenses WHERE id = $1`, [id]);
    return result.rows[0] ?? null;
  }

  async findAll(params: ExpenseSearchParams): Promise<ExpenseListResponse> {
    const { page, limit, offset } = resolvePagination(params);
    const { whereClause, queryParams } = buildWhere(params);

    // Only whitelisted column names reach the ORDER BY
    const sortBy = EXPENSE_SORT_FIELDS.find(field => field === params.sortBy) ?? 'date';
    const sortOrder = params.sortOrder === 'asc' ? 'ASC' : 'DESC';

    const countResult = await this.db.query<{ total: string }>(
      `SELECT COUNT(*) AS total FROM expenses ${whereClause}`,
      queryParams,
    );
    const total = parseInt(countResult.rows[0]?.total ?? '0', 10);

    const result = await this.db.query<Expense>(
      `
        SELECT ${EXPENSE_COLUMNS} FROM expenses
        ${whereClause}
        ORDER BY ${sortBy} ${sortOrder}, id ASC
        LIMIT $${queryParams.length + 1} OFFSET $${queryParams.length + 2}
      `,
      [...queryParams, limit, offset],
    );

    return {
      expenses: result.rows,
      total,
      page,
      limit,
      offset,
    };
  }

  async sum(filter: ExpenseFilter): Promise<ExpenseSums> {
    const { whereClause, queryParams } = buildWhere(filter);
    const result = await this.db.query<{ count: string; amount: string; vat_amount: string }>(
      `
        SELECT COUNT(*) AS count,
          COALESCE(SUM(amount), 0)::text AS amount,
          COALESCE(SUM(vat_amount), 0)::text AS vat_amount
        FROM expenses ${whereClause}
      `,
      queryParams,
    );
    const row = result.rows[0];
    return {
      count: parseInt(row?.count ?? '0', 10),
      amount: row?.amount ?? '0',
      vat_amount: row?.vat_amount ?? '0',
    };
  }

  async update(id: number, expense: ExpenseRecordInput): Promise<Expense | null> {
    const query = `
      UPDATE expenses
      SET date = $1, category = $2, vendor = $3, amount = $4, vat_amount = $5, description = $6, updated_at = NOW()
      WHERE id = $7
      RETURNING ${EXPENSE_COLUMNS}
    `;
    const result = await this.db.query<Expense>(query, [
      expense.date,
      expense.category,
      expense.vendor,
      expense.amount,
      expense.vat_amount,
      expense.description,
      id,
    ]);
    return result.rows[0] ?? null;
  }

  async delete(id: number): Promise<boolean> {
    const result = await this.db.query('DELETE FROM expenses WHERE id = $1', [id]);
    return (result.rowCount ?? 0) > 0;
  }
}
