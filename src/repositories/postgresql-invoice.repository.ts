import type { DatabaseAdapter } from '../database/adapter';
import { likePattern } from '../database/sql';
import type { Invoice, InvoiceRecordInput, InvoiceSearchParams } from '../models/invoice';
import { INVOICE_SORT_FIELDS } from '../models/invoice';
import type { InvoicePage, InvoiceRepository, InvoiceWithClientName } from './invoice.repository';
import { ConflictError } from '../utils/errors';
import { resolvePagination } from '../utils/pagination';

const UNIQUE_VIOLATION = '23505';

const SELECT_WITH_CLIENT = `
  SELECT i.*, c.name AS client_name
  FROM invoices i
  LEFT JOIN clients c ON c.id = i.client_id
`;

function isUniqueViolation(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === UNIQUE_VIOLATION;
}

export class PostgreSQLInvoiceRepository implements InvoiceRepository {
  constructor(private readonly db: DatabaseAdapter) {}

  private rethrowDuplicate(error: unknown, invoiceNumber: string): never {
    if (isUniqueViolation(error)) {
      throw new ConflictError(`Invoice number ${invoiceNumber} already exists`, { invoice_number: invoiceNumber });
    }
    throw error;
  }

  async create(invoice: InvoiceRecordInput): Promise<Invoice> {
    const query = `
      INSERT INTO invoices (
        invoice_number, client_id, invoice_date, due_date, payment_date, status, notes,
        created_at, updated_at
      ) VALUES ($1, $2, $3, $4, $5, $6, $7, NOW(), NOW())
      RETURNING *
    `;
    try {
      const result = await this.db.query<Invoice>(query, [
        invoice.invoice_number,
        invoice.client_id,
        invoice.invoice_date,
        invoice.due_date,
        invoice.payment_date,
        invoice.status,
        invoice.notes,
      ]);
      return result.rows[0];
    } catch (error) {
      return this.rethrowDuplicate(error, invoice.invoice_number);
    }
  }

  async findById(id: number): Promise<InvoiceWithClientName | null> {
    const result = await this.db.query<InvoiceWithClientName>(`${SELECT_WITH_CLIENT} WHERE i.id = $1`, [id]);
    return result.rows[0] ?? null;
  }

  async findByNumber(invoiceNumber: string): Promise<Invoice | null> {
    const result = await this.db.query<Invoice>('SELECT * FROM invoices WHERE invoice_number = $1', [invoiceNumber]);
    return result.rows[0] ?? null;
  }

  async findAll(params: InvoiceSearchParams): Promise<InvoicePage> {
    const { page, limit, offset } = resolvePagination(params);

    const conditions: string[] = [];
    const queryParams: unknown[] = [];

    if (params.status) {
      queryParams.push(params.status);
      conditions.push(`i.status = $${queryParams.length}`);
    }

    if (params.client_id !== undefined) {
      queryParams.push(params.client_id);
      conditions.push(`i.client_id = $${queryParams.length}`);
    }

    if (params.search) {
      queryParams.push(likePattern(params.search));
      const p = `$${queryParams.length}`;
      conditions.push(`(i.invoice_number ILIKE ${p} ESCAPE '\\' OR i.notes ILIKE ${p} ESCAPE '\\' OR c.name ILIKE ${p} ESCAPE '\\')`);
    }

    const whereClause = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const sortBy = INVOICE_SORT_FIELDS.find(field => field === params.sortBy) ?? 'id';
    const sortOrder = params.sortOrder === 'desc' ? 'DESC' : 'ASC';

    const countResult = await this.db.query<{ total: string }>(
      `SELECT COUNT(*) AS total FROM invoices i LEFT JOIN clients c ON c.id = i.client_id ${whereClause}`,
      queryParams,
    );
    const total = parseInt(countResult.rows[0]?.total ?? '0', 10);

    const result = await this.db.query<InvoiceWithClientName>(
      `
        ${SELECT_WITH_CLIENT}
        ${whereClause}
        ORDER BY i.${sortBy} ${sortOrder} NULLS LAST, i.id ASC
        LIMIT $${queryParams.length + 1} OFFSET $${queryParams.length + 2}
      `,
      [...queryParams, limit, offset],
    );

    return {
      invoices: result.rows,
      total,
      page,
      limit,
      offset,
    };
  }

  async findByClientId(clientId: number): Promise<InvoiceWithClientName[]> {
    const result = await this.db.query<InvoiceWithClientName>(
      `${SELECT_WITH_CLIENT} WHERE i.client_id = $1 ORDER BY i.id ASC`,
      [clientId],
    );
    return result.rows;
  }

  async update(id: number, invoice: InvoiceRecordInput): Promise<Invoice | null> {
    const query = `
      UPDATE invoices
      SET invoice_number = $1, client_id = $2, invoice_date = $3, due_date = $4,
          payment_date = $5, status = $6, notes = $7, updated_at = NOW()
      WHERE id = $8
      RETURNING *
    `;
    try {
      const result = await this.db.query<Invoice>(query, [
        invoice.invoice_number,
        invoice.client_id,
        invoice.invoice_date,
        invoice.due_date,
        invoice.payment_date,
        invoice.status,
        invoice.notes,
        id,
      ]);
      return result.rows[0] ?? null;
    } catch (error) {
      return this.rethrowDuplicate(error, invoice.invoice_number);
    }
  }

  async delete(id: number): Promise<boolean> {
    const result = await this.db.query('DELETE FROM invoices WHERE id = $1', [id]);
    return (result.rowCount ?? 0) > 0;
  }
}
