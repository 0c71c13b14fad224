import type { DatabaseAdapter } from '../database/adapter';
import type { InvoiceItem, InvoiceItemRecordInput } from '../models/invoice-item';
import type { InvoiceItemRepository } from './invoice-item.repository';

// NUMERIC columns come back as strings; ::text keeps the stored scale either way.
const ITEM_COLUMNS = `
  id, invoice_id, description,
  quantity::text AS quantity, unit_price::text AS unit_price, tax_rate::text AS tax_rate,
  created_at
`;

export class PostgreSQLInvoiceItemRepository implements InvoiceItemRepository {
  constructor(private readonly db: DatabaseAdapter) {}

  async create(invoiceId: number, item: InvoiceItemRecordInput): Promise<InvoiceItem> {
    const query = `
      INSERT INTO invoice_items (invoice_id, description, quantity, unit_price, tax_rate, created_at)
      VALUES ($1, $2, $3, $4, $5, NOW())
      RETURNING ${ITEM_COLUMNS}
    `;
    const result = await this.db.query<InvoiceItem>(query, [
      invoiceId,
      item.description,
      item.quantity,
      item.unit_price,
      item.tax_rate,
    ]);
    return result.rows[0];
  }

  async findById(id: number): Promise<InvoiceItem | null> {
    const result = await this.db.query<InvoiceItem>(`SELECT ${ITEM_COLUMNS} FROM invoice_items WHERE id = $1`, [id]);
    return result.rows[0] ?? null;
  }

  async findByInvoiceId(invoiceId: number): Promise<InvoiceItem[]> {
    const result = await this.db.query<InvoiceItem>(
      `SELECT ${ITEM_COLUMNS} FROM invoice_items WHERE invoice_id = $1 ORDER BY id ASC`,
      [invoiceId],
    );
    return result.rows;
  }

  async findByInvoiceIds(invoiceIds: number[]): Promise<InvoiceItem[]> {
    if (invoiceIds.length === 0) return [];
    const result = await this.db.query<InvoiceItem>(
      `SELECT ${ITEM_COLUMNS} FROM invoice_items WHERE invoice_id = ANY($1::int[]) ORDER BY id ASC`,
      [invoiceIds],
    );
    return result.rows;
  }

  async update(id: number, item: InvoiceItemRecordInput): Promise<InvoiceItem | null> {
    const query = `
      UPDATE invoice_items
      SET description = $1, quantity = $2, unit_price = $3, tax_rate = $4
      WHERE id = $5
      RETURNING ${ITEM_COLUMNS}
    `;
    const result = await this.db.query<InvoiceItem>(query, [
      item.description,
      item.quantity,
      item.unit_price,
      item.tax_rate,
      id,
    ]);
    return result.rows[0] ?? null;
  }

  async delete(id: number): Promise<boolean> {
    const result = await this.db.query('DELETE FROM invoice_items WHERE id = $1', [id]);
    return (result.rowCount ?? 0) > 0;
  }
}
