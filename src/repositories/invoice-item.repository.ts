import type { InvoiceItem, InvoiceItemRecordInput } from '../models/invoice-item';

/** Lists come back in creation (id) order. */
export interface InvoiceItemRepository {
  create(invoiceId: number, item: InvoiceItemRecordInput): Promise<InvoiceItem>;
  findById(id: number): Promise<InvoiceItem | null>;
  findByInvoiceId(invoiceId: number): Promise<InvoiceItem[]>;
  findByInvoiceIds(invoiceIds: number[]): Promise<InvoiceItem[]>;
  update(id: number, item: InvoiceItemRecordInput): Promise<InvoiceItem | null>;
  delete(id: number): Promise<boolean>;
}
