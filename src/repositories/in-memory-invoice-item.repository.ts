import type { InvoiceItem, InvoiceItemRecordInput } from '../models/invoice-item';
import type { InvoiceItemRepository } from './invoice-item.repository';
import type { InMemoryStore } from '../database/in-memory';

export class InMemoryInvoiceItemRepository implements InvoiceItemRepository {
  constructor(private readonly store: InMemoryStore) {}

  async create(invoiceId: number, item: InvoiceItemRecordInput): Promise<InvoiceItem> {
    const newItem: InvoiceItem = {
      id: this.store.nextId('invoice_items'),
      invoice_id: invoiceId,
      ...item,
      created_at: new Date(),
    };
    this.store.invoiceItems.push(newItem);
    return { ...newItem };
  }

  async findById(id: number): Promise<InvoiceItem | null> {
    const item = this.store.invoiceItems.find(i => i.id === id);
    return item ? { ...item } : null;
  }

  async findByInvoiceId(invoiceId: number): Promise<InvoiceItem[]> {
    return this.findByInvoiceIds([invoiceId]);
  }

  async findByInvoiceIds(invoiceIds: number[]): Promise<InvoiceItem[]> {
    const wanted = new Set(invoiceIds);
    return this.store.invoiceItems
      .filter(item => wanted.has(item.invoice_id))
      .sort((a, b) => a.id - b.id)
      .map(item => ({ ...item }));
  }

  async update(id: number, item: InvoiceItemRecordInput): Promise<InvoiceItem | null> {
    const index = this.store.invoiceItems.findIndex(i => i.id === id);
    if (index === -1) return null;

    const updated: InvoiceItem = { ...this.store.invoiceItems[index], ...item };
    this.store.invoiceItems[index] = updated;
    return { ...updated };
  }

  async delete(id: number): Promise<boolean> {
    const index = this.store.invoiceItems.findIndex(i => i.id === id);
    if (index === -1) return false;
    this.store.invoiceItems.splice(index, 1);
    return true;
  }
}
