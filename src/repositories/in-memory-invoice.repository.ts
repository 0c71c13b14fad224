import type { Invoice, InvoiceRecordInput, InvoiceSearchParams } from '../models/invoice';
import type { InvoicePage, InvoiceRepository, InvoiceWithClientName } from './invoice.repository';
import type { InMemoryStore } from '../database/in-memory';
import { ConflictError } from '../utils/errors';
import { resolvePagination } from '../utils/pagination';
import { compareSortable } from '../utils/sort';

export class InMemoryInvoiceRepository implements InvoiceRepository {
  constructor(private readonly store: InMemoryStore) {}

  private withClientName(invoice: Invoice): InvoiceWithClientName {
    const client = this.store.clients.find(c => c.id === invoice.client_id);
    return { ...invoice, client_name: client ? client.name : null };
  }

  private assertNumberAvailable(invoiceNumber: string, exceptId?: number): void {
    const taken = this.store.invoices.some(i => i.invoice_number === invoiceNumber && i.id !== exceptId);
    if (taken) {
      throw new ConflictError(`Invoice number ${invoiceNumber} already exists`, { invoice_number: invoiceNumber });
    }
  }

  async create(invoice: InvoiceRecordInput): Promise<Invoice> {
    this.assertNumberAvailable(invoice.invoice_number);

    const now = new Date();
    const newInvoice: Invoice = {
      id: this.store.nextId('invoices'),
      ...invoice,
      created_at: now,
      updated_at: now,
    };
    this.store.invoices.push(newInvoice);
    return { ...newInvoice };
  }

  async findById(id: number): Promise<InvoiceWithClientName | null> {
    const invoice = this.store.invoices.find(i => i.id === id);
    return invoice ? this.withClientName(invoice) : null;
  }

  async findByNumber(invoiceNumber: string): Promise<Invoice | null> {
    const invoice = this.store.invoices.find(i => i.invoice_number === invoiceNumber);
    return invoice ? { ...invoice } : null;
  }

  async findAll(params: InvoiceSearchParams): Promise<InvoicePage> {
    let filtered = this.store.invoices.map(invoice => this.withClientName(invoice));

    if (params.status) {
      filtered = filtered.filter(invoice => invoice.status === params.status);
    }

    if (params.client_id !== undefined) {
      filtered = filtered.filter(invoice => invoice.client_id === params.client_id);
    }

    if (params.search) {
      const searchLower = params.search.toLowerCase();
      filtered = filtered.filter(invoice => {
        return [invoice.invoice_number, invoice.notes, invoice.client_name]
          .some(value => value !== null && value.toLowerCase().includes(searchLower));
      });
    }

    const sortBy = params.sortBy ?? 'id';
    const direction = params.sortOrder === 'desc' ? -1 : 1;
    filtered.sort((a, b) => {
      const aVal = a[sortBy];
      const bVal = b[sortBy];
      if (aVal === null || bVal === null) return compareSortable(aVal, bVal);
      return compareSortable(aVal, bVal) * direction;
    });

    const { page, limit, offset } = resolvePagination(params);

    return {
      invoices: filtered.slice(offset, offset + limit),
      total: filtered.length,
      page,
      limit,
      offset,
    };
  }

  async findByClientId(clientId: number): Promise<InvoiceWithClientName[]> {
    return this.store.invoices
      .filter(invoice => invoice.client_id === clientId)
      .map(invoice => this.withClientName(invoice));
  }

  async update(id: number, invoice: InvoiceRecordInput): Promise<Invoice | null> {
    const index = this.store.invoices.findIndex(i => i.id === id);
    if (index === -1) return null;

    this.assertNumberAvailable(invoice.invoice_number, id);

    const updated: Invoice = {
      ...this.store.invoices[index],
      ...invoice,
      updated_at: new Date(),
    };
    this.store.invoices[index] = updated;
    return { ...updated };
  }

  async delete(id: number): Promise<boolean> {
    return this.store.removeInvoices(invoice => invoice.id === id) > 0;
  }
}
