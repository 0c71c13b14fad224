import type { Client } from '../models/client';
import type { Expense } from '../models/expense';
import type { Invoice } from '../models/invoice';
import type { InvoiceItem } from '../models/invoice-item';

type Table = 'clients' | 'invoices' | 'invoice_items' | 'expenses';

/**
 * Shared backing store for the in-memory repositories. One instance per
 * application (or per test), so cascades can reach across entities the way
 * foreign keys do in PostgreSQL.
 */
export class InMemoryStore {
  clients: Client[] = [];
  invoices: Invoice[] = [];
  invoiceItems: InvoiceItem[] = [];
  expenses: Expense[] = [];

  private sequences: Record<Table, number> = {
    clients: 1,
    invoices: 1,
    invoice_items: 1,
    expenses: 1,
  };

  nextId(table: Table): number {
    return this.sequences[table]++;
  }

  removeInvoices(predicate: (invoice: Invoice) => boolean): number {
    const removedIds = new Set(this.invoices.filter(predicate).map(invoice => invoice.id));
    if (removedIds.size === 0) {
      return 0;
    }
    this.invoices = this.invoices.filter(invoice => !removedIds.has(invoice.id));
    this.invoiceItems = this.invoiceItems.filter(item => !removedIds.has(item.invoice_id));
    return removedIds.size;
  }

  removeClients(ids: Set<number>): number {
    const before = this.clients.length;
    this.clients = this.clients.filter(client => !ids.has(client.id));
    this.removeInvoices(invoice => ids.has(invoice.client_id));
    return before - this.clients.length;
  }
}
