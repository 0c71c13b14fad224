import type { DatabaseAdapter } from '../database/adapter';
import { InMemoryStore } from '../database/in-memory';
import type { ClientRepository } from './client.repository';
import { InMemoryClientRepository } from './in-memory-client.repository';
import { PostgreSQLClientRepository } from './postgresql-client.repository';
import type { ExpenseRepository } from './expense.repository';
import { InMemoryExpenseRepository } from './in-memory-expense.repository';
import { PostgreSQLExpenseRepository } from './postgresql-expense.repository';
import type { InvoiceRepository } from './invoice.repository';
import { InMemoryInvoiceRepository } from './in-memory-invoice.repository';
import { PostgreSQLInvoiceRepository } from './postgresql-invoice.repository';
import type { InvoiceItemRepository } from './invoice-item.repository';
import { InMemoryInvoiceItemRepository } from './in-memory-invoice-item.repository';
import { PostgreSQLInvoiceItemRepository } from './postgresql-invoice-item.repository';

export type { ClientRepository } from './client.repository';
export type { ExpenseRepository } from './expense.repository';
export type { InvoiceRepository, InvoicePage, InvoiceWithClientName } from './invoice.repository';
export type { InvoiceItemRepository } from './invoice-item.repository';

export interface Repositories {
  clients: ClientRepository;
  invoices: InvoiceRepository;
  invoiceItems: InvoiceItemRepository;
  expenses: ExpenseRepository;
}

export function createInMemoryRepositories(store: InMemoryStore = new InMemoryStore()): Repositories {
  return {
    clients: new InMemoryClientRepository(store),
    invoices: new InMemoryInvoiceRepository(store),
    invoiceItems: new InMemoryInvoiceItemRepository(store),
    expenses: new InMemoryExpenseRepository(store),
  };
}

export function createPostgreSQLRepositories(db: DatabaseAdapter): Repositories {
  return {
    clients: new PostgreSQLClientRepository(db),
    invoices: new PostgreSQLInvoiceRepository(db),
    invoiceItems: new PostgreSQLInvoiceItemRepository(db),
    expenses: new PostgreSQLExpenseRepository(db),
  };
}
