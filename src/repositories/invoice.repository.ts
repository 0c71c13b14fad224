import type { Invoice, InvoiceRecordInput, InvoiceSearchParams } from '../models/invoice';

export interface InvoiceWithClientName extends Invoice {
  client_name: string | null;
}

export interface InvoicePage {
  invoices: InvoiceWithClientName[];
  total: number;
  page: number;
  limit: number;
  offset: number;
}

export interface InvoiceRepository {
  /** Throws ConflictError when the invoice number is taken. */
  create(invoice: InvoiceRecordInput): Promise<Invoice>;
  findById(id: number): Promise<InvoiceWithClientName | null>;
  findByNumber(invoiceNumber: string): Promise<Invoice | null>;
  findAll(params: InvoiceSearchParams): Promise<InvoicePage>;
  findByClientId(clientId: number): Promise<InvoiceWithClientName[]>;
  update(id: number, invoice: InvoiceRecordInput): Promise<Invoice | null>;
  /** Deleting an invoice also deletes its items. */
  delete(id: number): Promise<boolean>;
}
