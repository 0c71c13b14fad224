import type { InvoiceItemView } from './invoice-item';

export const INVOICE_STATUSES = ['pending', 'paid', 'overdue', 'cancelled'] as const;
export type InvoiceStatus = (typeof INVOICE_STATUSES)[number];

/** Dates are ISO calendar dates (YYYY-MM-DD). */
export interface Invoice {
  id: number;
  invoice_number: string;
  client_id: number;
  invoice_date: string;
  due_date: string | null;
  payment_date: string | null;
  status: InvoiceStatus;
  notes: string | null;
  created_at: Date;
  updated_at: Date;
}

export interface CreateInvoiceDTO {
  invoice_number: string;
  client_id: number;
  invoice_date?: string;
  due_date?: string | null;
  payment_date?: string | null;
  status?: InvoiceStatus;
  notes?: string | null;
}

/** What repositories persist: defaults applied, everything validated. */
export interface InvoiceRecordInput {
  invoice_number: string;
  client_id: number;
  invoice_date: string;
  due_date: string | null;
  payment_date: string | null;
  status: InvoiceStatus;
  notes: string | null;
}

export type UpdateInvoiceDTO = Partial<CreateInvoiceDTO>;

export interface InvoiceTotals {
  subtotal: string;
  tax_total: string;
  grand_total: string;
  /** grand_total rounded half-even to cents */
  amount_due: string;
}

export interface InvoiceSummary extends Invoice {
  client_name: string | null;
  items_count: number;
  total: string;
}

export interface InvoiceDetail extends InvoiceSummary {
  items: InvoiceItemView[];
  totals: InvoiceTotals;
}

export const INVOICE_SORT_FIELDS = ['id', 'invoice_number', 'invoice_date', 'due_date', 'status', 'created_at'] as const;
export type InvoiceSortField = (typeof INVOICE_SORT_FIELDS)[number];

export interface InvoiceSearchParams {
  search?: string;
  status?: InvoiceStatus;
  client_id?: number;
  sortBy?: InvoiceSortField;
  sortOrder?: 'asc' | 'desc';
  page?: number;
  limit?: number;
  offset?: number;
}

export interface InvoiceListResponse {
  invoices: InvoiceSummary[];
  total: number;
  page: number;
  limit: number;
  offset: number;
}
