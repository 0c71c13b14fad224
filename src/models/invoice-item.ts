import type { DecimalInput } from '../utils/decimal';

/**
 * Decimal columns travel as strings in plain notation, the way PostgreSQL
 * NUMERIC values arrive from pg.
 */
export interface InvoiceItem {
  id: number;
  invoice_id: number;
  description: string;
  quantity: string;
  unit_price: string;
  tax_rate: string;
  created_at: Date;
}

export interface CreateInvoiceItemDTO {
  description: string;
  quantity?: DecimalInput;
  unit_price: DecimalInput;
  tax_rate?: DecimalInput;
}

export type UpdateInvoiceItemDTO = Partial<CreateInvoiceItemDTO>;

export interface InvoiceItemRecordInput {
  description: string;
  quantity: string;
  unit_price: string;
  tax_rate: string;
}

export interface InvoiceItemView extends InvoiceItem {
  subtotal: string;
  tax_amount: string;
  total: string;
}
