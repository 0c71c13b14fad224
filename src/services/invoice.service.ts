import type {
  CreateInvoiceDTO,
  Invoice,
  InvoiceDetail,
  InvoiceListResponse,
  InvoiceSearchParams,
  InvoiceSummary,
  InvoiceTotals,
  UpdateInvoiceDTO,
} from '../models/invoice';
import type { InvoiceItem } from '../models/invoice-item';
import type { ClientRepository, InvoiceItemRepository, InvoiceRepository, InvoiceWithClientName } from '../repositories';
import { ConflictError, NotFoundError, ValidationError } from '../utils/errors';
import { generateInvoicePDFBuffer } from '../utils/invoice-pdf';
import { computeTotal, computeTotalsBreakdown, toItemView } from '../utils/invoice-totals';
import { normalizeInvoiceData, validateInvoice } from '../utils/invoice-validation';
import { Logger } from '../utils/logger';
import { isIsoDate, todayIsoDate } from '../utils/validation';

export interface InvoiceServiceOptions {
  companyName: string;
  currency: string;
}

function toInvoiceDTO(invoice: Invoice): CreateInvoiceDTO {
  return {
    invoice_number: invoice.invoice_number,
    client_id: invoice.client_id,
    invoice_date: invoice.invoice_date,
    due_date: invoice.due_date,
    payment_date: invoice.payment_date,
    status: invoice.status,
    notes: invoice.notes,
  };
}

function toSummary(invoice: InvoiceWithClientName, items: InvoiceItem[]): InvoiceSummary {
  return {
    ...invoice,
    items_count: items.length,
    total: computeTotal(items),
  };
}

export class InvoiceService {
  constructor(
    private readonly invoices: InvoiceRepository,
    private readonly invoiceItems: InvoiceItemRepository,
    private readonly clients: ClientRepository,
    private readonly options: InvoiceServiceOptions,
  ) {}

  async createInvoice(data: CreateInvoiceDTO): Promise<InvoiceDetail> {
    const normalized = normalizeInvoiceData(data);
    const validation = validateInvoice(normalized);

    if (validation.valid && !(await this.clients.findById(normalized.client_id))) {
      validation.errors.push('client_id does not reference an existing client');
    }
    if (validation.errors.length > 0) {
      throw new ValidationError(validation.errors);
    }

    if (await this.invoices.findByNumber(normalized.invoice_number)) {
      throw new ConflictError(`Invoice number ${normalized.invoice_number} already exists`, {
        invoiceNumber: normalized.invoice_number,
      });
    }

    const invoice = await this.invoices.create(normalized);
    Logger.info('Invoice created', { invoiceId: invoice.id, invoiceNumber: invoice.invoice_number });
    return this.requireDetail(invoice.id);
  }

  async getInvoiceById(id: number): Promise<InvoiceDetail | null> {
    const invoice = await this.invoices.findById(id);
    if (!invoice) {
      return null;
    }
    const items = await this.invoiceItems.findByInvoiceId(id);
    return {
      ...toSummary(invoice, items),
      items: items.map(toItemView),
      totals: computeTotalsBreakdown(items),
    };
  }

  async listInvoices(params: InvoiceSearchParams): Promise<InvoiceListResponse> {
    const page = await this.invoices.findAll(params);
    return {
      ...page,
      invoices: await this.summarize(page.invoices),
    };
  }

  async listClientInvoices(clientId: number): Promise<InvoiceSummary[]> {
    if (!(await this.clients.findById(clientId))) {
      throw new NotFoundError('Client', clientId);
    }
    return this.summarize(await this.invoices.findByClientId(clientId));
  }

  async updateInvoice(id: number, data: UpdateInvoiceDTO): Promise<InvoiceDetail | null> {
    const existing = await this.invoices.findById(id);
    if (!existing) {
      return null;
    }

    const normalized = normalizeInvoiceData({ ...toInvoiceDTO(existing), ...data });
    const validation = validateInvoice(normalized);

    if (
      validation.valid &&
      normalized.client_id !== existing.client_id &&
      !(await this.clients.findById(normalized.client_id))
    ) {
      validation.errors.push('client_id does not reference an existing client');
    }
    if (validation.errors.length > 0) {
      throw new ValidationError(validation.errors);
    }
    if (existing.status === 'cancelled' && normalized.status === 'paid') {
      throw new ConflictError('Cancelled invoices cannot be marked as paid', { invoiceId: id });
    }

    if (normalized.invoice_number !== existing.invoice_number) {
      const taken = await this.invoices.findByNumber(normalized.invoice_number);
      if (taken && taken.id !== id) {
        throw new ConflictError(`Invoice number ${normalized.invoice_number} already exists`, {
          invoiceNumber: normalized.invoice_number,
        });
      }
    }

    if (!(await this.invoices.update(id, normalized))) {
      return null;
    }
    return this.getInvoiceById(id);
  }

  /**
   * Sets status to paid and stamps the payment date (today unless given).
   * Cancelled invoices cannot be paid.
   */
  async markInvoicePaid(id: number, paymentDate?: string): Promise<InvoiceDetail | null> {
    const existing = await this.invoices.findById(id);
    if (!existing) {
      return null;
    }
    if (existing.status === 'cancelled') {
      throw new ConflictError('Cancelled invoices cannot be marked as paid', { invoiceId: id });
    }
    if (paymentDate !== undefined && !isIsoDate(paymentDate)) {
      throw new ValidationError(['payment_date must be a date in YYYY-MM-DD format']);
    }

    const updated = await this.invoices.update(id, {
      ...normalizeInvoiceData(toInvoiceDTO(existing)),
      status: 'paid',
      payment_date: paymentDate ?? todayIsoDate(),
    });
    if (!updated) {
      return null;
    }
    Logger.info('Invoice marked as paid', { invoiceId: id, paymentDate: updated.payment_date });
    return this.getInvoiceById(id);
  }

  async deleteInvoice(id: number): Promise<boolean> {
    const deleted = await this.invoices.delete(id);
    if (deleted) {
      Logger.debug('Invoice deleted with its items', { invoiceId: id });
    }
    return deleted;
  }

  async getInvoiceTotal(id: number): Promise<InvoiceTotals | null> {
    if (!(await this.invoices.findById(id))) {
      return null;
    }
    return computeTotalsBreakdown(await this.invoiceItems.findByInvoiceId(id));
  }

  async generateInvoicePdf(id: number): Promise<Buffer | null> {
    const invoice = await this.getInvoiceById(id);
    if (!invoice) {
      return null;
    }
    const client = await this.clients.findById(invoice.client_id);
    return generateInvoicePDFBuffer(invoice, client, this.options);
  }

  private async requireDetail(id: number): Promise<InvoiceDetail> {
    const detail = await this.getInvoiceById(id);
    if (!detail) {
      throw new NotFoundError('Invoice', id);
    }
    return detail;
  }

  private async summarize(invoices: InvoiceWithClientName[]): Promise<InvoiceSummary[]> {
    if (invoices.length === 0) {
      return [];
    }
    const items = await this.invoiceItems.findByInvoiceIds(invoices.map(invoice => invoice.id));
    const byInvoice = new Map<number, InvoiceItem[]>();
    for (const item of items) {
      const list = byInvoice.get(item.invoice_id);
      if (list) {
        list.push(item);
      } else {
        byInvoice.set(item.invoice_id, [item]);
      }
    }
    return invoices.map(invoice => toSummary(invoice, byInvoice.get(invoice.id) ?? []));
  }
}
