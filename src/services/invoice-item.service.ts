import type { CreateInvoiceItemDTO, InvoiceItem, InvoiceItemView, UpdateInvoiceItemDTO } from '../models/invoice-item';
import type { InvoiceItemRepository, InvoiceRepository } from '../repositories';
import { NotFoundError, ValidationError } from '../utils/errors';
import { normalizeInvoiceItemData, validateInvoiceItem } from '../utils/invoice-item-validation';
import { toItemView } from '../utils/invoice-totals';
import { Logger } from '../utils/logger';

function toItemDTO(item: InvoiceItem): CreateInvoiceItemDTO {
  return {
    description: item.description,
    quantity: item.quantity,
    unit_price: item.unit_price,
    tax_rate: item.tax_rate,
  };
}

/** Line items are always addressed through their invoice. */
export class InvoiceItemService {
  constructor(
    private readonly invoices: InvoiceRepository,
    private readonly invoiceItems: InvoiceItemRepository,
  ) {}

  async listItems(invoiceId: number): Promise<InvoiceItemView[]> {
    await this.requireInvoice(invoiceId);
    const items = await this.invoiceItems.findByInvoiceId(invoiceId);
    return items.map(toItemView);
  }

  async addItem(invoiceId: number, data: CreateInvoiceItemDTO): Promise<InvoiceItemView> {
    await this.requireInvoice(invoiceId);

    const validation = validateInvoiceItem(data);
    if (!validation.valid) {
      throw new ValidationError(validation.errors);
    }

    const item = await this.invoiceItems.create(invoiceId, normalizeInvoiceItemData(data));
    Logger.debug('Invoice item added', { invoiceId, itemId: item.id });
    return toItemView(item);
  }

  async updateItem(invoiceId: number, itemId: number, data: UpdateInvoiceItemDTO): Promise<InvoiceItemView> {
    const existing = await this.requireItem(invoiceId, itemId);

    const merged = { ...toItemDTO(existing), ...data };
    const validation = validateInvoiceItem(merged);
    if (!validation.valid) {
      throw new ValidationError(validation.errors);
    }

    const updated = await this.invoiceItems.update(itemId, normalizeInvoiceItemData(merged));
    if (!updated) {
      throw new NotFoundError('Invoice item', itemId);
    }
    return toItemView(updated);
  }

  async deleteItem(invoiceId: number, itemId: number): Promise<void> {
    await this.requireItem(invoiceId, itemId);
    await this.invoiceItems.delete(itemId);
    Logger.debug('Invoice item deleted', { invoiceId, itemId });
  }

  private async requireInvoice(invoiceId: number): Promise<void> {
    if (!(await this.invoices.findById(invoiceId))) {
      throw new NotFoundError('Invoice', invoiceId);
    }
  }

  private async requireItem(invoiceId: number, itemId: number): Promise<InvoiceItem> {
    await this.requireInvoice(invoiceId);
    const item = await this.invoiceItems.findById(itemId);
    if (!item || item.invoice_id !== invoiceId) {
      throw new NotFoundError('Invoice item', itemId);
    }
    return item;
  }
}
