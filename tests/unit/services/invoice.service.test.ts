/**
 * Invoice Service Tests
 * Invoice lifecycle, totals and PDF rendering against in-memory repositories
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { createInMemoryRepositories } from '../../../src/repositories';
import type { Repositories } from '../../../src/repositories';
import { ClientService } from '../../../src/services/client.service';
import { InvoiceItemService } from '../../../src/services/invoice-item.service';
import { InvoiceService } from '../../../src/services/invoice.service';
import { ConflictError, NotFoundError, ValidationError } from '../../../src/utils/errors';

describe('InvoiceService', () => {
  let repos: Repositories;
  let invoices: InvoiceService;
  let items: InvoiceItemService;
  let clientId: number;

  beforeEach(async () => {
    repos = createInMemoryRepositories();
    invoices = new InvoiceService(repos.invoices, repos.invoiceItems, repos.clients, {
      companyName: 'Test Company',
      currency: 'EUR',
    });
    items = new InvoiceItemService(repos.invoices, repos.invoiceItems);
    const client = await new ClientService(repos.clients).createClient({ name: 'Acme Ltd', email: 'billing@acme.test' });
    clientId = client.id;
  });

  describe('createInvoice', () => {
    it('should create an empty pending invoice', async () => {
      const invoice = await invoices.createInvoice({
        invoice_number: 'INV-001',
        client_id: clientId,
        invoice_date: '2024-05-01',
      });

      expect(invoice).toMatchObject({
        invoice_number: 'INV-001',
        client_id: clientId,
        client_name: 'Acme Ltd',
        invoice_date: '2024-05-01',
        status: 'pending',
        items_count: 0,
        total: '0.00',
        items: [],
        totals: { subtotal: '0.00', tax_total: '0.00', grand_total: '0.00' },
      });
    });

    it('should default the invoice date to today', async () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date('2024-07-04T10:00:00Z'));
      try {
        const invoice = await invoices.createInvoice({ invoice_number: 'INV-001', client_id: clientId });
        expect(invoice.invoice_date).toBe('2024-07-04');
      } finally {
        vi.useRealTimers();
      }
    });

    it('should reject an unknown client', async () => {
      await expect(invoices.createInvoice({ invoice_number: 'INV-001', client_id: 999 })).rejects.toThrow(
        'client_id does not reference an existing client',
      );
    });

    it('should reject a duplicate invoice number', async () => {
      await invoices.createInvoice({ invoice_number: 'INV-001', client_id: clientId });

      await expect(invoices.createInvoice({ invoice_number: 'INV-001', client_id: clientId })).rejects.toBeInstanceOf(
        ConflictError,
      );
    });

    it('should report every validation problem', async () => {
      try {
        await invoices.createInvoice({ invoice_number: '', client_id: clientId, invoice_date: '2024-13-01' });
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ValidationError);
        if (error instanceof ValidationError) {
          expect(error.errors).toEqual([
            'invoice_number is required',
            'invoice_date must be a date in YYYY-MM-DD format',
          ]);
        }
      }
    });
  });

  describe('totals', () => {
    it('should compute the total from the items', async () => {
      const invoice = await invoices.createInvoice({ invoice_number: 'INV-001', client_id: clientId });
      await items.addItem(invoice.id, { description: 'Consulting', quantity: 10, unit_price: '50.00', tax_rate: 21 });

      expect(await invoices.getInvoiceTotal(invoice.id)).toEqual({
        subtotal: '500.00',
        tax_total: '105.00',
        grand_total: '605.00',
        amount_due: '605.00',
      });

      const detail = await invoices.getInvoiceById(invoice.id);
      expect(detail?.total).toBe('605.00');
      expect(detail?.items_count).toBe(1);
      expect(detail?.items[0]).toMatchObject({ quantity: '10', unit_price: '50.00', tax_rate: '21', total: '605.00' });
    });

    it('should follow item changes', async () => {
      const invoice = await invoices.createInvoice({ invoice_number: 'INV-001', client_id: clientId });
      const line = await items.addItem(invoice.id, { description: 'Hosting', unit_price: '20' });
      await items.addItem(invoice.id, { description: 'Domain', unit_price: '10', tax_rate: '10' });

      expect((await invoices.getInvoiceTotal(invoice.id))?.grand_total).toBe('31.00');

      await items.updateItem(invoice.id, line.id, { quantity: '3' });
      expect((await invoices.getInvoiceTotal(invoice.id))?.grand_total).toBe('71.00');

      await items.deleteItem(invoice.id, line.id);
      expect((await invoices.getInvoiceTotal(invoice.id))?.grand_total).toBe('11.00');
    });

    it('should return null for a missing invoice', async () => {
      expect(await invoices.getInvoiceTotal(42)).toBeNull();
    });
  });

  describe('listing', () => {
    it('should summarize each invoice with its own total', async () => {
      const first = await invoices.createInvoice({ invoice_number: 'INV-001', client_id: clientId });
      const second = await invoices.createInvoice({ invoice_number: 'INV-002', client_id: clientId });
      await items.addItem(first.id, { description: 'A', unit_price: '1.10' });
      await items.addItem(second.id, { description: 'B', quantity: 2, unit_price: '5' });
      await items.addItem(second.id, { description: 'C', unit_price: '0.5' });

      const result = await invoices.listInvoices({ sortBy: 'invoice_number' });

      expect(result.total).toBe(2);
      expect(result.invoices.map(i => [i.invoice_number, i.items_count, i.total])).toEqual([
        ['INV-001', 1, '1.10'],
        ['INV-002', 2, '10.50'],
      ]);
    });

    it('should list the invoices of one client', async () => {
      const other = await repos.clients.create({ name: 'Globex', email: null, phone: null, company_code: null, address: null });
      await invoices.createInvoice({ invoice_number: 'INV-001', client_id: clientId });
      await invoices.createInvoice({ invoice_number: 'INV-002', client_id: other.id });

      const list = await invoices.listClientInvoices(other.id);

      expect(list.map(i => i.invoice_number)).toEqual(['INV-002']);
      await expect(invoices.listClientInvoices(999)).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('updateInvoice', () => {
    it('should merge changes over the stored invoice', async () => {
      const invoice = await invoices.createInvoice({
        invoice_number: 'INV-001',
        client_id: clientId,
        invoice_date: '2024-05-01',
        notes: 'First draft',
      });

      const updated = await invoices.updateInvoice(invoice.id, { due_date: '2024-05-31', status: 'overdue' });

      expect(updated).toMatchObject({
        invoice_number: 'INV-001',
        invoice_date: '2024-05-01',
        due_date: '2024-05-31',
        status: 'overdue',
        notes: 'First draft',
      });
    });

    it('should refuse a number that another invoice uses', async () => {
      await invoices.createInvoice({ invoice_number: 'INV-001', client_id: clientId });
      const second = await invoices.createInvoice({ invoice_number: 'INV-002', client_id: clientId });

      await expect(invoices.updateInvoice(second.id, { invoice_number: 'INV-001' })).rejects.toThrow(
        'Invoice number INV-001 already exists',
      );
    });

    it('should not move a cancelled invoice to paid', async () => {
      const invoice = await invoices.createInvoice({ invoice_number: 'INV-001', client_id: clientId, status: 'cancelled' });

      await expect(
        invoices.updateInvoice(invoice.id, { status: 'paid', payment_date: '2024-05-20' }),
      ).rejects.toThrow('Cancelled invoices cannot be marked as paid');
      expect((await invoices.getInvoiceById(invoice.id))?.status).toBe('cancelled');
    });

    it('should still reopen a cancelled invoice as pending', async () => {
      const invoice = await invoices.createInvoice({ invoice_number: 'INV-001', client_id: clientId, status: 'cancelled' });

      expect((await invoices.updateInvoice(invoice.id, { status: 'pending' }))?.status).toBe('pending');
    });

    it('should return null for a missing invoice', async () => {
      expect(await invoices.updateInvoice(42, { notes: 'x' })).toBeNull();
    });
  });

  describe('markInvoicePaid', () => {
    it('should set the status and payment date', async () => {
      const invoice = await invoices.createInvoice({ invoice_number: 'INV-001', client_id: clientId, invoice_date: '2024-05-01' });

      const paid = await invoices.markInvoicePaid(invoice.id, '2024-05-20');

      expect(paid).toMatchObject({ status: 'paid', payment_date: '2024-05-20' });
    });

    it('should not pay a cancelled invoice', async () => {
      const invoice = await invoices.createInvoice({ invoice_number: 'INV-001', client_id: clientId, status: 'cancelled' });

      await expect(invoices.markInvoicePaid(invoice.id)).rejects.toBeInstanceOf(ConflictError);
    });

    it('should reject a malformed payment date', async () => {
      const invoice = await invoices.createInvoice({ invoice_number: 'INV-001', client_id: clientId });

      await expect(invoices.markInvoicePaid(invoice.id, '20/05/2024')).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('deleteInvoice', () => {
    it('should delete the invoice and its items', async () => {
      const invoice = await invoices.createInvoice({ invoice_number: 'INV-001', client_id: clientId });
      await items.addItem(invoice.id, { description: 'Design', unit_price: '100' });

      expect(await invoices.deleteInvoice(invoice.id)).toBe(true);
      expect(await invoices.getInvoiceById(invoice.id)).toBeNull();
      expect(await repos.invoiceItems.findByInvoiceIds([invoice.id])).toEqual([]);
      expect(await invoices.deleteInvoice(invoice.id)).toBe(false);
    });
  });

  describe('generateInvoicePdf', () => {
    it('should render a PDF document', async () => {
      const invoice = await invoices.createInvoice({ invoice_number: 'INV-001', client_id: clientId, notes: 'Thank you' });
      await items.addItem(invoice.id, { description: 'Consulting', quantity: 10, unit_price: '50.00', tax_rate: 21 });

      const pdf = await invoices.generateInvoicePdf(invoice.id);

      expect(pdf).not.toBeNull();
      expect(pdf?.subarray(0, 5).toString('latin1')).toBe('%PDF-');
    });

    it('should render text outside Latin-1 and sub-cent totals', async () => {
      const client = await new ClientService(repos.clients).createClient({ name: 'UAB Žalgirio ąžuolas', address: 'Gatvė 5, Łódź' });
      const invoice = await invoices.createInvoice({ invoice_number: 'INV-002', client_id: client.id, notes: 'Ačiū 東京' });
      await items.addItem(invoice.id, { description: 'Konsultacijos ėė', quantity: 3, unit_price: '0.10', tax_rate: 15 });

      const pdf = await invoices.generateInvoicePdf(invoice.id);

      expect(pdf?.subarray(0, 5).toString('latin1')).toBe('%PDF-');
    });

    it('should return null for a missing invoice', async () => {
      expect(await invoices.generateInvoicePdf(42)).toBeNull();
    });
  });
});
