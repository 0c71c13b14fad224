import { Router } from 'express';
import type { Request, Response } from 'express';
import type { CreateInvoiceDTO, InvoiceSearchParams, UpdateInvoiceDTO } from '../models/invoice';
import { INVOICE_SORT_FIELDS, INVOICE_STATUSES } from '../models/invoice';
import type { CreateInvoiceItemDTO, UpdateInvoiceItemDTO } from '../models/invoice-item';
import type { InvoiceItemService } from '../services/invoice-item.service';
import type { InvoiceService } from '../services/invoice.service';
import { queryInteger, queryOption, queryString, requireId, sendError } from '../utils/http';
import { Logger } from '../utils/logger';

/**
 * @swagger
 * components:
 *   schemas:
 *     InvoiceItem:
 *       type: object
 *       properties:
 *         id:
 *           type: integer
 *         invoice_id:
 *           type: integer
 *         description:
 *           type: string
 *         quantity:
 *           type: string
 *           example: "10"
 *         unit_price:
 *           type: string
 *           example: "50.00"
 *         tax_rate:
 *           type: string
 *           description: Percentage, e.g. "21" for 21%
 *         subtotal:
 *           type: string
 *           example: "500.00"
 *         tax_amount:
 *           type: string
 *           example: "105.00"
 *         total:
 *           type: string
 *           example: "605.00"
 *     CreateInvoiceItem:
 *       type: object
 *       required:
 *         - description
 *         - unit_price
 *       properties:
 *         description:
 *           type: string
 *         quantity:
 *           oneOf:
 *             - type: string
 *             - type: number
 *           default: 1
 *         unit_price:
 *           oneOf:
 *             - type: string
 *             - type: number
 *         tax_rate:
 *           oneOf:
 *             - type: string
 *             - type: number
 *           default: 0
 *     InvoiceTotals:
 *       type: object
 *       properties:
 *         subtotal:
 *           type: string
 *         tax_total:
 *           type: string
 *         grand_total:
 *           type: string
 *           description: Exact sum of subtotal and tax
 *         amount_due:
 *           type: string
 *           description: grand_total rounded half-even to cents
 *     Invoice:
 *       type: object
 *       properties:
 *         id:
 *           type: integer
 *         invoice_number:
 *           type: string
 *         client_id:
 *           type: integer
 *         client_name:
 *           type: string
 *           nullable: true
 *         invoice_date:
 *           type: string
 *           format: date
 *         due_date:
 *           type: string
 *           format: date
 *           nullable: true
 *         payment_date:
 *           type: string
 *           format: date
 *           nullable: true
 *         status:
 *           type: string
 *           enum: [pending, paid, overdue, cancelled]
 *         notes:
 *           type: string
 *           nullable: true
 *         items_count:
 *           type: integer
 *         total:
 *           type: string
 *         items:
 *           type: array
 *           items:
 *             $ref: '#/components/schemas/InvoiceItem'
 *         totals:
 *           $ref: '#/components/schemas/InvoiceTotals'
 *     CreateInvoice:
 *       type: object
 *       required:
 *         - invoice_number
 *         - client_id
 *       properties:
 *         invoice_number:
 *           type: string
 *         client_id:
 *           type: integer
 *         invoice_date:
 *           type: string
 *           format: date
 *         due_date:
 *           type: string
 *           format: date
 *         payment_date:
 *           type: string
 *           format: date
 *         status:
 *           type: string
 *           enum: [pending, paid, overdue, cancelled]
 *         notes:
 *           type: string
 */

export function createInvoiceRouter(invoiceService: InvoiceService, itemService: InvoiceItemService): Router {
  const invoiceRouter = Router();

  /**
   * @swagger
   * /invoices:
   *   post:
   *     summary: Create a new invoice
   *     tags: [Invoices]
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             $ref: '#/components/schemas/CreateInvoice'
   *     responses:
   *       201:
   *         description: Invoice created successfully
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/Invoice'
   *       409:
   *         description: Invoice number already exists
   *       422:
   *         description: Validation error
   */
  invoiceRouter.post('/', async (req: Request, res: Response) => {
    try {
      const invoiceData: CreateInvoiceDTO = req.body;
      const invoice = await invoiceService.createInvoice(invoiceData);
      res.status(201).json(invoice);
    } catch (error) {
      sendError(res, error, 'Failed to create invoice', { method: 'POST', url: '/invoices' });
    }
  });

  /**
   * @swagger
   * /invoices:
   *   get:
   *     summary: List invoices with pagination, filtering, and sorting
   *     tags: [Invoices]
   *     parameters:
   *       - in: query
   *         name: search
   *         schema:
   *           type: string
   *         description: Matches invoice number, notes and client name
   *       - in: query
   *         name: status
   *         schema:
   *           type: string
   *           enum: [pending, paid, overdue, cancelled]
   *       - in: query
   *         name: client_id
   *         schema:
   *           type: integer
   *       - in: query
   *         name: sortBy
   *         schema:
   *           type: string
   *           enum: [id, invoice_number, invoice_date, due_date, status, created_at]
   *       - in: query
   *         name: sortOrder
   *         schema:
   *           type: string
   *           enum: [asc, desc]
   *       - in: query
   *         name: page
   *         schema:
   *           type: integer
   *       - in: query
   *         name: limit
   *         schema:
   *           type: integer
   *       - in: query
   *         name: offset
   *         schema:
   *           type: integer
   *     responses:
   *       200:
   *         description: List of invoices, each with its computed total
   */
  invoiceRouter.get('/', async (req: Request, res: Response) => {
    try {
      const params: InvoiceSearchParams = {
        search: queryString(req.query.search),
        status: queryOption(req.query.status, INVOICE_STATUSES),
        client_id: req.query.client_id === undefined ? undefined : requireId(req.query.client_id, 'client_id'),
        sortBy: queryOption(req.query.sortBy, INVOICE_SORT_FIELDS),
        sortOrder: queryOption(req.query.sortOrder, ['asc', 'desc'] as const) ?? 'desc',
        page: queryInteger(req.query.page),
        limit: queryInteger(req.query.limit),
        offset: queryInteger(req.query.offset),
      };
      res.json(await invoiceService.listInvoices(params));
    } catch (error) {
      sendError(res, error, 'Failed to list invoices', { method: 'GET', url: '/invoices', query: req.query });
    }
  });

  /**
   * @swagger
   * /invoices/{id}:
   *   get:
   *     summary: Get an invoice with its items and totals
   *     tags: [Invoices]
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: integer
   *     responses:
   *       200:
   *         description: Invoice found
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/Invoice'
   *       404:
   *         description: Invoice not found
   */
  invoiceRouter.get('/:id', async (req: Request, res: Response) => {
    try {
      const id = requireId(req.params.id);
      const invoice = await invoiceService.getInvoiceById(id);
      if (!invoice) {
        Logger.warn('Invoice not found', { method: 'GET', url: `/invoices/${id}`, invoiceId: id });
        res.status(404).json({ error: 'Invoice not found', code: 'NOT_FOUND' });
        return;
      }
      res.json(invoice);
    } catch (error) {
      sendError(res, error, 'Failed to get invoice by ID', { method: 'GET', url: `/invoices/${req.params.id}` });
    }
  });

  /**
   * @swagger
   * /invoices/{id}/total:
   *   get:
   *     summary: Compute invoice totals from its items
   *     tags: [Invoices]
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: integer
   *     responses:
   *       200:
   *         description: Totals rounded half-even to two decimal places
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/InvoiceTotals'
   *       404:
   *         description: Invoice not found
   */
  invoiceRouter.get('/:id/total', async (req: Request, res: Response) => {
    try {
      const id = requireId(req.params.id);
      const totals = await invoiceService.getInvoiceTotal(id);
      if (!totals) {
        res.status(404).json({ error: 'Invoice not found', code: 'NOT_FOUND' });
        return;
      }
      res.json(totals);
    } catch (error) {
      sendError(res, error, 'Failed to compute invoice total', {
        method: 'GET',
        url: `/invoices/${req.params.id}/total`,
      });
    }
  });

  /**
   * @swagger
   * /invoices/{id}/pdf:
   *   get:
   *     summary: Download the invoice as a PDF
   *     tags: [Invoices]
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: integer
   *     responses:
   *       200:
   *         description: PDF document
   *         content:
   *           application/pdf:
   *             schema:
   *               type: string
   *               format: binary
   *       404:
   *         description: Invoice not found
   */
  invoiceRouter.get('/:id/pdf', async (req: Request, res: Response) => {
    try {
      const id = requireId(req.params.id);
      const pdf = await invoiceService.generateInvoicePdf(id);
      if (!pdf) {
        res.status(404).json({ error: 'Invoice not found', code: 'NOT_FOUND' });
        return;
      }
      res.setHeader('Content-Type', 'application/pdf');
      res.setHeader('Content-Disposition', `attachment; filename="invoice_${id}.pdf"`);
      res.send(pdf);
    } catch (error) {
      sendError(res, error, 'Failed to generate invoice PDF', { method: 'GET', url: `/invoices/${req.params.id}/pdf` });
    }
  });

  /**
   * @swagger
   * /invoices/{id}:
   *   put:
   *     summary: Update an invoice
   *     tags: [Invoices]
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: integer
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             $ref: '#/components/schemas/CreateInvoice'
   *     responses:
   *       200:
   *         description: Invoice updated successfully
   *       404:
   *         description: Invoice not found
   *       409:
   *         description: Invoice number already exists
   *       422:
   *         description: Validation error
   */
  invoiceRouter.put('/:id', async (req: Request, res: Response) => {
    try {
      const id = requireId(req.params.id);
      const invoiceData: UpdateInvoiceDTO = req.body;
      const invoice = await invoiceService.updateInvoice(id, invoiceData);
      if (!invoice) {
        Logger.warn('Invoice not found for update', { method: 'PUT', url: `/invoices/${id}`, invoiceId: id });
        res.status(404).json({ error: 'Invoice not found', code: 'NOT_FOUND' });
        return;
      }
      res.json(invoice);
    } catch (error) {
      sendError(res, error, 'Failed to update invoice', { method: 'PUT', url: `/invoices/${req.params.id}` });
    }
  });

  /**
   * @swagger
   * /invoices/{id}/mark-paid:
   *   post:
   *     summary: Mark an invoice as paid
   *     tags: [Invoices]
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: integer
   *     requestBody:
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             properties:
   *               payment_date:
   *                 type: string
   *                 format: date
   *                 description: Defaults to today
   *     responses:
   *       200:
   *         description: Invoice marked as paid
   *       404:
   *         description: Invoice not found
   *       409:
   *         description: Invoice is cancelled
   */
  invoiceRouter.post('/:id/mark-paid', async (req: Request, res: Response) => {
    try {
      const id = requireId(req.params.id);
      const rawDate: unknown = req.body?.payment_date;
      const paymentDate = rawDate === undefined || rawDate === null ? undefined : typeof rawDate === 'string' ? rawDate : '';
      const invoice = await invoiceService.markInvoicePaid(id, paymentDate);
      if (!invoice) {
        res.status(404).json({ error: 'Invoice not found', code: 'NOT_FOUND' });
        return;
      }
      res.json(invoice);
    } catch (error) {
      sendError(res, error, 'Failed to mark invoice as paid', {
        method: 'POST',
        url: `/invoices/${req.params.id}/mark-paid`,
      });
    }
  });

  /**
   * @swagger
   * /invoices/{id}:
   *   delete:
   *     summary: Delete an invoice and its items
   *     tags: [Invoices]
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: integer
   *     responses:
   *       200:
   *         description: Invoice deleted successfully
   *       404:
   *         description: Invoice not found
   */
  invoiceRouter.delete('/:id', async (req: Request, res: Response) => {
    try {
      const id = requireId(req.params.id);
      const deleted = await invoiceService.deleteInvoice(id);
      if (!deleted) {
        Logger.warn('Invoice not found for deletion', { method: 'DELETE', url: `/invoices/${id}`, invoiceId: id });
        res.status(404).json({ error: 'Invoice not found', code: 'NOT_FOUND' });
        return;
      }
      res.json({ message: 'Invoice deleted successfully' });
    } catch (error) {
      sendError(res, error, 'Failed to delete invoice', { method: 'DELETE', url: `/invoices/${req.params.id}` });
    }
  });

  /**
   * @swagger
   * /invoices/{id}/items:
   *   get:
   *     summary: List the items of an invoice
   *     tags: [Invoice Items]
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: integer
   *     responses:
   *       200:
   *         description: Items in creation order
   *         content:
   *           application/json:
   *             schema:
   *               type: array
   *               items:
   *                 $ref: '#/components/schemas/InvoiceItem'
   *       404:
   *         description: Invoice not found
   */
  invoiceRouter.get('/:id/items', async (req: Request, res: Response) => {
    try {
      const id = requireId(req.params.id);
      res.json(await itemService.listItems(id));
    } catch (error) {
      sendError(res, error, 'Failed to list invoice items', { method: 'GET', url: `/invoices/${req.params.id}/items` });
    }
  });

  /**
   * @swagger
   * /invoices/{id}/items:
   *   post:
   *     summary: Add an item to an invoice
   *     tags: [Invoice Items]
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: integer
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             $ref: '#/components/schemas/CreateInvoiceItem'
   *     responses:
   *       201:
   *         description: Item added
   *       404:
   *         description: Invoice not found
   *       422:
   *         description: Validation error
   */
  invoiceRouter.post('/:id/items', async (req: Request, res: Response) => {
    try {
      const id = requireId(req.params.id);
      const itemData: CreateInvoiceItemDTO = req.body;
      const item = await itemService.addItem(id, itemData);
      res.status(201).json(item);
    } catch (error) {
      sendError(res, error, 'Failed to add invoice item', { method: 'POST', url: `/invoices/${req.params.id}/items` });
    }
  });

  /**
   * @swagger
   * /invoices/{id}/items/{itemId}:
   *   put:
   *     summary: Update an invoice item
   *     tags: [Invoice Items]
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: integer
   *       - in: path
   *         name: itemId
   *         required: true
   *         schema:
   *           type: integer
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             $ref: '#/components/schemas/CreateInvoiceItem'
   *     responses:
   *       200:
   *         description: Item updated
   *       404:
   *         description: Invoice or item not found
   *       422:
   *         description: Validation error
   */
  invoiceRouter.put('/:id/items/:itemId', async (req: Request, res: Response) => {
    try {
      const id = requireId(req.params.id);
      const itemId = requireId(req.params.itemId, 'itemId');
      const itemData: UpdateInvoiceItemDTO = req.body;
      res.json(await itemService.updateItem(id, itemId, itemData));
    } catch (error) {
      sendError(res, error, 'Failed to update invoice item', {
        method: 'PUT',
        url: `/invoices/${req.params.id}/items/${req.params.itemId}`,
      });
    }
  });

  /**
   * @swagger
   * /invoices/{id}/items/{itemId}:
   *   delete:
   *     summary: Delete an invoice item
   *     tags: [Invoice Items]
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: integer
   *       - in: path
   *         name: itemId
   *         required: true
   *         schema:
   *           type: integer
   *     responses:
   *       200:
   *         description: Item deleted
   *       404:
   *         description: Invoice or item not found
   */
  invoiceRouter.delete('/:id/items/:itemId', async (req: Request, res: Response) => {
    try {
      const id = requireId(req.params.id);
      const itemId = requireId(req.params.itemId, 'itemId');
      await itemService.deleteItem(id, itemId);
      res.json({ message: 'Invoice item deleted successfully' });
    } catch (error) {
      sendError(res, error, 'Failed to delete invoice item', {
        method: 'DELETE',
        url: `/invoices/${req.params.id}/items/${req.params.itemId}`,
      });
    }
  });

  return invoiceRouter;
}
