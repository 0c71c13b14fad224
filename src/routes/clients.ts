import { Router } from 'express';
import type { Request, Response } from 'express';
import type { CreateClientDTO, ClientSearchParams, UpdateClientDTO } from '../models/client';
import { CLIENT_SORT_FIELDS } from '../models/client';
import type { ClientService } from '../services/client.service';
import type { InvoiceService } from '../services/invoice.service';
import { ValidationError } from '../utils/errors';
import { queryInteger, queryOption, queryString, requireId, sendError } from '../utils/http';
import { Logger } from '../utils/logger';
import { isPositiveInteger } from '../utils/validation';

/**
 * @swagger
 * components:
 *   schemas:
 *     Client:
 *       type: object
 *       properties:
 *         id:
 *           type: integer
 *           description: Auto-generated primary key
 *         name:
 *           type: string
 *           maxLength: 100
 *         email:
 *           type: string
 *           format: email
 *           nullable: true
 *         phone:
 *           type: string
 *           nullable: true
 *         company_code:
 *           type: string
 *           nullable: true
 *           description: Company registration code
 *         address:
 *           type: string
 *           nullable: true
 *         created_at:
 *           type: string
 *           format: date-time
 *         updated_at:
 *           type: string
 *           format: date-time
 *     CreateClient:
 *       type: object
 *       required:
 *         - name
 *       properties:
 *         name:
 *           type: string
 *         email:
 *           type: string
 *           format: email
 *         phone:
 *           type: string
 *         company_code:
 *           type: string
 *         address:
 *           type: string
 *     Error:
 *       type: object
 *       properties:
 *         error:
 *           type: string
 *         code:
 *           type: string
 *         errors:
 *           type: array
 *           items:
 *             type: string
 */

export function createClientRouter(clientService: ClientService, invoiceService: InvoiceService): Router {
  const clientRouter = Router();

  /**
   * @swagger
   * /clients:
   *   post:
   *     summary: Create a new client
   *     tags: [Clients]
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             $ref: '#/components/schemas/CreateClient'
   *     responses:
   *       201:
   *         description: Client created successfully
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/Client'
   *       422:
   *         description: Validation error
   */
  clientRouter.post('/', async (req: Request, res: Response) => {
    try {
      const clientData: CreateClientDTO = req.body;
      const client = await clientService.createClient(clientData);
      res.status(201).json(client);
    } catch (error) {
      sendError(res, error, 'Failed to create client', { method: 'POST', url: '/clients' });
    }
  });

  /**
   * @swagger
   * /clients:
   *   get:
   *     summary: List clients with pagination, search, and sorting
   *     tags: [Clients]
   *     parameters:
   *       - in: query
   *         name: search
   *         schema:
   *           type: string
   *         description: Matches name, email, phone, company code and address
   *       - in: query
   *         name: sortBy
   *         schema:
   *           type: string
   *           enum: [id, name, email, company_code, created_at, updated_at]
   *       - in: query
   *         name: sortOrder
   *         schema:
   *           type: string
   *           enum: [asc, desc]
   *           default: asc
   *       - in: query
   *         name: page
   *         schema:
   *           type: integer
   *           minimum: 1
   *           default: 1
   *       - in: query
   *         name: limit
   *         schema:
   *           type: integer
   *           minimum: 1
   *           maximum: 1000
   *           default: 50
   *       - in: query
   *         name: offset
   *         schema:
   *           type: integer
   *           minimum: 0
   *     responses:
   *       200:
   *         description: List of clients
   */
  clientRouter.get('/', async (req: Request, res: Response) => {
    try {
      const params: ClientSearchParams = {
        search: queryString(req.query.search),
        sortBy: queryOption(req.query.sortBy, CLIENT_SORT_FIELDS),
        sortOrder: queryOption(req.query.sortOrder, ['asc', 'desc'] as const) ?? 'asc',
        page: queryInteger(req.query.page),
        limit: queryInteger(req.query.limit),
        offset: queryInteger(req.query.offset),
      };
      res.json(await clientService.listClients(params));
    } catch (error) {
      sendError(res, error, 'Failed to list clients', { method: 'GET', url: '/clients', query: req.query });
    }
  });

  /**
   * @swagger
   * /clients/export:
   *   get:
   *     summary: Export all clients to an Excel workbook
   *     tags: [Clients]
   *     responses:
   *       200:
   *         description: Excel file
   *         content:
   *           application/vnd.openxmlformats-officedocument.spreadsheetml.sheet:
   *             schema:
   *               type: string
   *               format: binary
   */
  clientRouter.get('/export', async (req: Request, res: Response) => {
    try {
      const buffer = await clientService.exportToExcel();
      const filename = `clients_export_${new Date().toISOString().split('T')[0]}.xlsx`;
      res.setHeader('Content-Type', 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet');
      res.setHeader('Content-Disposition', `attachment; filename="${filename}"`);
      res.send(buffer);
    } catch (error) {
      sendError(res, error, 'Failed to export clients', { method: 'GET', url: '/clients/export' });
    }
  });

  /**
   * @swagger
   * /clients/{id}:
   *   get:
   *     summary: Get client by ID
   *     tags: [Clients]
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: integer
   *     responses:
   *       200:
   *         description: Client found
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/Client'
   *       404:
   *         description: Client not found
   */
  clientRouter.get('/:id', async (req: Request, res: Response) => {
    try {
      const id = requireId(req.params.id);
      const client = await clientService.getClientById(id);
      if (!client) {
        Logger.warn('Client not found', { method: 'GET', url: `/clients/${id}`, clientId: id });
        res.status(404).json({ error: 'Client not found', code: 'NOT_FOUND' });
        return;
      }
      res.json(client);
    } catch (error) {
      sendError(res, error, 'Failed to get client by ID', { method: 'GET', url: `/clients/${req.params.id}` });
    }
  });

  /**
   * @swagger
   * /clients/{id}/invoices:
   *   get:
   *     summary: List a client's invoices with their totals
   *     tags: [Clients]
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: integer
   *     responses:
   *       200:
   *         description: Invoices of the client
   *       404:
   *         description: Client not found
   */
  clientRouter.get('/:id/invoices', async (req: Request, res: Response) => {
    try {
      const id = requireId(req.params.id);
      res.json(await invoiceService.listClientInvoices(id));
    } catch (error) {
      sendError(res, error, 'Failed to list client invoices', {
        method: 'GET',
        url: `/clients/${req.params.id}/invoices`,
      });
    }
  });

  /**
   * @swagger
   * /clients/{id}:
   *   put:
   *     summary: Update a client
   *     tags: [Clients]
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
   *             $ref: '#/components/schemas/CreateClient'
   *     responses:
   *       200:
   *         description: Client updated successfully
   *       404:
   *         description: Client not found
   *       422:
   *         description: Validation error
   */
  clientRouter.put('/:id', async (req: Request, res: Response) => {
    try {
      const id = requireId(req.params.id);
      const clientData: UpdateClientDTO = req.body;
      const client = await clientService.updateClient(id, clientData);
      if (!client) {
        Logger.warn('Client not found for update', { method: 'PUT', url: `/clients/${id}`, clientId: id });
        res.status(404).json({ error: 'Client not found', code: 'NOT_FOUND' });
        return;
      }
      res.json(client);
    } catch (error) {
      sendError(res, error, 'Failed to update client', { method: 'PUT', url: `/clients/${req.params.id}` });
    }
  });

  /**
   * @swagger
   * /clients/{id}:
   *   delete:
   *     summary: Delete a client together with its invoices and their items
   *     tags: [Clients]
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: integer
   *     responses:
   *       200:
   *         description: Client deleted successfully
   *       404:
   *         description: Client not found
   */
  clientRouter.delete('/:id', async (req: Request, res: Response) => {
    try {
      const id = requireId(req.params.id);
      const deleted = await clientService.deleteClient(id);
      if (!deleted) {
        Logger.warn('Client not found for deletion', { method: 'DELETE', url: `/clients/${id}`, clientId: id });
        res.status(404).json({ error: 'Client not found', code: 'NOT_FOUND' });
        return;
      }
      res.json({ message: 'Client deleted successfully' });
    } catch (error) {
      sendError(res, error, 'Failed to delete client', { method: 'DELETE', url: `/clients/${req.params.id}` });
    }
  });

  /**
   * @swagger
   * /clients:
   *   delete:
   *     summary: Delete multiple clients
   *     tags: [Clients]
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required:
   *               - ids
   *             properties:
   *               ids:
   *                 type: array
   *                 items:
   *                   type: integer
   *     responses:
   *       200:
   *         description: Clients deleted successfully
   *       422:
   *         description: Invalid ids
   */
  clientRouter.delete('/', async (req: Request, res: Response) => {
    try {
      const ids: unknown = req.body?.ids;
      if (!Array.isArray(ids) || ids.length === 0 || !ids.every(isPositiveInteger)) {
        throw new ValidationError(['ids must be a non-empty array of positive integers']);
      }
      const deleted = await clientService.deleteClients(ids);
      res.json({ message: `${deleted} client(s) deleted successfully`, deleted });
    } catch (error) {
      sendError(res, error, 'Failed to delete clients', { method: 'DELETE', url: '/clients' });
    }
  });

  return clientRouter;
}
