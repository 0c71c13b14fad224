/**
 * HTTP API Tests
 * Runs the Express app on an ephemeral port against in-memory storage
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { Server } from 'http';
import { createApp } from '../../../src/app';
import { loadConfig } from '../../../src/config/env';
import { createInMemoryRepositories } from '../../../src/repositories';

interface JsonResponse {
  status: number;
  body: unknown;
}

describe('HTTP API', () => {
  let server: Server;
  let baseUrl: string;

  beforeEach(async () => {
    const app = createApp({
      repositories: createInMemoryRepositories(),
      config: loadConfig({ NODE_ENV: 'test', COMPANY_NAME: 'Test Company' }),
    });
    server = await new Promise<Server>(resolve => {
      const listening = app.listen(0, () => resolve(listening));
    });
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Server did not bind to a TCP port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => server.close(error => (error ? reject(error) : resolve())));
  });

  async function call(method: string, path: string, body?: unknown): Promise<JsonResponse> {
    const response = await fetch(`${baseUrl}${path}`, {
      method,
      headers: body === undefined ? undefined : { 'Content-Type': 'application/json' },
      body: body === undefined ? undefined : JSON.stringify(body),
    });
    return { status: response.status, body: await response.json() };
  }

  async function createClient(name = 'Acme Ltd'): Promise<number> {
    const { body } = await call('POST', '/clients', { name });
    expect(body).toMatchObject({ id: expect.any(Number) });
    return typeof body === 'object' && body !== null && 'id' in body && typeof body.id === 'number' ? body.id : NaN;
  }

  it('should report health', async () => {
    const { status, body } = await call('GET', '/health');

    expect(status).toBe(200);
    expect(body).toMatchObject({ status: 'ok', storage: 'memory', database: 'connected' });
  });

  it('should create and fetch a client', async () => {
    const created = await call('POST', '/clients', { name: 'Acme Ltd', email: 'BILLING@acme.test' });
    expect(created.status).toBe(201);
    expect(created.body).toMatchObject({ id: 1, name: 'Acme Ltd', email: 'billing@acme.test' });

    const fetched = await call('GET', '/clients/1');
    expect(fetched.status).toBe(200);
    expect(fetched.body).toMatchObject({ id: 1, name: 'Acme Ltd' });
  });

  it('should answer validation failures with 422 and the list of errors', async () => {
    const { status, body } = await call('POST', '/clients', { email: 'nope' });

    expect(status).toBe(422);
    expect(body).toEqual({
      error: 'Validation failed: name is required, email is invalid',
      code: 'VALIDATION_ERROR',
      errors: ['name is required', 'email is invalid'],
    });
  });

  it('should answer 404 for unknown records and 422 for malformed ids', async () => {
    expect((await call('GET', '/clients/42')).status).toBe(404);
    expect((await call('GET', '/invoices/42')).status).toBe(404);

    const malformed = await call('GET', '/clients/abc');
    expect(malformed.status).toBe(422);
    expect(malformed.body).toMatchObject({ errors: ['id must be a positive integer'] });
  });

  it('should answer 422 for ids beyond the integer column range', async () => {
    const oversized = await call('GET', '/invoices/99999999999');
    expect(oversized.status).toBe(422);
    expect(oversized.body).toMatchObject({ errors: ['id must be a positive integer'] });

    await createClient();
    const invoice = await call('POST', '/invoices', { invoice_number: 'INV-001', client_id: 3000000000 });
    expect(invoice.status).toBe(422);
    expect(invoice.body).toMatchObject({ errors: ['client_id must be a positive integer'] });

    const filtered = await call('GET', '/invoices?client_id=3000000000');
    expect(filtered.status).toBe(422);
    expect(filtered.body).toMatchObject({ errors: ['client_id must be a positive integer'] });
  });

  it('should compute invoice totals through the API', async () => {
    const clientId = await createClient();
    const invoice = await call('POST', '/invoices', {
      invoice_number: 'INV-001',
      client_id: clientId,
      invoice_date: '2024-05-01',
    });
    expect(invoice.status).toBe(201);
    expect(invoice.body).toMatchObject({ id: 1, total: '0.00', client_name: 'Acme Ltd' });

    const item = await call('POST', '/invoices/1/items', {
      description: 'Consulting',
      quantity: 10,
      unit_price: '50.00',
      tax_rate: 21,
    });
    expect(item.status).toBe(201);
    expect(item.body).toMatchObject({ id: 1, subtotal: '500.00', tax_amount: '105.00', total: '605.00' });

    const totals = await call('GET', '/invoices/1/total');
    expect(totals).toEqual({
      status: 200,
      body: { subtotal: '500.00', tax_total: '105.00', grand_total: '605.00', amount_due: '605.00' },
    });

    const list = await call('GET', '/invoices');
    expect(list.body).toMatchObject({ total: 1, invoices: [{ invoice_number: 'INV-001', items_count: 1, total: '605.00' }] });
  });

  it('should reject an item with a missing price', async () => {
    await createClient();
    await call('POST', '/invoices', { invoice_number: 'INV-001', client_id: 1 });

    const { status, body } = await call('POST', '/invoices/1/items', { description: 'Consulting' });

    expect(status).toBe(422);
    expect(body).toMatchObject({ errors: ['unit_price is required'] });
  });

  it('should answer 409 for a duplicate invoice number', async () => {
    await createClient();
    await call('POST', '/invoices', { invoice_number: 'INV-001', client_id: 1 });

    const { status, body } = await call('POST', '/invoices', { invoice_number: 'INV-001', client_id: 1 });

    expect(status).toBe(409);
    expect(body).toEqual({ error: 'Invoice number INV-001 already exists', code: 'CONFLICT' });
  });

  it('should mark an invoice as paid', async () => {
    await createClient();
    await call('POST', '/invoices', { invoice_number: 'INV-001', client_id: 1, invoice_date: '2024-05-01' });

    const { status, body } = await call('POST', '/invoices/1/mark-paid', { payment_date: '2024-05-15' });

    expect(status).toBe(200);
    expect(body).toMatchObject({ status: 'paid', payment_date: '2024-05-15' });
  });

  it('should answer 409 when an update pays a cancelled invoice', async () => {
    await createClient();
    await call('POST', '/invoices', { invoice_number: 'INV-001', client_id: 1, status: 'cancelled' });

    expect(await call('PUT', '/invoices/1', { status: 'paid' })).toEqual({
      status: 409,
      body: { error: 'Cancelled invoices cannot be marked as paid', code: 'CONFLICT' },
    });
    expect((await call('GET', '/invoices/1')).body).toMatchObject({ status: 'cancelled' });
  });

  it('should delete a client with its invoices', async () => {
    await createClient();
    await call('POST', '/invoices', { invoice_number: 'INV-001', client_id: 1 });

    expect((await call('GET', '/clients/1/invoices')).body).toMatchObject([{ invoice_number: 'INV-001' }]);
    expect((await call('DELETE', '/clients/1')).status).toBe(200);
    expect((await call('GET', '/invoices/1')).status).toBe(404);
  });

  it('should bulk delete clients', async () => {
    await createClient('A');
    await createClient('B');

    expect(await call('DELETE', '/clients', { ids: [1, 2] })).toEqual({
      status: 200,
      body: { message: '2 client(s) deleted successfully', deleted: 2 },
    });
    expect((await call('DELETE', '/clients', { ids: [] })).status).toBe(422);
  });

  it('should serve the invoice PDF', async () => {
    await createClient();
    await call('POST', '/invoices', { invoice_number: 'INV-001', client_id: 1 });

    const response = await fetch(`${baseUrl}/invoices/1/pdf`);

    expect(response.status).toBe(200);
    expect(response.headers.get('content-type')).toBe('application/pdf');
    expect(Buffer.from(await response.arrayBuffer()).subarray(0, 5).toString('latin1')).toBe('%PDF-');
  });

  it('should record and total expenses', async () => {
    const created = await call('POST', '/expenses', {
      date: '2024-05-02',
      category: 'office',
      vendor: 'Paper Co',
      amount: '12.10',
      vat_amount: '2.10',
    });
    expect(created.status).toBe(201);
    expect(created.body).toMatchObject({ id: 1, vendor: 'Paper Co', amount: '12.10', vat_amount: '2.10', description: null });

    await call('POST', '/expenses', { date: '2024-05-10', category: 'transport', vendor: 'Fuel Station', amount: 60.5 });

    expect(await call('GET', '/expenses/total')).toEqual({
      status: 200,
      body: { count: 2, amount: '72.60', vat_amount: '2.10', net_amount: '70.50' },
    });
    expect((await call('GET', '/expenses/total?category=office')).body).toMatchObject({ count: 1, amount: '12.10' });
    expect((await call('GET', '/expenses?date_from=2024-05-05')).body).toMatchObject({
      total: 1,
      expenses: [{ vendor: 'Fuel Station' }],
    });
  });

  it('should validate expenses', async () => {
    const { status, body } = await call('POST', '/expenses', { category: 'travel', vendor: 'Airline', amount: '100' });

    expect(status).toBe(422);
    expect(body).toMatchObject({
      errors: ['category must be one of: food, transport, rent, utilities, office, services, other'],
    });
    expect((await call('GET', '/expenses/total?date_from=yesterday')).status).toBe(422);
  });

  it('should update, fetch and delete an expense', async () => {
    await call('POST', '/expenses', { date: '2024-05-02', category: 'office', vendor: 'Paper Co', amount: '12.10' });

    expect((await call('PUT', '/expenses/1', { category: 'services' })).body).toMatchObject({ category: 'services' });
    expect((await call('GET', '/expenses/1')).body).toMatchObject({ category: 'services', amount: '12.10' });
    expect(await call('DELETE', '/expenses/1')).toEqual({ status: 200, body: { message: 'Expense deleted successfully' } });
    expect((await call('GET', '/expenses/1')).status).toBe(404);
  });

  it('should list the expense categories', async () => {
    expect(await call('GET', '/expenses/categories')).toEqual({
      status: 200,
      body: ['food', 'transport', 'rent', 'utilities', 'office', 'services', 'other'],
    });
  });

  it('should answer unknown routes with 404', async () => {
    const { status, body } = await call('GET', '/nowhere');

    expect(status).toBe(404);
    expect(body).toEqual({ error: 'Route not found: GET /nowhere', code: 'NOT_FOUND' });
  });
});
