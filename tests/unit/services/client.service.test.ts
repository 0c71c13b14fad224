/**
 * Client Service Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { Readable } from 'stream';
import ExcelJS from 'exceljs';
import { InMemoryStore } from '../../../src/database/in-memory';
import { createInMemoryRepositories } from '../../../src/repositories';
import { ClientService } from '../../../src/services/client.service';
import { ValidationError } from '../../../src/utils/errors';

describe('ClientService', () => {
  let store: InMemoryStore;
  let service: ClientService;

  beforeEach(() => {
    store = new InMemoryStore();
    service = new ClientService(createInMemoryRepositories(store).clients);
  });

  it('should create a normalized client', async () => {
    const client = await service.createClient({ name: ' Acme Ltd ', email: 'Billing@Acme.TEST', phone: '' });

    expect(client).toMatchObject({
      id: 1,
      name: 'Acme Ltd',
      email: 'billing@acme.test',
      phone: null,
      company_code: null,
      address: null,
    });
    expect(client.created_at).toBeInstanceOf(Date);
  });

  it('should reject invalid input', async () => {
    await expect(service.createClient({ name: '', email: 'nope' })).rejects.toThrow(
      'Validation failed: name is required, email is invalid',
    );
    expect(store.clients).toEqual([]);
  });

  it('should update only the given fields', async () => {
    const client = await service.createClient({ name: 'Acme Ltd', email: 'billing@acme.test', company_code: 'AC-1' });

    const updated = await service.updateClient(client.id, { phone: '+1 555 0100' });

    expect(updated).toMatchObject({
      name: 'Acme Ltd',
      email: 'billing@acme.test',
      phone: '+1 555 0100',
      company_code: 'AC-1',
    });
  });

  it('should validate the merged client on update', async () => {
    const client = await service.createClient({ name: 'Acme Ltd' });

    await expect(service.updateClient(client.id, { name: '' })).rejects.toBeInstanceOf(ValidationError);
  });

  it('should return null when updating a missing client', async () => {
    expect(await service.updateClient(7, { name: 'Ghost' })).toBeNull();
  });

  it('should delete one or many clients', async () => {
    const a = await service.createClient({ name: 'A' });
    const b = await service.createClient({ name: 'B' });
    const c = await service.createClient({ name: 'C' });

    expect(await service.deleteClient(a.id)).toBe(true);
    expect(await service.deleteClient(a.id)).toBe(false);
    expect(await service.deleteClients([b.id, c.id])).toBe(2);
    expect(store.clients).toEqual([]);
  });

  it('should export every client to a worksheet', async () => {
    await service.createClient({ name: 'Acme Ltd', email: 'billing@acme.test' });
    await service.createClient({ name: 'Globex', address: 'Main Street 1' });

    const buffer = await service.exportToExcel();

    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.read(Readable.from([buffer]));
    const sheet = workbook.getWorksheet('Clients');

    expect(sheet?.rowCount).toBe(3);
    expect(sheet?.getRow(1).getCell(2).value).toBe('Name');
    expect(sheet?.getRow(2).getCell(2).value).toBe('Acme Ltd');
    expect(sheet?.getRow(2).getCell(3).value).toBe('billing@acme.test');
    expect(sheet?.getRow(3).getCell(6).value).toBe('Main Street 1');
  });
});
