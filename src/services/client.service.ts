import ExcelJS from 'exceljs';
import type { Client, ClientListResponse, ClientSearchParams, CreateClientDTO, UpdateClientDTO } from '../models/client';
import type { ClientRepository } from '../repositories';
import { normalizeClientData, validateClient } from '../utils/client-validation';
import { ValidationError } from '../utils/errors';
import { Logger } from '../utils/logger';
import { MAX_PAGE_LIMIT } from '../utils/pagination';

function toClientDTO(client: Client): CreateClientDTO {
  return {
    name: client.name,
    email: client.email,
    phone: client.phone,
    company_code: client.company_code,
    address: client.address,
  };
}

export class ClientService {
  constructor(private readonly repository: ClientRepository) {}

  async createClient(data: CreateClientDTO): Promise<Client> {
    const normalized = normalizeClientData(data);
    const validation = validateClient(normalized);

    if (!validation.valid) {
      throw new ValidationError(validation.errors);
    }

    const client = await this.repository.create(normalized);
    Logger.debug('Client created', { clientId: client.id });
    return client;
  }

  async getClientById(id: number): Promise<Client | null> {
    return this.repository.findById(id);
  }

  async listClients(params: ClientSearchParams): Promise<ClientListResponse> {
    return this.repository.findAll(params);
  }

  async updateClient(id: number, data: UpdateClientDTO): Promise<Client | null> {
    const existing = await this.repository.findById(id);
    if (!existing) {
      return null;
    }

    const normalized = normalizeClientData({ ...toClientDTO(existing), ...data });
    const validation = validateClient(normalized);
    if (!validation.valid) {
      throw new ValidationError(validation.errors);
    }

    return this.repository.update(id, normalized);
  }

  async deleteClient(id: number): Promise<boolean> {
    const deleted = await this.repository.delete(id);
    if (deleted) {
      Logger.debug('Client deleted with its invoices', { clientId: id });
    }
    return deleted;
  }

  async deleteClients(ids: number[]): Promise<number> {
    return this.repository.deleteMany(ids);
  }

  async listAllClients(): Promise<Client[]> {
    const clients: Client[] = [];
    let offset = 0;
    for (;;) {
      const page = await this.repository.findAll({ limit: MAX_PAGE_LIMIT, offset });
      clients.push(...page.clients);
      offset += page.clients.length;
      if (page.clients.length === 0 || offset >= page.total) {
        return clients;
      }
    }
  }

  async exportToExcel(): Promise<Buffer> {
    const clients = await this.listAllClients();

    const workbook = new ExcelJS.Workbook();
    const worksheet = workbook.addWorksheet('Clients');

    worksheet.columns = [
      { header: 'ID', key: 'id', width: 8 },
      { header: 'Name', key: 'name', width: 25 },
      { header: 'Email', key: 'email', width: 30 },
      { header: 'Phone', key: 'phone', width: 18 },
      { header: 'Company Code', key: 'companyCode', width: 18 },
      { header: 'Address', key: 'address', width: 40 },
      { header: 'Created At', key: 'createdAt', width: 22 },
    ];

    const headerRow = worksheet.getRow(1);
    headerRow.font = { bold: true };
    headerRow.alignment = { vertical: 'middle', horizontal: 'left', wrapText: true };
    headerRow.height = 25;

    for (const client of clients) {
      const row = worksheet.addRow({
        id: client.id,
        name: client.name,
        email: client.email ?? '',
        phone: client.phone ?? '',
        companyCode: client.company_code ?? '',
        address: client.address ?? '',
        createdAt: client.created_at.toISOString(),
      });
      row.alignment = { wrapText: true, vertical: 'top', horizontal: 'left' };
    }

    Logger.info('Clients exported to Excel', { count: clients.length });

    const buffer = await workbook.xlsx.writeBuffer();
    return Buffer.from(buffer);
  }
}
