import type { Client, ClientListResponse, ClientRecordInput, ClientSearchParams } from '../models/client';
import type { ClientRepository } from './client.repository';
import type { InMemoryStore } from '../database/in-memory';
import { resolvePagination } from '../utils/pagination';
import { compareSortable } from '../utils/sort';

export class InMemoryClientRepository implements ClientRepository {
  constructor(private readonly store: InMemoryStore) {}

  async create(client: ClientRecordInput): Promise<Client> {
    const now = new Date();
    const newClient: Client = {
      id: this.store.nextId('clients'),
      ...client,
      created_at: now,
      updated_at: now,
    };
    this.store.clients.push(newClient);
    return { ...newClient };
  }

  async findById(id: number): Promise<Client | null> {
    const client = this.store.clients.find(c => c.id === id);
    return client ? { ...client } : null;
  }

  async findAll(params: ClientSearchParams): Promise<ClientListResponse> {
    let filtered = [...this.store.clients];

    if (params.search) {
      const searchLower = params.search.toLowerCase();
      filtered = filtered.filter(client => {
        return [client.name, client.email, client.phone, client.company_code, client.address]
          .some(value => value !== null && value.toLowerCase().includes(searchLower));
      });
    }

    const sortBy = params.sortBy ?? 'id';
    const direction = params.sortOrder === 'desc' ? -1 : 1;
    filtered.sort((a, b) => {
      const aVal = a[sortBy];
      const bVal = b[sortBy];
      // Nulls stay last in both directions
      if (aVal === null || bVal === null) return compareSortable(aVal, bVal);
      return compareSortable(aVal, bVal) * direction;
    });

    const { page, limit, offset } = resolvePagination(params);

    return {
      clients: filtered.slice(offset, offset + limit).map(client => ({ ...client })),
      total: filtered.length,
      page,
      limit,
      offset,
    };
  }

  async update(id: number, client: ClientRecordInput): Promise<Client | null> {
    const index = this.store.clients.findIndex(c => c.id === id);
    if (index === -1) return null;

    const updated: Client = {
      ...this.store.clients[index],
      ...client,
      updated_at: new Date(),
    };
    this.store.clients[index] = updated;
    return { ...updated };
  }

  async delete(id: number): Promise<boolean> {
    return this.store.removeClients(new Set([id])) > 0;
  }

  async deleteMany(ids: number[]): Promise<number> {
    return this.store.removeClients(new Set(ids));
  }
}
