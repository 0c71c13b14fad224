import type { Client, ClientListResponse, ClientRecordInput, ClientSearchParams } from '../models/client';

export interface ClientRepository {
  create(client: ClientRecordInput): Promise<Client>;
  findById(id: number): Promise<Client | null>;
  findAll(params: ClientSearchParams): Promise<ClientListResponse>;
  update(id: number, client: ClientRecordInput): Promise<Client | null>;
  /** Deleting a client also deletes its invoices and their items. */
  delete(id: number): Promise<boolean>;
  deleteMany(ids: number[]): Promise<number>;
}
