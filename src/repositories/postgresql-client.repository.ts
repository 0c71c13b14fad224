import type { DatabaseAdapter } from '../database/adapter';
import { likePattern } from '../database/sql';
import type { Client, ClientListResponse, ClientRecordInput, ClientSearchParams } from '../models/client';
import { CLIENT_SORT_FIELDS } from '../models/client';
import type { ClientRepository } from './client.repository';
import { resolvePagination } from '../utils/pagination';

export class PostgreSQLClientRepository implements ClientRepository {
  constructor(private readonly db: DatabaseAdapter) {}

  async create(client: ClientRecordInput): Promise<Client> {
    const query = `
      INSERT INTO clients (
        name, email, phone, company_code, address, created_at, updated_at
      ) VALUES ($1, $2, $3, $4, $5, NOW(), NOW())
      RETURNING *
    `;
    const result = await this.db.query<Client>(query, [
      client.name,
      client.email,
      client.phone,
      client.company_code,
      client.address,
    ]);
    return result.rows[0];
  }

  async findById(id: number): Promise<Client | null> {
    const result = await this.db.query<Client>('SELECT * FROM clients WHERE id = $1', [id]);
    return result.rows[0] ?? null;
  }

  async findAll(params: ClientSearchParams): Promise<ClientListResponse> {
    const { page, limit, offset } = resolvePagination(params);

    let whereClause = '';
    const queryParams: unknown[] = [];

    if (params.search) {
      whereClause = `WHERE (
        name ILIKE $1 ESCAPE '\\' OR
        email ILIKE $1 ESCAPE '\\' OR
        phone ILIKE $1 ESCAPE '\\' OR
        company_code ILIKE $1 ESCAPE '\\' OR
        address ILIKE $1 ESCAPE '\\'
      )`;
      queryParams.push(likePattern(params.search));
    }

    // Only whitelisted column names reach the ORDER BY
    const sortBy = CLIENT_SORT_FIELDS.find(field => field === params.sortBy) ?? 'id';
    const sortOrder = params.sortOrder === 'desc' ? 'DESC' : 'ASC';

    const countResult = await this.db.query<{ total: string }>(
      `SELECT COUNT(*) AS total FROM clients ${whereClause}`,
      queryParams,
    );
    const total = parseInt(countResult.rows[0]?.total ?? '0', 10);

    const limitParam = queryParams.length + 1;
    const offsetParam = queryParams.length + 2;
    const result = await this.db.query<Client>(
      `
        SELECT * FROM clients
        ${whereClause}
        ORDER BY ${sortBy} ${sortOrder} NULLS LAST, id ASC
        LIMIT $${limitParam} OFFSET $${offsetParam}
      `,
      [...queryParams, limit, offset],
    );

    return {
      clients: result.rows,
      total,
      page,
      limit,
      offset,
    };
  }

  async update(id: number, client: ClientRecordInput): Promise<Client | null> {
    const query = `
      UPDATE clients
      SET name = $1, email = $2, phone = $3, company_code = $4, address = $5, updated_at = NOW()
      WHERE id = $6
      RETURNING *
    `;
    const result = await this.db.query<Client>(query, [
      client.name,
      client.email,
      client.phone,
      client.company_code,
      client.address,
      id,
    ]);
    return result.rows[0] ?? null;
  }

  async delete(id: number): Promise<boolean> {
    const result = await this.db.query('DELETE FROM clients WHERE id = $1', [id]);
    return (result.rowCount ?? 0) > 0;
  }

  async deleteMany(ids: number[]): Promise<number> {
    if (ids.length === 0) return 0;
    const result = await this.db.query('DELETE FROM clients WHERE id = ANY($1::int[])', [ids]);
    return result.rowCount ?? 0;
  }
}
