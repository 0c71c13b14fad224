export interface Client {
  id: number;
  name: string;
  email: string | null;
  phone: string | null;
  company_code: string | null;
  address: string | null;
  created_at: Date;
  updated_at: Date;
}

export interface CreateClientDTO {
  name: string;
  email?: string | null;
  phone?: string | null;
  company_code?: string | null;
  address?: string | null;
}

export type UpdateClientDTO = Partial<CreateClientDTO>;

/** Normalized client fields as repositories store them. */
export type ClientRecordInput = Required<CreateClientDTO>;

export const CLIENT_SORT_FIELDS = ['id', 'name', 'email', 'company_code', 'created_at', 'updated_at'] as const;
export type ClientSortField = (typeof CLIENT_SORT_FIELDS)[number];

export interface ClientSearchParams {
  search?: string;
  sortBy?: ClientSortField;
  sortOrder?: 'asc' | 'desc';
  page?: number;
  limit?: number;
  offset?: number;
}

export interface ClientListResponse {
  clients: Client[];
  total: number;
  page: number;
  limit: number;
  offset: number;
}
