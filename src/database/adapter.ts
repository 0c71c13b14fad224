import type { QueryResult, QueryResultRow } from 'pg';

/**
 * Database adapter interface
 * The PostgreSQL repositories talk to storage only through this seam.
 */
export interface DatabaseAdapter {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  query<T extends QueryResultRow = QueryResultRow>(sql: string, params?: unknown[]): Promise<QueryResult<T>>;
  isConnected(): boolean;
}
