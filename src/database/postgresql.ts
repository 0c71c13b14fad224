import { Pool, types } from 'pg';
import type { QueryResult, QueryResultRow } from 'pg';
import type { DatabaseAdapter } from './adapter';
import { Logger } from '../utils/logger';

// Keep DATE columns as YYYY-MM-DD strings instead of local-midnight Date objects.
// NUMERIC already arrives as a string.
const DATE_OID = 1082;
types.setTypeParser(DATE_OID, (value: string) => value);

export interface PostgreSQLConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
}

export class PostgreSQLAdapter implements DatabaseAdapter {
  private pool: Pool | null = null;

  constructor(private readonly config: PostgreSQLConfig) {}

  async connect(): Promise<void> {
    const pool = new Pool({
      host: this.config.host,
      port: this.config.port,
      database: this.config.database,
      user: this.config.user,
      password: this.config.password,
      max: 20,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 2000,
    });

    try {
      const client = await pool.connect();
      try {
        await client.query('SELECT NOW()');
      } finally {
        client.release();
      }
      this.pool = pool;
      Logger.info('PostgreSQL connected successfully', {
        host: this.config.host,
        database: this.config.database,
      });
    } catch (error) {
      Logger.error('PostgreSQL connection error', error, {
        host: this.config.host,
        database: this.config.database,
      });
      await pool.end();
      throw error;
    }
  }

  async disconnect(): Promise<void> {
    if (this.pool) {
      await this.pool.end();
      this.pool = null;
      Logger.info('PostgreSQL disconnected');
    }
  }

  async query<T extends QueryResultRow = QueryResultRow>(sql: string, params?: unknown[]): Promise<QueryResult<T>> {
    if (!this.pool) {
      throw new Error('Database not connected');
    }
    return this.pool.query<T>(sql, params);
  }

  isConnected(): boolean {
    return this.pool !== null;
  }
}
