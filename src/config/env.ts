import type { PostgreSQLConfig } from '../database/postgresql';

export type DatabaseType = 'memory' | 'postgres';

export interface AppConfig {
  port: number;
  nodeEnv: string;
  dbType: DatabaseType;
  database: PostgreSQLConfig;
  logLevel: string;
  apiUrl: string;
  currency: string;
  companyName: string;
}

function parseInteger(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }
  const parsed = parseInt(value.trim(), 10);
  return Number.isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Storage selection: an explicit DB_TYPE wins, otherwise production talks to
 * PostgreSQL and every other environment keeps records in memory.
 */
function resolveDatabaseType(dbType: string | undefined, nodeEnv: string): DatabaseType {
  const normalized = (dbType || '').trim().toLowerCase();
  if (normalized === 'postgres' || normalized === 'postgresql') {
    return 'postgres';
  }
  if (normalized === 'memory') {
    return 'memory';
  }
  if (normalized !== '') {
    throw new Error(`Unsupported DB_TYPE "${dbType}". Expected "memory" or "postgres".`);
  }
  return nodeEnv === 'production' ? 'postgres' : 'memory';
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const nodeEnv = source.NODE_ENV || 'development';
  const port = parseInteger(source.PORT, 3000);

  return {
    port,
    nodeEnv,
    dbType: resolveDatabaseType(source.DB_TYPE, nodeEnv),
    database: {
      host: source.DB_HOST || 'localhost',
      port: parseInteger(source.DB_PORT, 5432),
      database: source.DB_NAME || 'ledgerly',
      user: source.DB_USER || 'postgres',
      password: source.DB_PASSWORD || 'postgres',
    },
    logLevel: source.LOG_LEVEL || (nodeEnv === 'development' ? 'DEBUG' : 'INFO'),
    apiUrl: source.API_URL || `http://localhost:${port}`,
    currency: (source.CURRENCY || 'EUR').toUpperCase(),
    companyName: source.COMPANY_NAME || 'Ledgerly',
  };
}
