import type { DatabaseAdapter } from './adapter';
import { PostgreSQLAdapter } from './postgresql';
import type { PostgreSQLConfig } from './postgresql';
import { Logger } from '../utils/logger';

const SCHEMA: Array<{ name: string; sql: string }> = [
  {
    name: 'clients',
    sql: `
      CREATE TABLE IF NOT EXISTS clients (
        id SERIAL PRIMARY KEY,
        name VARCHAR(100) NOT NULL,
        email VARCHAR(120),
        phone VARCHAR(20),
        company_code VARCHAR(20),
        address TEXT,
        created_at TIMESTAMP NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMP NOT NULL DEFAULT NOW()
      );

      CREATE INDEX IF NOT EXISTS idx_clients_name ON clients(name);
      CREATE INDEX IF NOT EXISTS idx_clients_email ON clients(email);
    `,
  },
  {
    name: 'invoices',
    sql: `
      CREATE TABLE IF NOT EXISTS invoices (
        id SERIAL PRIMARY KEY,
        invoice_number VARCHAR(50) NOT NULL UNIQUE,
        client_id INTEGER NOT NULL REFERENCES clients(id) ON DELETE CASCADE,
        invoice_date DATE NOT NULL DEFAULT CURRENT_DATE,
        due_date DATE,
        payment_date DATE,
        status VARCHAR(20) NOT NULL DEFAULT 'pending' CHECK (status IN ('pending', 'paid', 'overdue', 'cancelled')),
        notes TEXT,
        created_at TIMESTAMP NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMP NOT NULL DEFAULT NOW()
      );

      CREATE INDEX IF NOT EXISTS idx_invoices_client_id ON invoices(client_id);
      CREATE INDEX IF NOT EXISTS idx_invoices_status ON invoices(status);
      CREATE INDEX IF NOT EXISTS idx_invoices_invoice_date ON invoices(invoice_date);
    `,
  },
  {
    name: 'invoice_items',
    sql: `
      CREATE TABLE IF NOT EXISTS invoice_items (
        id SERIAL PRIMARY KEY,
        invoice_id INTEGER NOT NULL REFERENCES invoices(id) ON DELETE CASCADE,
        description VARCHAR(200) NOT NULL,
        quantity NUMERIC NOT NULL DEFAULT 1 CHECK (quantity >= 0),
        unit_price NUMERIC NOT NULL CHECK (unit_price >= 0),
        tax_rate NUMERIC NOT NULL DEFAULT 0 CHECK (tax_rate >= 0),
        created_at TIMESTAMP NOT NULL DEFAULT NOW()
      );

      CREATE INDEX IF NOT EXISTS idx_invoice_items_invoice_id ON invoice_items(invoice_id);
    `,
  },
  {
    name: 'expenses',
    sql: `
      CREATE TABLE IF NOT EXISTS expenses (
        id SERIAL PRIMARY KEY,
        date DATE NOT NULL DEFAULT CURRENT_DATE,
        category VARCHAR(20) NOT NULL CHECK (category IN ('food', 'transport', 'rent', 'utilities', 'office', 'services', 'other')),
        vendor VARCHAR(100) NOT NULL,
        amount NUMERIC NOT NULL CHECK (amount >= 0),
        vat_amount NUMERIC NOT NULL DEFAULT 0 CHECK (vat_amount >= 0 AND vat_amount <= amount),
        description TEXT,
        created_at TIMESTAMP NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMP NOT NULL DEFAULT NOW()
      );

      CREATE INDEX IF NOT EXISTS idx_expenses_date ON expenses(date);
      CREATE INDEX IF NOT EXISTS idx_expenses_category ON expenses(category);
    `,
  },
];

export async function createTables(db: DatabaseAdapter): Promise<void> {
  for (const table of SCHEMA) {
    try {
      await db.query(table.sql);
      Logger.debug(`Table ${table.name} ready`);
    } catch (error) {
      Logger.error(`Error creating ${table.name} table`, error);
      throw error;
    }
  }
}

/**
 * Connects to PostgreSQL and makes sure the schema exists.
 * The caller owns the returned adapter and disconnects it on shutdown.
 */
export async function initializeDatabase(config: PostgreSQLConfig): Promise<DatabaseAdapter> {
  Logger.info('Initializing PostgreSQL database...', { host: config.host, database: config.database });
  const adapter = new PostgreSQLAdapter(config);
  await adapter.connect();
  await createTables(adapter);
  return adapter;
}
