import express from 'express';
import type { Express, Request, Response, NextFunction } from 'express';
import cors from 'cors';
import swaggerUi from 'swagger-ui-express';
import type { AppConfig } from './config/env';
import { setupSwagger } from './config/swagger';
import type { DatabaseAdapter } from './database/adapter';
import { requestLogger, errorLogger } from './middleware/logger.middleware';
import type { Repositories } from './repositories';
import { createClientRouter } from './routes/clients';
import { createExpenseRouter } from './routes/expenses';
import { createHealthRouter } from './routes/health';
import { createInvoiceRouter } from './routes/invoices';
import { ClientService } from './services/client.service';
import { ExpenseService } from './services/expense.service';
import { InvoiceItemService } from './services/invoice-item.service';
import { InvoiceService } from './services/invoice.service';
import { Logger } from './utils/logger';

export interface AppDependencies {
  repositories: Repositories;
  config: AppConfig;
  db?: DatabaseAdapter;
}

export function createApp({ repositories, config, db }: AppDependencies): Express {
  const app = express();

  const clientService = new ClientService(repositories.clients);
  const invoiceService = new InvoiceService(repositories.invoices, repositories.invoiceItems, repositories.clients, {
    companyName: config.companyName,
    currency: config.currency,
  });
  const invoiceItemService = new InvoiceItemService(repositories.invoices, repositories.invoiceItems);
  const expenseService = new ExpenseService(repositories.expenses);

  // Request logging middleware (must be before other middleware)
  app.use(requestLogger);

  app.use(cors());
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  // Swagger Documentation
  const swaggerSpec = setupSwagger(config);
  app.get('/api-docs/swagger.json', (req: Request, res: Response) => {
    res.json(swaggerSpec);
  });
  app.use('/api-docs', swaggerUi.serve, swaggerUi.setup(swaggerSpec));

  app.use('/health', createHealthRouter({ storage: config.dbType, db }));
  app.use('/clients', createClientRouter(clientService, invoiceService));
  app.use('/invoices', createInvoiceRouter(invoiceService, invoiceItemService));
  app.use('/expenses', createExpenseRouter(expenseService));

  app.get('/', (req: Request, res: Response) => {
    res.json({
      message: `Welcome to ${config.companyName} API`,
      documentation: '/api-docs',
      health: '/health',
      clients: '/clients',
      invoices: '/invoices',
      expenses: '/expenses',
    });
  });

  app.use((req: Request, res: Response) => {
    res.status(404).json({ error: `Route not found: ${req.method} ${req.path}`, code: 'NOT_FOUND' });
  });

  // Error handling middleware (must be after all routes)
  app.use(errorLogger);

  // Global error handler; body-parser failures arrive here with their own status
  app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
    const status = 'status' in err && typeof err.status === 'number' && err.status < 500 ? err.status : 500;
    if (status === 500) {
      Logger.error('Unhandled application error', err, { method: req.method, url: req.originalUrl });
    }

    res.status(status).json({
      error: status < 500 || config.nodeEnv !== 'production' ? err.message : 'Internal server error',
      code: status < 500 ? 'BAD_REQUEST' : 'INTERNAL_ERROR',
    });
  });

  return app;
}
