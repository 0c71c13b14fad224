import dotenv from 'dotenv';
import type { Server } from 'http';
import { createApp } from './app';
import { loadConfig } from './config/env';
import { initializeDatabase } from './database';
import type { DatabaseAdapter } from './database/adapter';
import { createInMemoryRepositories, createPostgreSQLRepositories } from './repositories';
import { Logger } from './utils/logger';

dotenv.config();

async function startServer(): Promise<void> {
  const config = loadConfig();
  Logger.configure({ level: config.logLevel, includeStack: config.nodeEnv !== 'production' });

  let db: DatabaseAdapter | undefined;
  if (config.dbType === 'postgres') {
    db = await initializeDatabase(config.database);
    Logger.info('Database initialized successfully');
  } else {
    Logger.warn('Using in-memory storage; records are lost on restart');
  }

  const repositories = db ? createPostgreSQLRepositories(db) : createInMemoryRepositories();
  const app = createApp({ repositories, config, db });

  const server: Server = app.listen(config.port, () => {
    Logger.info(`Server is running on http://localhost:${config.port}`);
    Logger.info(`Swagger documentation available at http://localhost:${config.port}/api-docs`);
  });

  const shutdown = (signal: string): void => {
    Logger.info(`${signal} received, shutting down`);
    server.close(() => {
      const done = db ? db.disconnect() : Promise.resolve();
      done
        .then(() => process.exit(0))
        .catch(error => {
          Logger.error('Error during shutdown', error);
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

startServer().catch(error => {
  Logger.error('Failed to start server', error);
  process.exit(1);
});
