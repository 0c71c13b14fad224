import { Router } from 'express';
import type { Request, Response } from 'express';
import type { DatabaseType } from '../config/env';
import type { DatabaseAdapter } from '../database/adapter';

export interface HealthOptions {
  storage: DatabaseType;
  db?: DatabaseAdapter;
}

export function createHealthRouter(options: HealthOptions): Router {
  const healthRouter = Router();

  /**
   * @swagger
   * /health:
   *   get:
   *     summary: Health check endpoint
   *     tags: [Health]
   *     responses:
   *       200:
   *         description: Service is healthy
   *         content:
   *           application/json:
   *             schema:
   *               type: object
   *               properties:
   *                 status:
   *                   type: string
   *                   example: ok
   *                 storage:
   *                   type: string
   *                   example: memory
   *                 database:
   *                   type: string
   *                   example: connected
   *                 timestamp:
   *                   type: string
   *                   format: date-time
   *       503:
   *         description: Database connection lost
   */
  healthRouter.get('/', (req: Request, res: Response) => {
    const connected = options.storage === 'memory' || (options.db?.isConnected() ?? false);

    res.status(connected ? 200 : 503).json({
      status: connected ? 'ok' : 'error',
      storage: options.storage,
      database: connected ? 'connected' : 'disconnected',
      timestamp: new Date().toISOString(),
    });
  });

  return healthRouter;
}
