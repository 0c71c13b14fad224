import swaggerJsdoc from 'swagger-jsdoc';
import type { AppConfig } from './env';

export function setupSwagger(config: AppConfig): object {
  const production = config.nodeEnv === 'production';

  const options: swaggerJsdoc.Options = {
    definition: {
      openapi: '3.0.0',
      info: {
        title: process.env.SWAGGER_TITLE || 'Ledgerly API',
        version: process.env.SWAGGER_VERSION || '1.0.0',
        description: process.env.SWAGGER_DESCRIPTION || 'Clients, invoices and invoice totals',
      },
      servers: [
        {
          url: config.apiUrl,
          description: production ? 'Production API server' : 'Local development server',
        },
      ],
    },
    apis: [production ? './dist/src/routes/*.js' : './src/routes/*.ts'],
  };

  return swaggerJsdoc(options);
}
