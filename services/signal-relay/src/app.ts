// services/signal-relay/src/app.ts
import express from 'express';
import helmet from 'helmet';
import cors from 'cors';
import fs from 'node:fs';
import path from 'node:path';
import YAML from 'yaml';
import swaggerUi from 'swagger-ui-express';
import { pinoHttp } from 'pino-http';
import { requestId } from './middleware/request-id.js';
import { errorHandler } from './middleware/error.js';
import { apiRouter, type ApiDeps } from './routes/index.js';
import type { AppConfig } from './config.js';
import { logger } from './logger.js';

export type AppDeps = ApiDeps & { config: Pick<AppConfig, 'env' | 'cors'> };

export function buildApp(deps: AppDeps) {
  const app = express();
  const { config } = deps;

  app.disable('x-powered-by');
  app.use(helmet());
  const configuredOrigins =
    config.cors.origins === '*'
      ? '*'
      : config.cors.origins && config.cors.origins.length
        ? [...config.cors.origins]
        : true;
  app.use(cors({ origin: configuredOrigins, credentials: false }));
  app.use(requestId);

  if (config.env === 'development') {
    // dev-friendly HTTP logs
    app.use(pinoHttp({ logger, autoLogging: true }));

    // ---- Swagger UI in development (mounted at /docs) ----
    const candidates = [
      path.resolve('src/openapi/openapi.yaml'),
      path.resolve('services/signal-relay/src/openapi/openapi.yaml')
    ];
    const found = candidates.find((p) => fs.existsSync(p));
    if (found) {
      try {
        const doc: Record<string, unknown> = YAML.parse(fs.readFileSync(found, 'utf8'));
        app.get('/docs.json', (_req, res) => res.json(doc));
        app.use('/docs', swaggerUi.serve, swaggerUi.setup(doc));
        logger.info({ file: found }, '[swagger] UI mounted at /docs');
      } catch (err) {
        logger.warn({ err }, '[swagger] failed to parse openapi');
      }
    } else {
      logger.warn('[swagger] openapi file not found, skipping UI');
    }
  }

  app.use(apiRouter(deps));

  // Global error handler
  app.use(errorHandler);

  return app;
}
