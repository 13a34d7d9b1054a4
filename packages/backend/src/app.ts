import express from 'express';
import helmet from 'helmet';
import { requestIdMiddleware } from './middleware/requestId';
import { requestLoggerMiddleware } from './middleware/requestLogger';
import { errorHandler } from './middleware/errorHandler';
import { createAuthMiddleware } from './middleware/auth';
import { successResponse, errorResponse } from './shared/envelope';
import { errorMessage } from './shared/errors';
import { logger } from './shared/logger';
import { healthCheck as openSearchHealthCheck } from './modules/search/opensearch/client';
import { createSearchRoutes } from './modules/search/search.routes';
import type { ReindexService } from './modules/search/search.service';

export interface AppConfig {
  jwtSecret: string;
  reindexService: ReindexService;
}

export function createApp(config: AppConfig): express.Express {
  const app = express();

  app.disable('x-powered-by');

  // Middleware pipeline (order matters)
  app.use(requestIdMiddleware);
  app.use(requestLoggerMiddleware);
  app.use(helmet());
  app.use(express.json({ limit: '1mb' }));

  // Authentication runs before every route; the health check is on its public list
  app.use(createAuthMiddleware(config.jwtSecret));

  app.get('/api/v1/health', async (_req, res) => {
    let opensearch = 'unavailable';
    try {
      const health = await openSearchHealthCheck();
      opensearch = health.status;
    } catch (err) {
      logger.debug('Health: search cluster unreachable', { error: errorMessage(err) });
    }

    res.json(successResponse({
      status: 'ok',
      opensearch,
      indexes: config.reindexService.indexStatuses(),
    }));
  });

  app.use('/api/v1/search', createSearchRoutes(config.reindexService));

  // 404 catch-all for unknown routes
  app.use((_req, res) => {
    res.status(404).json(errorResponse('NOT_FOUND', 'The requested resource was not found'));
  });

  // errorHandler (must be last)
  app.use(errorHandler);

  return app;
}
