import express from 'express';
import type { Application } from 'express';
import { pinoHttp } from 'pino-http';
import type { IncomingMessage, ServerResponse } from 'node:http';
import type { Config } from '../config.js';
import type { SalesPipeline } from '../services/SalesPipeline.js';
import type { PlanilhaStore } from '../packages/storage/PlanilhaStore.js';
import { logger } from '../utils/logger.js';
import {
  createCollectionRateLimiter,
  createPlanilhaRateLimiter,
  errorHandler,
  notFoundHandler,
  requestIdMiddleware,
} from './middleware.js';
import { createPlanilhaRouter } from './planilhas.routes.js';
import { createCollectionRouter } from './collection.routes.js';

export interface AppDependencies {
  pipeline: SalesPipeline;
  store: PlanilhaStore;
}

/**
 * Create and configure the Express application
 */
export function createApp(deps: AppDependencies): Application {
  const expressApp = express();

  // Trust proxy for X-Forwarded-For headers (rate limiting behind a proxy)
  expressApp.set('trust proxy', 1);

  // Request ID middleware
  expressApp.use(requestIdMiddleware);

  // Request logging via pino-http
  expressApp.use(
    pinoHttp({
      logger,
      // Don't log health checks to reduce noise
      autoLogging: {
        ignore: (req: IncomingMessage) => req.url === '/health',
      },
      serializers: {
        req: (req: IncomingMessage) => ({
          method: req.method,
          url: req.url,
        }),
        res: (res: ServerResponse) => ({
          statusCode: res.statusCode,
        }),
      },
    })
  );

  // JSON body parsing
  expressApp.use(express.json({ limit: '1mb' }));

  expressApp.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  expressApp.use('/planilhas', createPlanilhaRateLimiter(), createPlanilhaRouter(deps.store));
  expressApp.use('/coletas', createCollectionRateLimiter(), createCollectionRouter(deps.pipeline));

  // 404 handler
  expressApp.use(notFoundHandler);

  // Global error handler
  expressApp.use(errorHandler);

  return expressApp;
}

export interface RunningServer {
  close(): Promise<void>;
}

/**
 * Start the Express server
 */
export async function startServer(config: Config, deps: AppDependencies): Promise<RunningServer> {
  const app = createApp(deps);
  const { port, host } = config.api;

  const server = await new Promise<ReturnType<Application['listen']>>((resolve, reject) => {
    const listening = app.listen(port, host, () => {
      logger.info({ port, host }, 'API server started');
      resolve(listening);
    });

    listening.on('error', (error: NodeJS.ErrnoException) => {
      if (error.code === 'EADDRINUSE') {
        logger.fatal({ port }, 'Port already in use');
      } else {
        logger.fatal({ error }, 'Failed to start server');
      }
      reject(error);
    });
  });

  return {
    close: () =>
      new Promise<void>((resolve, reject) => {
        logger.info('Stopping API server...');
        server.close((error) => {
          if (error) {
            reject(error);
            return;
          }
          logger.info('API server stopped');
          resolve();
        });
      }),
  };
}
