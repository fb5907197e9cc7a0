/**
 * @fileoverview Hono application factory
 * @module @tasklane/platform/app
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { errorHandler, notFoundHandler } from '@tasklane/errors/middleware';
import { createLogger, createRequestLogger, type RequestLoggerEnv } from '@tasklane/logger';
import { createApiRoutes, type ClickUpReader } from './routes/api.js';

const logger = createLogger('app');

export interface AppOptions {
  /** ClickUp client the `/api` routes forward to */
  client: ClickUpReader;
  /** Include stack traces in error bodies */
  includeStack?: boolean;
}

/**
 * Build the HTTP application: health check, open CORS, request logging and
 * the `/api` routes.
 *
 * @example
 * ```typescript
 * const app = createApp({ client: ClickUpClient.fromEnv() });
 * const res = await app.request('/api/workspaces');
 * ```
 */
export function createApp(options: AppOptions): Hono<RequestLoggerEnv> {
  const app = new Hono<RequestLoggerEnv>();

  app.use('*', cors());
  app.use('*', createRequestLogger());

  app.get('/', (c) => c.json({ status: 'ok' }));
  app.route('/api', createApiRoutes(options.client));

  app.onError(
    errorHandler({
      includeStack: options.includeStack ?? false,
      onError: (error, c) => {
        if (error.statusCode >= 500) {
          logger.error('Request failed', { error, path: c.req.path, method: c.req.method });
        }
      },
    })
  );
  app.notFound(notFoundHandler());

  return app;
}
