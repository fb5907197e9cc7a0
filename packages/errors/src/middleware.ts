/**
 * @fileoverview Hono error handling for Tasklane services
 * @module @tasklane/errors/middleware
 *
 * @example
 * ```typescript
 * import { Hono } from 'hono';
 * import { errorHandler, notFoundHandler } from '@tasklane/errors/middleware';
 *
 * const app = new Hono();
 * app.onError(errorHandler());
 * app.notFound(notFoundHandler());
 * ```
 */

import type { Context, ErrorHandler, NotFoundHandler } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { NotFoundError, TasklaneError, isTasklaneError, wrapError } from './index.js';

/**
 * Error handler configuration
 */
export interface ErrorHandlerConfig {
  /** Include stack traces in responses. Keep false in production. */
  includeStack?: boolean;

  /** Called for every error before the response is written */
  onError?: (error: TasklaneError, ctx: Context) => void | Promise<void>;
}

/**
 * Create a Hono error handler rendering TasklaneError bodies.
 *
 * @example
 * ```typescript
 * app.onError(errorHandler({
 *   includeStack: config.NODE_ENV !== 'production',
 *   onError: (error) => logger.error('Request failed', { error }),
 * }));
 * ```
 */
export function errorHandler(config: ErrorHandlerConfig = {}): ErrorHandler {
  const { includeStack = false, onError } = config;

  return async (error: Error, ctx: Context) => {
    const tasklaneError = isTasklaneError(error) ? error : wrapError(error);

    if (onError) {
      await onError(tasklaneError, ctx);
    }

    const body = tasklaneError.toJSON();

    if (includeStack && tasklaneError.stack) {
      body.error['stack'] = tasklaneError.stack;
    }

    const requestId = ctx.req.header('x-request-id');
    if (requestId) {
      body.error['requestId'] = requestId;
    }

    return ctx.json(body, tasklaneError.statusCode as ContentfulStatusCode);
  };
}

/**
 * Create a 404 handler for unmatched routes.
 */
export function notFoundHandler(): NotFoundHandler {
  return (ctx: Context) => {
    const error = new NotFoundError('Endpoint', {
      path: ctx.req.path,
      method: ctx.req.method,
    });

    return ctx.json(error.toJSON(), 404);
  };
}
