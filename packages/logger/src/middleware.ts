/**
 * @fileoverview Hono middleware for request logging
 * @module @tasklane/logger/middleware
 */

import { randomUUID } from 'node:crypto';
import { createMiddleware } from 'hono/factory';
import { type Logger, createLogger } from './logger.js';
import type { HttpInfo, LogLevel } from './types.js';

/**
 * Context variables set by the request logger.
 */
export interface RequestLoggerEnv {
  Variables: {
    logger: Logger;
    requestId: string;
  };
}

/**
 * Request logging middleware configuration.
 */
export interface RequestLoggerConfig {
  /** Level for 2xx/3xx responses */
  successLevel?: LogLevel;
  /** Level for 4xx responses; 5xx always log at error */
  errorLevel?: LogLevel;
  /** Paths that are never logged */
  skipPaths?: string[];
  /** Header carrying the correlation ID */
  requestIdHeader?: string;
  /** Base logger the request loggers derive from */
  logger?: Logger;
}

const DEFAULT_REQUEST_LOGGER_CONFIG = {
  successLevel: 'info',
  errorLevel: 'warn',
  skipPaths: ['/'],
  requestIdHeader: 'x-request-id',
} satisfies Omit<Required<RequestLoggerConfig>, 'logger'>;

/**
 * Create a request logger middleware for Hono.
 * Each request gets a child logger bound to its request ID, stored as
 * `c.get('logger')`, and one summary line once the response is ready.
 *
 * @example
 * ```typescript
 * const app = new Hono<RequestLoggerEnv>();
 * app.use('*', createRequestLogger());
 * ```
 */
export function createRequestLogger(config: RequestLoggerConfig = {}) {
  const finalConfig = { ...DEFAULT_REQUEST_LOGGER_CONFIG, ...config };
  const base = config.logger ?? createLogger('http');

  return createMiddleware<RequestLoggerEnv>(async (c, next) => {
    const requestId = c.req.header(finalConfig.requestIdHeader) ?? randomUUID();
    const reqLogger = base.child({ requestId });

    c.set('logger', reqLogger);
    c.set('requestId', requestId);
    c.header(finalConfig.requestIdHeader, requestId);

    const start = performance.now();
    await next();

    const path = c.req.path;
    if (finalConfig.skipPaths.includes(path)) {
      return;
    }

    const statusCode = c.res.status;
    const http: HttpInfo = {
      method: c.req.method,
      path,
      statusCode,
      userAgent: c.req.header('user-agent'),
      durationMs: Math.round(performance.now() - start),
    };

    const level: LogLevel =
      statusCode >= 500 ? 'error' : statusCode >= 400 ? finalConfig.errorLevel : finalConfig.successLevel;

    reqLogger[level](`${http.method} ${http.path} ${statusCode}`, { http });
  });
}
