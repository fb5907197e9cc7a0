/**
 * @fileoverview Structured logging for Tasklane services
 * @module @tasklane/logger
 *
 * pino-backed logging with component loggers, child bindings, redaction of
 * credentials and a Hono request logger.
 *
 * @example
 * ```typescript
 * import { configureLogger, createLogger, createRequestLogger } from '@tasklane/logger';
 *
 * configureLogger({ level: 'debug', service: 'tasklane-api' });
 *
 * const logger = createLogger('clickup-client');
 * logger.debug('Dispatching request', { method: 'GET', endpoint: 'team' });
 *
 * app.use('*', createRequestLogger());
 * ```
 */

export { Logger, logger, createLogger, configureLogger, getLoggerConfig } from './logger.js';

export { createRequestLogger, type RequestLoggerConfig, type RequestLoggerEnv } from './middleware.js';

export {
  type LogLevel,
  type LoggerConfig,
  type LogDestination,
  type ErrorInfo,
  type HttpInfo,
  type ILogger,
  LOG_LEVELS,
  LoggerConfigSchema,
} from './types.js';
