/**
 * @fileoverview Type definitions for the Tasklane logger
 * @module @tasklane/logger/types
 */

import { z } from 'zod';

/**
 * Log levels in order of severity.
 */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const satisfies readonly LogLevel[];

/**
 * Error information attached to log entries.
 */
export interface ErrorInfo {
  name: string;
  message: string;
  stack?: string;
  code?: string;
}

/**
 * HTTP request information attached to request log entries.
 */
export interface HttpInfo {
  /** HTTP method */
  method: string;
  /** Request path */
  path: string;
  /** Response status code */
  statusCode?: number;
  /** User agent */
  userAgent?: string;
  /** Request duration in ms */
  durationMs?: number;
}

/**
 * Something pino can write serialized lines to.
 */
export interface LogDestination {
  write(line: string): void;
}

/**
 * Logger configuration schema.
 */
export const LoggerConfigSchema = z.object({
  level: z.enum(LOG_LEVELS).default('info'),
  service: z.string().min(1).default('tasklane'),
  pretty: z.boolean().default(false),
  redact: z
    .array(z.string())
    .default(['authorization', 'apiKey', 'token', 'headers.authorization', '*.Authorization']),
});

/**
 * Logger configuration options.
 */
export type LoggerConfig = z.infer<typeof LoggerConfigSchema> & {
  /** Custom destination (tests, custom transports). Ignored when `pretty` is set. */
  destination?: LogDestination;
};

/**
 * Logger interface for dependency injection.
 */
export interface ILogger {
  trace(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  fatal(message: string, data?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): ILogger;
}
