/**
 * @fileoverview Core Logger class for Tasklane services
 * @module @tasklane/logger/logger
 */

import pino, { type Logger as PinoLogger, type LoggerOptions as PinoOptions } from 'pino';
import {
  type ErrorInfo,
  type ILogger,
  type LogLevel,
  type LoggerConfig,
  LOG_LEVELS,
  LoggerConfigSchema,
} from './types.js';

// ============================================================================
// Root Configuration
// ============================================================================

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function configFromEnv(): LoggerConfig {
  const level = process.env['LOG_LEVEL'];
  return LoggerConfigSchema.parse({
    level: isLogLevel(level) ? level : undefined,
    service: process.env['SERVICE_NAME'] || undefined,
    pretty: process.env['NODE_ENV'] === 'development',
  });
}

let globalConfig: LoggerConfig = configFromEnv();
let root: PinoLogger = buildRoot(globalConfig);
/** Bumped on every reconfiguration so cached children are rebuilt */
let generation = 0;

function buildRoot(config: LoggerConfig): PinoLogger {
  const options: PinoOptions = {
    level: config.level,
    base: { service: config.service },
    redact: config.redact,
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
  };

  if (config.pretty) {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      },
    });
  }

  return config.destination ? pino(options, config.destination) : pino(options);
}

/**
 * Configure the process-wide logger. Existing Logger instances pick up the
 * new settings on their next call.
 * @param config - Partial configuration to merge
 */
export function configureLogger(config: Partial<LoggerConfig>): void {
  const { destination, ...rest } = { ...globalConfig, ...config };
  globalConfig = { ...LoggerConfigSchema.parse(rest), destination };
  root = buildRoot(globalConfig);
  generation += 1;
}

/**
 * Get the current logger configuration.
 */
export function getLoggerConfig(): LoggerConfig {
  return { ...globalConfig };
}

// ============================================================================
// Logger Class
// ============================================================================

function toErrorInfo(error: Error): ErrorInfo {
  const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
  return { name: error.name, message: error.message, stack: error.stack, code };
}

/**
 * Structured logger backed by pino.
 *
 * @example
 * ```typescript
 * const logger = createLogger('clickup-client');
 * logger.info('Space created', { spaceId: '790' });
 *
 * const reqLogger = logger.child({ requestId: 'abc-123' });
 * reqLogger.warn('Upstream rejected request', { status: 404 });
 * ```
 */
export class Logger implements ILogger {
  private readonly bindings: Record<string, unknown>;
  private cached?: { generation: number; instance: PinoLogger };

  /**
   * @param context - Bindings attached to every entry from this logger
   */
  constructor(context: Record<string, unknown> = {}) {
    this.bindings = { ...context };
  }

  private get pino(): PinoLogger {
    if (!this.cached || this.cached.generation !== generation) {
      this.cached = { generation, instance: root.child(this.bindings) };
    }
    return this.cached.instance;
  }

  /**
   * Create a child logger with additional context.
   */
  child(context: Record<string, unknown>): Logger {
    return new Logger({ ...this.bindings, ...context });
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (!data) {
      this.pino[level](message);
      return;
    }

    const { error, ...rest } = data;
    const entry: Record<string, unknown> = rest;
    if (error instanceof Error) {
      entry['error'] = toErrorInfo(error);
    } else if (error !== undefined) {
      entry['error'] = error;
    }

    this.pino[level](entry, message);
  }

  trace(message: string, data?: Record<string, unknown>): void {
    this.log('trace', message, data);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('warn', message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log('error', message, data);
  }

  fatal(message: string, data?: Record<string, unknown>): void {
    this.log('fatal', message, data);
  }

  /**
   * Whether entries at the given level are currently written.
   */
  isLevelEnabled(level: LogLevel): boolean {
    return this.pino.isLevelEnabled(level);
  }

  /**
   * Start a timer that logs the elapsed time when ended.
   *
   * @example
   * ```typescript
   * const timer = logger.time('getTasks');
   * await client.getTasks(listId);
   * timer.end({ listId }); // "getTasks completed" with durationMs
   * ```
   */
  time(operation: string): { end: (data?: Record<string, unknown>) => number } {
    const start = performance.now();
    return {
      end: (data) => {
        const durationMs = Math.round(performance.now() - start);
        this.debug(`${operation} completed`, { ...data, durationMs });
        return durationMs;
      },
    };
  }
}

// ============================================================================
// Default Logger Instance
// ============================================================================

/**
 * Default logger instance.
 */
export const logger = new Logger();

/**
 * Create a logger for a component, or with arbitrary bindings.
 * @param context - Component name or bindings
 */
export function createLogger(context?: string | Record<string, unknown>): Logger {
  if (typeof context === 'string') {
    return new Logger({ component: context });
  }
  return new Logger(context);
}
