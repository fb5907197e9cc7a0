/**
 * @fileoverview Service entry point
 * @module @tasklane/platform/server
 */

import { serve } from '@hono/node-server';
import { ClickUpClient } from '@tasklane/integrations';
import { configureLogger, createLogger } from '@tasklane/logger';
import { createApp } from './app.js';
import { loadConfig } from './config.js';

const config = loadConfig();

configureLogger({
  level: config.LOG_LEVEL,
  service: 'tasklane-api',
  pretty: config.NODE_ENV === 'development',
});

const logger = createLogger('server');

const client = new ClickUpClient({
  apiKey: config.CLICKUP_API_KEY,
  baseUrl: config.CLICKUP_BASE_URL,
  timeout: config.CLICKUP_TIMEOUT_MS,
  debug: config.LOG_LEVEL === 'trace',
});

const app = createApp({ client, includeStack: config.NODE_ENV !== 'production' });

const server = serve({ fetch: app.fetch, port: config.PORT, hostname: config.HOST }, (info) => {
  logger.info('Server listening', { address: info.address, port: info.port });
});

function shutdown(signal: string): void {
  logger.info('Shutting down', { signal });
  server.close((error) => {
    if (error) {
      logger.error('Server close failed', { error });
      process.exitCode = 1;
    }
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
