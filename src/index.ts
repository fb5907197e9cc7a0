/**
 * @fileoverview Main entry point for @tasklane/platform
 * @module @tasklane/platform
 *
 * HTTP service over the ClickUp client.
 *
 * @example
 * ```typescript
 * import { createApp, loadConfig } from '@tasklane/platform';
 * import { ClickUpClient } from '@tasklane/integrations';
 *
 * const config = loadConfig();
 * const app = createApp({ client: new ClickUpClient({ apiKey: config.CLICKUP_API_KEY }) });
 * ```
 */

export { createApp, type AppOptions } from './app.js';
export { createApiRoutes, type ClickUpReader } from './routes/api.js';
export { loadConfig, EnvSchema, type ServiceConfig } from './config.js';
