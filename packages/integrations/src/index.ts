/**
 * @fileoverview Integrations package for Tasklane
 * Provides the ClickUp client, its resource schemas, and the result envelope
 * every integration call resolves to.
 * @module @tasklane/integrations
 */

// Common utilities and types
export * from './common/index.js';

// ClickUp integration
export * as clickup from './clickup/index.js';
export { ClickUpClient, CLICKUP_API_BASE } from './clickup/client.js';
export type { ClickUpClientConfig } from './clickup/client.js';
export * from './clickup/types.js';
