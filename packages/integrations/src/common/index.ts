/**
 * @fileoverview Common utilities for integrations
 * @module @tasklane/integrations/common
 */

export * from './types.js';
export * from './errors.js';
export * from './result.js';
export * from './http.js';
