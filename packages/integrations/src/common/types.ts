/**
 * @fileoverview Common types shared by integration clients
 * @module @tasklane/integrations/common
 */

import type { AxiosInstance } from 'axios';

/**
 * Integration source identifiers
 */
export type IntegrationSource = 'clickup';

/**
 * HTTP methods the adapters issue
 */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

/**
 * Query parameter values as sent on the wire
 */
export type QueryParams = Record<string, string | number>;

/**
 * Base configuration for integration clients
 */
export interface IntegrationConfig {
  /** Base URL for the API */
  baseUrl?: string;
  /**
   * Request timeout in milliseconds. 0 (the default) leaves the transport's
   * own behavior in place.
   */
  timeout?: number;
  /** Log every dispatched request at debug level */
  debug?: boolean;
  /**
   * Preconfigured HTTP client. When given, it replaces the client built from
   * `baseUrl` and `timeout`; credentials are still sent per request.
   */
  httpClient?: AxiosInstance;
}
