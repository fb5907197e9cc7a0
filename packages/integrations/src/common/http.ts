/**
 * @fileoverview HTTP client utilities for integrations
 * @module @tasklane/integrations/common/http
 */

import axios, { type AxiosError, type AxiosInstance } from 'axios';
import { createLogger } from '@tasklane/logger';
import type { IntegrationConfig, IntegrationSource } from './types.js';

/**
 * Creates a configured Axios instance for an integration.
 *
 * Bodies come back as raw text and every status resolves, so callers decide
 * how to decode payloads and which statuses count as failures.
 */
export function createHttpClient(
  source: IntegrationSource,
  config: Omit<IntegrationConfig, 'httpClient'> & { baseUrl: string }
): AxiosInstance {
  const client = axios.create({
    baseURL: config.baseUrl,
    timeout: config.timeout ?? 0,
    headers: {
      'Content-Type': 'application/json',
      Accept: 'application/json',
    },
    responseType: 'text',
    transformResponse: [(data: unknown) => data],
    validateStatus: () => true,
  });

  if (config.debug) {
    const log = createLogger({ component: 'http', source });
    client.interceptors.request.use((request) => {
      log.debug(`${request.method?.toUpperCase() ?? 'GET'} ${request.url ?? ''}`);
      return request;
    });
  }

  return client;
}

/**
 * Outcome of decoding a response body
 */
export type DecodedBody = { ok: true; value: unknown } | { ok: false };

/**
 * Decodes a raw response body. An empty body decodes to `null`; text that is
 * not JSON is reported as undecodable.
 */
export function decodeBody(body: unknown): DecodedBody {
  if (body === undefined || body === null) {
    return { ok: true, value: null };
  }
  if (typeof body !== 'string') {
    return { ok: true, value: body };
  }
  if (body.trim() === '') {
    return { ok: true, value: null };
  }
  try {
    return { ok: true, value: JSON.parse(body) };
  } catch {
    return { ok: false };
  }
}

/**
 * Error details carried in a remote error body
 */
export interface RemoteError {
  message: string;
  code?: string;
}

/**
 * Extracts the remote error from a non-2xx body.
 *
 * Reads the `err` message and `ECODE` code ClickUp sends; falls back to a
 * generic message naming the status.
 */
export function extractRemoteError(body: unknown, statusCode: number): RemoteError {
  const fallback = `Request failed with status code ${statusCode}`;
  const decoded = decodeBody(body);
  if (!decoded.ok || !isRecord(decoded.value)) {
    return { message: fallback };
  }

  const { err, ECODE } = decoded.value;
  const message = typeof err === 'string' && err.trim() !== '' ? err : fallback;
  return typeof ECODE === 'string' ? { message, code: ECODE } : { message };
}

/**
 * Describes a request that produced no HTTP response.
 */
export function describeTransportError(error: AxiosError): string {
  return error.message || error.code || 'Network Error';
}

/**
 * Encodes a remote identifier for use as a path segment
 */
export function pathSegment(id: string): string {
  return encodeURIComponent(id);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
