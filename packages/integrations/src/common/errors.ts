/**
 * @fileoverview Integration error types
 * @module @tasklane/integrations/common/errors
 *
 * Adapters report remote and transport failures through the result envelope.
 * These errors cover what is thrown instead: bad configuration, and callers
 * that opt into exceptions through `unwrapResult`.
 */

import type { IntegrationSource } from './types.js';

/**
 * Error codes for integration failures
 */
export enum IntegrationErrorCode {
  /** Authentication failed (invalid or missing token) */
  AUTH_FAILED = 'AUTH_FAILED',
  /** Authorization failed (insufficient permissions) */
  FORBIDDEN = 'FORBIDDEN',
  /** Resource not found */
  NOT_FOUND = 'NOT_FOUND',
  /** Rate limit exceeded */
  RATE_LIMITED = 'RATE_LIMITED',
  /** Invalid request parameters */
  INVALID_REQUEST = 'INVALID_REQUEST',
  /** Timeout error */
  TIMEOUT = 'TIMEOUT',
  /** Integration service unavailable */
  SERVICE_UNAVAILABLE = 'SERVICE_UNAVAILABLE',
  /** Remote failed or sent an unusable payload */
  PROVIDER_ERROR = 'PROVIDER_ERROR',
  /** Configuration error */
  CONFIG_ERROR = 'CONFIG_ERROR',
  /** Unknown/internal error */
  UNKNOWN = 'UNKNOWN',
}

const HTTP_STATUS_TO_ERROR_CODE: Record<number, IntegrationErrorCode> = {
  400: IntegrationErrorCode.INVALID_REQUEST,
  401: IntegrationErrorCode.AUTH_FAILED,
  403: IntegrationErrorCode.FORBIDDEN,
  404: IntegrationErrorCode.NOT_FOUND,
  429: IntegrationErrorCode.RATE_LIMITED,
  500: IntegrationErrorCode.PROVIDER_ERROR,
  502: IntegrationErrorCode.SERVICE_UNAVAILABLE,
  503: IntegrationErrorCode.SERVICE_UNAVAILABLE,
  504: IntegrationErrorCode.TIMEOUT,
};

/**
 * Maps an HTTP status to an integration error code
 */
export function errorCodeForStatus(statusCode: number): IntegrationErrorCode {
  return HTTP_STATUS_TO_ERROR_CODE[statusCode] ?? IntegrationErrorCode.UNKNOWN;
}

/**
 * Base error class for all integration errors
 */
export class IntegrationError extends Error {
  readonly code: IntegrationErrorCode;
  /** Integration source that produced the error */
  readonly source: IntegrationSource;
  readonly statusCode?: number;
  readonly details?: unknown;

  constructor(
    message: string,
    code: IntegrationErrorCode,
    source: IntegrationSource,
    options?: {
      statusCode?: number;
      details?: unknown;
      cause?: Error;
    }
  ) {
    super(message, { cause: options?.cause });
    this.name = 'IntegrationError';
    this.code = code;
    this.source = source;
    this.statusCode = options?.statusCode;
    this.details = options?.details;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      source: this.source,
      statusCode: this.statusCode,
      details: this.details,
    };
  }
}

/**
 * Thrown by `unwrapResult` for a failed call.
 */
export class RequestFailedError extends IntegrationError {
  /** Remote error code, when the remote sent one */
  readonly remoteCode?: string;

  constructor(source: IntegrationSource, message: string, statusCode: number, remoteCode?: string) {
    super(message, errorCodeForStatus(statusCode), source, {
      statusCode,
      details: remoteCode === undefined ? undefined : { remoteCode },
    });
    this.name = 'RequestFailedError';
    this.remoteCode = remoteCode;
  }
}

/**
 * Thrown when a client is constructed without usable configuration
 */
export class ConfigurationError extends IntegrationError {
  constructor(source: IntegrationSource, message: string) {
    super(message, IntegrationErrorCode.CONFIG_ERROR, source);
    this.name = 'ConfigurationError';
  }
}

export function isIntegrationError(error: unknown): error is IntegrationError {
  return error instanceof IntegrationError;
}
