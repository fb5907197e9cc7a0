/**
 * @fileoverview Shared error classes for Tasklane services
 * @module @tasklane/errors
 *
 * One error hierarchy for the API service and the integration packages, with
 * stable error codes, HTTP status mappings and JSON serialization.
 *
 * @example
 * ```typescript
 * import { ValidationError, fromStatusCode, isTasklaneError } from '@tasklane/errors';
 *
 * throw new ValidationError('Invalid space', { name: ['Required'] });
 *
 * // Turn an upstream status into a typed error
 * throw fromStatusCode(404, 'Space not found', { upstream: 'clickup' });
 * ```
 */

// ============================================================================
// Error Codes
// ============================================================================

/**
 * Error codes used across Tasklane packages.
 */
export const ErrorCodes = {
  // Client errors (4xx)
  BAD_REQUEST: 'BAD_REQUEST',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  AUTHENTICATION_REQUIRED: 'AUTHENTICATION_REQUIRED',
  PERMISSION_DENIED: 'PERMISSION_DENIED',
  NOT_FOUND: 'NOT_FOUND',
  CONFLICT: 'CONFLICT',
  RATE_LIMIT_EXCEEDED: 'RATE_LIMIT_EXCEEDED',

  // Server errors (5xx)
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  UPSTREAM_ERROR: 'UPSTREAM_ERROR',
  SERVICE_UNAVAILABLE: 'SERVICE_UNAVAILABLE',
  GATEWAY_TIMEOUT: 'GATEWAY_TIMEOUT',
} as const;

/**
 * Error code type
 */
export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

// ============================================================================
// Base Error Class
// ============================================================================

/**
 * Base class for every Tasklane error.
 *
 * Carries a machine-readable code, the HTTP status it maps to and optional
 * structured details.
 */
export class TasklaneError extends Error {
  /** Error code for programmatic handling */
  readonly code: string;

  /** HTTP status code */
  readonly statusCode: number;

  /** Additional error details */
  readonly details?: Record<string, unknown>;

  /** When the error was created */
  readonly timestamp: Date;

  /**
   * @param message - Human-readable error message
   * @param code - Machine-readable error code
   * @param statusCode - HTTP status code (default: 500)
   * @param details - Additional error details
   */
  constructor(
    message: string,
    code: string,
    statusCode: number = 500,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'TasklaneError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
    this.timestamp = new Date();

    Object.setPrototypeOf(this, new.target.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Convert to the JSON body used in API error responses.
   */
  toJSON(): { error: Record<string, unknown> } {
    return {
      error: {
        code: this.code,
        message: this.message,
        details: this.details,
        timestamp: this.timestamp.toISOString(),
      },
    };
  }
}

// ============================================================================
// Client Errors (4xx)
// ============================================================================

/**
 * Bad request error (HTTP 400).
 */
export class BadRequestError extends TasklaneError {
  constructor(message: string = 'Bad request', details?: Record<string, unknown>) {
    super(message, ErrorCodes.BAD_REQUEST, 400, details);
    this.name = 'BadRequestError';
  }
}

/**
 * Validation error (HTTP 400).
 * Raised before any outbound call when input fails its schema.
 */
export class ValidationError extends TasklaneError {
  /** Messages keyed by field path */
  readonly fieldErrors: Record<string, string[]>;

  constructor(message: string = 'Validation failed', fieldErrors: Record<string, string[]> = {}) {
    super(message, ErrorCodes.VALIDATION_ERROR, 400, { fieldErrors });
    this.name = 'ValidationError';
    this.fieldErrors = fieldErrors;
  }
}

/**
 * Authentication error (HTTP 401).
 */
export class AuthenticationError extends TasklaneError {
  constructor(message: string = 'Authentication required', details?: Record<string, unknown>) {
    super(message, ErrorCodes.AUTHENTICATION_REQUIRED, 401, details);
    this.name = 'AuthenticationError';
  }
}

/**
 * Authorization error (HTTP 403).
 */
export class AuthorizationError extends TasklaneError {
  constructor(message: string = 'Permission denied', details?: Record<string, unknown>) {
    super(message, ErrorCodes.PERMISSION_DENIED, 403, details);
    this.name = 'AuthorizationError';
  }
}

/**
 * Not found error (HTTP 404).
 */
export class NotFoundError extends TasklaneError {
  readonly resource: string;

  constructor(resource: string = 'Resource', details?: Record<string, unknown>) {
    super(`${resource} not found`, ErrorCodes.NOT_FOUND, 404, { resource, ...details });
    this.name = 'NotFoundError';
    this.resource = resource;
  }
}

/**
 * Conflict error (HTTP 409).
 */
export class ConflictError extends TasklaneError {
  constructor(message: string = 'Resource conflict', details?: Record<string, unknown>) {
    super(message, ErrorCodes.CONFLICT, 409, details);
    this.name = 'ConflictError';
  }
}

/**
 * Rate limit error (HTTP 429).
 */
export class RateLimitError extends TasklaneError {
  constructor(message: string = 'Too many requests', details?: Record<string, unknown>) {
    super(message, ErrorCodes.RATE_LIMIT_EXCEEDED, 429, details);
    this.name = 'RateLimitError';
  }
}

// ============================================================================
// Server Errors (5xx)
// ============================================================================

/**
 * Internal server error (HTTP 500).
 */
export class InternalError extends TasklaneError {
  constructor(message: string = 'Internal server error', details?: Record<string, unknown>) {
    super(message, ErrorCodes.INTERNAL_ERROR, 500, details);
    this.name = 'InternalError';
  }
}

/**
 * Upstream error.
 * An external API rejected the call or could not be reached. The status code
 * is the upstream status when it is an error status, otherwise 502.
 */
export class UpstreamError extends TasklaneError {
  readonly upstream: string;

  constructor(
    upstream: string,
    message?: string,
    statusCode: number = 502,
    details?: Record<string, unknown>,
  ) {
    super(message ?? `${upstream} request failed`, ErrorCodes.UPSTREAM_ERROR, statusCode, {
      upstream,
      ...details,
    });
    this.name = 'UpstreamError';
    this.upstream = upstream;
  }
}

/**
 * Service unavailable error (HTTP 503).
 */
export class ServiceUnavailableError extends TasklaneError {
  constructor(message: string = 'Service temporarily unavailable', details?: Record<string, unknown>) {
    super(message, ErrorCodes.SERVICE_UNAVAILABLE, 503, details);
    this.name = 'ServiceUnavailableError';
  }
}

/**
 * Gateway timeout error (HTTP 504).
 */
export class GatewayTimeoutError extends TasklaneError {
  constructor(message: string = 'Upstream timed out', details?: Record<string, unknown>) {
    super(message, ErrorCodes.GATEWAY_TIMEOUT, 504, details);
    this.name = 'GatewayTimeoutError';
  }
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Type guard for TasklaneError instances.
 */
export function isTasklaneError(error: unknown): error is TasklaneError {
  return error instanceof TasklaneError;
}

/**
 * Wrap an unknown thrown value into a TasklaneError.
 *
 * @param error - The thrown value
 * @returns The same error if already a TasklaneError, otherwise an InternalError
 */
export function wrapError(error: unknown): TasklaneError {
  if (isTasklaneError(error)) {
    return error;
  }

  if (error instanceof Error) {
    const wrapped = new InternalError(error.message, { originalError: error.name });
    wrapped.stack = error.stack;
    return wrapped;
  }

  if (typeof error === 'string') {
    return new InternalError(error);
  }

  return new InternalError('An unknown error occurred', {
    originalValue: String(error),
  });
}

/**
 * Create a typed error from an HTTP status code.
 * Used to surface upstream failures through the service's own error shape.
 *
 * @param statusCode - HTTP status code
 * @param message - Error message
 * @param details - Additional details
 */
export function fromStatusCode(
  statusCode: number,
  message?: string,
  details?: Record<string, unknown>,
): TasklaneError {
  switch (statusCode) {
    case 400:
      return new BadRequestError(message, details);
    case 401:
      return new AuthenticationError(message, details);
    case 403:
      return new AuthorizationError(message, details);
    case 404: {
      const error = new NotFoundError('Resource', details);
      return message ? new TasklaneError(message, error.code, 404, error.details) : error;
    }
    case 409:
      return new ConflictError(message, details);
    case 429:
      return new RateLimitError(message, details);
    case 503:
      return new ServiceUnavailableError(message, details);
    case 504:
      return new GatewayTimeoutError(message, details);
    default:
      if (statusCode >= 400 && statusCode < 500) {
        return new TasklaneError(message ?? 'Request failed', ErrorCodes.BAD_REQUEST, statusCode, details);
      }
      return new UpstreamError(
        typeof details?.['upstream'] === 'string' ? details['upstream'] : 'upstream',
        message,
        statusCode >= 500 ? statusCode : 502,
        details,
      );
  }
}
