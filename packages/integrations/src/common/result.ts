/**
 * @fileoverview Tagged result envelope returned by every adapter call
 * @module @tasklane/integrations/common/result
 *
 * A call either succeeded with data or failed with a message; both carry the
 * HTTP status. The `ok` tag makes "data xor error" a type-level fact.
 *
 * @example
 * ```typescript
 * const result = await client.getSpace('790');
 * if (!result.ok) {
 *   logger.warn('Space lookup failed', { status: result.status, error: result.error });
 *   return;
 * }
 * if (result.data === null) {
 *   // 2xx with an empty body: the caller decides whether that means "gone"
 * }
 * ```
 */

import type { IntegrationSource } from './types.js';
import { RequestFailedError } from './errors.js';

/** Status reported when no HTTP response was obtained */
export const TRANSPORT_FAILURE_STATUS = 500;

/**
 * Successful call.
 */
export interface ApiSuccess<T> {
  readonly ok: true;
  /** Decoded, validated payload */
  readonly data: T;
  /** HTTP status of the response */
  readonly status: number;
  readonly error?: undefined;
}

/**
 * Failed call: remote rejection, transport failure or unusable payload.
 */
export interface ApiFailure {
  readonly ok: false;
  /** Human-readable reason */
  readonly error: string;
  /** HTTP status, or 500 when the request never got a response */
  readonly status: number;
  /** Remote error code (ClickUp `ECODE`), when the remote sent one */
  readonly code?: string;
  readonly data?: undefined;
}

export type ApiResult<T> = ApiSuccess<T> | ApiFailure;

export function success<T>(data: T, status: number): ApiSuccess<T> {
  return { ok: true, data, status };
}

export function failure(error: string, status: number, code?: string): ApiFailure {
  return code === undefined ? { ok: false, error, status } : { ok: false, error, status, code };
}

export function isSuccess<T>(result: ApiResult<T>): result is ApiSuccess<T> {
  return result.ok;
}

export function isFailure<T>(result: ApiResult<T>): result is ApiFailure {
  return !result.ok;
}

/**
 * Return the data of a successful result, or throw a RequestFailedError.
 * For callers that prefer exceptions over inspecting the envelope.
 */
export function unwrapResult<T>(result: ApiResult<T>, source: IntegrationSource = 'clickup'): T {
  if (result.ok) {
    return result.data;
  }
  throw new RequestFailedError(source, result.error, result.status, result.code);
}

/**
 * Transform the data of a successful result; failures pass through.
 */
export function mapResult<T, U>(result: ApiResult<T>, fn: (data: T) => U): ApiResult<U> {
  return result.ok ? success(fn(result.data), result.status) : result;
}
