import { describe, it, expect } from 'vitest';
import {
  failure,
  isFailure,
  isSuccess,
  mapResult,
  success,
  unwrapResult,
  type ApiResult,
} from '../src/common/result.js';
import { IntegrationErrorCode, RequestFailedError } from '../src/common/errors.js';

describe('result envelope', () => {
  it('should build successes without an error', () => {
    const result = success({ id: '790' }, 200);

    expect(result).toEqual({ ok: true, data: { id: '790' }, status: 200 });
    expect('error' in result).toBe(false);
  });

  it('should build failures without data', () => {
    expect(failure('Space not found', 404)).toEqual({ ok: false, error: 'Space not found', status: 404 });
    expect(failure('Team not authorized', 401, 'OAUTH_027')).toEqual({
      ok: false,
      error: 'Team not authorized',
      status: 401,
      code: 'OAUTH_027',
    });
    expect('data' in failure('Space not found', 404)).toBe(false);
  });

  it('should narrow with the type guards', () => {
    const results: ApiResult<number>[] = [success(1, 200), failure('nope', 500)];

    expect(results.filter(isSuccess).map((result) => result.data)).toEqual([1]);
    expect(results.filter(isFailure).map((result) => result.error)).toEqual(['nope']);
  });
});

describe('unwrapResult', () => {
  it('should return data for a success', () => {
    expect(unwrapResult(success(null, 200))).toBeNull();
  });

  it('should throw RequestFailedError for a failure', () => {
    let thrown: unknown;
    try {
      unwrapResult(failure('Rate limit reached', 429, 'APP_002'));
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(RequestFailedError);
    const error = thrown instanceof RequestFailedError ? thrown : undefined;
    expect(error?.message).toBe('Rate limit reached');
    expect(error?.statusCode).toBe(429);
    expect(error?.code).toBe(IntegrationErrorCode.RATE_LIMITED);
    expect(error?.remoteCode).toBe('APP_002');
    expect(error?.source).toBe('clickup');
  });

  it('should map statuses without a known code to UNKNOWN', () => {
    const error = new RequestFailedError('clickup', 'Conflict', 409);

    expect(error.code).toBe(IntegrationErrorCode.UNKNOWN);
    expect(error.details).toBeUndefined();
  });

  it('should report transport failures as provider errors', () => {
    const error = new RequestFailedError('clickup', 'connect ECONNREFUSED 127.0.0.1:443', 500);

    expect(error.code).toBe(IntegrationErrorCode.PROVIDER_ERROR);
    expect(Object.keys(error.toJSON())).toEqual(['name', 'message', 'code', 'source', 'statusCode', 'details']);
  });
});

describe('mapResult', () => {
  it('should transform success data and keep failures', () => {
    expect(mapResult(success([1, 2], 200), (items) => items.length)).toEqual(success(2, 200));
    expect(mapResult(failure('down', 503), (items: number[]) => items.length)).toEqual(failure('down', 503));
  });
});
