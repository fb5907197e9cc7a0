import { describe, it, expect } from 'vitest';
import { ValidationError } from '@tasklane/errors';
import { loadConfig } from '../src/config.js';

describe('loadConfig', () => {
  it('should apply defaults', () => {
    expect(loadConfig({ CLICKUP_API_KEY: 'test-token' })).toEqual({
      CLICKUP_API_KEY: 'test-token',
      CLICKUP_BASE_URL: 'https://api.clickup.com/api/v2',
      CLICKUP_TIMEOUT_MS: 0,
      PORT: 3000,
      HOST: '0.0.0.0',
      LOG_LEVEL: 'info',
      NODE_ENV: 'development',
    });
  });

  it('should coerce numeric variables and treat empty ones as unset', () => {
    const config = loadConfig({
      CLICKUP_API_KEY: 'test-token',
      CLICKUP_TIMEOUT_MS: '1500',
      PORT: '',
      LOG_LEVEL: 'debug',
    });

    expect(config.CLICKUP_TIMEOUT_MS).toBe(1500);
    expect(config.PORT).toBe(3000);
    expect(config.LOG_LEVEL).toBe('debug');
  });

  it('should list every invalid variable', () => {
    let thrown: unknown;
    try {
      loadConfig({ PORT: '70000', LOG_LEVEL: 'verbose', CLICKUP_BASE_URL: 'not a url' });
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(ValidationError);
    const error = thrown instanceof ValidationError ? thrown : undefined;
    expect(Object.keys(error?.fieldErrors ?? {}).sort()).toEqual([
      'CLICKUP_API_KEY',
      'CLICKUP_BASE_URL',
      'LOG_LEVEL',
      'PORT',
    ]);
    expect(error?.fieldErrors['CLICKUP_API_KEY']).toEqual(['CLICKUP_API_KEY is required']);
  });
});
