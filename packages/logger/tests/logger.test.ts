import { describe, it, expect, beforeEach } from 'vitest';
import { Logger, configureLogger, createLogger, getLoggerConfig, logger } from '../src/logger.js';

let lines: Record<string, unknown>[] = [];

function capture(level: 'trace' | 'debug' | 'info' | 'warn' = 'debug') {
  lines = [];
  configureLogger({
    level,
    service: 'test-service',
    pretty: false,
    destination: { write: (line) => lines.push(JSON.parse(line)) },
  });
}

describe('Logger', () => {
  beforeEach(() => {
    capture();
  });

  it('writes structured entries with service and component bindings', () => {
    createLogger('clickup-client').info('Space created', { spaceId: '790' });

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      level: 'info',
      service: 'test-service',
      component: 'clickup-client',
      spaceId: '790',
      msg: 'Space created',
    });
    expect(typeof lines[0]?.['time']).toBe('string');
  });

  it('filters entries below the configured level', () => {
    capture('warn');
    const log = createLogger('filtering');

    log.debug('hidden');
    log.info('hidden');
    log.warn('shown');

    expect(lines.map((line) => line['msg'])).toEqual(['shown']);
    expect(log.isLevelEnabled('info')).toBe(false);
  });

  it('serializes Error values passed as error', () => {
    const failure = Object.assign(new Error('connect ECONNREFUSED'), { code: 'ECONNREFUSED' });
    logger.error('Transport failure', { error: failure });

    expect(lines[0]?.['error']).toMatchObject({
      name: 'Error',
      message: 'connect ECONNREFUSED',
      code: 'ECONNREFUSED',
    });
  });

  it('redacts credentials', () => {
    logger.info('Request headers', { authorization: 'test-token', apiKey: 'test-key' });

    expect(lines[0]?.['authorization']).toBe('[Redacted]');
    expect(lines[0]?.['apiKey']).toBe('[Redacted]');
  });

  it('merges child bindings over parent bindings', () => {
    const parent = createLogger({ component: 'api', region: 'eu' });
    parent.child({ requestId: 'req-1', region: 'us' }).warn('Slow upstream');

    expect(lines[0]).toMatchObject({ component: 'api', requestId: 'req-1', region: 'us' });
  });

  it('applies reconfiguration to loggers created earlier', () => {
    const early = createLogger('early');
    early.info('first');

    const later: Record<string, unknown>[] = [];
    configureLogger({ service: 'renamed', destination: { write: (line) => later.push(JSON.parse(line)) } });
    early.info('second');

    expect(lines).toHaveLength(1);
    expect(later[0]).toMatchObject({ service: 'renamed', component: 'early', msg: 'second' });
  });

  it('logs the duration of timed operations', () => {
    const timer = createLogger('timing').time('getTasks');
    const durationMs = timer.end({ listId: 'list-1' });

    expect(durationMs).toBeGreaterThanOrEqual(0);
    expect(lines[0]).toMatchObject({
      level: 'debug',
      msg: 'getTasks completed',
      listId: 'list-1',
      durationMs,
    });
  });

  it('exposes the merged configuration', () => {
    expect(getLoggerConfig()).toMatchObject({ level: 'debug', service: 'test-service', pretty: false });
    expect(createLogger()).toBeInstanceOf(Logger);
  });
});
