/**
 * Tests for logging
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { ConsoleLogger, NoopLogger, sanitizeContext } from '../index.js';

describe('sanitizeContext', () => {
  it('should redact sensitive fields at any depth', () => {
    expect(
      sanitizeContext({
        container: 'photos',
        'X-Auth-Token': 'test-token',
        request: { headers: { Authorization: 'Bearer test-token', Accept: 'application/json' } },
        tempUrlKey: 'test-secret',
      })
    ).toEqual({
      container: 'photos',
      'X-Auth-Token': '[REDACTED]',
      request: { headers: { Authorization: '[REDACTED]', Accept: 'application/json' } },
      tempUrlKey: '[REDACTED]',
    });
  });

  it('should leave arrays and dates alone', () => {
    const at = new Date('2024-03-01T12:00:00Z');
    expect(sanitizeContext({ names: ['a', 'b'], at })).toEqual({ names: ['a', 'b'], at });
  });
});

describe('ConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should write entries at or above its level', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const logger = new ConsoleLogger('info');

    logger.info('uploaded', { container: 'photos' });
    logger.debug('not shown');
    logger.trace('not shown either');

    expect(info).toHaveBeenCalledTimes(1);
    expect(info.mock.calls[0]?.[0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] INFO uploaded \{"container":"photos"\}$/);
    expect(debug).not.toHaveBeenCalled();
  });

  it('should carry the context of its parents', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const logger = new ConsoleLogger('warn', { account: 'AUTH_test' }).child({ authToken: 'test-token' });

    logger.warn('slow response', { durationMs: 1200 });

    expect(warn.mock.calls[0]?.[0]).toMatch(
      / WARN slow response \{"account":"AUTH_test","authToken":"\[REDACTED\]","durationMs":1200\}$/
    );
  });

  it('should print trace entries through console.debug', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);

    new ConsoleLogger('trace').trace('body chunk');

    expect(debug.mock.calls[0]?.[0]).toMatch(/ TRACE body chunk$/);
  });
});

describe('NoopLogger', () => {
  it('should return itself as child', () => {
    const logger = new NoopLogger();
    expect(logger.child()).toBe(logger);
  });
});
