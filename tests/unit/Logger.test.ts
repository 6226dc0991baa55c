// tests/unit/Logger.test.ts

import { describe, it, expect } from 'vitest';
import { Logger } from '../../src/observability/Logger';

describe('Logger', () => {
  const logger = new Logger({ level: 'debug', format: 'json' });

  it('should redact top-level secrets', () => {
    const redacted = logger['redactSensitive']({
      identity: 'default',
      accessToken: 'test-access',
      refreshToken: 'test-refresh',
      apiToken: 'test-api-token',
      clientSecret: 'test-secret',
    });

    expect(redacted).toEqual({
      identity: 'default',
      accessToken: '[REDACTED]',
      refreshToken: '[REDACTED]',
      apiToken: '[REDACTED]',
      clientSecret: '[REDACTED]',
    });
  });

  it('should redact secrets inside a credential set', () => {
    const expiresAt = new Date('2024-05-01T12:00:00Z');
    const redacted = logger['redactSensitive']({
      credentials: { accessToken: 'test-access', refreshToken: 'test-refresh', expiresAt },
    });

    expect(redacted.credentials).toEqual({ accessToken: '[REDACTED]', refreshToken: '[REDACTED]', expiresAt });
  });

  it('should not modify the caller metadata', () => {
    const meta = { credentials: { accessToken: 'test-access' } };

    logger['redactSensitive'](meta);

    expect(meta.credentials.accessToken).toBe('test-access');
  });

  it('should log errors by message', () => {
    const redacted = logger['redactSensitive']({ error: new Error('socket hang up'), runId: 'r1' });

    expect(redacted).toEqual({ error: 'socket hang up', runId: 'r1' });
  });

  it('should preserve ordinary metadata', () => {
    const meta = { runId: 'r1', trigger: 'full', written: 250, location: 'exports/tickets_all.csv' };

    expect(logger['redactSensitive'](meta)).toEqual(meta);
  });

  it('should not throw when logging at any level', () => {
    const quiet = new Logger({ level: 'error', format: 'pretty' });

    expect(() => {
      quiet.debug('Debug message', { key: 'value' });
      quiet.info('Info message');
      quiet.warn('Warn message', { key: 'value' });
    }).not.toThrow();
  });
});
