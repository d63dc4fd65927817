// tests/unit/Logger.test.ts

import { describe, it, expect } from 'vitest';
import { Logger } from '../../src/observability/Logger';

describe('Logger', () => {
  const logger = new Logger({ level: 'debug', format: 'json', silent: true });

  it('should redact the GitHub token in metadata', () => {
    const redacted = logger['redactSensitive']({
      repo: 'acme/gridsim',
      token: 'test-token',
    });

    expect(redacted).toEqual({ repo: 'acme/gridsim', token: '[REDACTED]' });
  });

  it('should redact githubToken and password fields', () => {
    const redacted = logger['redactSensitive']({
      githubToken: 'test-token',
      password: 'test-secret',
      stage: 'refresh',
    });

    expect(redacted).toEqual({
      githubToken: '[REDACTED]',
      password: '[REDACTED]',
      stage: 'refresh',
    });
  });

  it('should redact the Authorization header', () => {
    const redacted = logger['redactSensitive']({
      url: 'https://api.github.com/users/octo',
      headers: { Authorization: 'Bearer test-token', Accept: 'application/json' },
    });

    expect(redacted).toEqual({
      url: 'https://api.github.com/users/octo',
      headers: { Authorization: '[REDACTED]', Accept: 'application/json' },
    });
  });

  it('should flatten errors to their message', () => {
    const redacted = logger['redactSensitive']({ error: new Error('boom') });

    expect(redacted).toEqual({ error: 'boom' });
  });

  it('should preserve non-sensitive data', () => {
    const data = {
      stage: 'interactions',
      repo: 'acme/gridsim',
      rows: 50,
    };

    expect(logger['redactSensitive'](data)).toEqual(data);
  });

  it('should handle null/undefined gracefully', () => {
    expect(logger['redactSensitive'](null)).toBe(null);
    expect(logger['redactSensitive'](undefined)).toBe(undefined);
    expect(logger['redactSensitive']('string')).toBe('string');
  });

  it('should not throw when logging', () => {
    expect(() => {
      logger.debug('Debug message', { key: 'value' });
      logger.info('Info message', { key: 'value' });
      logger.warn('Warn message');
      logger.error('Error message', { error: new Error('boom') });
    }).not.toThrow();
  });

  it('should accept the pretty format', () => {
    const pretty = new Logger({ format: 'pretty', silent: true });
    expect(() => pretty.info('hello', { token: 'test-token' })).not.toThrow();
  });
});
