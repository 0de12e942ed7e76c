import { afterEach, describe, it, expect, vi } from 'vitest';
import { createLogger, isLogLevel, redactSensitiveFields, setLogLevel } from '../utils/logger.js';

describe('redactSensitiveFields', () => {
  it('masks secret-looking keys at any depth', () => {
    expect(redactSensitiveFields({
      apiKey: 'test-secret',
      model: 'gpt-4o-mini',
      nested: { authorization: 'Bearer test-secret', count: 2 },
      list: [{ password: 'hunter' }, 'plain'],
    })).toEqual({
      apiKey: '***REDACTED***',
      model: 'gpt-4o-mini',
      nested: { authorization: '***REDACTED***', count: 2 },
      list: [{ password: '***REDACTED***' }, 'plain'],
    });
  });
});

describe('createLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    setLogLevel('error');
  });

  it('writes info to stderr with subsystem prefix and redacted data', () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    setLogLevel('debug');

    createLogger('tools:registry').info('Tool calculate completed', { token: 'test-secret', elapsed: 3 });

    expect(stderr).toHaveBeenCalledTimes(1);
    const [line, data] = stderr.mock.calls[0];
    expect(line).toContain('[INFO] [tools:registry]');
    expect(line).toContain('Tool calculate completed');
    expect(data).toEqual({ token: '***REDACTED***', elapsed: 3 });
  });

  it('drops messages below the global threshold', () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const stdwarn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    setLogLevel('warn');

    const log = createLogger('agent');
    log.info('hidden');
    log.warn('shown');

    expect(stderr).not.toHaveBeenCalled();
    expect(stdwarn).toHaveBeenCalledTimes(1);
  });

  it('prefixes child loggers with the parent subsystem', () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    setLogLevel('debug');

    createLogger('agent').child('run1').debug('Round 1/10');

    expect(stderr.mock.calls[0][0]).toContain('[DEBUG] [agent:run1]');
  });
});

describe('isLogLevel', () => {
  it('accepts only known levels', () => {
    expect(isLogLevel('warn')).toBe(true);
    expect(isLogLevel('trace')).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });
});
