import { describe, it, expect } from 'vitest';
import { loadConfigFromEnv, parseConfig } from '../types/config.js';
import { ConfigError } from '../errors.js';
import { DEFAULT_USER_AGENT } from '../constants.js';

describe('loadConfigFromEnv', () => {
  it('falls back to defaults for an empty environment', () => {
    expect(loadConfigFromEnv({})).toEqual({
      agent: { model: 'gpt-4o-mini', maxTokens: 1000, temperature: 0.1, maxRounds: 10 },
      providers: {},
      http: { timeoutMs: 30_000, userAgent: DEFAULT_USER_AGENT },
      logLevel: 'info',
    });
  });

  it('maps and coerces the documented variables', () => {
    const config = loadConfigFromEnv({
      ALMANAC_MODEL: 'claude-haiku-4-5',
      ALMANAC_MAX_TOKENS: '512',
      ALMANAC_TEMPERATURE: '0.5',
      ALMANAC_MAX_ROUNDS: '3',
      OPENAI_API_KEY: 'test-secret',
      OPENAI_BASE_URL: 'http://localhost:8080/v1',
      ANTHROPIC_API_KEY: 'test-secret-2',
      ALMANAC_HTTP_TIMEOUT_MS: '5000',
      LOG_LEVEL: 'DEBUG',
    });

    expect(config.agent).toEqual({ model: 'claude-haiku-4-5', maxTokens: 512, temperature: 0.5, maxRounds: 3 });
    expect(config.providers).toEqual({
      openaiApiKey: 'test-secret',
      openaiBaseUrl: 'http://localhost:8080/v1',
      anthropicApiKey: 'test-secret-2',
    });
    expect(config.http.timeoutMs).toBe(5000);
    expect(config.logLevel).toBe('debug');
  });

  it('treats blank values as unset', () => {
    const config = loadConfigFromEnv({ ALMANAC_MODEL: '   ', OPENAI_API_KEY: '' });
    expect(config.agent.model).toBe('gpt-4o-mini');
    expect(config.providers.openaiApiKey).toBeUndefined();
  });

  it('rejects invalid values with a ConfigError naming the field', () => {
    let caught: unknown;
    try {
      loadConfigFromEnv({ ALMANAC_MAX_ROUNDS: '0' });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught instanceof ConfigError && caught.code).toBe('CONFIG');
    expect(caught instanceof Error ? caught.message : '').toMatch(/^Invalid configuration: agent\.maxRounds: /);
  });

  it('rejects an unknown log level', () => {
    expect(() => loadConfigFromEnv({ LOG_LEVEL: 'verbose' })).toThrow(ConfigError);
  });
});

describe('parseConfig', () => {
  it('fills missing sections', () => {
    const config = parseConfig({ agent: { maxRounds: 4 } });
    expect(config.agent.maxRounds).toBe(4);
    expect(config.agent.model).toBe('gpt-4o-mini');
    expect(config.http.timeoutMs).toBe(30_000);
  });

  it('rejects a malformed base URL', () => {
    expect(() => parseConfig({ providers: { openaiBaseUrl: 'not a url' } }))
      .toThrow(/^Invalid configuration: providers\.openaiBaseUrl: /);
  });
});
