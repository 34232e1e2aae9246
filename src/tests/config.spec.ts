import { describe, it, expect } from 'vitest';
import { loadConfig } from '../config.js';
import { ConfigError } from '../errors.js';

describe('loadConfig', () => {
  it('falls back to defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      model: 'gpt-4o-mini',
      apiKey: undefined,
      baseUrl: 'https://api.openai.com/v1',
      apiStyle: 'chat',
      temperature: 0,
      maxTokens: 800,
      maxRetries: 2,
      transportRetries: 2,
      retryDelayMs: 100,
      timeoutMs: 60_000
    });
  });

  it('reads overrides and trims trailing slashes from the base URL', () => {
    const c = loadConfig({
      MODEL: 'local-model',
      OPENAI_API_KEY: 'test-key',
      OPENAI_BASE_URL: 'http://localhost:8080/v1/',
      OPENAI_API_STYLE: 'responses',
      TEMPERATURE: '0.3',
      MAX_SCHEMA_RETRIES: '4',
      RETRY_DELAY_MS: '0'
    });
    expect(c.model).toBe('local-model');
    expect(c.apiKey).toBe('test-key');
    expect(c.baseUrl).toBe('http://localhost:8080/v1');
    expect(c.apiStyle).toBe('responses');
    expect(c.temperature).toBe(0.3);
    expect(c.maxRetries).toBe(4);
    expect(c.retryDelayMs).toBe(0);
  });

  it('treats blank values as unset', () => {
    const c = loadConfig({ MODEL: '  ', TEMPERATURE: '', MAX_SCHEMA_RETRIES: '' });
    expect(c.model).toBe('gpt-4o-mini');
    expect(c.temperature).toBe(0);
    expect(c.maxRetries).toBe(2);
  });

  it.each([
    ['MAX_SCHEMA_RETRIES', '-1'],
    ['MAX_SCHEMA_RETRIES', '1.5'],
    ['OPENAI_API_STYLE', 'grpc'],
    ['TEMPERATURE', '3'],
    ['OPENAI_BASE_URL', 'not a url']
  ])('rejects %s=%s', (field, value) => {
    let failure: unknown;
    try {
      loadConfig({ [field]: value });
    } catch (e) {
      failure = e;
    }
    expect(failure).toBeInstanceOf(ConfigError);
    if (failure instanceof ConfigError) expect(failure.field).toBe(field);
  });
});
