import {
  DEFAULT_BASE_URL,
  DEFAULT_MODEL,
  FALLBACK_MODELS,
  buildModelRotation,
  loadCompletionConfig,
  loadServerConfig
} from '../src/core/env.js';

describe('loadCompletionConfig', () => {
  it('runs in fallback mode with defaults when nothing is set', () => {
    expect(loadCompletionConfig({})).toEqual({
      apiKey: '',
      baseUrl: DEFAULT_BASE_URL,
      models: [DEFAULT_MODEL, ...FALLBACK_MODELS],
      maxAttempts: 6,
      baseDelayMs: 2000,
      maxJitterMs: 1000,
      timeoutMs: 60000,
    });
  });

  it('puts the configured model first', () => {
    const config = loadCompletionConfig({
      OPENAI_API_KEY: ' test-key ',
      OPENAI_BASE_URL: 'http://localhost:4000/v1',
      OPENAI_MODEL: 'custom/model',
      LLM_TIMEOUT_MS: '5000',
    });

    expect(config.apiKey).toBe('test-key');
    expect(config.baseUrl).toBe('http://localhost:4000/v1');
    expect(config.models).toEqual(['custom/model', ...FALLBACK_MODELS]);
    expect(config.timeoutMs).toBe(5000);
  });
});

describe('buildModelRotation', () => {
  it('does not repeat an alternate that is already primary', () => {
    expect(buildModelRotation('b', ['a', 'b', 'c'])).toEqual(['b', 'a', 'c']);
  });
});

describe('loadServerConfig', () => {
  it('parses numbers and origin lists, ignoring bad values', () => {
    const config = loadServerConfig({
      PORT: '9090',
      RATE_LIMIT_MAX_REQUESTS: 'lots',
      ALLOWED_ORIGINS: 'https://a.example, https://b.example,',
    });

    expect(config).toEqual({
      port: 9090,
      host: '127.0.0.1',
      rateLimitWindowMs: 60000,
      rateLimitMaxRequests: 30,
      jsonBodyLimit: '20mb',
      maxStreamFindings: 10000,
      allowedOrigins: ['https://a.example', 'https://b.example'],
    });
  });
});
