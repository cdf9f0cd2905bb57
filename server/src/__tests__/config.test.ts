import { describe, it, expect } from 'vitest';
import { loadConfig } from '../lib/config.js';
import { createProvider, isProviderConfigured } from '../lib/llm.js';
import { ConfigurationError } from '../lib/errors.js';
import { OllamaProvider, OpenAICompatibleProvider } from '../lib/llm-provider.js';

describe('loadConfig', () => {
  it('applies defaults for an empty environment', () => {
    const cfg = loadConfig({});
    expect(cfg.port).toBe(3001);
    expect(cfg.agentProvider).toBe('ollama');
    expect(cfg.reportProvider).toBe('ollama');
    expect(cfg.providers.ollama).toEqual({ baseUrl: undefined, model: 'gemma3:12b' });
    expect(cfg.llm).toEqual({ timeoutMs: 60_000, maxAttempts: 2, maxTokens: 2048 });
    expect(cfg.successMarkers).toEqual(['Checkout successful', 'ORDER CONFIRMED']);
    expect(cfg.defaultMaxSteps).toBe(8);
    expect(cfg.historyLimit).toBeUndefined();
    expect(cfg.sessionStartDelayMs).toBe(500);
    expect(cfg.mockApi).toEqual({ port: 8001, url: 'http://127.0.0.1:8001', cartDelayMs: 2500 });
  });

  it('coerces numbers and splits lists', () => {
    const cfg = loadConfig({
      PORT: '4000',
      SUCCESS_MARKERS: ' Paid , Thank you ,',
      ALLOWED_ORIGINS: 'http://a.test,http://b.test',
      SESSION_START_DELAY_MS: '0',
    });
    expect(cfg.port).toBe(4000);
    expect(cfg.successMarkers).toEqual(['Paid', 'Thank you']);
    expect(cfg.allowedOrigins).toEqual(['http://a.test', 'http://b.test']);
    expect(cfg.sessionStartDelayMs).toBe(0);
  });

  it('accepts GEMMA_URL as the Ollama endpoint and a separate report provider', () => {
    const cfg = loadConfig({ GEMMA_URL: 'http://gemma.test', REPORT_LLM_PROVIDER: 'anthropic' });
    expect(cfg.providers.ollama.baseUrl).toBe('http://gemma.test');
    expect(cfg.agentProvider).toBe('ollama');
    expect(cfg.reportProvider).toBe('anthropic');
  });

  it('reads an optional prompt history cap', () => {
    expect(loadConfig({ HISTORY_LIMIT: '6' }).historyLimit).toBe(6);
    expect(loadConfig({ HISTORY_LIMIT: ' ' }).historyLimit).toBeUndefined();
    expect(() => loadConfig({ HISTORY_LIMIT: '0' })).toThrow(/HISTORY_LIMIT/);
  });

  it('rejects an unknown provider', () => {
    expect(() => loadConfig({ LLM_PROVIDER: 'mystery' })).toThrow(/^Invalid environment configuration: LLM_PROVIDER: /);
  });

  it('rejects a non-numeric port', () => {
    expect(() => loadConfig({ PORT: 'eighty' })).toThrow(/PORT/);
  });
});

describe('createProvider', () => {
  it('fails with ConfigurationError when the endpoint is missing', () => {
    const cfg = loadConfig({});
    expect(isProviderConfigured('ollama', cfg)).toBe(false);
    expect(() => createProvider('ollama', cfg)).toThrow(ConfigurationError);
    expect(() => createProvider('anthropic', cfg)).toThrow(ConfigurationError);
  });

  it('builds the configured providers', () => {
    const cfg = loadConfig({
      OLLAMA_URL: 'http://ollama.test',
      OPENAI_BASE_URL: 'http://openai.test/v1',
      OPENAI_API_KEY: 'test-key',
    });
    expect(createProvider('ollama', cfg)).toBeInstanceOf(OllamaProvider);
    expect(createProvider('openai', cfg)).toBeInstanceOf(OpenAICompatibleProvider);
    expect(isProviderConfigured('openai', cfg)).toBe(true);
  });
});
