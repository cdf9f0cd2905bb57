import { describe, it, expect, vi } from 'vitest';
import { GATEWAY_ERROR_SENTINEL, LanguageModelGateway } from '../agent/gateway.js';
import { ProviderHTTPError } from '../lib/errors.js';
import type { GenerateParams, GenerateResponse, LLMProvider } from '../lib/llm-provider.js';

function fakeProvider(generate: (params: GenerateParams) => Promise<GenerateResponse>) {
  const mock = vi.fn(generate);
  const provider: LLMProvider = { name: 'fake', model: 'fake-model', generate: mock };
  return { provider, generate: mock };
}

const ok = (text: string): GenerateResponse => ({ text, usage: { input_tokens: 3, output_tokens: 4 } });

describe('LanguageModelGateway', () => {
  it('forwards the request and returns the model text', async () => {
    const { provider, generate } = fakeProvider(async () => ok('{"thought": "hi"}'));
    const gateway = new LanguageModelGateway(provider, { timeoutMs: 1_000, maxAttempts: 2, maxTokens: 321 });

    const text = await gateway.complete({ prompt: 'P', system: 'S', responseSchema: { type: 'object' } });

    expect(text).toBe('{"thought": "hi"}');
    expect(generate).toHaveBeenCalledOnce();
    expect(generate.mock.calls[0][0]).toMatchObject({
      prompt: 'P',
      system: 'S',
      responseSchema: { type: 'object' },
      max_tokens: 321,
    });
  });

  it('retries a transient provider error', async () => {
    let calls = 0;
    const { provider, generate } = fakeProvider(async () => {
      calls += 1;
      if (calls === 1) throw new ProviderHTTPError('fake', 503, 'busy');
      return ok('second time lucky');
    });
    const gateway = new LanguageModelGateway(provider, {
      timeoutMs: 1_000, maxAttempts: 2, maxTokens: 10, retryBaseDelayMs: 1,
    });

    await expect(gateway.complete({ prompt: 'P' })).resolves.toBe('second time lucky');
    expect(generate).toHaveBeenCalledTimes(2);
  });

  it('returns the sentinel without retrying a client error', async () => {
    const { provider, generate } = fakeProvider(async () => {
      throw new ProviderHTTPError('fake', 400, 'bad request');
    });
    const gateway = new LanguageModelGateway(provider, {
      timeoutMs: 1_000, maxAttempts: 3, maxTokens: 10, retryBaseDelayMs: 1,
    });

    await expect(gateway.complete({ prompt: 'P' })).resolves.toBe(GATEWAY_ERROR_SENTINEL);
    expect(generate).toHaveBeenCalledOnce();
  });

  it('returns the sentinel once every attempt has failed', async () => {
    const { provider, generate } = fakeProvider(async () => {
      throw new ProviderHTTPError('fake', 502, 'bad gateway');
    });
    const gateway = new LanguageModelGateway(provider, {
      timeoutMs: 1_000, maxAttempts: 3, maxTokens: 10, retryBaseDelayMs: 1,
    });

    await expect(gateway.complete({ prompt: 'P' })).resolves.toBe(GATEWAY_ERROR_SENTINEL);
    expect(generate).toHaveBeenCalledTimes(3);
  });

  it('gives up on a provider that outlives the timeout', async () => {
    const { provider, generate } = fakeProvider((params) => new Promise((_resolve, reject) => {
      params.signal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
    }));
    const gateway = new LanguageModelGateway(provider, {
      timeoutMs: 20, maxAttempts: 2, maxTokens: 10, retryBaseDelayMs: 1,
    });

    await expect(gateway.complete({ prompt: 'P' })).resolves.toBe(GATEWAY_ERROR_SENTINEL);
    expect(generate).toHaveBeenCalledOnce();
  });

  it('the sentinel is valid JSON carrying an error field', () => {
    expect(JSON.parse(GATEWAY_ERROR_SENTINEL)).toEqual({
      error: 'Failed to communicate with the language model service.',
    });
  });
});
