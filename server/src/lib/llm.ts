import { config as defaultConfig } from './config.js';
import type { AppConfig, LLMProviderName } from './config.js';
import { ConfigurationError } from './errors.js';
import { getAnthropicClient } from './anthropic.js';
import {
  AnthropicProvider,
  OllamaProvider,
  OpenAICompatibleProvider,
  type LLMProvider,
} from './llm-provider.js';

/**
 * Build the provider for a role. Throws ConfigurationError when the provider's
 * endpoint or key is missing, which callers treat as session-fatal.
 */
export function createProvider(
  name: LLMProviderName,
  appConfig: AppConfig = defaultConfig,
): LLMProvider {
  const settings = appConfig.providers;

  switch (name) {
    case 'ollama': {
      const baseUrl = settings.ollama.baseUrl;
      if (!baseUrl) {
        throw new ConfigurationError('OLLAMA_URL (or GEMMA_URL) is not configured');
      }
      return new OllamaProvider({ baseUrl, model: settings.ollama.model });
    }
    case 'openai': {
      const { baseUrl, apiKey, model } = settings.openai;
      if (!baseUrl || !apiKey) {
        throw new ConfigurationError('OPENAI_BASE_URL and OPENAI_API_KEY are required for the openai provider');
      }
      return new OpenAICompatibleProvider({ baseUrl, apiKey, model });
    }
    case 'anthropic':
      return new AnthropicProvider(getAnthropicClient(settings.anthropic.apiKey), settings.anthropic.model);
  }
}

/** True when the provider for this role has what it needs to be built. */
export function isProviderConfigured(
  name: LLMProviderName,
  appConfig: AppConfig = defaultConfig,
): boolean {
  const settings = appConfig.providers;
  switch (name) {
    case 'ollama':
      return Boolean(settings.ollama.baseUrl);
    case 'openai':
      return Boolean(settings.openai.baseUrl && settings.openai.apiKey);
    case 'anthropic':
      return Boolean(settings.anthropic.apiKey);
  }
}
