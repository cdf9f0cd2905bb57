import Anthropic from '@anthropic-ai/sdk';
import { ConfigurationError } from './errors.js';

let anthropicClient: Anthropic | null = null;
let clientApiKey: string | null = null;

/**
 * Lazily create the Anthropic client so modules can be imported in test/dev
 * environments even when Anthropic credentials are not configured.
 */
export function getAnthropicClient(apiKey: string | undefined): Anthropic {
  if (!apiKey) {
    throw new ConfigurationError('ANTHROPIC_API_KEY environment variable is required for the anthropic provider');
  }
  if (!anthropicClient || clientApiKey !== apiKey) {
    anthropicClient = new Anthropic({ apiKey });
    clientApiKey = apiKey;
  }
  return anthropicClient;
}
