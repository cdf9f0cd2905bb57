import { createCombinedAbortSignal } from '../lib/abort-signal.js';
import type { LLMProvider, ResponseSchema } from '../lib/llm-provider.js';
import { withRetry } from '../lib/retry.js';
import logger, { type Logger } from '../lib/logger.js';

/** Returned in place of model text whenever a call fails for any reason */
export const GATEWAY_ERROR_SENTINEL = '{"error": "Failed to communicate with the language model service."}';

export interface GatewayOptions {
  timeoutMs: number;
  maxAttempts: number;
  maxTokens: number;
  /** Base backoff between attempts */
  retryBaseDelayMs?: number;
  log?: Logger;
}

export interface GatewayRequest {
  prompt: string;
  system?: string;
  responseSchema?: ResponseSchema;
  signal?: AbortSignal;
}

/**
 * Sends one prompt to a provider. Each attempt gets its own timeout; transient
 * failures are retried with backoff. The caller always receives text: either
 * the model's output or the sentinel.
 */
export class LanguageModelGateway {
  readonly provider: LLMProvider;
  private readonly options: GatewayOptions;
  private readonly log: Logger;

  constructor(provider: LLMProvider, options: GatewayOptions) {
    this.provider = provider;
    this.options = options;
    this.log = options.log ?? logger.child({ component: 'llm-gateway', provider: provider.name });
  }

  async complete(request: GatewayRequest): Promise<string> {
    const { timeoutMs, maxAttempts, maxTokens, retryBaseDelayMs } = this.options;
    const start = Date.now();

    try {
      const response = await withRetry(
        async () => {
          const { signal, cleanup } = createCombinedAbortSignal(request.signal, timeoutMs);
          try {
            return await this.provider.generate({
              prompt: request.prompt,
              system: request.system,
              responseSchema: request.responseSchema,
              max_tokens: maxTokens,
              signal,
            });
          } catch (err) {
            // Surface the timeout reason instead of the generic AbortError
            if (signal.aborted && signal.reason instanceof Error && !request.signal?.aborted) {
              throw signal.reason;
            }
            throw err;
          } finally {
            cleanup();
          }
        },
        {
          maxAttempts,
          baseDelay: retryBaseDelayMs,
          signal: request.signal,
          onRetry: (attempt, error) => {
            this.log.warn({ attempt, error: error.message }, 'Language model call failed, retrying');
          },
        },
      );

      this.log.debug(
        {
          model: this.provider.model,
          duration_ms: Date.now() - start,
          input_tokens: response.usage.input_tokens,
          output_tokens: response.usage.output_tokens,
        },
        'Language model call complete',
      );
      return response.text;
    } catch (err) {
      this.log.error(
        { model: this.provider.model, error: err instanceof Error ? err.message : String(err) },
        'Language model call failed',
      );
      return GATEWAY_ERROR_SENTINEL;
    }
  }
}
