import type Anthropic from '@anthropic-ai/sdk';
import { ProviderHTTPError } from './errors.js';

// ─── Shared interfaces ───────────────────────────────────────────────

/** JSON Schema handed to providers that support constrained output */
export type ResponseSchema = Record<string, unknown>;

export interface GenerateParams {
  prompt: string;
  /** System-level instruction, sent separately from the prompt where the provider allows it */
  system?: string;
  responseSchema?: ResponseSchema;
  max_tokens: number;
  signal?: AbortSignal;
}

export interface GenerateResponse {
  text: string;
  usage: { input_tokens: number; output_tokens: number };
}

export interface LLMProvider {
  readonly name: string;
  readonly model: string;
  generate(params: GenerateParams): Promise<GenerateResponse>;
}

async function postJson(
  providerName: string,
  url: string,
  body: Record<string, unknown>,
  headers: Record<string, string>,
  signal?: AbortSignal,
): Promise<unknown> {
  const response = await fetch(url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json', ...headers },
    body: JSON.stringify(body),
    signal,
  });

  if (!response.ok) {
    const errText = await response.text().catch(() => '');
    throw new ProviderHTTPError(providerName, response.status, errText);
  }

  return response.json();
}

// ─── Ollama provider ─────────────────────────────────────────────────

interface OllamaConfig {
  baseUrl: string;
  model: string;
}

interface OllamaGenerateResponse {
  response?: string;
  content?: string;
  prompt_eval_count?: number;
  eval_count?: number;
}

/**
 * Ollama `/api/generate` (single prompt, no chat history). Structured output
 * goes through the `format` field, which accepts a JSON schema.
 */
export class OllamaProvider implements LLMProvider {
  readonly name = 'ollama';
  readonly model: string;
  private baseUrl: string;

  constructor(config: OllamaConfig) {
    this.baseUrl = config.baseUrl.replace(/\/$/, '');
    this.model = config.model;
  }

  async generate(params: GenerateParams): Promise<GenerateResponse> {
    const body: Record<string, unknown> = {
      model: this.model,
      prompt: params.prompt,
      stream: false,
      options: { num_predict: params.max_tokens },
    };
    if (params.system) body.system = params.system;
    if (params.responseSchema) body.format = params.responseSchema;

    const data = await postJson(this.name, `${this.baseUrl}/api/generate`, body, {}, params.signal) as OllamaGenerateResponse;
    const text = data.response ?? data.content;
    if (typeof text !== 'string') {
      // Unknown payload shape: hand the raw body to the parser rather than failing
      return { text: JSON.stringify(data), usage: { input_tokens: 0, output_tokens: 0 } };
    }

    return {
      text,
      usage: {
        input_tokens: data.prompt_eval_count ?? 0,
        output_tokens: data.eval_count ?? 0,
      },
    };
  }
}

// ─── OpenAI-compatible provider ──────────────────────────────────────

interface OpenAICompatibleConfig {
  baseUrl: string;
  apiKey: string;
  model: string;
}

interface OpenAIChatResponse {
  choices?: Array<{
    message?: {
      content?: string | null;
    };
  }>;
  usage?: {
    prompt_tokens?: number;
    completion_tokens?: number;
  };
}

export class OpenAICompatibleProvider implements LLMProvider {
  readonly name = 'openai';
  readonly model: string;
  private apiKey: string;
  private baseUrl: string;

  constructor(config: OpenAICompatibleConfig) {
    this.apiKey = config.apiKey;
    this.baseUrl = config.baseUrl.replace(/\/$/, '');
    this.model = config.model;
  }

  async generate(params: GenerateParams): Promise<GenerateResponse> {
    const messages: Array<{ role: 'system' | 'user'; content: string }> = [];
    if (params.system) {
      messages.push({ role: 'system', content: params.system });
    }
    messages.push({ role: 'user', content: params.prompt });

    const body: Record<string, unknown> = {
      model: this.model,
      max_tokens: params.max_tokens,
      messages,
      stream: false,
    };
    if (params.responseSchema) {
      body.response_format = {
        type: 'json_schema',
        json_schema: { name: 'response', schema: params.responseSchema },
      };
    }

    const data = await postJson(
      this.name,
      `${this.baseUrl}/chat/completions`,
      body,
      { Authorization: `Bearer ${this.apiKey}` },
      params.signal,
    ) as OpenAIChatResponse;

    return {
      text: data.choices?.[0]?.message?.content ?? '',
      usage: {
        input_tokens: data.usage?.prompt_tokens ?? 0,
        output_tokens: data.usage?.completion_tokens ?? 0,
      },
    };
  }
}

// ─── Anthropic provider ──────────────────────────────────────────────

export class AnthropicProvider implements LLMProvider {
  readonly name = 'anthropic';
  readonly model: string;
  private client: Anthropic;

  constructor(client: Anthropic, model: string) {
    this.client = client;
    this.model = model;
  }

  async generate(params: GenerateParams): Promise<GenerateResponse> {
    // No native schema mode here; the schema rides along in the system instruction
    const systemParts = [params.system ?? ''];
    if (params.responseSchema) {
      systemParts.push(
        `Respond with ONLY valid JSON matching this JSON schema:\n${JSON.stringify(params.responseSchema)}`,
      );
    }
    const system = systemParts.filter(Boolean).join('\n\n');

    const response = await this.client.messages.create(
      {
        model: this.model,
        max_tokens: params.max_tokens,
        ...(system ? { system } : {}),
        messages: [{ role: 'user', content: params.prompt }],
      },
      { signal: params.signal },
    );

    let text = '';
    for (const block of response.content) {
      if (block.type === 'text') {
        text += block.text;
      }
    }

    return {
      text,
      usage: {
        input_tokens: response.usage?.input_tokens ?? 0,
        output_tokens: response.usage?.output_tokens ?? 0,
      },
    };
  }
}
