import { z } from 'zod';

export const LLM_PROVIDER_NAMES = ['ollama', 'openai', 'anthropic'] as const;
export type LLMProviderName = (typeof LLM_PROVIDER_NAMES)[number];

const DEFAULT_SUCCESS_MARKERS = ['Checkout successful', 'ORDER CONFIRMED'];

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const nonNegativeInt = (fallback: number) => z.coerce.number().int().min(0).default(fallback);
const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const csvList = (fallback: string[]) =>
  z
    .string()
    .optional()
    .transform((raw) => {
      const items = (raw ?? '').split(',').map((item) => item.trim()).filter(Boolean);
      return items.length > 0 ? items : fallback;
    });

const EnvSchema = z.object({
  NODE_ENV: z.string().default('development'),
  PORT: positiveInt(3001),
  ALLOWED_ORIGINS: csvList([]),

  LLM_PROVIDER: z.enum(LLM_PROVIDER_NAMES).default('ollama'),
  REPORT_LLM_PROVIDER: z.enum(LLM_PROVIDER_NAMES).optional(),
  OLLAMA_URL: optionalString,
  GEMMA_URL: optionalString,
  OLLAMA_MODEL: z.string().default('gemma3:12b'),
  OPENAI_BASE_URL: optionalString,
  OPENAI_API_KEY: optionalString,
  OPENAI_MODEL: z.string().default('gpt-4o-mini'),
  ANTHROPIC_API_KEY: optionalString,
  ANTHROPIC_MODEL: z.string().default('claude-sonnet-4-5-20250929'),

  LLM_TIMEOUT_MS: positiveInt(60_000),
  LLM_MAX_ATTEMPTS: positiveInt(2),
  LLM_MAX_TOKENS: positiveInt(2048),
  TOOL_TIMEOUT_MS: positiveInt(30_000),

  SUCCESS_MARKERS: csvList(DEFAULT_SUCCESS_MARKERS),
  DEFAULT_MAX_STEPS: positiveInt(8),
  // Unset means the whole memory goes into every prompt
  HISTORY_LIMIT: z.preprocess(
    (raw) => (typeof raw === 'string' && raw.trim() === '' ? undefined : raw),
    z.coerce.number().int().positive().optional(),
  ),
  SESSION_START_DELAY_MS: nonNegativeInt(500),
  MAX_RUN_TESTS_BODY_BYTES: positiveInt(200_000),

  MOCK_API_PORT: positiveInt(8001),
  MOCK_API_URL: z.string().default('http://127.0.0.1:8001'),
  MOCK_CART_DELAY_MS: nonNegativeInt(2500),
});

export interface ProviderSettings {
  ollama: { baseUrl?: string; model: string };
  openai: { baseUrl?: string; apiKey?: string; model: string };
  anthropic: { apiKey?: string; model: string };
}

export interface AppConfig {
  nodeEnv: string;
  port: number;
  allowedOrigins: string[];
  agentProvider: LLMProviderName;
  reportProvider: LLMProviderName;
  providers: ProviderSettings;
  llm: {
    timeoutMs: number;
    maxAttempts: number;
    maxTokens: number;
  };
  toolTimeoutMs: number;
  successMarkers: string[];
  defaultMaxSteps: number;
  historyLimit: number | undefined;
  sessionStartDelayMs: number;
  maxRunTestsBodyBytes: number;
  mockApi: {
    port: number;
    url: string;
    cartDelayMs: number;
  };
}

/**
 * Parse the process environment into the application config.
 * Missing model endpoints are allowed here; they only become an error when a
 * session tries to build a gateway for that provider.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }
  const e = parsed.data;

  return {
    nodeEnv: e.NODE_ENV,
    port: e.PORT,
    allowedOrigins: e.ALLOWED_ORIGINS,
    agentProvider: e.LLM_PROVIDER,
    reportProvider: e.REPORT_LLM_PROVIDER ?? e.LLM_PROVIDER,
    providers: {
      ollama: { baseUrl: e.OLLAMA_URL ?? e.GEMMA_URL, model: e.OLLAMA_MODEL },
      openai: { baseUrl: e.OPENAI_BASE_URL, apiKey: e.OPENAI_API_KEY, model: e.OPENAI_MODEL },
      anthropic: { apiKey: e.ANTHROPIC_API_KEY, model: e.ANTHROPIC_MODEL },
    },
    llm: {
      timeoutMs: e.LLM_TIMEOUT_MS,
      maxAttempts: e.LLM_MAX_ATTEMPTS,
      maxTokens: e.LLM_MAX_TOKENS,
    },
    toolTimeoutMs: e.TOOL_TIMEOUT_MS,
    successMarkers: e.SUCCESS_MARKERS,
    defaultMaxSteps: e.DEFAULT_MAX_STEPS,
    historyLimit: e.HISTORY_LIMIT,
    sessionStartDelayMs: e.SESSION_START_DELAY_MS,
    maxRunTestsBodyBytes: e.MAX_RUN_TESTS_BODY_BYTES,
    mockApi: {
      port: e.MOCK_API_PORT,
      url: e.MOCK_API_URL,
      cartDelayMs: e.MOCK_CART_DELAY_MS,
    },
  };
}

export const config: AppConfig = loadConfig();
