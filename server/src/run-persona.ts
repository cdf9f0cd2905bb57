import { config } from './lib/config.js';
import { createProvider } from './lib/llm.js';
import logger from './lib/logger.js';
import { LanguageModelGateway } from './agent/gateway.js';
import { runPersonaAgent } from './agent/loop.js';
import { CASUAL_SHOPPER, findPresetPersona } from './agent/personas.js';
import { createShopToolRegistry } from './agent/tools/index.js';

const DEFAULT_GOAL = 'Find a wireless mouse, add one to the cart and complete the purchase.';

/**
 * Usage: run-persona [persona name] [goal]
 * Runs one built-in persona against MOCK_API_URL with the configured provider.
 */
async function main(): Promise<number> {
  const [personaArg, goalArg] = process.argv.slice(2);
  const persona = personaArg ? findPresetPersona(personaArg) : CASUAL_SHOPPER;
  if (!persona) {
    logger.error({ persona: personaArg }, 'Unknown persona; use "Casual Casey" or "Power-User Paula"');
    return 2;
  }

  const gateway = new LanguageModelGateway(createProvider(config.agentProvider, config), {
    timeoutMs: config.llm.timeoutMs,
    maxAttempts: config.llm.maxAttempts,
    maxTokens: config.llm.maxTokens,
  });
  const registry = createShopToolRegistry({ baseUrl: config.mockApi.url, timeoutMs: config.toolTimeoutMs });

  const result = await runPersonaAgent({
    persona,
    goal: goalArg ?? DEFAULT_GOAL,
    maxSteps: config.defaultMaxSteps,
    gateway,
    registry,
    successMarkers: config.successMarkers,
    historyLimit: config.historyLimit,
    emit: (event) => logger.info({ type: event.type }, event.message),
  });

  logger.info(
    {
      persona: result.persona_name,
      success: result.success,
      termination: result.termination,
      steps: result.steps_taken,
      failure: result.failure,
    },
    'Run finished',
  );
  return result.success ? 0 : 1;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    logger.error({ error: err instanceof Error ? err.message : String(err) }, 'Persona run failed');
    process.exitCode = 1;
  },
);
