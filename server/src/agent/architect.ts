import { z } from 'zod';
import logger from '../lib/logger.js';
import type { LanguageModelGateway } from './gateway.js';
import { createPersona, PersonaSchema, type Persona, type TestOutcome } from './types.js';

type Gateway = Pick<LanguageModelGateway, 'complete'>;

// ─── Persona generation ──────────────────────────────────────────────

export const PERSONA_RESPONSE_SCHEMA = {
  type: 'array',
  items: {
    type: 'object',
    properties: {
      name: { type: 'string', description: 'Short, memorable persona name' },
      system_prompt: {
        type: 'string',
        description: 'Directive for the agent: personality, technical skill, goals and pain points',
      },
    },
    required: ['name', 'system_prompt'],
  },
} as const;

const PERSONA_SYSTEM_INSTRUCTION = `You are an expert market researcher and product strategist.
Your task is to generate a certain number of distinct user personas based on the following market segment description provided by the user.

For each persona, you must create a name and a detailed system_prompt that a future AI agent will use.
The system_prompt should encapsulate their personality, technical skill, goals, and pain points.

You MUST respond with ONLY a valid JSON array of persona objects.`;

const GeneratedPersonasSchema = z.union([
  z.array(PersonaSchema),
  z.object({ personas: z.array(PersonaSchema) }).transform((value) => value.personas),
]);

/** The array payload, with any markdown fence stripped. */
function extractJsonArray(raw: string): string {
  const fenced = /```(?:json)?\s*([\s\S]*?)```/.exec(raw);
  const body = fenced ? fenced[1] : raw;
  const start = body.indexOf('[');
  const end = body.lastIndexOf(']');
  if (start !== -1 && end > start) return body.slice(start, end + 1);
  return body.trim();
}

/**
 * Ask the model for `count` distinct personas for a market segment. Any
 * failure (gateway sentinel, bad JSON, wrong shape) yields an empty list.
 */
export async function generatePersonas(
  gateway: Gateway,
  marketSegment: string,
  count: number,
  signal?: AbortSignal,
): Promise<Persona[]> {
  const log = logger.child({ component: 'architect' });
  const prompt = `Generate exactly ${count} distinct user personas for the market segment: "${marketSegment}"

Return them as a JSON array. Each persona should be unique and represent different aspects of this market segment.`;

  const raw = await gateway.complete({
    prompt,
    system: PERSONA_SYSTEM_INSTRUCTION,
    responseSchema: PERSONA_RESPONSE_SCHEMA,
    signal,
  });

  let value: unknown;
  try {
    value = JSON.parse(extractJsonArray(raw));
  } catch (err) {
    log.warn({ error: err instanceof Error ? err.message : String(err), raw: raw.slice(0, 500) }, 'Persona generation returned invalid JSON');
    return [];
  }

  const parsed = GeneratedPersonasSchema.safeParse(value);
  if (!parsed.success) {
    log.warn({ issues: parsed.error.issues.length, raw: raw.slice(0, 500) }, 'Persona generation returned an unexpected shape');
    return [];
  }

  log.info({ requested: count, received: parsed.data.length }, 'Personas generated');
  return parsed.data.map((p) => createPersona(p.name, p.system_prompt));
}

// ─── Report synthesis ────────────────────────────────────────────────

export function renderOutcomeLogs(outcomes: readonly TestOutcome[]): string {
  return outcomes
    .map((outcome) =>
      `\n--- START LOG: ${outcome.persona_name} (Success: ${outcome.was_successful}) ---\n`
      + JSON.stringify(outcome.log, null, 2)
      + `\n--- END LOG: ${outcome.persona_name} ---\n`)
    .join('');
}

export function buildReportPrompt(goal: string, outcomes: readonly TestOutcome[]): string {
  return `You are a principal product manager analyzing the results of an automated API test.
The overall goal of the test was: "${goal}"

Multiple AI agents, each with a different persona, attempted this goal.
Below are the raw JSON logs of their thought processes and actions.

<RAW_LOGS>
${renderOutcomeLogs(outcomes)}
</RAW_LOGS>

Your task is to analyze these logs and generate a concise, insightful report for a busy executive.
The report should be in Markdown format and have the following sections:

### Executive Summary
A 2-3 sentence overview of the test results. Did the agents generally succeed or fail? What was the most significant finding?

### Key Findings & Actionable Insights
A bulleted list of the 3-5 most critical issues discovered across all personas. For each issue, briefly explain the problem and suggest a concrete action for the engineering team.
Example:
- **ISSUE:** The \`/search\` endpoint is case-sensitive.
  **IMPACT:** This frustrated non-technical users like 'Casual Casey' who couldn't find products.
  **ACTION:** Modify the search endpoint to be case-insensitive by default.

### Persona Deep Dive
Briefly summarize the experience of 2-3 key personas, highlighting how their unique personality led to different outcomes.`;
}

/** Narrative report over every outcome. The text is returned as the model wrote it. */
export async function synthesizeReport(
  gateway: Gateway,
  goal: string,
  outcomes: readonly TestOutcome[],
  signal?: AbortSignal,
): Promise<string> {
  return gateway.complete({ prompt: buildReportPrompt(goal, outcomes), signal });
}
