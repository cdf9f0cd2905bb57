import type { MemoryTurn, Persona } from './types.js';

export const EMPTY_HISTORY_PLACEHOLDER = 'No actions taken yet.';

/** JSON schema for a Decision, passed to providers with constrained output */
export const DECISION_RESPONSE_SCHEMA = {
  type: 'object',
  properties: {
    thought: { type: 'string', description: 'Your reasoning and critique about the last step.' },
    tool_name: { type: 'string', description: 'The name of the single tool to use next.' },
    parameters: { type: 'object', description: 'The parameters for the chosen tool.' },
  },
  required: ['thought', 'tool_name', 'parameters'],
} as const;

export function renderHistory(memory: readonly MemoryTurn[], historyLimit?: number): string {
  const window = historyLimit !== undefined && historyLimit > 0 ? memory.slice(-historyLimit) : memory;
  if (window.length === 0) return EMPTY_HISTORY_PLACEHOLDER;
  return window.map((turn) => `${turn.role}:\n${turn.content}`).join('\n');
}

export interface AgentPromptInput {
  persona: Persona;
  goal: string;
  capabilities: string;
  memory: readonly MemoryTurn[];
  historyLimit?: number;
}

export function buildAgentPrompt(input: AgentPromptInput): string {
  return `${input.persona.system_prompt}

Your ultimate goal is: "${input.goal}"

You have the following tools available:
${input.capabilities}

This is the history of your actions and observations so far:
<history>
${renderHistory(input.memory, input.historyLimit)}
</history>

Based on your persona, the goal, and the history, what is your next step?
You MUST respond in the following JSON format:
{
"thought": "Your detailed thought process and critique of the last observation.",
"tool_name": "The single tool you will use next.",
"parameters": { "param_name": "param_value" }
}`;
}
