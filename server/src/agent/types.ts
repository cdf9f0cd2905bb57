import { z } from 'zod';

// ─── Persona ─────────────────────────────────────────────────────────

export const PersonaSchema = z.object({
  name: z.string().trim().min(1).max(200),
  system_prompt: z.string().trim().min(1).max(20_000),
});

export type Persona = Readonly<z.infer<typeof PersonaSchema>>;

/** Freeze a persona so every run that shares it sees the same directive. */
export function createPersona(name: string, systemPrompt: string): Persona {
  return Object.freeze({ name, system_prompt: systemPrompt });
}

// ─── Decision ────────────────────────────────────────────────────────

/**
 * One parsed model turn. Field names are the wire format the prompt asks for.
 * `parameters` stays a dynamic map; each operation validates its own arguments.
 */
export const DecisionSchema = z.object({
  thought: z.string(),
  tool_name: z.string(),
  parameters: z.record(z.string(), z.unknown()),
});

export type Decision = Readonly<z.infer<typeof DecisionSchema>>;

// ─── Memory ──────────────────────────────────────────────────────────

export type MemoryRole = 'assistant' | 'tool_observation';

export interface MemoryTurn {
  readonly role: MemoryRole;
  readonly content: string;
}

// ─── Run results ─────────────────────────────────────────────────────

export type TerminationReason =
  /** An observation carried a goal-completion marker */
  | 'goal_reached'
  /** Step budget used up without the marker */
  | 'exhausted'
  /** Model output (or the gateway sentinel) did not decode into a Decision */
  | 'decode_failure'
  /** An unexpected fault after at least one completed step */
  | 'step_error'
  /** The caller abandoned the run */
  | 'aborted';

export interface StepFailure {
  step: number;
  reason: string;
  raw_output?: string;
}

export interface AgentRunResult {
  persona_name: string;
  memory: readonly MemoryTurn[];
  steps_taken: number;
  termination: TerminationReason;
  success: boolean;
  failure?: StepFailure;
}

/** Per-persona summary consumed by report synthesis */
export interface TestOutcome {
  readonly persona_name: string;
  readonly log: readonly MemoryTurn[];
  readonly was_successful: boolean;
}

export function toTestOutcome(result: AgentRunResult): TestOutcome {
  return Object.freeze({
    persona_name: result.persona_name,
    log: result.memory,
    was_successful: result.success,
  });
}

// ─── Progress events ─────────────────────────────────────────────────

export type LogType = 'info' | 'thinking' | 'acting' | 'observing' | 'error' | 'complete';

export interface AgentEvent {
  type: LogType;
  message: string;
  data?: Record<string, unknown>;
}

export type AgentEventEmitter = (event: AgentEvent) => void;
