import logger, { type Logger } from '../lib/logger.js';
import type { LanguageModelGateway } from './gateway.js';
import { buildAgentPrompt, DECISION_RESPONSE_SCHEMA } from './prompt.js';
import { decodeDecision, extractJsonPayload, serializeDecision } from './response-parser.js';
import type { ToolRegistry } from './tool-registry.js';
import type {
  AgentEventEmitter,
  AgentRunResult,
  MemoryTurn,
  Persona,
  StepFailure,
  TerminationReason,
} from './types.js';

export const DEFAULT_SUCCESS_MARKERS: readonly string[] = ['Checkout successful', 'ORDER CONFIRMED'];

/** Observations longer than this are shortened in the `observing` event message */
const OBSERVATION_PREVIEW_CHARS = 200;

export type CompletionGateway = Pick<LanguageModelGateway, 'complete'>;

export interface PersonaRunOptions {
  persona: Persona;
  goal: string;
  maxSteps: number;
  gateway: CompletionGateway;
  registry: ToolRegistry;
  successMarkers?: readonly string[];
  /** Window only the rendered history; memory itself is never trimmed */
  historyLimit?: number;
  signal?: AbortSignal;
  emit?: AgentEventEmitter;
  log?: Logger;
}

export function containsSuccessMarker(text: string, markers: readonly string[]): boolean {
  return markers.some((marker) => text.includes(marker));
}

export function memoryShowsSuccess(memory: readonly MemoryTurn[], markers: readonly string[]): boolean {
  return memory.some((turn) => containsSuccessMarker(turn.content, markers));
}

/**
 * Think, act, observe until a success marker shows up in an observation, the
 * step budget runs out, the model output cannot be decoded, or the caller aborts.
 *
 * A fault before any step completes is rethrown so the caller can report the
 * persona as failed; later faults end the run with what was gathered so far.
 */
export async function runPersonaAgent(options: PersonaRunOptions): Promise<AgentRunResult> {
  const { persona, goal, maxSteps, gateway, registry, signal } = options;
  const markers = options.successMarkers ?? DEFAULT_SUCCESS_MARKERS;
  const emit: AgentEventEmitter = options.emit ?? (() => {});
  const log = (options.log ?? logger).child({ persona: persona.name });

  const memory: MemoryTurn[] = [];
  const capabilities = registry.describeCapabilities();
  let stepsTaken = 0;
  let stepsCompleted = 0;
  let termination: TerminationReason = 'exhausted';
  let failure: StepFailure | undefined;

  emit({ type: 'thinking', message: `${persona.name} is analyzing the goal: ${goal}` });
  log.info({ goal, maxSteps }, 'Persona run starting');

  for (let step = 1; step <= maxSteps; step++) {
    if (signal?.aborted) {
      termination = 'aborted';
      break;
    }
    stepsTaken = step;

    try {
      const prompt = buildAgentPrompt({
        persona,
        goal,
        capabilities,
        memory,
        historyLimit: options.historyLimit,
      });

      emit({ type: 'thinking', message: `${persona.name} is thinking (step ${step})...` });
      const raw = await gateway.complete({ prompt, responseSchema: DECISION_RESPONSE_SCHEMA, signal });
      if (signal?.aborted) {
        termination = 'aborted';
        break;
      }

      const decoded = decodeDecision(extractJsonPayload(raw));
      if (!decoded.ok) {
        termination = 'decode_failure';
        failure = { step, reason: decoded.reason, raw_output: raw };
        log.warn({ step, reason: decoded.reason, raw: raw.slice(0, 500) }, 'Model output failed validation');
        emit({
          type: 'error',
          message: `${persona.name} produced an unreadable decision at step ${step}: ${decoded.reason}`,
          data: { raw_output: raw },
        });
        break;
      }

      const { decision } = decoded;
      memory.push({ role: 'assistant', content: serializeDecision(decision) });
      emit({ type: 'thinking', message: `${persona.name}: "${decision.thought}"` });
      emit({
        type: 'acting',
        message: `${persona.name} is using: ${decision.tool_name}`,
        data: { tool: decision.tool_name, parameters: decision.parameters },
      });

      const observation = await registry.invoke(decision.tool_name, decision.parameters, signal);
      if (signal?.aborted) {
        termination = 'aborted';
        break;
      }

      memory.push({ role: 'tool_observation', content: observation });
      stepsCompleted = step;

      const preview = observation.length > OBSERVATION_PREVIEW_CHARS
        ? `${observation.slice(0, OBSERVATION_PREVIEW_CHARS)}...`
        : observation;
      emit({
        type: 'observing',
        message: `${persona.name} observed: ${preview}`,
        data: { full_result: observation },
      });
      log.debug({ step, tool: decision.tool_name }, 'Step complete');

      if (containsSuccessMarker(observation, markers)) {
        termination = 'goal_reached';
        emit({ type: 'info', message: `${persona.name} completed the goal successfully!` });
        break;
      }
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      if (stepsCompleted === 0) {
        log.error({ step, error: reason }, 'Persona run failed before completing a step');
        throw err;
      }
      termination = 'step_error';
      failure = { step, reason };
      log.error({ step, error: reason }, 'Persona step failed');
      emit({ type: 'error', message: `${persona.name} encountered error at step ${step}: ${reason}` });
      break;
    }
  }

  const success = memoryShowsSuccess(memory, markers);
  log.info({ termination, stepsTaken, success }, 'Persona run finished');

  return {
    persona_name: persona.name,
    memory,
    steps_taken: stepsTaken,
    termination,
    success,
    ...(failure ? { failure } : {}),
  };
}
