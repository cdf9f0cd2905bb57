import logger, { createSessionLogger, type Logger } from '../lib/logger.js';
import type { SessionStore, TestSession } from '../lib/session-store.js';
import { synthesizeReport } from './architect.js';
import { GATEWAY_ERROR_SENTINEL } from './gateway.js';
import { runPersonaAgent, type CompletionGateway } from './loop.js';
import type { ToolRegistry } from './tool-registry.js';
import { toTestOutcome, type TestOutcome } from './types.js';

const PREPARATION_MESSAGES = [
  'Preparing test environment...',
  'Initializing AI agents...',
  'Ready to start persona testing!',
];

export interface SessionRunnerDeps {
  store: SessionStore;
  /** Both factories may throw ConfigurationError, which fails the session */
  createAgentGateway: () => CompletionGateway;
  createReportGateway: () => CompletionGateway;
  createRegistry: (apiUrl: string) => ToolRegistry;
  successMarkers?: readonly string[];
  /** Pause after each preparation message so late observers can attach */
  startDelayMs: number;
  historyLimit?: number;
  log?: Logger;
}

function sleep(ms: number, signal: AbortSignal): Promise<void> {
  if (ms <= 0 || signal.aborted) return Promise.resolve();
  return new Promise((resolve) => {
    const timer = setTimeout(done, ms);
    function done() {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    }
    signal.addEventListener('abort', done, { once: true });
  });
}

/**
 * Run every persona of a session in order, then synthesize the report.
 * Resolves once the session reaches a terminal status. Rejects only for an
 * unknown session id.
 */
export async function runTestSession(sessionId: string, deps: SessionRunnerDeps): Promise<void> {
  const { store } = deps;
  const session = store.get(sessionId);
  if (!session) {
    throw new Error(`Unknown session ${sessionId}`);
  }
  const log = deps.log?.child({ sessionId }) ?? createSessionLogger(sessionId);
  const signal = session.abort.signal;

  try {
    for (const message of PREPARATION_MESSAGES) {
      store.appendLog(sessionId, { type: 'info', message });
      await sleep(deps.startDelayMs, signal);
      if (signal.aborted) return;
    }

    await executeSession(session, deps, log);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    log.error({ error: message }, 'Test session failed');
    if (signal.aborted) return;
    // Status first: observers close the stream once they see a terminal status
    store.update(sessionId, { status: 'failed', error: message });
    store.appendLog(sessionId, { type: 'error', message: `Test session failed: ${message}` });
  }
}

async function executeSession(session: TestSession, deps: SessionRunnerDeps, log: Logger): Promise<void> {
  const { store } = deps;
  const sessionId = session.id;
  const signal = session.abort.signal;
  const total = session.personas.length;

  store.appendLog(sessionId, { type: 'info', message: `Starting test session with ${total} personas` });
  store.update(sessionId, { status: 'testing' });

  // Configuration faults surface here, before any persona starts
  const agentGateway = deps.createAgentGateway();
  const reportGateway = deps.createReportGateway();
  const registry = deps.createRegistry(session.api_url);

  const outcomes: TestOutcome[] = [];
  const failedPersonas: string[] = [];

  for (const [index, persona] of session.personas.entries()) {
    if (signal.aborted) return;
    store.appendLog(sessionId, {
      type: 'info',
      message: `Starting tests for ${persona.name} (${index + 1}/${total})`,
    });

    try {
      const result = await runPersonaAgent({
        persona,
        goal: session.test_goal,
        maxSteps: session.max_steps,
        gateway: agentGateway,
        registry,
        successMarkers: deps.successMarkers,
        historyLimit: deps.historyLimit,
        signal,
        log,
        emit: (event) => {
          store.appendLog(sessionId, { ...event, persona_name: persona.name });
        },
      });
      if (signal.aborted) return;

      outcomes.push(toTestOutcome(result));
      store.appendLog(sessionId, {
        type: 'info',
        message: `${persona.name} completed: ${result.success ? 'Success' : 'Failed'}`,
        persona_name: persona.name,
        data: { termination: result.termination, steps_taken: result.steps_taken },
      });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      failedPersonas.push(persona.name);
      store.appendLog(sessionId, {
        type: 'error',
        message: `${persona.name} failed to complete: ${message}`,
        persona_name: persona.name,
      });
    }
  }

  store.appendLog(sessionId, { type: 'info', message: 'Generating final report...' });
  const report = await synthesizeReport(reportGateway, session.test_goal, outcomes, signal);
  if (signal.aborted) return;
  if (report === GATEWAY_ERROR_SENTINEL) {
    store.appendLog(sessionId, { type: 'error', message: 'Report synthesis failed: the language model service did not respond' });
  }

  store.update(sessionId, {
    status: 'completed',
    results: outcomes,
    failed_personas: failedPersonas,
    report,
  });
  store.appendLog(sessionId, {
    type: 'complete',
    message: 'All persona tests completed!',
    data: { report, results: outcomes, failed_personas: failedPersonas },
  });
  log.info({ outcomes: outcomes.length, failed: failedPersonas.length }, 'Test session completed');
}

export type CancelResult = 'cancelled' | 'not_found' | 'already_finished';

/** Abandon a running session. The runner stops at its next step boundary. */
export function cancelTestSession(store: SessionStore, sessionId: string): CancelResult {
  const session = store.get(sessionId);
  if (!session) return 'not_found';
  if (store.isFinished(sessionId)) return 'already_finished';

  store.update(sessionId, { status: 'cancelled' });
  session.abort.abort(new Error('Session cancelled'));
  store.appendLog(sessionId, { type: 'info', message: 'Test session cancelled' });
  logger.info({ sessionId }, 'Test session cancelled');
  return 'cancelled';
}
