import { Hono } from 'hono';
import { streamSSE } from 'hono/streaming';
import { z } from 'zod';
import { PersonaSchema } from '../agent/types.js';
import { cancelTestSession, runTestSession, type SessionRunnerDeps } from '../agent/session-runner.js';
import type { LogEvent, SessionStore, TestSession } from '../lib/session-store.js';
import { parseJsonBodyWithLimit } from '../lib/http-body-guard.js';
import { validateBody } from '../lib/validate.js';
import logger from '../lib/logger.js';

const HEARTBEAT_INTERVAL_MS = 10_000;

const RunTestsSchema = z.object({
  personas: z.array(PersonaSchema).min(1).max(20),
  test_goal: z.string().trim().min(1).max(2_000),
  api_url: z.string().trim().url(),
  max_steps: z.number().int().min(1).max(50).optional(),
});

export interface TestSessionRouteDeps {
  store: SessionStore;
  runner: Omit<SessionRunnerDeps, 'store'>;
  defaultMaxSteps: number;
  maxBodyBytes: number;
  heartbeatMs?: number;
}

function sessionView(session: TestSession, logCount: number) {
  const finished = session.status === 'completed';
  return {
    session_id: session.id,
    status: session.status,
    personas: session.personas,
    test_goal: session.test_goal,
    api_url: session.api_url,
    max_steps: session.max_steps,
    log_count: logCount,
    created_at: session.created_at,
    completed_at: session.completed_at,
    failed_personas: session.failed_personas,
    error: session.error,
    ...(finished ? { results: session.results, report: session.report } : {}),
  };
}

export function createTestSessionRoutes(deps: TestSessionRouteDeps): Hono {
  const { store } = deps;
  const routes = new Hono();

  // POST /run-tests: create a session and start it in the background
  routes.post('/run-tests', async (c) => {
    const body = await parseJsonBodyWithLimit(c, deps.maxBodyBytes);
    if (!body.ok) return body.response;

    const parsed = validateBody(RunTestsSchema, body.data);
    if (!parsed.success) {
      return c.json({ error: 'Invalid request', details: parsed.issues }, 400);
    }

    const session = store.create({
      personas: parsed.data.personas,
      test_goal: parsed.data.test_goal,
      api_url: parsed.data.api_url,
      max_steps: parsed.data.max_steps ?? deps.defaultMaxSteps,
    });
    logger.info(
      { sessionId: session.id, personas: session.personas.length, requestId: c.get('requestId') },
      'Test session started',
    );

    runTestSession(session.id, { ...deps.runner, store }).catch((err: unknown) => {
      logger.error(
        { sessionId: session.id, error: err instanceof Error ? err.message : String(err) },
        'Test session runner crashed',
      );
    });

    return c.json({ session_id: session.id, status: session.status });
  });

  // GET /test-sessions/:id: status snapshot, with results once completed
  routes.get('/test-sessions/:id', (c) => {
    const sessionId = c.req.param('id');
    const session = store.get(sessionId);
    if (!session) {
      return c.json({ error: 'Session not found' }, 404);
    }
    return c.json(sessionView(session, store.getLogs(sessionId).length));
  });

  // GET /test-sessions/:id/logs: history replay then live events over SSE
  routes.get('/test-sessions/:id/logs', (c) => {
    const sessionId = c.req.param('id');
    if (!store.get(sessionId)) {
      return c.json({ error: 'Session not found' }, 404);
    }

    return streamSSE(c, async (stream) => {
      let sequence = 0;
      let finish: () => void = () => {};
      const done = new Promise<void>((resolve) => {
        finish = resolve;
      });

      // Writes are chained so events leave in the order they were stored
      let pending: Promise<void> = Promise.resolve();
      const write = (message: { id?: string; event: string; data: string }) => {
        pending = pending
          .then(() => stream.writeSSE(message))
          .catch(() => {
            logger.warn({ sessionId }, 'SSE write failed, closing log stream');
            finish();
          });
      };

      const send = (event: LogEvent) => {
        write({ id: String(sequence++), event: event.type, data: JSON.stringify(event) });
        if (store.isFinished(sessionId)) finish();
      };

      const unsubscribe = store.subscribe(sessionId, send);
      if (store.isFinished(sessionId)) finish();

      const heartbeat = setInterval(() => {
        write({ event: 'heartbeat', data: '' });
      }, deps.heartbeatMs ?? HEARTBEAT_INTERVAL_MS);
      heartbeat.unref();

      stream.onAbort(() => finish());

      try {
        await done;
      } finally {
        clearInterval(heartbeat);
        unsubscribe();
        await pending;
      }
    });
  });

  // DELETE /test-sessions/:id: abandon a running session
  routes.delete('/test-sessions/:id', (c) => {
    const sessionId = c.req.param('id');
    const outcome = cancelTestSession(store, sessionId);
    if (outcome === 'not_found') {
      return c.json({ error: 'Session not found' }, 404);
    }
    if (outcome === 'already_finished') {
      return c.json({ error: 'Session already finished' }, 409);
    }
    return c.json({ session_id: sessionId, status: 'cancelled' });
  });

  return routes;
}
