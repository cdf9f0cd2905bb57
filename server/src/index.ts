import { serve } from '@hono/node-server';
import { fileURLToPath } from 'node:url';
import path from 'node:path';
import { createApp, createDefaultDeps } from './app.js';
import { cancelTestSession } from './agent/session-runner.js';
import { config } from './lib/config.js';
import { isProviderConfigured } from './lib/llm.js';
import logger from './lib/logger.js';

const deps = createDefaultDeps(config);
const app = createApp(deps);

let server: ReturnType<typeof serve> | null = null;
let shuttingDown = false;

function shutdown(signal: string) {
  if (shuttingDown) return;
  if (!server) return;
  shuttingDown = true;
  logger.info({ signal }, 'Graceful shutdown initiated');

  // Running sessions stop at their next step boundary
  for (const sessionId of deps.store.activeIds()) {
    cancelTestSession(deps.store, sessionId);
  }

  server.close(() => {
    logger.info('HTTP server closed');
    process.exit(0);
  });

  // Open SSE streams can hold the server; force exit if they do not drain
  setTimeout(() => {
    logger.warn('Forcing exit after shutdown timeout');
    process.exit(1);
  }, 10_000).unref();
}

export function startServer() {
  if (server) return server;

  const port = config.port;
  if (!isProviderConfigured(config.agentProvider, config)) {
    logger.warn(
      { provider: config.agentProvider },
      'Language model provider is not configured; test sessions will fail until it is',
    );
  }

  server = serve({ fetch: app.fetch, port });
  logger.info({ port, provider: config.agentProvider }, `Server running at http://localhost:${port}`);

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'Unhandled promise rejection');
    shutdown('UNHANDLED_REJECTION');
  });
  process.on('uncaughtException', (err) => {
    logger.error({ err }, 'Uncaught exception');
    shutdown('UNCAUGHT_EXCEPTION');
  });

  return server;
}

function isMainModule(): boolean {
  const current = fileURLToPath(import.meta.url);
  const entry = process.argv[1];
  if (!entry) return false;
  return path.resolve(entry) === path.resolve(current);
}

if (isMainModule()) {
  startServer();
}

export { app };
