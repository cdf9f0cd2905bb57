import { serve } from '@hono/node-server';
import { config } from '../lib/config.js';
import logger from '../lib/logger.js';
import { createMockShopApi } from './app.js';

const app = createMockShopApi({ cartDelayMs: config.mockApi.cartDelayMs });
const port = config.mockApi.port;

const server = serve({ fetch: app.fetch, port });
logger.info({ port, cartDelayMs: config.mockApi.cartDelayMs }, `Mock shop API running at http://localhost:${port}`);

function shutdown(signal: string) {
  logger.info({ signal }, 'Mock shop API shutting down');
  server.close(() => process.exit(0));
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
