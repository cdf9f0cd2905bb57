import { Hono } from 'hono';
import { cors } from 'hono/cors';
import type { AppConfig } from './lib/config.js';
import { createProvider, isProviderConfigured } from './lib/llm.js';
import logger from './lib/logger.js';
import { SessionStore } from './lib/session-store.js';
import { requestIdMiddleware } from './middleware/request-id.js';
import { LanguageModelGateway } from './agent/gateway.js';
import type { CompletionGateway } from './agent/loop.js';
import type { ToolRegistry } from './agent/tool-registry.js';
import { createShopToolRegistry } from './agent/tools/index.js';
import { createPersonaRoutes } from './routes/personas.js';
import { createTestSessionRoutes } from './routes/test-sessions.js';

export type GatewayRole = 'agent' | 'report';

export interface AppDeps {
  config: AppConfig;
  store: SessionStore;
  createGateway: (role: GatewayRole) => CompletionGateway;
  createRegistry: (apiUrl: string) => ToolRegistry;
}

export function createDefaultDeps(appConfig: AppConfig): AppDeps {
  return {
    config: appConfig,
    store: new SessionStore(),
    createGateway: (role) => {
      const providerName = role === 'agent' ? appConfig.agentProvider : appConfig.reportProvider;
      const provider = createProvider(providerName, appConfig);
      return new LanguageModelGateway(provider, {
        timeoutMs: appConfig.llm.timeoutMs,
        maxAttempts: appConfig.llm.maxAttempts,
        maxTokens: appConfig.llm.maxTokens,
        log: logger.child({ component: 'llm-gateway', role, provider: provider.name }),
      });
    },
    createRegistry: (apiUrl) =>
      createShopToolRegistry({ baseUrl: apiUrl, timeoutMs: appConfig.toolTimeoutMs }),
  };
}

export function createApp(deps: AppDeps): Hono {
  const { config: appConfig, store } = deps;
  const app = new Hono();

  app.use('*', requestIdMiddleware);
  app.use('*', cors({
    origin: appConfig.allowedOrigins.length > 0 ? appConfig.allowedOrigins : '*',
  }));

  app.get('/', (c) => c.json({
    service: 'persona-probe',
    status: 'running',
    endpoints: {
      presets: '/api/personas/presets',
      generate_personas: '/api/generate-personas',
      run_tests: '/api/run-tests',
      session_status: '/api/test-sessions/{session_id}',
      session_logs: '/api/test-sessions/{session_id}/logs',
    },
  }));

  app.get('/health', (c) => {
    c.header('Cache-Control', 'no-store');
    return c.json({
      status: 'ok',
      sessions: store.size(),
      agent_provider: appConfig.agentProvider,
      agent_provider_configured: isProviderConfigured(appConfig.agentProvider, appConfig),
      report_provider: appConfig.reportProvider,
      report_provider_configured: isProviderConfigured(appConfig.reportProvider, appConfig),
      timestamp: new Date().toISOString(),
    });
  });

  app.route('/api', createPersonaRoutes({
    createGateway: () => deps.createGateway('agent'),
    maxBodyBytes: appConfig.maxRunTestsBodyBytes,
  }));
  app.route('/api', createTestSessionRoutes({
    store,
    defaultMaxSteps: appConfig.defaultMaxSteps,
    maxBodyBytes: appConfig.maxRunTestsBodyBytes,
    runner: {
      createAgentGateway: () => deps.createGateway('agent'),
      createReportGateway: () => deps.createGateway('report'),
      createRegistry: deps.createRegistry,
      successMarkers: appConfig.successMarkers,
      historyLimit: appConfig.historyLimit,
      startDelayMs: appConfig.sessionStartDelayMs,
    },
  }));

  app.notFound((c) => c.json({ error: 'Not found' }, 404));

  app.onError((err, c) => {
    const requestId = c.get('requestId');
    logger.error({ err, requestId }, 'Unhandled error');
    return c.json({ error: 'Internal server error', request_id: requestId }, 500);
  });

  return app;
}
