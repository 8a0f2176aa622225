import { Hono } from 'hono';
import { logger as requestLogger } from 'hono/logger';
import { cors } from 'hono/cors';
import { loadConfig, type AppConfig } from './config.js';
import { sessionRoutes, type SessionFactory, type SessionRequest } from './api/sessions.js';
import { toolRoutes } from './api/tools.js';
import { bindModelTools, getChatModel } from './model/llm.js';
import { ChatSession } from './session/chat-session.js';
import { SessionStore } from './session/session-store.js';
import { STARTERS, WELCOME_MESSAGE } from './session/starters.js';
import { getTools } from './tools/registry.js';
import { MissingCredentialError, SessionBusyError, SessionNotFoundError } from './utils/errors.js';
import { logger } from './utils/logger.js';

export interface AppDeps {
  store?: SessionStore;
  createSession?: SessionFactory;
}

/** Builds a session on the configured (or requested) chat model with the full tool registry. */
export function createDefaultSession(request: SessionRequest, config: AppConfig = loadConfig()): ChatSession {
  const modelName = request.model ?? config.model;
  const llm = getChatModel(modelName, { apiKey: request.apiKey, temperature: config.temperature });
  const tools = getTools();
  logger.info(`[Server] new session on ${modelName}`);
  return new ChatSession({
    model: bindModelTools(llm, tools),
    tools,
    maxIterations: config.maxIterations,
    historyMaxTurns: config.historyMaxTurns,
  });
}

function defaultStore(config: AppConfig): SessionStore {
  return new SessionStore({ idleTtlMs: config.sessionIdleMinutes * 60_000, maxSessions: config.maxSessions });
}

export function createApp(deps: AppDeps = {}): Hono {
  const store = deps.store ?? defaultStore(loadConfig());
  const createSession = deps.createSession ?? ((request: SessionRequest) => createDefaultSession(request));

  const app = new Hono();

  app.use('*', requestLogger((message) => logger.info(message)));
  app.use('*', cors());

  app.get('/health', (c) => c.text('OK'));

  app.get('/api/starters', (c) => c.json({ welcome: WELCOME_MESSAGE, starters: STARTERS }));

  app.route('/api/sessions', sessionRoutes(store, createSession));
  app.route('/api/tools', toolRoutes);

  app.onError((err, c) => {
    if (err instanceof SessionNotFoundError) return c.json({ error: err.message }, 404);
    if (err instanceof SessionBusyError) return c.json({ error: err.message }, 409);
    if (err instanceof MissingCredentialError) return c.json({ error: err.message }, 401);
    logger.error('[Server] unhandled error', { error: err.message });
    return c.json({ error: 'Internal Server Error', details: err.message }, 500);
  });

  return app;
}
