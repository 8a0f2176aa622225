import { Hono } from 'hono';
import { z } from 'zod';
import type { ChatSession } from '../session/chat-session.js';
import type { SessionStore } from '../session/session-store.js';
import { WELCOME_MESSAGE } from '../session/starters.js';

export interface SessionRequest {
  apiKey?: string;
  model?: string;
}

export type SessionFactory = (request: SessionRequest) => ChatSession;

const CreateSessionSchema = z.object({
  apiKey: z.string().trim().min(1).optional(),
  model: z.string().trim().min(1).optional(),
});

const MessageSchema = z.object({
  message: z.string().trim().min(1),
});

/**
 * POST   /api/sessions               -> 201 { id, welcome }
 * POST   /api/sessions/:id/messages  Body: { "message": "What is AAPL trading at?" }
 * GET    /api/sessions/:id/history
 * DELETE /api/sessions/:id
 */
export function sessionRoutes(store: SessionStore, createSession: SessionFactory): Hono {
  const routes = new Hono();

  routes.post('/', async (c) => {
    const body: unknown = await c.req.json().catch(() => ({}));
    const parsed = CreateSessionSchema.safeParse(body ?? {});
    if (!parsed.success) {
      return c.json({ error: 'Invalid Request', details: parsed.error.issues }, 400);
    }
    const session = store.add(createSession(parsed.data));
    return c.json({ id: session.id, welcome: WELCOME_MESSAGE }, 201);
  });

  routes.post('/:id/messages', async (c) => {
    const session = store.get(c.req.param('id'));
    const body: unknown = await c.req.json().catch(() => null);
    const parsed = MessageSchema.safeParse(body);
    if (!parsed.success) {
      return c.json({ error: 'Invalid Request', details: parsed.error.issues }, 400);
    }
    const reply = await session.send(parsed.data.message);
    return c.json(reply);
  });

  routes.get('/:id/history', (c) => {
    const session = store.get(c.req.param('id'));
    return c.json({ id: session.id, history: session.getHistory() });
  });

  routes.delete('/:id', (c) => {
    store.delete(c.req.param('id'));
    return c.body(null, 204);
  });

  return routes;
}
