import { Hono } from 'hono';
import { z } from 'zod';
import { callRegisteredTool, getRegisteredTool, getToolRegistry } from '../tools/registry.js';

const ToolCallSchema = z.object({
  tool: z.string().min(1),
  args: z.record(z.unknown()).default({}),
});

export const toolRoutes = new Hono();

toolRoutes.get('/', (c) =>
  c.json({
    tools: getToolRegistry().map((t) => ({ name: t.name, description: t.description.trim() })),
  })
);

/**
 * POST /api/tools/call
 * Body: { "tool": "get_stock_price", "args": { "ticker": "AAPL" } }
 *
 * Invokes a tool directly, without the chat model.
 */
toolRoutes.post('/call', async (c) => {
  const body: unknown = await c.req.json().catch(() => null);
  const parsed = ToolCallSchema.safeParse(body);
  if (!parsed.success) {
    return c.json({ error: 'Invalid Request', details: parsed.error.issues }, 400);
  }

  const { tool, args } = parsed.data;
  if (!getRegisteredTool(tool)) {
    return c.json({ error: `Tool '${tool}' not found` }, 404);
  }

  const startTime = performance.now();
  const result = await callRegisteredTool(tool, args);
  const duration = Math.round(performance.now() - startTime);
  return c.json({ tool, result, duration });
});
