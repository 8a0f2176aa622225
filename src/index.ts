import { serve } from '@hono/node-server';
import { loadConfig } from './config.js';
import { createApp } from './server.js';
import { logger } from './utils/logger.js';

const config = loadConfig();
const app = createApp();

serve({ fetch: app.fetch, port: config.port }, (info) => {
  logger.info(`[Server] listening on port ${info.port}`);
  console.log(`Stock chat agent listening on http://localhost:${info.port} (model: ${config.model})`);
});
