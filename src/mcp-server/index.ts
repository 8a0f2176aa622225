#!/usr/bin/env node
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { createMcpServer } from './server.js';

async function run() {
  const transport = new StdioServerTransport();
  await createMcpServer().connect(transport);
  console.error('Stock chat MCP server running on stdio');
}

run().catch((error: unknown) => {
  console.error('Fatal error running server:', error);
  process.exit(1);
});
