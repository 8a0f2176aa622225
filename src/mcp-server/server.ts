import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import { ZodType } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { callRegisteredTool, getRegisteredTool, getToolRegistry } from '../tools/registry.js';
import { serializeToolResult } from '../tools/types.js';
import { logger } from '../utils/logger.js';

interface ToolInputSchema {
  [key: string]: unknown;
  type: 'object';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function toInputSchema(schema: unknown): ToolInputSchema {
  const json: unknown = schema instanceof ZodType ? zodToJsonSchema(schema) : schema;
  return isRecord(json) ? { ...json, type: 'object' } : { type: 'object' };
}

export function createMcpServer(): Server {
  const server = new Server(
    {
      name: 'stock-chat-agent',
      version: '0.1.0',
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: getToolRegistry().map((t) => ({
      name: t.name,
      description: t.description.trim(),
      inputSchema: toInputSchema(t.tool.schema),
    })),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name } = request.params;
    if (!getRegisteredTool(name)) {
      throw new Error(`Tool '${name}' not found`);
    }

    // stdout carries the protocol
    console.error(`[MCP] calling ${name}`);
    logger.info(`[MCP] calling ${name}`, request.params.arguments);
    const result = await callRegisteredTool(name, request.params.arguments ?? {});

    return {
      content: [{ type: 'text' as const, text: serializeToolResult(result) }],
      isError: result.kind === 'error',
    };
  });

  return server;
}
