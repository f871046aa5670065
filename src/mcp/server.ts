/**
 * MCP server over stdio
 */

import { pathToFileURL } from 'url';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { ZodError } from 'zod';
import { tools, getTool, zodToJsonSchema } from './tools/index.js';
import { getDatabase, closeDatabase } from '../storage/sqlite.js';
import { ensureCollection } from '../storage/qdrant.js';
import { sanitizeError } from '../utils/security.js';

export const SERVER_NAME = 'knowledge-drill';
export const SERVER_VERSION = '1.0.0';

function textResult(payload: unknown, isError: boolean) {
  return {
    content: [{ type: 'text' as const, text: JSON.stringify(payload, null, 2) }],
    isError,
  };
}

export function createServer(): Server {
  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return {
      tools: tools.map(tool => ({
        name: tool.name,
        description: tool.description,
        inputSchema: zodToJsonSchema(tool.inputSchema),
      })),
    };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    const tool = getTool(name);
    if (!tool) {
      return textResult({ success: false, error: `Unknown tool: ${name}` }, true);
    }

    try {
      const result = await tool.handler(args ?? {});
      return textResult(result, !result.success);
    } catch (error) {
      if (error instanceof ZodError) {
        const issues = error.errors.map(issue => `${issue.path.join('.') || 'input'}: ${issue.message}`);
        return textResult({ success: false, error: `Invalid arguments: ${issues.join('; ')}` }, true);
      }

      console.error(`[mcp] tool ${name} failed:`, error);
      return textResult({ success: false, error: `Tool execution failed: ${sanitizeError(error)}` }, true);
    }
  });

  return server;
}

async function initializeStorage(): Promise<void> {
  getDatabase();
  await ensureCollection();
}

export async function main(): Promise<void> {
  try {
    await initializeStorage();

    const server = createServer();
    const transport = new StdioServerTransport();
    await server.connect(transport);

    const shutdown = async () => {
      closeDatabase();
      await server.close();
      process.exit(0);
    };

    process.on('SIGINT', () => void shutdown());
    process.on('SIGTERM', () => void shutdown());

    // stdout carries the protocol
    console.error(`${SERVER_NAME} v${SERVER_VERSION} started`);
  } catch (error) {
    console.error('Failed to start MCP server:', error);
    process.exit(1);
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().catch(console.error);
}
