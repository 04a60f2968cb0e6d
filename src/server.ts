import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type CallToolResult,
} from '@modelcontextprotocol/sdk/types.js';
import { ZodError } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { tools, getTool, renderToolResult } from './tools/index.js';
import { errorResult } from './tools/result.js';
import type { ToolContext, ToolResult } from './types.js';

export const SERVER_NAME = 'gmaps-tools';
export const SERVER_VERSION = '1.0.0';

function toCallToolResult(result: ToolResult<unknown>): CallToolResult {
  const { text, isError } = renderToolResult(result);
  return {
    content: [{ type: 'text', text }],
    isError,
  };
}

/**
 * Run one tool call. Every failure is reported in the result; nothing thrown
 * here reaches the transport.
 */
export async function dispatchTool(
  name: string,
  args: unknown,
  context: ToolContext
): Promise<CallToolResult> {
  const tool = getTool(name);
  if (!tool) {
    return toCallToolResult(errorResult('UNKNOWN_TOOL', `Unknown tool: ${name}`));
  }

  try {
    return toCallToolResult(await tool.handler(args ?? {}, context));
  } catch (error) {
    if (error instanceof ZodError) {
      return toCallToolResult(
        errorResult(
          'VALIDATION_ERROR',
          `Invalid input: ${error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ')}`
        )
      );
    }

    console.error(`Tool ${name} failed:`, error);
    return toCallToolResult(
      errorResult('INTERNAL_ERROR', error instanceof Error ? error.message : 'Unknown error')
    );
  }
}

/**
 * Create and configure the MCP server
 */
export function createServer(context: ToolContext): Server {
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

  // Handle list_tools request
  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return {
      tools: tools.map((tool) => ({
        name: tool.name,
        description: tool.description,
        inputSchema: { ...zodToJsonSchema(tool.inputSchema), type: 'object' as const },
      })),
    };
  });

  // Handle call_tool request
  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    return dispatchTool(name, args, context);
  });

  server.onerror = (error) => console.error('[MCP Error]', error);

  return server;
}
