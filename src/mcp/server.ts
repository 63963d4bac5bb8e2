/**
 * MCP Server
 *
 * Advertises every tool and routes calls through handleToolCall. The JSON
 * envelope travels as the text content; error envelopes also set isError.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { functionDeclarations, handleToolCall } from './tools/index.js';
import { SERVER_INFO } from './tools/shared.js';
import type { ToolContext, ToolEnvelope } from './tools/shared.js';

export function toCallToolResult(envelope: ToolEnvelope): CallToolResult {
  return {
    content: [{ type: 'text', text: JSON.stringify(envelope, null, 2) }],
    isError: envelope.status === 'error',
  };
}

export function createMcpServer(context: ToolContext): Server {
  const server = new Server(
    { name: SERVER_INFO.name, version: SERVER_INFO.version },
    { capabilities: { tools: {} } }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: functionDeclarations,
  }));

  server.setRequestHandler(CallToolRequestSchema, async request => {
    const { name, arguments: args } = request.params;
    return toCallToolResult(await handleToolCall(name, args, context));
  });

  return server;
}
