/**
 * Server bootstrap for both transports
 *
 * - stdio: one MCP server on stdin/stdout (logs stay on stderr)
 * - sse:   express app with /sse, /messages and /health
 */

import type { Server as HttpServer } from 'http';
import express from 'express';
import type { Express } from 'express';
import cors from 'cors';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { AppConfig } from './config.js';
import { createMcpServer } from './mcp/server.js';
import { toolNames } from './mcp/tools/index.js';
import type { ToolContext } from './mcp/tools/shared.js';
import { createHealthRouter } from './routes/health.js';
import { createMcpRouter } from './routes/mcp.js';
import type { McpRouter } from './routes/mcp.js';
import { logger } from './utils/logger.js';

export interface RunningServer {
  close(): Promise<void>;
}

export interface HttpApp {
  app: Express;
  sse: McpRouter;
}

export function createApp(context: ToolContext): HttpApp {
  const app = express();
  app.use(cors());
  app.use(express.json());

  const sse = createMcpRouter(context);
  app.use('/', sse.router);
  app.use('/health', createHealthRouter(context.scraper, sse));

  return { app, sse };
}

export async function startStdioServer(context: ToolContext): Promise<RunningServer> {
  const server = createMcpServer(context);
  await server.connect(new StdioServerTransport());
  logger.info('Server', `MCP server on stdio with ${toolNames.length} tools`);
  return { close: () => server.close() };
}

export interface SseServer extends RunningServer {
  port: number;
  activeSessions: () => number;
}

export async function startSseServer(context: ToolContext, host: string, port: number): Promise<SseServer> {
  const { app, sse } = createApp(context);

  const httpServer = await new Promise<HttpServer>((resolve, reject) => {
    const listening = app.listen(port, host, () => resolve(listening));
    listening.once('error', reject);
  });

  const address = httpServer.address();
  const boundPort = address && typeof address === 'object' ? address.port : port;

  logger.info('Server', `MCP SSE server on http://${host}:${boundPort}/sse with ${toolNames.length} tools`);
  logger.info('Server', `Health: http://${host}:${boundPort}/health`);

  return {
    port: boundPort,
    activeSessions: sse.activeSessions,
    close: async () => {
      // SSE streams never end on their own; close() would wait on them forever
      await sse.closeAll();
      const closed = new Promise<void>((resolve, reject) => {
        httpServer.close(err => (err ? reject(err) : resolve()));
      });
      httpServer.closeAllConnections();
      await closed;
    },
  };
}

export async function startServer(config: AppConfig, context: ToolContext): Promise<RunningServer> {
  return config.server.transport === 'stdio'
    ? startStdioServer(context)
    : startSseServer(context, config.server.host, config.server.port);
}
