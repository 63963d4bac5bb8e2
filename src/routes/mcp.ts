/**
 * MCP SSE Routes
 *
 * GET /sse opens a stream and gets its own MCP server; the client then posts
 * JSON-RPC messages to /messages?sessionId=<id>.
 */

import { Router } from 'express';
import type { Request, Response } from 'express';
import { SSEServerTransport } from '@modelcontextprotocol/sdk/server/sse.js';
import { createMcpServer } from '../mcp/server.js';
import type { ToolContext } from '../mcp/tools/shared.js';
import { logger } from '../utils/logger.js';

export interface McpRouter {
  router: Router;
  activeSessions: () => number;
  closeAll: () => Promise<void>;
}

export function createMcpRouter(context: ToolContext): McpRouter {
  const router = Router();
  const transports = new Map<string, SSEServerTransport>();

  router.get('/sse', async (_req: Request, res: Response) => {
    const transport = new SSEServerTransport('/messages', res);
    const sessionId = transport.sessionId;
    transports.set(sessionId, transport);
    logger.info('SSE', `Client connected (${sessionId}), ${transports.size} active`);

    res.on('close', () => {
      transports.delete(sessionId);
      logger.info('SSE', `Client disconnected (${sessionId}), ${transports.size} active`);
    });

    try {
      await createMcpServer(context).connect(transport);
    } catch (err) {
      transports.delete(sessionId);
      logger.error('SSE', `Failed to open session ${sessionId}: ${err instanceof Error ? err.message : String(err)}`);
      if (!res.headersSent) {
        res.status(500).json({ error: 'Failed to open SSE session' });
      }
    }
  });

  router.post('/messages', async (req: Request, res: Response) => {
    const sessionId = typeof req.query.sessionId === 'string' ? req.query.sessionId : '';
    const transport = transports.get(sessionId);
    if (!transport) {
      res.status(404).json({ error: `No active SSE session '${sessionId}'` });
      return;
    }

    try {
      await transport.handlePostMessage(req, res, req.body);
    } catch (err) {
      logger.error('SSE', `Message for ${sessionId} failed: ${err instanceof Error ? err.message : String(err)}`);
      if (!res.headersSent) {
        res.status(500).json({ error: 'Failed to handle message' });
      }
    }
  });

  /** End every open stream so the HTTP server can close */
  const closeAll = async (): Promise<void> => {
    const open = [...transports.values()];
    transports.clear();
    await Promise.all(open.map(transport => transport.close()));
    if (open.length > 0) {
      logger.info('SSE', `Closed ${open.length} open session(s)`);
    }
  };

  return {
    router,
    activeSessions: () => transports.size,
    closeAll,
  };
}
