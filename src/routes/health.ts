/**
 * Health Routes
 *
 * Liveness plus the state an operator wants at a glance: registered tools,
 * portal session and page caches. Does not contact the portal.
 */

import { Router } from 'express';
import type { Request, Response } from 'express';
import type { PortalScraper } from '../scrapers/portalScraper.js';
import { toolNames } from '../mcp/tools/index.js';
import { SERVER_INFO } from '../mcp/tools/shared.js';

export function createHealthRouter(scraper: PortalScraper, sse: { activeSessions: () => number }) {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    const stats = scraper.getStats();
    res.json({
      status: 'ok',
      server: SERVER_INFO.name,
      version: SERVER_INFO.version,
      tools: toolNames,
      session: stats.session,
      caches: stats.caches,
      sseSessions: sse.activeSessions(),
    });
  });

  return router;
}
