/**
 * Health Check Tool
 *
 * Logs in from scratch and scrapes the marks page. Any failure on the way
 * makes the server unhealthy.
 */

import { toToolError } from '../../errors.js';
import { logger } from '../../utils/logger.js';
import { NO_ARGS, SERVER_INFO, failure, success } from './shared.js';
import type { ToolContext, ToolDefinition, ToolEnvelope } from './shared.js';

export const definition: ToolDefinition = {
  name: 'health_check',
  description: 'Check that the server can log in to the portal and read the marks page.',
  inputSchema: NO_ARGS,
};

export async function handler(_args: Record<string, unknown>, context: ToolContext): Promise<ToolEnvelope> {
  try {
    const report = await context.scraper.checkHealth();
    return success(context, {
      status: 'healthy',
      server: SERVER_INFO.name,
      version: SERVER_INFO.version,
      ...report,
    });
  } catch (err) {
    logger.error('Health', `Health check failed: ${toToolError(err).message}`);
    return failure(context, err, {
      status: 'unhealthy',
      server: SERVER_INFO.name,
      version: SERVER_INFO.version,
    });
  }
}
