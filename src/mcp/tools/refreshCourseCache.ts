/**
 * Refresh Course Cache Tool
 */

import { courseStatistics } from '../../calculators/courseCatalog.js';
import { logger } from '../../utils/logger.js';
import { NO_ARGS, success } from './shared.js';
import type { ToolContext, ToolDefinition, ToolEnvelope } from './shared.js';

export const definition: ToolDefinition = {
  name: 'refresh_course_cache',
  description: 'Throw away the cached course plan and fetch it again from the portal.',
  inputSchema: NO_ARGS,
};

export async function handler(_args: Record<string, unknown>, context: ToolContext): Promise<ToolEnvelope> {
  const courses = await context.scraper.refreshCourses();
  logger.info('Tools', `Course cache refreshed with ${courses.length} courses`);
  return success(context, {
    refreshed: true,
    totalCourses: courses.length,
    statistics: courseStatistics(courses),
  });
}
