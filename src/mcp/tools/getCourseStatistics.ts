/**
 * Get Course Statistics Tool
 */

import { courseStatistics } from '../../calculators/courseCatalog.js';
import { NO_ARGS, success } from './shared.js';
import type { ToolContext, ToolDefinition, ToolEnvelope } from './shared.js';

export const definition: ToolDefinition = {
  name: 'get_course_statistics',
  description: 'Course plan statistics: total courses, courses per department, average title and code length.',
  inputSchema: NO_ARGS,
};

export async function handler(_args: Record<string, unknown>, context: ToolContext): Promise<ToolEnvelope> {
  return success(context, courseStatistics(await context.scraper.getCourses()));
}
