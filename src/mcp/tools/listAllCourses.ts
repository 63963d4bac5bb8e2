/**
 * List All Courses Tool
 */

import { NO_ARGS, success } from './shared.js';
import type { ToolContext, ToolDefinition, ToolEnvelope } from './shared.js';

export const definition: ToolDefinition = {
  name: 'list_all_courses',
  description: 'List every course in the course plan with its code, title and description.',
  inputSchema: NO_ARGS,
};

export async function handler(_args: Record<string, unknown>, context: ToolContext): Promise<ToolEnvelope> {
  const courses = await context.scraper.getCourses();
  return success(context, {
    courses,
    totalCourses: courses.length,
  });
}
