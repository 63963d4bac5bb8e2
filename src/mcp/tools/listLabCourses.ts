/**
 * List Lab Courses Tool
 */

import { isLabCourse } from '../../calculators/courseCatalog.js';
import { NO_ARGS, success } from './shared.js';
import type { ToolContext, ToolDefinition, ToolEnvelope } from './shared.js';

export const definition: ToolDefinition = {
  name: 'list_lab_courses',
  description: 'List the laboratory courses in the course plan.',
  inputSchema: NO_ARGS,
};

export async function handler(_args: Record<string, unknown>, context: ToolContext): Promise<ToolEnvelope> {
  const labCourses = (await context.scraper.getCourses()).filter(isLabCourse);
  return success(context, {
    labCourses,
    totalLabCourses: labCourses.length,
  });
}
