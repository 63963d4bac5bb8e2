/**
 * Get Courses By Department Tool
 */

import { z } from 'zod';
import { courseStatistics, coursesByDepartment } from '../../calculators/courseCatalog.js';
import { notFound, success } from './shared.js';
import type { ToolContext, ToolDefinition, ToolEnvelope } from './shared.js';

const argsSchema = z.object({
  department_code: z.string().trim().min(1, 'department_code is required'),
});

export const definition: ToolDefinition = {
  name: 'get_courses_by_department',
  description: 'List the courses of one department, identified by the letters in its course codes (e.g. "XT" for 20XT81).',
  inputSchema: {
    type: 'object',
    properties: {
      department_code: { type: 'string', description: 'Department letters, e.g. "XT"' },
    },
    required: ['department_code'],
  },
};

export async function handler(args: Record<string, unknown>, context: ToolContext): Promise<ToolEnvelope> {
  const { department_code } = argsSchema.parse(args);
  const courses = await context.scraper.getCourses();
  const matches = coursesByDepartment(courses, department_code);
  if (matches.length === 0) {
    return notFound(context, `No courses found for department '${department_code}'`, {
      availableDepartments: Object.keys(courseStatistics(courses).departments),
    });
  }
  return success(context, {
    departmentCode: department_code.toUpperCase(),
    courses: matches,
    totalCourses: matches.length,
  });
}
