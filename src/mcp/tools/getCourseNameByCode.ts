/**
 * Get Course Name By Code Tool
 */

import { departmentCode, findCourseByCode } from '../../calculators/courseCatalog.js';
import { COURSE_CODE_PROPERTY, courseCodeArgs, notFound, success } from './shared.js';
import type { ToolContext, ToolDefinition, ToolEnvelope } from './shared.js';

export const definition: ToolDefinition = {
  name: 'get_course_name_by_code',
  description: 'Look up the full course title for a course code from the course plan.',
  inputSchema: {
    type: 'object',
    properties: {
      course_code: COURSE_CODE_PROPERTY,
    },
    required: ['course_code'],
  },
};

export async function handler(args: Record<string, unknown>, context: ToolContext): Promise<ToolEnvelope> {
  const { course_code } = courseCodeArgs.parse(args);
  const courses = await context.scraper.getCourses();
  const course = findCourseByCode(courses, course_code);
  if (!course) {
    return notFound(context, `Course code '${course_code}' not found`, {
      availableCodes: courses.map(c => c.code),
    });
  }
  return success(context, {
    courseCode: course.code,
    courseName: course.name,
    description: course.description,
    departmentCode: departmentCode(course.code),
  });
}
