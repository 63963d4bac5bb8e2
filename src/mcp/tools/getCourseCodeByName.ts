/**
 * Get Course Code By Name Tool
 *
 * Whole-word match first, then substring; fuzzy hits come back as suggestions.
 */

import { z } from 'zod';
import { matchCoursesByName } from '../../calculators/courseCatalog.js';
import { notFound, success } from './shared.js';
import type { ToolContext, ToolDefinition, ToolEnvelope } from './shared.js';

const argsSchema = z.object({
  course_name_query: z.string().trim().min(1, 'course_name_query is required'),
});

export const definition: ToolDefinition = {
  name: 'get_course_code_by_name',
  description: 'Find course codes whose title matches a name or part of one, e.g. "operating systems" or "lab".',
  inputSchema: {
    type: 'object',
    properties: {
      course_name_query: { type: 'string', description: 'Course title or a word from it' },
    },
    required: ['course_name_query'],
  },
};

export async function handler(args: Record<string, unknown>, context: ToolContext): Promise<ToolEnvelope> {
  const { course_name_query } = argsSchema.parse(args);
  const courses = await context.scraper.getCourses();
  const { matches, strategy } = matchCoursesByName(courses, course_name_query);
  const brief = matches.map(course => ({ courseCode: course.code, courseName: course.name }));

  if (strategy === 'none' || strategy === 'fuzzy') {
    return notFound(context, `No course title matches '${course_name_query}'`, {
      suggestions: brief,
      availableCoursesCount: courses.length,
    });
  }
  return success(context, {
    query: course_name_query,
    matchType: strategy,
    matches: brief,
    totalMatches: brief.length,
  });
}
