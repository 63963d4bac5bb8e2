/**
 * Search Courses Tool
 */

import { z } from 'zod';
import { searchCourses } from '../../calculators/courseCatalog.js';
import { success } from './shared.js';
import type { ToolContext, ToolDefinition, ToolEnvelope } from './shared.js';

const argsSchema = z.object({
  search_term: z.string().trim().min(1, 'search_term is required'),
});

export const definition: ToolDefinition = {
  name: 'search_courses',
  description: 'Search the course plan by any part of a course code or title (case-insensitive).',
  inputSchema: {
    type: 'object',
    properties: {
      search_term: { type: 'string', description: 'Text to look for in course codes and titles' },
    },
    required: ['search_term'],
  },
};

export async function handler(args: Record<string, unknown>, context: ToolContext): Promise<ToolEnvelope> {
  const { search_term } = argsSchema.parse(args);
  const results = searchCourses(await context.scraper.getCourses(), search_term);
  return success(context, {
    searchTerm: search_term,
    courses: results,
    totalMatches: results.length,
  });
}
