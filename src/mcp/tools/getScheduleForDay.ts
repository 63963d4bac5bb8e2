/**
 * Get Schedule For Day Tool
 */

import { z } from 'zod';
import { normalizeDay } from '../../calculators/timetableClock.js';
import { WEEK_DAYS } from '../../types.js';
import { daySchedule } from './timetableViews.js';
import { notFound, success } from './shared.js';
import type { ToolContext, ToolDefinition, ToolEnvelope } from './shared.js';

const argsSchema = z.object({
  day: z.string().trim().min(1, 'day is required'),
});

export const definition: ToolDefinition = {
  name: 'get_schedule_for_day',
  description:
    'Get the class schedule for a day of the week. Accepts full or short day names ("Monday", "tue") as well as "today" and "tomorrow".',
  inputSchema: {
    type: 'object',
    properties: {
      day: { type: 'string', description: 'Day of the week, e.g. "Monday", "wed", "today"' },
    },
    required: ['day'],
  },
};

export async function handler(args: Record<string, unknown>, context: ToolContext): Promise<ToolEnvelope> {
  const { day } = argsSchema.parse(args);
  const weekDay = normalizeDay(day, context.now());
  if (!weekDay) {
    return notFound(context, `Unknown day '${day}'`, { availableDays: [...WEEK_DAYS] });
  }
  const entries = await context.scraper.getTimetable();
  return success(context, daySchedule(entries, weekDay));
}
