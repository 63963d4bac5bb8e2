/**
 * Get Weekly Schedule Tool
 */

import { WEEK_DAYS } from '../../types.js';
import { daySchedule } from './timetableViews.js';
import { NO_ARGS, success } from './shared.js';
import type { ToolContext, ToolDefinition, ToolEnvelope } from './shared.js';

export const definition: ToolDefinition = {
  name: 'get_weekly_schedule',
  description: 'Get the full weekly timetable, grouped by day.',
  inputSchema: NO_ARGS,
};

export async function handler(_args: Record<string, unknown>, context: ToolContext): Promise<ToolEnvelope> {
  const entries = await context.scraper.getTimetable();
  const week = WEEK_DAYS.map(day => daySchedule(entries, day)).filter(schedule => schedule.totalClasses > 0);

  return success(context, {
    week,
    totalClasses: entries.length,
    daysWithClasses: week.map(schedule => schedule.day),
  });
}
