/**
 * Get Today's Schedule Tool
 */

import { currentPeriod, dayName, formatClock } from '../../calculators/timetableClock.js';
import { daySchedule } from './timetableViews.js';
import { NO_ARGS, success } from './shared.js';
import type { ToolContext, ToolDefinition, ToolEnvelope } from './shared.js';

export const definition: ToolDefinition = {
  name: 'get_todays_schedule',
  description: "Get today's classes in order, with the current time and period.",
  inputSchema: NO_ARGS,
};

export async function handler(_args: Record<string, unknown>, context: ToolContext): Promise<ToolEnvelope> {
  const now = context.now();
  const entries = await context.scraper.getTimetable();
  return success(context, {
    ...daySchedule(entries, dayName(now)),
    currentTime: formatClock(now),
    currentPeriod: currentPeriod(now),
  });
}
