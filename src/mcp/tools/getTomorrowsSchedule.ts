/**
 * Get Tomorrow's Schedule Tool
 */

import { dayName } from '../../calculators/timetableClock.js';
import { daySchedule } from './timetableViews.js';
import { NO_ARGS, success } from './shared.js';
import type { ToolContext, ToolDefinition, ToolEnvelope } from './shared.js';

export const definition: ToolDefinition = {
  name: 'get_tomorrows_schedule',
  description: "Get tomorrow's classes in order.",
  inputSchema: NO_ARGS,
};

export async function handler(_args: Record<string, unknown>, context: ToolContext): Promise<ToolEnvelope> {
  const now = context.now();
  const tomorrow = new Date(now.getFullYear(), now.getMonth(), now.getDate() + 1);
  const entries = await context.scraper.getTimetable();
  return success(context, daySchedule(entries, dayName(tomorrow)));
}
