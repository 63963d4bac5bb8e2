/**
 * Get Next Class Tool
 */

import { currentPeriod, dayName, findNextClass, formatClock } from '../../calculators/timetableClock.js';
import { NO_ARGS, success } from './shared.js';
import type { ToolContext, ToolDefinition, ToolEnvelope } from './shared.js';

export const definition: ToolDefinition = {
  name: 'get_next_class',
  description:
    'Get the next class that has not started yet, looking ahead through the week, and how many minutes until it starts.',
  inputSchema: NO_ARGS,
};

export async function handler(_args: Record<string, unknown>, context: ToolContext): Promise<ToolEnvelope> {
  const now = context.now();
  const next = findNextClass(await context.scraper.getTimetable(), now);

  return success(context, {
    currentDay: dayName(now),
    currentTime: formatClock(now),
    currentPeriod: currentPeriod(now),
    nextClass: next
      ? {
          ...next.entry,
          startsAt: next.startsAt.toISOString(),
          minutesUntil: next.minutesUntil,
          isToday: next.startsAt.toDateString() === now.toDateString(),
        }
      : null,
  });
}
