/**
 * Get Schedule From Now Tool
 *
 * Rest of today: the class in progress (if any) and everything after it.
 */

import { dayName, entriesForDay, formatClock, minutesOfDay, toMinutes } from '../../calculators/timetableClock.js';
import { NO_ARGS, success } from './shared.js';
import type { ToolContext, ToolDefinition, ToolEnvelope } from './shared.js';

export const definition: ToolDefinition = {
  name: 'get_schedule_from_now',
  description: 'Get the remaining classes for today, including the one currently running.',
  inputSchema: NO_ARGS,
};

export async function handler(_args: Record<string, unknown>, context: ToolContext): Promise<ToolEnvelope> {
  const now = context.now();
  const nowMinutes = minutesOfDay(now);
  const day = dayName(now);

  const classes = entriesForDay(await context.scraper.getTimetable(), day)
    .filter(entry => toMinutes(entry.endTime) > nowMinutes)
    .map(entry => {
      const start = toMinutes(entry.startTime);
      return start <= nowMinutes
        ? { ...entry, status: 'ongoing' as const, minutesUntilStart: 0 }
        : { ...entry, status: 'upcoming' as const, minutesUntilStart: start - nowMinutes };
    });

  return success(context, {
    day,
    currentTime: formatClock(now),
    classes,
    remainingClasses: classes.length,
  });
}
