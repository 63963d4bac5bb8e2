/**
 * Get Break Schedule Tool
 *
 * Pure clock arithmetic; does not touch the portal.
 */

import {
  BREAKS,
  PERIOD_TIMES,
  breakDuration,
  currentBreak,
  formatClock,
  minutesOfDay,
  nextBreak,
  toMinutes,
} from '../../calculators/timetableClock.js';
import { NO_ARGS, success } from './shared.js';
import type { ToolContext, ToolDefinition, ToolEnvelope } from './shared.js';

export const definition: ToolDefinition = {
  name: 'get_break_schedule',
  description: 'Get the college break times and period timings, whether a break is on now, and when the next one starts.',
  inputSchema: NO_ARGS,
};

export async function handler(_args: Record<string, unknown>, context: ToolContext): Promise<ToolEnvelope> {
  const now = context.now();
  const nowMinutes = minutesOfDay(now);
  const active = currentBreak(now);
  const upcoming = nextBreak(now);

  return success(context, {
    currentTime: formatClock(now),
    breaks: BREAKS.map(slot => ({ ...slot, durationMinutes: breakDuration(slot) })),
    periods: Object.entries(PERIOD_TIMES).map(([period, range]) => ({ period: Number(period), ...range })),
    currentBreak: active ? { ...active, minutesRemaining: toMinutes(active.end) - nowMinutes } : null,
    nextBreak: upcoming ? { ...upcoming, minutesUntil: toMinutes(upcoming.start) - nowMinutes } : null,
  });
}
