/**
 * Get All Attendance Tool
 */

import { NO_ARGS, success } from './shared.js';
import type { ToolContext, ToolDefinition, ToolEnvelope } from './shared.js';

export const definition: ToolDefinition = {
  name: 'get_all_attendance',
  description: 'Get attendance for every registered course, with overall hour totals.',
  inputSchema: NO_ARGS,
};

export async function handler(_args: Record<string, unknown>, context: ToolContext): Promise<ToolEnvelope> {
  const subjects = await context.scraper.getAttendance();
  const totalHours = subjects.reduce((sum, s) => sum + s.totalHours, 0);
  const presentHours = subjects.reduce((sum, s) => sum + s.presentHours, 0);

  return success(context, {
    subjects,
    summary: {
      totalSubjects: subjects.length,
      totalHours,
      presentHours,
      absentHours: subjects.reduce((sum, s) => sum + s.absentHours, 0),
      overallPercentage: totalHours > 0 ? Math.round((presentHours / totalHours) * 10000) / 100 : 0,
    },
  });
}
