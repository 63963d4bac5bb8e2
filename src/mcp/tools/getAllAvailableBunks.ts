/**
 * Get All Available Bunks Tool
 */

import { z } from 'zod';
import { bunkReport, summarizeBunks } from '../../calculators/bunks.js';
import { MIN_ATTENDANCE_PROPERTY, minAttendance, success } from './shared.js';
import type { ToolContext, ToolDefinition, ToolEnvelope } from './shared.js';

const argsSchema = z.object({
  min_attendance: minAttendance,
});

export const definition: ToolDefinition = {
  name: 'get_all_available_bunks',
  description: 'Available bunks for every course at the given minimum attendance, with a summary across courses.',
  inputSchema: {
    type: 'object',
    properties: {
      min_attendance: MIN_ATTENDANCE_PROPERTY,
    },
  },
};

export async function handler(args: Record<string, unknown>, context: ToolContext): Promise<ToolEnvelope> {
  const { min_attendance } = argsSchema.parse(args);
  const reports = (await context.scraper.getAttendance()).map(record => bunkReport(record, min_attendance));
  return success(context, {
    subjects: reports,
    summary: summarizeBunks(reports, min_attendance),
  });
}
