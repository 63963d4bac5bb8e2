/**
 * Get Subject Available Bunks Tool
 *
 * available = floor(present * 100 / min) - total, never below 0
 */

import { bunkReport } from '../../calculators/bunks.js';
import { courseNotFound, findAttendance } from './attendanceViews.js';
import { COURSE_CODE_PROPERTY, MIN_ATTENDANCE_PROPERTY, courseCodeArgs, minAttendance, success } from './shared.js';
import type { ToolContext, ToolDefinition, ToolEnvelope } from './shared.js';

const argsSchema = courseCodeArgs.extend({
  min_attendance: minAttendance,
});

export const definition: ToolDefinition = {
  name: 'get_subject_available_bunks',
  description:
    'How many more classes of one course can be skipped while staying at or above the minimum attendance, and how many must be attended to recover when below it.',
  inputSchema: {
    type: 'object',
    properties: {
      course_code: COURSE_CODE_PROPERTY,
      min_attendance: MIN_ATTENDANCE_PROPERTY,
    },
    required: ['course_code'],
  },
};

export async function handler(args: Record<string, unknown>, context: ToolContext): Promise<ToolEnvelope> {
  const { course_code, min_attendance } = argsSchema.parse(args);
  const records = await context.scraper.getAttendance();
  const record = findAttendance(records, course_code);
  if (!record) {
    return courseNotFound(context, course_code, records);
  }
  return success(context, bunkReport(record, min_attendance));
}
