/**
 * Get Subject Attendance Tool
 */

import { courseNotFound, findAttendance } from './attendanceViews.js';
import { COURSE_CODE_PROPERTY, courseCodeArgs, success } from './shared.js';
import type { ToolContext, ToolDefinition, ToolEnvelope } from './shared.js';

export const definition: ToolDefinition = {
  name: 'get_subject_attendance',
  description:
    'Get attendance for one course: total, present, absent and exempted hours, the percentage (plain, with exemption, with medical exemption) and the period it covers.',
  inputSchema: {
    type: 'object',
    properties: {
      course_code: COURSE_CODE_PROPERTY,
    },
    required: ['course_code'],
  },
};

export async function handler(args: Record<string, unknown>, context: ToolContext): Promise<ToolEnvelope> {
  const { course_code } = courseCodeArgs.parse(args);
  const records = await context.scraper.getAttendance();
  const record = findAttendance(records, course_code);
  if (!record) {
    return courseNotFound(context, course_code, records);
  }
  return success(context, record);
}
