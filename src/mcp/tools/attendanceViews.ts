/**
 * Attendance lookups shared by the attendance tools
 */

import type { SubjectAttendance } from '../../types.js';
import { notFound } from './shared.js';
import type { ToolContext, ToolEnvelope } from './shared.js';

/** Exact course code match, ignoring case */
export function findAttendance(records: SubjectAttendance[], courseCode: string): SubjectAttendance | undefined {
  const wanted = courseCode.trim().toUpperCase();
  return records.find(record => record.courseCode.toUpperCase() === wanted);
}

export function courseNotFound(
  context: ToolContext,
  courseCode: string,
  records: SubjectAttendance[]
): ToolEnvelope<{ availableCourses: string[] }> {
  return notFound(context, `Course '${courseCode}' not found`, {
    availableCourses: records.map(record => record.courseCode),
  });
}
