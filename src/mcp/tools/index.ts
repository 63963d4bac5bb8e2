/**
 * MCP Tools Index
 *
 * Exports all tool definitions and handlers.
 * Every tool answers with a { status, data?, error?, timestamp } envelope;
 * exceptions never cross this boundary.
 */

// Marks tools
import * as getCa1SubjectMark from './getCa1SubjectMark.js';
import * as getCa2SubjectMark from './getCa2SubjectMark.js';
import * as getCa1AllMarks from './getCa1AllMarks.js';
import * as getCa2AllMarks from './getCa2AllMarks.js';
import * as getAssignmentMarkBySubject from './getAssignmentMarkBySubject.js';
import * as getAllAssignmentMarks from './getAllAssignmentMarks.js';
import * as getTutorialMarksBySubject from './getTutorialMarksBySubject.js';
import * as getAllTutorialMarks from './getAllTutorialMarks.js';
import * as getSubjectMarks from './getSubjectMarks.js';
import * as listAvailableSubjects from './listAvailableSubjects.js';

// Attendance tools
import * as getSubjectAttendance from './getSubjectAttendance.js';
import * as getAllAttendance from './getAllAttendance.js';
import * as getSubjectAvailableBunks from './getSubjectAvailableBunks.js';
import * as getAllAvailableBunks from './getAllAvailableBunks.js';

// Timetable tools
import * as getScheduleForDay from './getScheduleForDay.js';
import * as getTodaysSchedule from './getTodaysSchedule.js';
import * as getTomorrowsSchedule from './getTomorrowsSchedule.js';
import * as getScheduleFromNow from './getScheduleFromNow.js';
import * as getNextClass from './getNextClass.js';
import * as getWeeklySchedule from './getWeeklySchedule.js';
import * as getBreakSchedule from './getBreakSchedule.js';

// Course plan tools
import * as getCourseNameByCode from './getCourseNameByCode.js';
import * as getCourseCodeByName from './getCourseCodeByName.js';
import * as searchCourses from './searchCourses.js';
import * as getCoursesByDepartment from './getCoursesByDepartment.js';
import * as listLabCourses from './listLabCourses.js';
import * as listAllCourses from './listAllCourses.js';
import * as getCourseStatistics from './getCourseStatistics.js';
import * as refreshCourseCache from './refreshCourseCache.js';

import * as healthCheck from './healthCheck.js';

import { PortalError } from '../../errors.js';
import { logger } from '../../utils/logger.js';
import { failure } from './shared.js';
import type { ToolContext, ToolDefinition, ToolEnvelope, ToolHandler, ToolModule } from './shared.js';

const allTools: ToolModule[] = [
  getCa1SubjectMark,
  getCa2SubjectMark,
  getCa1AllMarks,
  getCa2AllMarks,
  getAssignmentMarkBySubject,
  getAllAssignmentMarks,
  getTutorialMarksBySubject,
  getAllTutorialMarks,
  getSubjectMarks,
  listAvailableSubjects,
  getSubjectAttendance,
  getAllAttendance,
  getSubjectAvailableBunks,
  getAllAvailableBunks,
  getScheduleForDay,
  getTodaysSchedule,
  getTomorrowsSchedule,
  getScheduleFromNow,
  getNextClass,
  getWeeklySchedule,
  getBreakSchedule,
  getCourseNameByCode,
  getCourseCodeByName,
  searchCourses,
  getCoursesByDepartment,
  listLabCourses,
  listAllCourses,
  getCourseStatistics,
  refreshCourseCache,
  healthCheck,
];

// Export all function declarations
export const functionDeclarations: ToolDefinition[] = allTools.map(tool => tool.definition);

export const toolNames: string[] = functionDeclarations.map(definition => definition.name);

// Export handler map
const handlers: Record<string, ToolHandler> = Object.fromEntries(
  allTools.map(tool => [tool.definition.name, tool.handler])
);

function summarize(envelope: ToolEnvelope): string {
  if (envelope.status === 'error') {
    return `${envelope.error?.kind ?? 'internal'}: ${envelope.error?.message ?? ''}`;
  }
  if (envelope.status === 'not_found') {
    return envelope.message ?? 'not found';
  }
  return 'ok';
}

/**
 * Run a tool by name. Unknown tools, bad arguments and portal failures all
 * come back as error envelopes.
 */
export async function handleToolCall(
  name: string,
  args: Record<string, unknown> | undefined,
  context: ToolContext
): Promise<ToolEnvelope> {
  const startTime = Date.now();
  logger.info('Tools', `📞 ${name}`);
  logger.debug('Tools', 'Arguments', args ?? {});

  const handler = handlers[name];
  if (!handler) {
    logger.warn('Tools', `❌ Unknown tool: ${name}`);
    return failure(
      context,
      new PortalError('validation', `Unknown tool: ${name}. Available: ${toolNames.join(', ')}`)
    );
  }

  let envelope: ToolEnvelope;
  try {
    envelope = await handler(args ?? {}, context);
  } catch (err) {
    envelope = failure(context, err);
  }

  const duration = Date.now() - startTime;
  const line = `${envelope.status === 'error' ? '❌' : '✅'} ${name} → ${envelope.status} (${duration}ms) ${summarize(envelope)}`;
  if (envelope.status === 'error') {
    logger.error('Tools', line);
  } else {
    logger.info('Tools', line);
  }
  return envelope;
}
