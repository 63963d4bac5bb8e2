/**
 * List Available Subjects Tool
 */

import { loadSubjects } from './markViews.js';
import { NO_ARGS, success } from './shared.js';
import type { ToolContext, ToolDefinition, ToolEnvelope } from './shared.js';

export const definition: ToolDefinition = {
  name: 'list_available_subjects',
  description: 'List every subject on the marks page with its code, name and whether it is a lab or theory course.',
  inputSchema: NO_ARGS,
};

export async function handler(_args: Record<string, unknown>, context: ToolContext): Promise<ToolEnvelope> {
  const subjects = await loadSubjects(context);
  const brief = (kind: 'lab' | 'theory') =>
    subjects
      .filter(subject => subject.kind === kind)
      .map(subject => ({ subjectCode: subject.subjectCode, subjectName: subject.subjectName }));

  const labSubjects = brief('lab');
  const theorySubjects = brief('theory');
  return success(context, {
    totalSubjects: subjects.length,
    labSubjects,
    theorySubjects,
    summary: {
      labCount: labSubjects.length,
      theoryCount: theorySubjects.length,
    },
  });
}
