/**
 * Get Subject Marks Tool
 *
 * Full CA record for one subject: every component with its maximum.
 */

import { findSubject } from '../../calculators/marks.js';
import { loadSubjects, subjectNotFound } from './markViews.js';
import { SUBJECT_PROPERTY, subjectArgs, success } from './shared.js';
import type { ToolContext, ToolDefinition, ToolEnvelope } from './shared.js';

export const definition: ToolDefinition = {
  name: 'get_subject_marks',
  description:
    'Get every continuous assessment mark for one subject (CA1, CA2, assignment, tutorial, total, converted total) with the maximum for each.',
  inputSchema: {
    type: 'object',
    properties: {
      subject: SUBJECT_PROPERTY,
    },
    required: ['subject'],
  },
};

export async function handler(args: Record<string, unknown>, context: ToolContext): Promise<ToolEnvelope> {
  const { subject } = subjectArgs.parse(args);
  const subjects = await loadSubjects(context);
  const found = findSubject(subjects, subject);
  if (!found) {
    return subjectNotFound(context, subject, subjects);
  }
  return success(context, found);
}
