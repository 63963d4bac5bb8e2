/**
 * Get Assignment Mark By Subject Tool
 */

import { subjectComponent } from './markViews.js';
import { SUBJECT_PROPERTY } from './shared.js';
import type { ToolContext, ToolDefinition, ToolEnvelope } from './shared.js';

export const definition: ToolDefinition = {
  name: 'get_assignment_mark_by_subject',
  description: 'Get the assignment/presentation (AP) mark for one theory subject, out of 8. Lab subjects have no assignment.',
  inputSchema: {
    type: 'object',
    properties: {
      subject: SUBJECT_PROPERTY,
    },
    required: ['subject'],
  },
};

export async function handler(args: Record<string, unknown>, context: ToolContext): Promise<ToolEnvelope> {
  return subjectComponent(args, context, 'assignment', 'theory');
}
