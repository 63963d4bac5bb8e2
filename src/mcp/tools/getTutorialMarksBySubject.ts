/**
 * Get Tutorial Marks By Subject Tool
 */

import { subjectComponent } from './markViews.js';
import { SUBJECT_PROPERTY } from './shared.js';
import type { ToolContext, ToolDefinition, ToolEnvelope } from './shared.js';

export const definition: ToolDefinition = {
  name: 'get_tutorial_marks_by_subject',
  description: 'Get the tutorial (MPT) mark for one theory subject, out of 12. Lab subjects have no tutorial.',
  inputSchema: {
    type: 'object',
    properties: {
      subject: SUBJECT_PROPERTY,
    },
    required: ['subject'],
  },
};

export async function handler(args: Record<string, unknown>, context: ToolContext): Promise<ToolEnvelope> {
  return subjectComponent(args, context, 'tutorial', 'theory');
}
