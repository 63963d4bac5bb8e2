/**
 * Get CA1 Subject Mark Tool
 */

import { subjectComponent } from './markViews.js';
import { SUBJECT_PROPERTY } from './shared.js';
import type { ToolContext, ToolDefinition, ToolEnvelope } from './shared.js';

export const definition: ToolDefinition = {
  name: 'get_ca1_subject_mark',
  description: 'Get the first continuous assessment (CA1) mark for one subject. Lab CA1 is out of 25; theory CA1 is test T1, out of 30.',
  inputSchema: {
    type: 'object',
    properties: {
      subject: SUBJECT_PROPERTY,
    },
    required: ['subject'],
  },
};

export async function handler(args: Record<string, unknown>, context: ToolContext): Promise<ToolEnvelope> {
  return subjectComponent(args, context, 'ca1');
}
