/**
 * Get CA2 Subject Mark Tool
 */

import { subjectComponent } from './markViews.js';
import { SUBJECT_PROPERTY } from './shared.js';
import type { ToolContext, ToolDefinition, ToolEnvelope } from './shared.js';

export const definition: ToolDefinition = {
  name: 'get_ca2_subject_mark',
  description: 'Get the second continuous assessment (CA2) mark for one subject. Lab CA2 is out of 25; theory CA2 is test T2, out of 30.',
  inputSchema: {
    type: 'object',
    properties: {
      subject: SUBJECT_PROPERTY,
    },
    required: ['subject'],
  },
};

export async function handler(args: Record<string, unknown>, context: ToolContext): Promise<ToolEnvelope> {
  return subjectComponent(args, context, 'ca2');
}
