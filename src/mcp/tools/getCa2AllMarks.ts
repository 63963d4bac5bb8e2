/**
 * Get CA2 All Marks Tool
 */

import { allComponents } from './markViews.js';
import { NO_ARGS } from './shared.js';
import type { ToolContext, ToolDefinition, ToolEnvelope } from './shared.js';

export const definition: ToolDefinition = {
  name: 'get_ca2_all_marks',
  description: 'Get CA2 marks for every subject, lab and theory.',
  inputSchema: NO_ARGS,
};

export async function handler(_args: Record<string, unknown>, context: ToolContext): Promise<ToolEnvelope> {
  return allComponents(context, 'ca2');
}
