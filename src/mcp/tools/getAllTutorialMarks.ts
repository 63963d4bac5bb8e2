/**
 * Get All Tutorial Marks Tool
 */

import { allComponents } from './markViews.js';
import { NO_ARGS } from './shared.js';
import type { ToolContext, ToolDefinition, ToolEnvelope } from './shared.js';

export const definition: ToolDefinition = {
  name: 'get_all_tutorial_marks',
  description: 'Get tutorial (MPT) marks for every theory subject.',
  inputSchema: NO_ARGS,
};

export async function handler(_args: Record<string, unknown>, context: ToolContext): Promise<ToolEnvelope> {
  return allComponents(context, 'tutorial', 'theory');
}
