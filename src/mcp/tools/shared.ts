/**
 * Shared tool plumbing: the response envelope, tool context, and argument schemas
 */

import { z } from 'zod';
import { DEFAULT_MIN_ATTENDANCE } from '../../calculators/bunks.js';
import { toToolError } from '../../errors.js';
import type { ToolError } from '../../errors.js';
import type { PortalScraper } from '../../scrapers/portalScraper.js';

export const SERVER_INFO = {
  name: 'campus-portal-mcp',
  version: '1.0.0',
} as const;

export type ToolStatus = 'success' | 'not_found' | 'error';

export interface ToolEnvelope<T = unknown> {
  status: ToolStatus;
  data?: T;
  message?: string;
  error?: ToolError;
  timestamp: string;
}

export interface ToolContext {
  scraper: PortalScraper;
  /** Clock for "today", "next class" and envelope timestamps */
  now: () => Date;
}

export interface JsonSchemaProperty {
  type: 'string' | 'number' | 'integer' | 'boolean';
  description?: string;
  default?: string | number | boolean;
  enum?: readonly string[];
  minimum?: number;
  exclusiveMinimum?: number;
  maximum?: number;
}

// Alias, not interface: the SDK's Tool type carries an index signature
export type ToolDefinition = {
  name: string;
  description: string;
  inputSchema: {
    type: 'object';
    properties: Record<string, JsonSchemaProperty>;
    required?: string[];
  };
};

export type ToolHandler = (args: Record<string, unknown>, context: ToolContext) => Promise<ToolEnvelope>;

export interface ToolModule {
  definition: ToolDefinition;
  handler: ToolHandler;
}

export const NO_ARGS: ToolDefinition['inputSchema'] = { type: 'object', properties: {} };

export function success<T>(context: ToolContext, data: T): ToolEnvelope<T> {
  return { status: 'success', data, timestamp: context.now().toISOString() };
}

/**
 * The thing asked for does not exist; `data` tells the caller what does
 */
export function notFound<T>(context: ToolContext, message: string, data: T): ToolEnvelope<T> {
  return { status: 'not_found', message, data, timestamp: context.now().toISOString() };
}

export function failure<T>(context: ToolContext, err: unknown, data?: T): ToolEnvelope<T> {
  return { status: 'error', data, error: toToolError(err), timestamp: context.now().toISOString() };
}

// ============ Argument Schemas ============

export const subjectArgs = z.object({
  subject: z.string().trim().min(1, 'subject is required'),
});

export const courseCodeArgs = z.object({
  course_code: z.string().trim().min(1, 'course_code is required'),
});

export const minAttendance = z.coerce
  .number()
  .gt(0, 'min_attendance must be above 0')
  .max(100, 'min_attendance cannot exceed 100')
  .default(DEFAULT_MIN_ATTENDANCE);

export const SUBJECT_PROPERTY: JsonSchemaProperty = {
  type: 'string',
  description: 'Subject code or name, e.g. "20XT81" or "Operating Systems"',
};

export const COURSE_CODE_PROPERTY: JsonSchemaProperty = {
  type: 'string',
  description: 'Course code, e.g. "20XT81"',
};

export const MIN_ATTENDANCE_PROPERTY: JsonSchemaProperty = {
  type: 'number',
  description: 'Minimum required attendance percentage',
  default: DEFAULT_MIN_ATTENDANCE,
  exclusiveMinimum: 0,
  maximum: 100,
};
