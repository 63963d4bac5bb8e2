/**
 * Portal error hierarchy
 *
 * Every failure a tool can hit is one of these kinds; the tool layer turns
 * them into `{ status: 'error', error: { kind, message } }` envelopes.
 */

import { ZodError } from 'zod';

export type ErrorKind =
  | 'authentication'
  | 'network'
  | 'session_expired'
  | 'page_structure'
  | 'validation'
  | 'config'
  | 'internal';

export interface ToolError {
  kind: ErrorKind;
  message: string;
}

export class PortalError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
  }
}

/** Bad credentials, or the portal rejected the login form. */
export class AuthenticationError extends PortalError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('authentication', message, options);
  }
}

/** Portal unreachable, timed out, or answered with a server error. */
export class NetworkError extends PortalError {
  readonly status?: number;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super('network', message, options);
    this.status = options?.status;
  }
}

/** The session was still rejected after re-authenticating. */
export class SessionExpiredError extends PortalError {
  constructor(message: string) {
    super('session_expired', message);
  }
}

/** The page no longer has the markup the parser relies on. */
export class PageStructureError extends PortalError {
  readonly page: string;

  constructor(page: string, message: string) {
    super('page_structure', `${page}: ${message}`);
    this.page = page;
  }
}

export class ConfigError extends PortalError {
  constructor(message: string) {
    super('config', message);
  }
}

export function toToolError(err: unknown): ToolError {
  if (err instanceof PortalError) {
    return { kind: err.kind, message: err.message };
  }
  if (err instanceof ZodError) {
    const message = err.issues
      .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    return { kind: 'validation', message };
  }
  if (err instanceof Error) {
    return { kind: 'internal', message: err.message };
  }
  return { kind: 'internal', message: String(err) };
}
