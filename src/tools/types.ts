import type { z } from 'zod';

import type { Switchboard } from '../core/app.js';
import { errorMessage } from '../errors/index.js';

export interface ToolContext {
  app: Switchboard;
}

export interface ToolResponse {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
  [key: string]: unknown;
}

export function jsonResponse(value: unknown, isError = false): ToolResponse {
  return {
    content: [{ type: 'text', text: JSON.stringify(value, null, 2) }],
    ...(isError ? { isError: true } : {})
  };
}

export function errorResponse(error: unknown): ToolResponse {
  const name = error instanceof Error ? error.name : 'Error';
  return jsonResponse({ status: 'error', error: name, message: errorMessage(error) }, true);
}

export type ParsedArgs<T> = { ok: true; value: T } | { ok: false; response: ToolResponse };

export function parseArgs<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  args: Record<string, unknown>
): ParsedArgs<T> {
  const result = schema.safeParse(args);
  if (result.success) return { ok: true, value: result.data };
  const issues = result.error.issues.map((issue) => `${issue.path.join('.') || 'arguments'}: ${issue.message}`);
  return {
    ok: false,
    response: jsonResponse({ status: 'error', error: 'InvalidArguments', message: issues.join('; ') }, true)
  };
}
