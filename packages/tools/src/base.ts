/**
 * Base interfaces and types for the tool system.
 */

import type { z } from 'zod';
import { errorMessage, formatZodIssues, isAlmanacError } from '@almanac/shared';

export interface ToolDefinition {
  name: string;
  description: string;
  input_schema: Record<string, unknown>;
}

export interface ToolResult {
  type: 'text' | 'error';
  /** Text handed to the model verbatim */
  content: string;
  metadata?: Record<string, unknown>;
}

export interface ToolContext {
  /** Cancels in-flight upstream requests when the agent run is aborted */
  signal?: AbortSignal;
  runId?: string;
}

export interface AgentTool {
  definition: ToolDefinition;
  execute(params: Record<string, unknown>, context: ToolContext): Promise<ToolResult>;
}

export function createToolResult(content: string, metadata?: Record<string, unknown>): ToolResult {
  return { type: 'text', content, metadata };
}

export function createErrorResult(error: string, metadata?: Record<string, unknown>): ToolResult {
  return { type: 'error', content: error, metadata };
}

/** `{"error": "<message>"}` as returned to the model by the lookup tools */
export function errorPayload(message: string): string {
  return JSON.stringify({ error: message });
}

export function createErrorPayloadResult(message: string, metadata?: Record<string, unknown>): ToolResult {
  return createErrorResult(errorPayload(message), metadata);
}

/**
 * Render any failure from a lookup tool as an error payload.
 * Taxonomy errors keep their message; anything else is reported as unexpected.
 */
export function failureResult(err: unknown, activity: string): ToolResult {
  if (isAlmanacError(err)) {
    return createErrorPayloadResult(err.message, { errorCode: err.code });
  }
  return createErrorPayloadResult(
    `An unexpected error occurred during ${activity}: ${errorMessage(err)}`,
    { errorCode: 'UNEXPECTED' },
  );
}

/** Validate tool arguments, returning either the parsed value or an error result */
export function parseToolInput<T extends z.ZodTypeAny>(
  toolName: string,
  schema: T,
  params: Record<string, unknown>,
): { ok: true; value: z.infer<T> } | { ok: false; result: ToolResult } {
  const parsed = schema.safeParse(params);
  if (parsed.success) {
    return { ok: true, value: parsed.data };
  }
  return {
    ok: false,
    result: createErrorPayloadResult(
      `Invalid arguments for ${toolName}: ${formatZodIssues(parsed.error)}`,
      { errorCode: 'INVALID_ARGUMENTS' },
    ),
  };
}
