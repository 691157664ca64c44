/**
 * Error Handler
 *
 * Maps anything a tool handler throws onto a structured MCP error
 * response with recovery hints.
 */

import { Errors, SockgraphError } from 'sockgraph-core';
import type { z } from 'zod';

import type { ToolContent } from './response-builder.js';

export function handleError(error: unknown, requestId?: string): ToolContent {
  if (error instanceof SockgraphError) {
    return error.toMCPResponse(requestId);
  }

  // Convert unknown errors to SockgraphError
  const message = error instanceof Error ? error.message : String(error);
  return Errors.internal(message).toMCPResponse(requestId);
}

/**
 * Validate tool arguments, throwing INVALID_ARGUMENT on the first issue
 */
export function parseArgs<T extends z.ZodTypeAny>(schema: T, args: unknown): z.infer<T> {
  const parsed = schema.safeParse(args ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const param = issue && issue.path.length > 0 ? issue.path.join('.') : 'arguments';
    throw Errors.invalidArgument(param, issue?.message ?? 'invalid value');
  }
  return parsed.data;
}
