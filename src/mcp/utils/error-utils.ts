import { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { InvalidArgumentError, errorMessage, isMetavaultError } from '../../utils/errors';
import { ToolHandlerContext } from '../types/sdk-custom';

/**
 * Validates raw tool arguments. Every violated rule is reported in one message.
 */
export function parseToolParams<T extends z.ZodTypeAny>(schema: T, params: unknown): z.output<T> {
  const parsed = schema.safeParse(params ?? {});
  if (!parsed.success) {
    throw new InvalidArgumentError(parsed.error.issues.map((issue) => issue.message).join('; '));
  }
  return parsed.data;
}

/**
 * Standardized parameter logging for tool handlers
 */
export function logToolExecution(
  context: ToolHandlerContext,
  operation: string,
  params: Record<string, unknown>,
): void {
  context.logger.info(params, `Executing ${operation}`);
}

/**
 * Error result returned to the MCP client: `"<code>: <message>"`.
 */
export function toToolErrorResult(error: unknown): CallToolResult {
  const text = isMetavaultError(error) ? `${error.code}: ${error.message}` : errorMessage(error);
  return {
    content: [{ type: 'text', text }],
    isError: true,
  };
}
