/**
 * MCP tool responses
 */

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { ZodError } from 'zod';
import { errorMessage, isOutreachError } from '../errors.js';
import { formatIssues } from '../schemas/index.js';

export function textResult(text: string): CallToolResult {
  return { content: [{ type: 'text', text }] };
}

/**
 * "❌ Ingestion failed [InvalidInput]: documentId: documentId is required"
 */
export function errorResult(action: string, error: unknown): CallToolResult {
  let kind = '';
  let message = errorMessage(error);
  if (error instanceof ZodError) {
    kind = ' [InvalidInput]';
    message = formatIssues(error).join('; ');
  } else if (isOutreachError(error)) {
    kind = ` [${error.kind}]`;
  }
  return { content: [{ type: 'text', text: `❌ ${action} failed${kind}: ${message}` }], isError: true };
}
