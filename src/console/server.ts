/**
 * MCP server assembly: one tool group per module
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { registerSystemStatusTool } from '../common/tools/system-status-tool.js';
import { registerKnowledgeTools } from '../knowledge/tools/knowledge-tools.js';
import { registerOutreachTools } from '../outreach/tools/outreach-tools.js';
import { registerRetrievalTools } from '../semantic/tools/retrieval-tools.js';
import type { OutreachRuntime } from './runtime.js';

export const SERVER_NAME = 'outreach-rag';
export const SERVER_VERSION = '0.1.0';

export function createServer(runtime: OutreachRuntime): McpServer {
  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });

  registerKnowledgeTools(server, runtime.pipeline, runtime.readiness);
  registerRetrievalTools(server, runtime.retriever, runtime.qa);
  registerOutreachTools(server, runtime.orchestrator, runtime.scorer);
  registerSystemStatusTool(server, { cache: runtime.cache, describeConfig: runtime.describe });

  return server;
}
