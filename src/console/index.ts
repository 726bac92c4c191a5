/**
 * outreach-rag MCP server
 *
 * Exposes the knowledge base, retrieval, spam scoring and email drafting to
 * MCP clients over stdio. stdout carries the protocol; logs go to stderr.
 *
 * Tools:
 * - ingest_document, document_status, delete_document
 * - retrieve_context, ask_knowledge_base
 * - score_email, generate_email
 * - system_status
 */

import 'dotenv/config';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { errorMessage } from '../common/errors.js';
import { logError, logInfo } from '../common/services/logger.js';
import { createRuntime } from './runtime.js';
import { createServer, SERVER_NAME, SERVER_VERSION } from './server.js';

async function main(): Promise<void> {
  const runtime = createRuntime();
  const server = createServer(runtime);

  const shutdown = (signal: string) => {
    logInfo('Shutting down', { signal });
    void server
      .close()
      .catch(error => logError('Error while closing server', { error: errorMessage(error) }))
      .finally(() => {
        runtime.close();
        process.exit(0);
      });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  await server.connect(new StdioServerTransport());
  logInfo(`${SERVER_NAME} running on stdio`, { version: SERVER_VERSION, warnings: runtime.warnings });
}

main().catch(error => {
  logError('Fatal startup error', { error: errorMessage(error) });
  process.exit(1);
});
