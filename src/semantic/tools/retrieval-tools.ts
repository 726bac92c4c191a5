/**
 * Retrieval tools
 *
 * - retrieve_context: the packed context a draft for this query would get
 * - ask_knowledge_base: answer a question from the tenant's knowledge
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { AskKnowledgeBaseSchema, resolveSourceTypes, RetrieveContextSchema } from '../../common/schemas/index.js';
import { errorResult, textResult } from '../../common/tools/tool-response.js';
import type { RetrievedContext } from '../../common/types.js';
import type { KnowledgeQa } from '../knowledge-qa.js';
import { formatContext, type Retriever } from '../retriever.js';

function contextSummary(context: RetrievedContext): string {
  return (
    `${context.chunks.length} chunk(s), ~${context.totalTokens} tokens ` +
    `(candidates: ${context.candidates}, below threshold: ${context.belowThreshold}, ` +
    `not ready: ${context.notReady}, over budget: ${context.overBudget})`
  );
}

export function registerRetrievalTools(server: McpServer, retriever: Retriever, qa: KnowledgeQa): void {
  server.tool(
    'retrieve_context',
    `Retrieve the most relevant knowledge chunks for a query, scoped to one tenant.

Chunks below the similarity threshold, or from documents still being ingested,
are left out. An empty result means the knowledge base has nothing relevant.`,
    RetrieveContextSchema.shape,
    async args => {
      try {
        const input = RetrieveContextSchema.parse(args);
        const context = await retriever.retrieve(input.tenant_id, input.query, {
          k: input.k,
          tokenBudget: input.token_budget,
          minSimilarity: input.min_similarity,
          sourceTypes: resolveSourceTypes(input.source_types),
        });
        if (context.chunks.length === 0) {
          return textResult(`No relevant knowledge found.\n\n${contextSummary(context)}`);
        }
        return textResult(`## Context: ${contextSummary(context)}\n\n${formatContext(context)}`);
      } catch (error) {
        return errorResult('Retrieval', error);
      }
    }
  );

  server.tool(
    'ask_knowledge_base',
    'Answer a question using only the tenant\'s knowledge base, citing the excerpts used.',
    AskKnowledgeBaseSchema.shape,
    async args => {
      try {
        const input = AskKnowledgeBaseSchema.parse(args);
        const { answer, context } = await qa.answer(input.tenant_id, input.question, {
          k: input.k,
          sourceTypes: resolveSourceTypes(input.source_types),
        });
        const sources = context.chunks.length > 0 ? `\n\n---\n${formatContext(context)}` : '';
        return textResult(`${answer}${sources}`);
      } catch (error) {
        return errorResult('Question', error);
      }
    }
  );
}
