/**
 * Knowledge base tools
 *
 * - ingest_document: chunk, embed and store one document for a tenant
 * - document_status: ingestion state of one document, or the tenant's list
 * - delete_document: remove a document with all its chunks
 * - knowledge_readiness: 0-100 score of how well the knowledge base supports outreach
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import {
  DeleteDocumentSchema,
  DocumentStatusSchema,
  IngestDocumentSchema,
  KnowledgeReadinessSchema,
} from '../../common/schemas/index.js';
import { errorResult, textResult } from '../../common/tools/tool-response.js';
import type { DocumentRecord } from '../../common/types.js';
import type { IngestionPipeline } from '../ingestion-pipeline.js';
import { formatReadinessReport, type ReadinessScorer } from '../readiness.js';

export function formatDocumentRecord(record: DocumentRecord): string {
  const lines = [
    `**${record.title ?? record.documentId}** (\`${record.documentId}\`)`,
    `- Source: ${record.sourceType}`,
    `- Status: ${record.status}`,
    `- Chunks: ${record.chunkCount}`,
  ];
  if (record.ingestedAt !== undefined) {
    lines.push(`- Ingested: ${new Date(record.ingestedAt).toISOString()}`);
  }
  if (record.sourceUrl) {
    lines.push(`- URL: ${record.sourceUrl}`);
  }
  if (record.error) {
    lines.push(`- Error: ${record.error.kind} at ${record.error.step}: ${record.error.message}`);
  }
  return lines.join('\n');
}

export function registerKnowledgeTools(server: McpServer, pipeline: IngestionPipeline, readiness: ReadinessScorer): void {
  server.tool(
    'ingest_document',
    `Add or replace one document in a tenant's knowledge base.

Plain text sources (uploaded_text, website_content, scraped_profile, bulk_snippet,
knowledge_document, url) send \`text\`. Company profiles, products and Q&A entries
send \`fields\`, rendered as labeled text before chunking.

Re-ingesting unchanged content is a no-op; changed content replaces every old chunk.`,
    IngestDocumentSchema.shape,
    async args => {
      try {
        const input = IngestDocumentSchema.parse(args);
        const result = await pipeline.ingest(input.tenant_id, {
          documentId: input.document_id,
          sourceType: input.source_type,
          text: input.text,
          fields: input.fields,
          title: input.title,
          sourceUrl: input.source_url,
        });
        const summary = result.skipped
          ? `✓ Document \`${result.documentId}\` unchanged, skipped (${result.chunkCount} chunks)`
          : `✓ Document \`${result.documentId}\` embedded: ${result.chunkCount} chunks`;
        return textResult(`${summary}\n\nContent hash: \`${result.contentHash}\`\nRequest: ${result.requestId}`);
      } catch (error) {
        return errorResult('Ingestion', error);
      }
    }
  );

  server.tool(
    'document_status',
    'Ingestion state of one document (pending, chunked, embedded, failed), or every document of the tenant when document_id is omitted.',
    DocumentStatusSchema.shape,
    async args => {
      try {
        const input = DocumentStatusSchema.parse(args);
        if (input.document_id) {
          const record = await pipeline.getStatus(input.tenant_id, input.document_id);
          return textResult(record ? formatDocumentRecord(record) : `No document \`${input.document_id}\` for this tenant.`);
        }
        const records = await pipeline.listDocuments(input.tenant_id, input.status);
        if (records.length === 0) {
          return textResult('No documents found.');
        }
        return textResult(
          `## ${records.length} document(s)\n\n${records.map(formatDocumentRecord).join('\n\n')}`
        );
      } catch (error) {
        return errorResult('Status lookup', error);
      }
    }
  );

  server.tool(
    'delete_document',
    'Remove a document and all of its chunks from the tenant\'s knowledge base.',
    DeleteDocumentSchema.shape,
    async args => {
      try {
        const input = DeleteDocumentSchema.parse(args);
        const { removedChunks, removedRecord } = await pipeline.deleteDocument(input.tenant_id, input.document_id);
        if (!removedRecord && removedChunks === 0) {
          return textResult(`No document \`${input.document_id}\` for this tenant.`);
        }
        const chunks = removedChunks >= 0 ? `${removedChunks} chunks` : 'all chunks';
        return textResult(`✓ Deleted \`${input.document_id}\` (${chunks})`);
      } catch (error) {
        return errorResult('Delete', error);
      }
    }
  );

  server.tool(
    'knowledge_readiness',
    `Score how well a tenant's embedded knowledge can support outreach (0-100).

Combines aspect coverage (about, value proposition, features, pricing, integrations,
onboarding, security, support, case studies, implementation, legal), detail per aspect,
freshness, volume and duplication. Lists the aspects with no knowledge at all.`,
    KnowledgeReadinessSchema.shape,
    async args => {
      try {
        const input = KnowledgeReadinessSchema.parse(args);
        return textResult(formatReadinessReport(await readiness.knowledgeReadiness(input.tenant_id)));
      } catch (error) {
        return errorResult('Readiness', error);
      }
    }
  );
}
