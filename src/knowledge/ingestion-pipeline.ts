/**
 * Ingestion Pipeline
 *
 * Chunker -> Embedding Client -> Vector Store for one document, as a state
 * machine persisted in the document registry:
 *
 *   pending -> chunked -> embedded
 *      \---------\-----> failed   (error kind, step and message kept)
 *
 * The registry status is the readiness flag: the retriever serves a
 * document's chunks only while its status is "embedded", and that status is
 * written after the last vector is stored. Old vectors of a changed document
 * are hidden as soon as it goes back to "pending".
 *
 * Unchanged documents (same content hash) are skipped without re-chunking
 * or re-embedding.
 */

import { createHash } from 'node:crypto';
import { mergeDefined } from '../common/constants.js';
import {
  EmbeddingUnavailable,
  IngestionFailed,
  InvalidInput,
  TenantIsolationViolation,
  errorMessage,
  toFailure,
} from '../common/errors.js';
import { DocumentPayloadSchema, formatIssues } from '../common/schemas/index.js';
import { ConcurrencyLimiter, KeyedLock } from '../common/services/concurrency-limiter.js';
import type { DocumentRegistry } from '../common/services/document-registry.js';
import { assertVectorShape, type EmbeddingClient } from '../common/services/embedding-service.js';
import { generateRequestId, logError, logInfo, logWarn, type LogContext } from '../common/services/logger.js';
import { recordIngestion } from '../common/services/metrics.js';
import { DEFAULT_RETRY_CONFIG, withRetry, withTimeout, type RetryConfig } from '../common/services/retry.js';
import type { VectorStore } from '../common/services/vector-store.js';
import type { DocumentInput, DocumentRecord, DocumentStatus, VectorRecord } from '../common/types.js';
import { chunkId, chunkText, DEFAULT_CHUNKING_CONFIG, type ChunkingConfig } from './chunker.js';
import { resolveDocumentText } from './source-composer.js';

// =============================================================================
// TYPES
// =============================================================================

export interface IngestionConfig {
  chunking: ChunkingConfig;
  retry: RetryConfig;
  /** Per-call timeout around each embedding request */
  embedTimeoutMs: number;
}

export const DEFAULT_INGESTION_CONFIG: IngestionConfig = {
  chunking: DEFAULT_CHUNKING_CONFIG,
  retry: DEFAULT_RETRY_CONFIG,
  embedTimeoutMs: 30000,
};

export interface IngestionDependencies {
  embedder: EmbeddingClient;
  store: VectorStore;
  registry: DocumentRegistry;
  /** Shared cap on concurrent embedding calls */
  limiter: ConcurrencyLimiter;
  /** Epoch ms; injectable for deterministic tests */
  clock?: () => number;
}

export type IngestionStep = 'chunking' | 'embedding' | 'storing';

export interface IngestionResult {
  requestId: string;
  documentId: string;
  status: 'embedded';
  /** True when the content hash was unchanged and nothing was redone */
  skipped: boolean;
  chunkCount: number;
  contentHash: string;
  ingestedAt?: number;
}

export interface BulkIngestionResult {
  embedded: number;
  skipped: number;
  failed: number;
  chunks: number;
  failures: Array<{ documentId: string; kind: string; step: string; message: string }>;
}

// =============================================================================
// PIPELINE
// =============================================================================

export class IngestionPipeline {
  private readonly locks = new KeyedLock();
  private readonly clock: () => number;
  private readonly config: IngestionConfig;

  constructor(
    private readonly deps: IngestionDependencies,
    config: Partial<IngestionConfig> = {}
  ) {
    this.config = mergeDefined(DEFAULT_INGESTION_CONFIG, config);
    this.clock = deps.clock ?? Date.now;
  }

  /**
   * Validate a loosely typed payload into a DocumentInput
   *
   * @throws InvalidInput listing every problem
   */
  static parseDocument(payload: unknown): DocumentInput {
    const parsed = DocumentPayloadSchema.safeParse(payload);
    if (!parsed.success) {
      const issues = formatIssues(parsed.error);
      throw new InvalidInput(`Invalid document payload: ${issues.join('; ')}`, issues);
    }
    const { documentId, sourceType, title, sourceUrl } = parsed.data;
    return {
      documentId,
      sourceType,
      text: resolveDocumentText(sourceType, parsed.data),
      title,
      sourceUrl,
    };
  }

  /**
   * Idempotence key: text plus everything that shapes the stored vectors
   */
  contentHash(input: DocumentInput): string {
    const { chunking } = this.config;
    return createHash('sha256')
      .update(
        JSON.stringify({
          text: input.text,
          sourceType: input.sourceType,
          title: input.title ?? null,
          sourceUrl: input.sourceUrl ?? null,
          maxTokens: chunking.maxTokens,
          overlapTokens: chunking.overlapTokens,
          model: this.deps.embedder.model,
          dimensions: this.deps.embedder.dimensions,
        }),
        'utf8'
      )
      .digest('hex');
  }

  /**
   * Ingest one document
   *
   * Calls for the same (tenant, document) run one at a time; the second
   * sees the first one's result and is normally skipped as unchanged.
   *
   * @throws InvalidInput for a malformed payload (nothing is persisted)
   * @throws IngestionFailed after persisting status "failed"
   * @throws TenantIsolationViolation unchanged
   */
  async ingest(tenantId: string, payload: unknown): Promise<IngestionResult> {
    const input = IngestionPipeline.parseDocument(payload);
    return this.locks.withLock(lockKey(tenantId, input.documentId), () => this.run(tenantId, input));
  }

  private async run(tenantId: string, input: DocumentInput): Promise<IngestionResult> {
    const { registry, store, embedder } = this.deps;
    const requestId = generateRequestId('ing');
    const startTime = this.clock();
    const logCtx: LogContext = { request_id: requestId, tenant_id: tenantId, document_id: input.documentId };
    const contentHash = this.contentHash(input);

    const existing = await registry.get(tenantId, input.documentId);
    if (existing && existing.status === 'embedded' && existing.contentHash === contentHash) {
      logInfo('Document unchanged, skipping ingestion', { ...logCtx, status: 'embedded', chunks: existing.chunkCount });
      recordIngestion(tenantId, { status: 'skipped' }, this.clock() - startTime);
      return {
        requestId,
        documentId: input.documentId,
        status: 'embedded',
        skipped: true,
        chunkCount: existing.chunkCount,
        contentHash,
        ingestedAt: existing.ingestedAt,
      };
    }

    const base: Omit<DocumentRecord, 'status' | 'chunkCount' | 'updatedAt'> = {
      tenantId,
      documentId: input.documentId,
      sourceType: input.sourceType,
      contentHash,
      title: input.title,
      sourceUrl: input.sourceUrl,
    };
    const transition = async (status: DocumentStatus, fields: Partial<DocumentRecord> = {}): Promise<void> => {
      await registry.put({ ...base, chunkCount: 0, ...fields, status, updatedAt: this.clock() });
      logInfo('Document status changed', { ...logCtx, status, ...(fields.chunkCount !== undefined ? { chunks: fields.chunkCount } : {}) });
    };

    let step: IngestionStep = 'storing';
    try {
      // Vectors of the previous version must not outlive its "embedded" status
      await transition('pending');
      await store.deleteDocument(tenantId, input.documentId);

      step = 'chunking';
      const chunks = chunkText(input.text, this.config.chunking);
      await transition('chunked', { chunkCount: chunks.length });

      step = 'embedding';
      const texts = chunks.map(chunk => chunk.text);
      const vectors = texts.length === 0 ? [] : await this.embedDocuments(texts, logCtx);

      step = 'storing';
      const ingestedAt = this.clock();
      const records: VectorRecord[] = chunks.map((chunk, index) => ({
        tenantId,
        chunkId: chunkId(input.documentId, chunk.ordinal),
        vector: vectors[index],
        metadata: {
          documentId: input.documentId,
          sourceType: input.sourceType,
          ordinal: chunk.ordinal,
          text: chunk.text,
          tokenCount: chunk.tokenCount,
          title: input.title,
          sourceUrl: input.sourceUrl,
          ingestedAt,
        },
      }));
      await store.upsertMany(tenantId, records);
      await transition('embedded', { chunkCount: chunks.length, ingestedAt });

      const durationMs = this.clock() - startTime;
      recordIngestion(tenantId, { status: 'embedded', chunks: chunks.length }, durationMs);
      logInfo('Document embedded', {
        ...logCtx,
        chunks: chunks.length,
        model: embedder.model,
        duration_ms: durationMs,
      });

      return {
        requestId,
        documentId: input.documentId,
        status: 'embedded',
        skipped: false,
        chunkCount: chunks.length,
        contentHash,
        ingestedAt,
      };
    } catch (error) {
      if (error instanceof TenantIsolationViolation) {
        logError('Ingestion aborted: tenant isolation violated', { ...logCtx, step, error: error.message });
        throw error;
      }

      const failure = toFailure(error, step);
      const reason = { kind: failure.kind, step, message: failure.message };
      try {
        await transition('failed', { error: reason });
      } catch (persistError) {
        logError('Could not persist failed status', { ...logCtx, step, error: errorMessage(persistError) });
      }
      try {
        await store.deleteDocument(tenantId, input.documentId);
      } catch (deleteError) {
        logError('Could not remove vectors of failed document', { ...logCtx, step, error: errorMessage(deleteError) });
      }

      recordIngestion(tenantId, { status: 'failed', kind: failure.kind }, this.clock() - startTime);
      logWarn('Document ingestion failed', { ...logCtx, step, error_kind: failure.kind, error: failure.message });
      throw new IngestionFailed(input.documentId, reason, error);
    }
  }

  /**
   * One batch call through the limiter, with timeout and bounded retries
   */
  private async embedDocuments(texts: string[], logCtx: LogContext): Promise<number[][]> {
    const { embedder, limiter } = this.deps;
    const timeoutMs = this.config.embedTimeoutMs;
    const vectors = await withRetry(
      () =>
        limiter.run(() =>
          withTimeout(
            embedder.embed(texts, 'document', logCtx),
            timeoutMs,
            () => new EmbeddingUnavailable(`Embedding did not complete within ${timeoutMs}ms`)
          )
        ),
      this.config.retry,
      { operation: 'embed_documents', logContext: logCtx }
    );
    assertVectorShape(vectors, texts.length, embedder.dimensions);
    return vectors;
  }

  /**
   * Ingest a tenant's documents; one failure does not stop the others
   *
   * @throws TenantIsolationViolation (aborts the batch)
   */
  async ingestMany(tenantId: string, payloads: unknown[]): Promise<BulkIngestionResult> {
    const summary: BulkIngestionResult = { embedded: 0, skipped: 0, failed: 0, chunks: 0, failures: [] };

    await Promise.all(
      payloads.map(async (payload, index) => {
        try {
          const result = await this.ingest(tenantId, payload);
          if (result.skipped) {
            summary.skipped++;
          } else {
            summary.embedded++;
            summary.chunks += result.chunkCount;
          }
        } catch (error) {
          if (error instanceof TenantIsolationViolation) throw error;
          summary.failed++;
          if (error instanceof IngestionFailed) {
            summary.failures.push({ documentId: error.documentId, ...error.reason });
          } else {
            const failure = toFailure(error, 'validating');
            summary.failures.push({
              documentId: payloadDocumentId(payload) ?? `#${index}`,
              kind: failure.kind,
              step: failure.step,
              message: failure.message,
            });
          }
        }
      })
    );

    summary.failures.sort((a, b) => a.documentId.localeCompare(b.documentId));
    logInfo('Bulk ingestion finished', {
      tenant_id: tenantId,
      embedded: summary.embedded,
      skipped: summary.skipped,
      failed: summary.failed,
      chunks: summary.chunks,
    });
    return summary;
  }

  /**
   * Remove a document's vectors and its registry record
   */
  async deleteDocument(tenantId: string, documentId: string): Promise<{ removedChunks: number; removedRecord: boolean }> {
    return this.locks.withLock(lockKey(tenantId, documentId), async () => {
      const removedChunks = await this.deps.store.deleteDocument(tenantId, documentId);
      const removedRecord = await this.deps.registry.delete(tenantId, documentId);
      logInfo('Document deleted', {
        tenant_id: tenantId,
        document_id: documentId,
        chunks: removedChunks,
        removed_record: removedRecord,
      });
      return { removedChunks, removedRecord };
    });
  }

  getStatus(tenantId: string, documentId: string): Promise<DocumentRecord | null> {
    return this.deps.registry.get(tenantId, documentId);
  }

  listDocuments(tenantId: string, status?: DocumentStatus): Promise<DocumentRecord[]> {
    return this.deps.registry.list(tenantId, { status });
  }
}

function lockKey(tenantId: string, documentId: string): string {
  return JSON.stringify([tenantId, documentId]);
}

function payloadDocumentId(payload: unknown): string | undefined {
  if (typeof payload === 'object' && payload !== null && 'documentId' in payload) {
    const { documentId } = payload;
    return typeof documentId === 'string' && documentId ? documentId : undefined;
  }
  return undefined;
}
