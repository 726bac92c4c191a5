/**
 * Qdrant Vector Store
 *
 * One collection per tenant. The collection name is derived from a hash of
 * the tenant id, so tenant ids never need escaping and a query can only
 * reach the collection of the tenant it names. Every point also carries
 * tenant_id in its payload, checked on the way out.
 */

import { createHash } from 'node:crypto';
import { QdrantClient } from '@qdrant/js-client-rest';
import { z } from 'zod';
import { errorMessage, isOutreachError, VectorStoreUnavailable } from '../errors.js';
import { SOURCE_TYPES, type ScoredChunk, type StoredChunk, type VectorQueryFilters, type VectorRecord } from '../types.js';
import { upstreamBreaker, type CircuitBreaker } from './circuit-breaker.js';
import { logDebug, logInfo } from './logger.js';
import { withTimeout } from './retry.js';
import {
  assertTenantOwnership,
  compareScoredChunks,
  compareStoredChunks,
  type VectorStore,
} from './vector-store.js';

// =============================================================================
// CONFIGURATION
// =============================================================================

export interface QdrantStoreConfig {
  host: string;
  apiKey?: string;
  collectionPrefix: string;
  vectorSize: number;
  /** Points per upsert or scroll request */
  upsertBatchSize: number;
  /** Per-request timeout */
  timeoutMs: number;
}

export const DEFAULT_QDRANT_CONFIG: QdrantStoreConfig = {
  host: 'http://localhost:6333',
  collectionPrefix: 'outreach_kb',
  vectorSize: 1024,
  upsertBatchSize: 256,
  timeoutMs: 10000,
};

// =============================================================================
// PURE HELPERS
// =============================================================================

/**
 * Collection name for a tenant: <prefix>_t<first 24 hex chars of sha256>
 */
export function tenantCollectionName(prefix: string, tenantId: string): string {
  const digest = createHash('sha256').update(tenantId, 'utf8').digest('hex');
  return `${prefix}_t${digest.slice(0, 24)}`;
}

export interface QdrantPoint {
  id: string;
  vector: number[];
  payload: Record<string, unknown>;
}

export function toPoint(record: VectorRecord): QdrantPoint {
  const { metadata } = record;
  return {
    id: record.chunkId,
    vector: record.vector,
    payload: {
      tenant_id: record.tenantId,
      document_id: metadata.documentId,
      source_type: metadata.sourceType,
      ordinal: metadata.ordinal,
      text: metadata.text,
      token_count: metadata.tokenCount,
      title: metadata.title ?? null,
      source_url: metadata.sourceUrl ?? null,
      ingested_at: metadata.ingestedAt,
    },
  };
}

const pointPayloadSchema = z.object({
  tenant_id: z.string(),
  document_id: z.string(),
  source_type: z.enum(SOURCE_TYPES),
  ordinal: z.number().int(),
  text: z.string(),
  token_count: z.number().int(),
  title: z.string().nullish(),
  source_url: z.string().nullish(),
  ingested_at: z.number(),
});

/**
 * Read a point back into a StoredChunk
 *
 * @throws Error when the payload is not one this store wrote
 */
export function fromPoint(point: { id: string | number; payload?: Record<string, unknown> | null }): StoredChunk {
  const parsed = pointPayloadSchema.safeParse(point.payload ?? {});
  if (!parsed.success) {
    throw new Error(`Qdrant point ${point.id} has an unexpected payload: ${parsed.error.message}`);
  }
  const p = parsed.data;
  return {
    tenantId: p.tenant_id,
    chunkId: String(point.id),
    metadata: {
      documentId: p.document_id,
      sourceType: p.source_type,
      ordinal: p.ordinal,
      text: p.text,
      tokenCount: p.token_count,
      title: p.title ?? undefined,
      sourceUrl: p.source_url ?? undefined,
      ingestedAt: p.ingested_at,
    },
  };
}

export function fromScoredPoint(point: {
  id: string | number;
  score: number;
  payload?: Record<string, unknown> | null;
}): ScoredChunk {
  return { ...fromPoint(point), score: point.score };
}

interface QdrantFilter {
  must: Array<{ key: string; match: { value: string } | { any: string[] } }>;
}

export function buildQdrantFilter(tenantId: string, filters?: VectorQueryFilters): QdrantFilter {
  const must: QdrantFilter['must'] = [{ key: 'tenant_id', match: { value: tenantId } }];
  if (filters?.sourceTypes && filters.sourceTypes.length > 0) {
    must.push({ key: 'source_type', match: { any: [...filters.sourceTypes] } });
  }
  if (filters?.documentIds && filters.documentIds.length > 0) {
    must.push({ key: 'document_id', match: { any: [...filters.documentIds] } });
  }
  return { must };
}

// =============================================================================
// STORE
// =============================================================================

/**
 * One Qdrant request under the breaker, bounded by a timeout
 *
 * Client errors become VectorStoreUnavailable inside the breaker, so they
 * count against the circuit.
 */
export function guardedQdrantCall<T>(
  breaker: CircuitBreaker,
  operation: string,
  timeoutMs: number,
  fn: () => Promise<T>
): Promise<T> {
  return breaker.execute(
    async () => {
      try {
        return await withTimeout(
          fn(),
          timeoutMs,
          () => new VectorStoreUnavailable(`Qdrant ${operation} did not complete within ${timeoutMs}ms`, { operation })
        );
      } catch (error) {
        if (isOutreachError(error)) throw error;
        throw new VectorStoreUnavailable(`Qdrant ${operation} failed: ${errorMessage(error)}`, { operation }, error);
      }
    },
    { qdrant_operation: operation }
  );
}

export class QdrantVectorStore implements VectorStore {
  private readonly client: QdrantClient;
  private readonly knownCollections = new Set<string>();

  constructor(
    private readonly config: QdrantStoreConfig,
    private readonly breaker: CircuitBreaker = upstreamBreaker('qdrant')
  ) {
    const clientConfig: { url: string; apiKey?: string; checkCompatibility?: boolean } = {
      url: config.host,
      checkCompatibility: false,
    };
    if (config.apiKey) {
      clientConfig.apiKey = config.apiKey;
    }
    this.client = new QdrantClient(clientConfig);
  }

  private collection(tenantId: string): string {
    return tenantCollectionName(this.config.collectionPrefix, tenantId);
  }

  private call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    return guardedQdrantCall(this.breaker, operation, this.config.timeoutMs, fn);
  }

  private async exists(collectionName: string): Promise<boolean> {
    if (this.knownCollections.has(collectionName)) return true;
    const { exists } = await this.call('collection_exists', () => this.client.collectionExists(collectionName));
    if (exists) this.knownCollections.add(collectionName);
    return exists;
  }

  /**
   * Create the tenant's collection with cosine distance and payload indexes
   */
  private async ensureCollection(tenantId: string): Promise<string> {
    const collectionName = this.collection(tenantId);
    if (await this.exists(collectionName)) return collectionName;

    await this.call('create_collection', () =>
      this.client.createCollection(collectionName, {
        vectors: { size: this.config.vectorSize, distance: 'Cosine' },
      })
    );

    const indexFields = ['tenant_id', 'document_id', 'source_type'];
    for (const field of indexFields) {
      try {
        await this.call('create_payload_index', () =>
          this.client.createPayloadIndex(collectionName, { field_name: field, field_schema: 'keyword' })
        );
      } catch (error) {
        logDebug('Payload index not created', { collection: collectionName, field, error: errorMessage(error) });
      }
    }

    this.knownCollections.add(collectionName);
    logInfo('Created tenant collection', {
      tenant_id: tenantId,
      collection: collectionName,
      vector_size: this.config.vectorSize,
    });
    return collectionName;
  }

  async upsert(tenantId: string, record: VectorRecord): Promise<void> {
    await this.upsertMany(tenantId, [record]);
  }

  async upsertMany(tenantId: string, records: VectorRecord[]): Promise<void> {
    if (records.length === 0) return;
    assertTenantOwnership(tenantId, records, 'QdrantVectorStore.upsertMany');

    const collectionName = await this.ensureCollection(tenantId);
    const points = records.map(toPoint);
    for (let i = 0; i < points.length; i += this.config.upsertBatchSize) {
      const batch = points.slice(i, i + this.config.upsertBatchSize);
      await this.call('upsert', () => this.client.upsert(collectionName, { wait: true, points: batch }));
    }
  }

  async deleteDocument(tenantId: string, documentId: string): Promise<number> {
    const collectionName = this.collection(tenantId);
    if (!(await this.exists(collectionName))) return 0;

    const filter = buildQdrantFilter(tenantId, { documentIds: [documentId] });
    const { count } = await this.call('count', () => this.client.count(collectionName, { filter, exact: true }));
    if (count === 0) return 0;

    await this.call('delete', () => this.client.delete(collectionName, { wait: true, filter }));
    return count;
  }

  async query(tenantId: string, vector: number[], k: number, filters?: VectorQueryFilters): Promise<ScoredChunk[]> {
    if (k <= 0) return [];
    const collectionName = this.collection(tenantId);
    if (!(await this.exists(collectionName))) return [];

    const hits = await this.call('search', () =>
      this.client.search(collectionName, {
        vector,
        limit: k,
        filter: buildQdrantFilter(tenantId, filters),
        with_payload: true,
      })
    );

    const results = hits.map(fromScoredPoint).sort(compareScoredChunks);
    assertTenantOwnership(tenantId, results, 'QdrantVectorStore.query');
    return results;
  }

  async listChunks(tenantId: string, filters?: VectorQueryFilters): Promise<StoredChunk[]> {
    const collectionName = this.collection(tenantId);
    if (!(await this.exists(collectionName))) return [];

    const filter = buildQdrantFilter(tenantId, filters);
    const chunks: StoredChunk[] = [];
    let offset: string | number | undefined;
    do {
      const page = await this.call('scroll', () =>
        this.client.scroll(collectionName, {
          filter,
          limit: this.config.upsertBatchSize,
          offset,
          with_payload: true,
          with_vector: false,
        })
      );
      chunks.push(...page.points.map(fromPoint));
      const next = page.next_page_offset;
      offset = typeof next === 'string' || typeof next === 'number' ? next : undefined;
    } while (offset !== undefined);

    assertTenantOwnership(tenantId, chunks, 'QdrantVectorStore.listChunks');
    return chunks.sort(compareStoredChunks);
  }

  async count(tenantId: string): Promise<number> {
    const collectionName = this.collection(tenantId);
    if (!(await this.exists(collectionName))) return 0;
    const { count } = await this.call('count', () => this.client.count(collectionName, { exact: true }));
    return count;
  }
}
