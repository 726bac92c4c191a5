/**
 * Vector Store
 *
 * Tenant-partitioned storage of chunk vectors with top-k cosine query.
 *
 * Isolation is structural: every backend keeps each tenant in its own
 * partition (a Map here, a Qdrant collection in qdrant-vector-store.ts), so a
 * query can only ever read the partition of the tenant it names. Results are
 * additionally checked with assertTenantOwnership(); a foreign record is a
 * TenantIsolationViolation, never silently dropped.
 */

import { TenantIsolationViolation } from '../errors.js';
import type { ScoredChunk, StoredChunk, VectorQueryFilters, VectorRecord } from '../types.js';
import { logError } from './logger.js';

export interface VectorStore {
  /** Insert or overwrite the record with the same (tenant, chunkId) */
  upsert(tenantId: string, record: VectorRecord): Promise<void>;

  upsertMany(tenantId: string, records: VectorRecord[]): Promise<void>;

  /**
   * Remove every chunk of one document
   *
   * @returns Number of records removed, or -1 when the backend does not report it
   */
  deleteDocument(tenantId: string, documentId: string): Promise<number>;

  /**
   * Top-k records by cosine similarity, ordered by score desc, then
   * ingestedAt desc, then chunkId asc
   */
  query(tenantId: string, vector: number[], k: number, filters?: VectorQueryFilters): Promise<ScoredChunk[]>;

  /** Every record of a tenant without vectors, ordered by documentId then ordinal */
  listChunks(tenantId: string, filters?: VectorQueryFilters): Promise<StoredChunk[]>;

  /** Number of records stored for a tenant */
  count(tenantId: string): Promise<number>;
}

// =============================================================================
// SHARED HELPERS
// =============================================================================

/**
 * Cosine similarity in [-1, 1]; 0 when either vector has zero length
 */
export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new RangeError(`Vector dimensions differ: ${a.length} vs ${b.length}`);
  }
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) {
    return 0;
  }
  const similarity = dot / (Math.sqrt(normA) * Math.sqrt(normB));
  // Float error can push identical vectors to 1.0000000002
  return Math.max(-1, Math.min(1, similarity));
}

export function compareStoredChunks(a: StoredChunk, b: StoredChunk): number {
  if (a.metadata.documentId !== b.metadata.documentId) return a.metadata.documentId < b.metadata.documentId ? -1 : 1;
  return a.metadata.ordinal - b.metadata.ordinal;
}

/**
 * Result ordering shared by all backends
 */
export function compareScoredChunks(a: ScoredChunk, b: ScoredChunk): number {
  if (b.score !== a.score) return b.score - a.score;
  if (b.metadata.ingestedAt !== a.metadata.ingestedAt) return b.metadata.ingestedAt - a.metadata.ingestedAt;
  return a.chunkId < b.chunkId ? -1 : a.chunkId > b.chunkId ? 1 : 0;
}

export function matchesFilters(record: VectorRecord, filters?: VectorQueryFilters): boolean {
  if (!filters) return true;
  if (filters.sourceTypes && filters.sourceTypes.length > 0 && !filters.sourceTypes.includes(record.metadata.sourceType)) {
    return false;
  }
  if (filters.documentIds && filters.documentIds.length > 0 && !filters.documentIds.includes(record.metadata.documentId)) {
    return false;
  }
  return true;
}

/**
 * Every record must belong to the tenant that asked for it
 *
 * @throws TenantIsolationViolation on the first foreign record
 */
export function assertTenantOwnership(
  tenantId: string,
  records: ReadonlyArray<{ tenantId: string; chunkId: string }>,
  where: string
): void {
  for (const record of records) {
    if (record.tenantId !== tenantId) {
      logError('Tenant isolation violated', {
        tenant_id: tenantId,
        foreign_tenant_id: record.tenantId,
        chunk_id: record.chunkId,
        where,
      });
      throw new TenantIsolationViolation(tenantId, record.tenantId, where);
    }
  }
}

// =============================================================================
// IN-MEMORY BACKEND
// =============================================================================

/**
 * Map-per-tenant store for tests and ephemeral runs
 *
 * Records are copied on write so callers cannot mutate stored vectors.
 */
export class InMemoryVectorStore implements VectorStore {
  private readonly partitions = new Map<string, Map<string, VectorRecord>>();

  private partition(tenantId: string): Map<string, VectorRecord> {
    let partition = this.partitions.get(tenantId);
    if (!partition) {
      partition = new Map();
      this.partitions.set(tenantId, partition);
    }
    return partition;
  }

  async upsert(tenantId: string, record: VectorRecord): Promise<void> {
    assertTenantOwnership(tenantId, [record], 'InMemoryVectorStore.upsert');
    this.partition(tenantId).set(record.chunkId, {
      ...record,
      vector: [...record.vector],
      metadata: { ...record.metadata },
    });
  }

  async upsertMany(tenantId: string, records: VectorRecord[]): Promise<void> {
    assertTenantOwnership(tenantId, records, 'InMemoryVectorStore.upsertMany');
    for (const record of records) {
      await this.upsert(tenantId, record);
    }
  }

  async deleteDocument(tenantId: string, documentId: string): Promise<number> {
    const partition = this.partitions.get(tenantId);
    if (!partition) return 0;

    let removed = 0;
    for (const [chunkId, record] of partition) {
      if (record.metadata.documentId === documentId) {
        partition.delete(chunkId);
        removed++;
      }
    }
    return removed;
  }

  async query(tenantId: string, vector: number[], k: number, filters?: VectorQueryFilters): Promise<ScoredChunk[]> {
    if (k <= 0) return [];
    const partition = this.partitions.get(tenantId);
    if (!partition) return [];

    const scored: ScoredChunk[] = [];
    for (const record of partition.values()) {
      if (!matchesFilters(record, filters)) continue;
      scored.push({
        tenantId: record.tenantId,
        chunkId: record.chunkId,
        score: cosineSimilarity(vector, record.vector),
        metadata: { ...record.metadata },
      });
    }

    const results = scored.sort(compareScoredChunks).slice(0, k);
    assertTenantOwnership(tenantId, results, 'InMemoryVectorStore.query');
    return results;
  }

  async listChunks(tenantId: string, filters?: VectorQueryFilters): Promise<StoredChunk[]> {
    const partition = this.partitions.get(tenantId);
    if (!partition) return [];

    const chunks: StoredChunk[] = [];
    for (const record of partition.values()) {
      if (!matchesFilters(record, filters)) continue;
      chunks.push({ tenantId: record.tenantId, chunkId: record.chunkId, metadata: { ...record.metadata } });
    }
    assertTenantOwnership(tenantId, chunks, 'InMemoryVectorStore.listChunks');
    return chunks.sort(compareStoredChunks);
  }

  async count(tenantId: string): Promise<number> {
    return this.partitions.get(tenantId)?.size ?? 0;
  }

  /**
   * Stored record by id (tests and diagnostics)
   */
  get(tenantId: string, chunkId: string): VectorRecord | undefined {
    const record = this.partitions.get(tenantId)?.get(chunkId);
    return record ? { ...record, vector: [...record.vector], metadata: { ...record.metadata } } : undefined;
  }
}
