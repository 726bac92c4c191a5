/**
 * Jest Unit Tests for the In-Memory Vector Store and shared helpers
 */

import { TenantIsolationViolation } from '../../errors.js';
import type { VectorRecord } from '../../types.js';
import { compareScoredChunks, cosineSimilarity, InMemoryVectorStore } from '../vector-store.js';

function record(chunkId: string, vector: number[], overrides: Partial<VectorRecord['metadata']> = {}, tenantId = 'tenant-a'): VectorRecord {
  return {
    tenantId,
    chunkId,
    vector,
    metadata: {
      documentId: 'doc',
      sourceType: 'uploaded_text',
      ordinal: 0,
      text: chunkId,
      tokenCount: 1,
      ingestedAt: 1000,
      ...overrides,
    },
  };
}

describe('cosineSimilarity', () => {
  test('is 1 for parallel, 0 for orthogonal and -1 for opposite vectors', () => {
    expect(cosineSimilarity([1, 2], [2, 4])).toBeCloseTo(1, 10);
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
    expect(cosineSimilarity([1, 0], [-1, 0])).toBe(-1);
  });

  test('is 0 when a vector has zero length', () => {
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
  });

  test('rejects vectors of different dimension', () => {
    expect(() => cosineSimilarity([1], [1, 0])).toThrow(RangeError);
  });
});

describe('InMemoryVectorStore', () => {
  test('queries return top-k by score', async () => {
    const store = new InMemoryVectorStore();
    await store.upsertMany('tenant-a', [record('far', [0, 1]), record('near', [1, 0.1]), record('exact', [1, 0])]);

    const results = await store.query('tenant-a', [1, 0], 2);

    expect(results.map(result => result.chunkId)).toEqual(['exact', 'near']);
  });

  test('ties break by newest ingestion, then chunk id', () => {
    const base = { tenantId: 'tenant-a', score: 0.5 };
    const older = { ...base, chunkId: 'a', metadata: record('a', []).metadata };
    const newer = { ...base, chunkId: 'z', metadata: { ...record('z', []).metadata, ingestedAt: 2000 } };
    const sibling = { ...base, chunkId: 'b', metadata: record('b', []).metadata };

    expect([sibling, older, newer].sort(compareScoredChunks).map(chunk => chunk.chunkId)).toEqual(['z', 'a', 'b']);
  });

  test('filters by source type and document id', async () => {
    const store = new InMemoryVectorStore();
    await store.upsertMany('tenant-a', [
      record('p', [1, 0], { sourceType: 'product', documentId: 'p-doc' }),
      record('q', [1, 0], { sourceType: 'company_qa', documentId: 'q-doc' }),
    ]);

    expect((await store.query('tenant-a', [1, 0], 5, { sourceTypes: ['product'] })).map(r => r.chunkId)).toEqual(['p']);
    expect((await store.query('tenant-a', [1, 0], 5, { documentIds: ['q-doc'] })).map(r => r.chunkId)).toEqual(['q']);
  });

  test('upsert overwrites by chunk id and copies the record', async () => {
    const store = new InMemoryVectorStore();
    const original = record('c', [1, 0]);
    await store.upsert('tenant-a', original);
    original.vector[0] = 0;
    await store.upsert('tenant-a', record('c', [0, 1], { text: 'replaced' }));

    expect(await store.count('tenant-a')).toBe(1);
    expect(store.get('tenant-a', 'c')?.metadata.text).toBe('replaced');
  });

  test('stored vectors are not affected by later caller mutation', async () => {
    const store = new InMemoryVectorStore();
    const original = record('c', [1, 0]);
    await store.upsert('tenant-a', original);
    original.vector[0] = 0;

    expect(store.get('tenant-a', 'c')?.vector).toEqual([1, 0]);
  });

  test('deleteDocument removes only that document', async () => {
    const store = new InMemoryVectorStore();
    await store.upsertMany('tenant-a', [
      record('a0', [1, 0], { documentId: 'a' }),
      record('a1', [1, 0], { documentId: 'a', ordinal: 1 }),
      record('b0', [1, 0], { documentId: 'b' }),
    ]);

    expect(await store.deleteDocument('tenant-a', 'a')).toBe(2);
    expect(await store.count('tenant-a')).toBe(1);
    expect(await store.deleteDocument('tenant-x', 'a')).toBe(0);
  });

  test('tenants are separate partitions', async () => {
    const store = new InMemoryVectorStore();
    await store.upsert('tenant-a', record('c', [1, 0]));

    expect(await store.query('tenant-b', [1, 0], 5)).toEqual([]);
    expect(await store.count('tenant-b')).toBe(0);
  });

  test('writing a record into another tenant is a violation', async () => {
    const store = new InMemoryVectorStore();

    await expect(store.upsert('tenant-a', record('c', [1, 0], {}, 'tenant-b'))).rejects.toBeInstanceOf(
      TenantIsolationViolation
    );
    expect(await store.count('tenant-a')).toBe(0);
  });

  test('k <= 0 returns nothing', async () => {
    const store = new InMemoryVectorStore();
    await store.upsert('tenant-a', record('c', [1, 0]));

    expect(await store.query('tenant-a', [1, 0], 0)).toEqual([]);
  });
});
