/**
 * Jest Unit Tests for the Qdrant store's helpers
 *
 * The client itself needs a running Qdrant and is not exercised here;
 * request guarding runs against in-process functions.
 */

import { VectorStoreUnavailable } from '../../errors.js';
import type { VectorRecord } from '../../types.js';
import { CircuitBreaker } from '../circuit-breaker.js';
import {
  buildQdrantFilter,
  fromPoint,
  fromScoredPoint,
  guardedQdrantCall,
  tenantCollectionName,
  toPoint,
} from '../qdrant-vector-store.js';

const RECORD: VectorRecord = {
  tenantId: 'tenant-a',
  chunkId: '6f1c2d3e-0000-4000-8000-000000000001',
  vector: [0.1, 0.2],
  metadata: {
    documentId: 'pricing',
    sourceType: 'product',
    ordinal: 2,
    text: 'Plans start at $49.',
    tokenCount: 5,
    title: 'Pricing',
    ingestedAt: 1700000000000,
  },
};

describe('Qdrant helpers', () => {
  test('collection names are stable, prefixed and tenant-specific', () => {
    const name = tenantCollectionName('outreach_kb', 'tenant-a');

    expect(name).toMatch(/^outreach_kb_t[0-9a-f]{24}$/);
    expect(tenantCollectionName('outreach_kb', 'tenant-a')).toBe(name);
    expect(tenantCollectionName('outreach_kb', 'tenant-b')).not.toBe(name);
  });

  test('points carry the tenant and citation metadata in the payload', () => {
    expect(toPoint(RECORD)).toEqual({
      id: RECORD.chunkId,
      vector: [0.1, 0.2],
      payload: {
        tenant_id: 'tenant-a',
        document_id: 'pricing',
        source_type: 'product',
        ordinal: 2,
        text: 'Plans start at $49.',
        token_count: 5,
        title: 'Pricing',
        source_url: null,
        ingested_at: 1700000000000,
      },
    });
  });

  test('search hits read back into scored chunks', () => {
    const point = toPoint(RECORD);

    expect(fromScoredPoint({ id: point.id, score: 0.87, payload: point.payload })).toEqual({
      tenantId: 'tenant-a',
      chunkId: RECORD.chunkId,
      score: 0.87,
      metadata: { ...RECORD.metadata, sourceUrl: undefined },
    });
  });

  test('a payload this store did not write is rejected', () => {
    expect(() => fromScoredPoint({ id: 7, score: 0.5, payload: { text: 'x' } })).toThrow(
      'Qdrant point 7 has an unexpected payload'
    );
  });

  test('filters always pin the tenant', () => {
    expect(buildQdrantFilter('tenant-a')).toEqual({ must: [{ key: 'tenant_id', match: { value: 'tenant-a' } }] });
    expect(buildQdrantFilter('tenant-a', { sourceTypes: ['product'], documentIds: ['pricing'] })).toEqual({
      must: [
        { key: 'tenant_id', match: { value: 'tenant-a' } },
        { key: 'source_type', match: { any: ['product'] } },
        { key: 'document_id', match: { any: ['pricing'] } },
      ],
    });
  });

  test('scrolled points read back into stored chunks without a score', () => {
    const point = toPoint(RECORD);

    expect(fromPoint({ id: point.id, payload: point.payload })).toEqual({
      tenantId: 'tenant-a',
      chunkId: RECORD.chunkId,
      metadata: { ...RECORD.metadata, sourceUrl: undefined },
    });
  });
});

describe('Guarded Qdrant calls', () => {
  const breaker = () =>
    new CircuitBreaker('qdrant-test', {
      failureThreshold: 1,
      resetTimeoutMs: 60000,
      halfOpenRequests: 1,
      openError: () => new VectorStoreUnavailable('circuit open'),
    });

  test('a request that never answers times out as VectorStoreUnavailable', async () => {
    const call = guardedQdrantCall(breaker(), 'search', 20, () => new Promise<never>(() => undefined));

    await expect(call).rejects.toBeInstanceOf(VectorStoreUnavailable);
    await expect(call).rejects.toThrow('Qdrant search did not complete within 20ms');
  });

  test('client errors are mapped and count against the circuit', async () => {
    const guard = breaker();

    await expect(
      guardedQdrantCall(guard, 'upsert', 1000, async () => Promise.reject(new Error('ECONNREFUSED')))
    ).rejects.toThrow('Qdrant upsert failed: ECONNREFUSED');

    expect(guard.getState()).toBe('open');
    await expect(guardedQdrantCall(guard, 'count', 1000, async () => 3)).rejects.toThrow('circuit open');
  });

  test('answers within the timeout pass through', async () => {
    await expect(guardedQdrantCall(breaker(), 'count', 1000, async () => 3)).resolves.toBe(3);
  });
});
