/**
 * Jest Unit Tests for the Ingestion Pipeline
 *
 * Runs against the in-memory store and registry with a deterministic
 * in-process embedder.
 */

import { EmbeddingUnavailable, IngestionFailed, InvalidInput, TenantIsolationViolation } from '../../common/errors.js';
import { FAST_RETRY, FakeEmbedder, NO_RETRY } from '../../common/__tests__/fakes.js';
import { ConcurrencyLimiter } from '../../common/services/concurrency-limiter.js';
import { InMemoryDocumentRegistry } from '../../common/services/document-registry.js';
import type { EmbeddingInputType } from '../../common/services/embedding-service.js';
import { InMemoryVectorStore } from '../../common/services/vector-store.js';
import type { VectorRecord } from '../../common/types.js';
import { chunkId } from '../chunker.js';
import { IngestionPipeline, type IngestionConfig } from '../ingestion-pipeline.js';

const TENANT = 'tenant-a';
const THREE_SENTENCES = 'Alpha beta gamma. Delta epsilon zeta. Eta theta iota.';

function setup(
  config: Partial<IngestionConfig> = {},
  store: InMemoryVectorStore = new InMemoryVectorStore(),
  embedder: FakeEmbedder = new FakeEmbedder()
) {
  const registry = new InMemoryDocumentRegistry();
  let now = 1000;
  const pipeline = new IngestionPipeline(
    { embedder, store, registry, limiter: new ConcurrencyLimiter(2), clock: () => now++ },
    { retry: NO_RETRY, ...config }
  );
  return { pipeline, embedder, store, registry };
}

async function expectIngestionFailure(promise: Promise<unknown>): Promise<IngestionFailed> {
  try {
    await promise;
  } catch (error) {
    expect(error).toBeInstanceOf(IngestionFailed);
    if (error instanceof IngestionFailed) return error;
  }
  throw new Error('Expected ingestion to fail');
}

describe('IngestionPipeline', () => {
  // ==========================================================================
  // HAPPY PATH
  // ==========================================================================

  describe('Ingest', () => {
    test('embeds a plain-text document and marks it embedded', async () => {
      const { pipeline, embedder, store, registry } = setup();

      const result = await pipeline.ingest(TENANT, {
        documentId: 'about',
        sourceType: 'uploaded_text',
        text: 'We help SaaS teams book more meetings.',
        title: 'About us',
      });

      expect(result.status).toBe('embedded');
      expect(result.skipped).toBe(false);
      expect(result.chunkCount).toBe(1);
      expect(embedder.calls).toEqual([{ texts: ['We help SaaS teams book more meetings.'], inputType: 'document' }]);
      expect(await store.count(TENANT)).toBe(1);

      const record = await registry.get(TENANT, 'about');
      expect(record?.status).toBe('embedded');
      expect(record?.chunkCount).toBe(1);
      expect(record?.title).toBe('About us');
      expect(record?.ingestedAt).toBe(result.ingestedAt);

      const stored = store.get(TENANT, chunkId('about', 0));
      expect(stored?.metadata.text).toBe('We help SaaS teams book more meetings.');
      expect(stored?.metadata.title).toBe('About us');
      expect(stored?.metadata.sourceType).toBe('uploaded_text');
    });

    test('composes structured records before chunking', async () => {
      const { pipeline, store } = setup();

      await pipeline.ingest(TENANT, {
        documentId: 'beacon',
        sourceType: 'products',
        fields: { name: 'Beacon', pricing: '$49 per seat' },
      });

      const stored = store.get(TENANT, chunkId('beacon', 0));
      expect(stored?.metadata.sourceType).toBe('product');
      expect(stored?.metadata.text).toBe('Product: Beacon\n\nPricing: $49 per seat');
    });

    test('a document with no text is embedded with zero chunks and no model call', async () => {
      const { pipeline, embedder, registry } = setup();

      const result = await pipeline.ingest(TENANT, { documentId: 'blank', sourceType: 'uploaded_text', text: '   ' });

      expect(result.chunkCount).toBe(0);
      expect(embedder.calls).toHaveLength(0);
      expect((await registry.get(TENANT, 'blank'))?.status).toBe('embedded');
    });
  });

  // ==========================================================================
  // IDEMPOTENCE & REPLACEMENT
  // ==========================================================================

  describe('Idempotence', () => {
    test('re-ingesting unchanged content is skipped', async () => {
      const { pipeline, embedder } = setup();
      const payload = { documentId: 'about', sourceType: 'uploaded_text', text: 'Same text.' };

      const first = await pipeline.ingest(TENANT, payload);
      const second = await pipeline.ingest(TENANT, payload);

      expect(second.skipped).toBe(true);
      expect(second.contentHash).toBe(first.contentHash);
      expect(second.ingestedAt).toBe(first.ingestedAt);
      expect(embedder.calls).toHaveLength(1);
    });

    test('concurrent ingestion of the same document embeds it once', async () => {
      const { pipeline, embedder } = setup();
      const payload = { documentId: 'about', sourceType: 'uploaded_text', text: 'Same text.' };

      const results = await Promise.all([pipeline.ingest(TENANT, payload), pipeline.ingest(TENANT, payload)]);

      expect(results.map(result => result.skipped)).toEqual([false, true]);
      expect(embedder.calls).toHaveLength(1);
    });

    test('changed content replaces every old chunk', async () => {
      const { pipeline, store } = setup({ chunking: { maxTokens: 10, overlapTokens: 0 } });

      const first = await pipeline.ingest(TENANT, { documentId: 'doc', sourceType: 'uploaded_text', text: THREE_SENTENCES });
      expect(first.chunkCount).toBe(2);

      const second = await pipeline.ingest(TENANT, { documentId: 'doc', sourceType: 'uploaded_text', text: 'Just one.' });

      expect(second.skipped).toBe(false);
      expect(second.chunkCount).toBe(1);
      expect(await store.count(TENANT)).toBe(1);
      expect(store.get(TENANT, chunkId('doc', 0))?.metadata.text).toBe('Just one.');
      expect(store.get(TENANT, chunkId('doc', 1))).toBeUndefined();
    });

    test('the content hash covers the chunking parameters', () => {
      const input = { documentId: 'doc', sourceType: 'uploaded_text' as const, text: THREE_SENTENCES };

      expect(setup().pipeline.contentHash(input)).not.toBe(
        setup({ chunking: { maxTokens: 10, overlapTokens: 0 } }).pipeline.contentHash(input)
      );
      expect(setup().pipeline.contentHash(input)).toBe(setup().pipeline.contentHash(input));
    });
  });

  // ==========================================================================
  // FAILURES
  // ==========================================================================

  describe('Failures', () => {
    test('an invalid payload throws InvalidInput and persists nothing', async () => {
      const { pipeline, registry } = setup();

      await expect(pipeline.ingest(TENANT, { documentId: '', sourceType: 'pdf' })).rejects.toBeInstanceOf(InvalidInput);
      expect(await registry.list(TENANT)).toEqual([]);
    });

    test('an embedding outage is persisted as failed with step and kind', async () => {
      const { pipeline, embedder, store, registry } = setup();
      embedder.failures.push(new EmbeddingUnavailable('Voyage is down'));

      const error = await expectIngestionFailure(
        pipeline.ingest(TENANT, { documentId: 'doc', sourceType: 'uploaded_text', text: 'Some text.' })
      );

      expect(error.reason).toEqual({ kind: 'EmbeddingUnavailable', step: 'embedding', message: 'Voyage is down' });
      const record = await registry.get(TENANT, 'doc');
      expect(record?.status).toBe('failed');
      expect(record?.error).toEqual({ kind: 'EmbeddingUnavailable', step: 'embedding', message: 'Voyage is down' });
      expect(await store.count(TENANT)).toBe(0);
    });

    test('transient failures are retried within the attempt budget', async () => {
      const { pipeline, embedder } = setup({ retry: FAST_RETRY });
      embedder.failures.push(new EmbeddingUnavailable('blip'));

      const result = await pipeline.ingest(TENANT, { documentId: 'doc', sourceType: 'uploaded_text', text: 'Some text.' });

      expect(result.status).toBe('embedded');
      expect(embedder.calls).toHaveLength(2);
    });

    test('a hanging embedder times out as EmbeddingUnavailable', async () => {
      const { pipeline, embedder } = setup({ embedTimeoutMs: 20 });
      embedder.hang = true;

      const error = await expectIngestionFailure(
        pipeline.ingest(TENANT, { documentId: 'doc', sourceType: 'uploaded_text', text: 'Some text.' })
      );

      expect(error.reason.kind).toBe('EmbeddingUnavailable');
      expect(error.reason.step).toBe('embedding');
    });

    test('a failed document can be ingested again once the upstream recovers', async () => {
      const { pipeline, embedder, registry } = setup();
      const payload = { documentId: 'doc', sourceType: 'uploaded_text', text: 'Some text.' };
      embedder.failures.push(new EmbeddingUnavailable('down'));

      await expectIngestionFailure(pipeline.ingest(TENANT, payload));
      const result = await pipeline.ingest(TENANT, payload);

      expect(result.skipped).toBe(false);
      expect((await registry.get(TENANT, 'doc'))?.status).toBe('embedded');
      expect((await registry.get(TENANT, 'doc'))?.error).toBeUndefined();
    });

    test('a failed re-ingestion leaves no vectors of the previous version', async () => {
      const { pipeline, embedder, store, registry } = setup();
      await pipeline.ingest(TENANT, { documentId: 'doc', sourceType: 'uploaded_text', text: 'Old pricing.' });
      expect(await store.count(TENANT)).toBe(1);
      embedder.failures.push(new EmbeddingUnavailable('down'));

      await expectIngestionFailure(
        pipeline.ingest(TENANT, { documentId: 'doc', sourceType: 'uploaded_text', text: 'New pricing.' })
      );

      expect((await registry.get(TENANT, 'doc'))?.status).toBe('failed');
      expect(await store.count(TENANT)).toBe(0);
    });

    test('old vectors are removed before the new version is embedded', async () => {
      const store = new InMemoryVectorStore();
      const storedDuringEmbed: number[] = [];
      class ObservingEmbedder extends FakeEmbedder {
        async embed(texts: string[], inputType: EmbeddingInputType): Promise<number[][]> {
          storedDuringEmbed.push(await store.count(TENANT));
          return super.embed(texts, inputType);
        }
      }
      const { pipeline } = setup({}, store, new ObservingEmbedder());

      await pipeline.ingest(TENANT, { documentId: 'doc', sourceType: 'uploaded_text', text: 'Old pricing.' });
      await pipeline.ingest(TENANT, { documentId: 'doc', sourceType: 'uploaded_text', text: 'New pricing.' });

      expect(storedDuringEmbed).toEqual([0, 0]);
      expect(await store.count(TENANT)).toBe(1);
    });
  });

  // ==========================================================================
  // TENANT ISOLATION
  // ==========================================================================

  describe('Tenant Isolation', () => {
    // Writes every batch into another tenant's partition
    class MisroutingStore extends InMemoryVectorStore {
      async upsertMany(_tenantId: string, records: VectorRecord[]): Promise<void> {
        await super.upsertMany('tenant-b', records);
      }
    }

    test('a store write into another tenant aborts with TenantIsolationViolation', async () => {
      const { pipeline, registry } = setup({}, new MisroutingStore());

      await expect(
        pipeline.ingest(TENANT, { documentId: 'doc', sourceType: 'uploaded_text', text: 'Some text.' })
      ).rejects.toBeInstanceOf(TenantIsolationViolation);
      expect((await registry.get(TENANT, 'doc'))?.status).toBe('chunked');
    });

    test('ingestMany does not fold the violation into its failures', async () => {
      const { pipeline } = setup({}, new MisroutingStore());

      await expect(
        pipeline.ingestMany(TENANT, [{ documentId: 'doc', sourceType: 'uploaded_text', text: 'Some text.' }])
      ).rejects.toBeInstanceOf(TenantIsolationViolation);
    });
  });

  // ==========================================================================
  // BULK, DELETE & ISOLATION
  // ==========================================================================

  describe('Bulk and Delete', () => {
    test('ingestMany reports each outcome without stopping on failures', async () => {
      const { pipeline } = setup();

      const summary = await pipeline.ingestMany(TENANT, [
        { documentId: 'a', sourceType: 'uploaded_text', text: 'First document.' },
        { documentId: 'b', sourceType: 'bulk_snippets', text: 'Second document.' },
        { documentId: 'c', sourceType: 'pdf', text: 'Third document.' },
      ]);

      expect(summary.embedded).toBe(2);
      expect(summary.skipped).toBe(0);
      expect(summary.failed).toBe(1);
      expect(summary.chunks).toBe(2);
      expect(summary.failures).toHaveLength(1);
      expect(summary.failures[0].documentId).toBe('c');
      expect(summary.failures[0].kind).toBe('InvalidInput');
      expect(summary.failures[0].step).toBe('validating');
    });

    test('deleteDocument removes chunks and the registry record', async () => {
      const { pipeline, store, registry } = setup({ chunking: { maxTokens: 10, overlapTokens: 0 } });
      await pipeline.ingest(TENANT, { documentId: 'doc', sourceType: 'uploaded_text', text: THREE_SENTENCES });

      const removed = await pipeline.deleteDocument(TENANT, 'doc');

      expect(removed).toEqual({ removedChunks: 2, removedRecord: true });
      expect(await store.count(TENANT)).toBe(0);
      expect(await registry.get(TENANT, 'doc')).toBeNull();
    });

    test('documents of one tenant are invisible to another', async () => {
      const { pipeline, store } = setup();
      await pipeline.ingest(TENANT, { documentId: 'doc', sourceType: 'uploaded_text', text: 'Private pricing.' });

      expect(await pipeline.getStatus('tenant-b', 'doc')).toBeNull();
      expect(await pipeline.listDocuments('tenant-b')).toEqual([]);
      expect(await store.count('tenant-b')).toBe(0);
      expect(await pipeline.deleteDocument('tenant-b', 'doc')).toEqual({ removedChunks: 0, removedRecord: false });
      expect(await store.count(TENANT)).toBe(1);
    });

    test('listDocuments filters by status', async () => {
      const { pipeline, embedder } = setup();
      await pipeline.ingest(TENANT, { documentId: 'ok', sourceType: 'uploaded_text', text: 'Fine.' });
      embedder.failures.push(new EmbeddingUnavailable('down'));
      await expectIngestionFailure(pipeline.ingest(TENANT, { documentId: 'broken', sourceType: 'uploaded_text', text: 'Bad.' }));

      expect((await pipeline.listDocuments(TENANT)).map(record => record.documentId)).toEqual(['broken', 'ok']);
      expect((await pipeline.listDocuments(TENANT, 'failed')).map(record => record.documentId)).toEqual(['broken']);
    });
  });
});
