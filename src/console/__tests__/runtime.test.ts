/**
 * Jest Unit Tests for runtime wiring
 */

import { FakeEmbedder, ScriptedGenerator } from '../../common/__tests__/fakes.js';
import { loadEnvConfig } from '../../common/constants.js';
import { InMemoryDocumentRegistry } from '../../common/services/document-registry.js';
import { InMemoryVectorStore } from '../../common/services/vector-store.js';
import { createRuntime, type OutreachRuntime } from '../runtime.js';

const MEMORY_BACKENDS = { VECTOR_BACKEND: 'memory', REGISTRY_BACKEND: 'memory' };

describe('createRuntime', () => {
  let runtime: OutreachRuntime | undefined;

  afterEach(() => {
    runtime?.close();
    runtime = undefined;
  });

  test('missing API keys are warnings, not errors', () => {
    runtime = createRuntime(loadEnvConfig(MEMORY_BACKENDS), {
      embedder: new FakeEmbedder(),
      generator: new ScriptedGenerator(['Subject: Hi\n\nBody']),
    });

    expect(runtime.warnings).toEqual(['VOYAGE_API_KEY is required', 'ANTHROPIC_API_KEY is required']);
    expect(runtime.store).toBeInstanceOf(InMemoryVectorStore);
    expect(runtime.registry).toBeInstanceOf(InMemoryDocumentRegistry);
  });

  test('invalid settings fail fast', () => {
    const env = loadEnvConfig({ ...MEMORY_BACKENDS, CHUNK_MAX_TOKENS: '10', CHUNK_OVERLAP_TOKENS: '10' });

    expect(() => createRuntime(env, { embedder: new FakeEmbedder() })).toThrow(
      'Invalid configuration: overlapTokens (10) must be smaller than maxTokens (10)'
    );
  });

  test('describe reports the effective configuration', () => {
    runtime = createRuntime(
      loadEnvConfig({ ...MEMORY_BACKENDS, VOYAGE_API_KEY: 'test-key', ANTHROPIC_API_KEY: 'test-key', RETRIEVAL_TOP_K: '8' }),
      { embedder: new FakeEmbedder(), generator: new ScriptedGenerator(['Subject: Hi\n\nBody']) }
    );
    const described = runtime.describe();

    expect(runtime.warnings).toEqual([]);
    expect(described.storage).toEqual({ vector_backend: 'memory', registry_backend: 'memory' });
    expect(described.chunking).toEqual({ maxTokens: 250, overlapTokens: 50 });
    expect(described.retrieval).toEqual({ k: 8, token_budget: 1500, min_similarity: 0.35 });
    expect(described.embedding).toEqual({ model: 'fake-bow', dimensions: 256, max_input_tokens: 8000 });
  });
});
