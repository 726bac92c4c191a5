/**
 * Runtime wiring
 *
 * Builds the component graph shared by the MCP server and the CLI:
 * defaults < environment < explicit overrides. Upstream clients and backends
 * can be injected (tests, embedding in a host service).
 */

import { loadEnvConfig, mergeDefined, type EnvConfig } from '../common/constants.js';
import { DEFAULT_CACHE_CONFIG, EmbeddingCache } from '../common/services/cache-service.js';
import { ConcurrencyLimiter } from '../common/services/concurrency-limiter.js';
import {
  DEFAULT_SQLITE_REGISTRY_CONFIG,
  InMemoryDocumentRegistry,
  SqliteDocumentRegistry,
  type DocumentRegistry,
} from '../common/services/document-registry.js';
import {
  DEFAULT_EMBEDDING_CONFIG,
  validateEmbeddingConfig,
  VoyageEmbeddingClient,
  type EmbeddingClient,
} from '../common/services/embedding-service.js';
import {
  AnthropicGenerationClient,
  DEFAULT_GENERATION_CONFIG,
  validateGenerationConfig,
  type GenerationClient,
} from '../common/services/generation-client.js';
import { logInfo, logWarn } from '../common/services/logger.js';
import { DEFAULT_QDRANT_CONFIG, QdrantVectorStore } from '../common/services/qdrant-vector-store.js';
import { DEFAULT_RETRY_CONFIG } from '../common/services/retry.js';
import { InMemoryVectorStore, type VectorStore } from '../common/services/vector-store.js';
import { DEFAULT_CHUNKING_CONFIG, validateChunkingConfig } from '../knowledge/chunker.js';
import { IngestionPipeline } from '../knowledge/ingestion-pipeline.js';
import { loadReadinessRules, ReadinessScorer } from '../knowledge/readiness.js';
import {
  DEFAULT_ORCHESTRATOR_CONFIG,
  EmailOrchestrator,
  validateOrchestratorConfig,
} from '../outreach/email-orchestrator.js';
import { loadSpamRules, SpamScorer } from '../outreach/spam-score.js';
import { KnowledgeQa } from '../semantic/knowledge-qa.js';
import { DEFAULT_RETRIEVAL_CONFIG, Retriever, validateRetrievalConfig } from '../semantic/retriever.js';

export interface RuntimeOverrides {
  embedder?: EmbeddingClient;
  generator?: GenerationClient;
  store?: VectorStore;
  registry?: DocumentRegistry;
  scorer?: SpamScorer;
}

export interface OutreachRuntime {
  env: EnvConfig;
  /** Non-fatal configuration problems (e.g. a missing API key) */
  warnings: string[];
  embedder: EmbeddingClient;
  generator: GenerationClient;
  store: VectorStore;
  registry: DocumentRegistry;
  cache: EmbeddingCache;
  scorer: SpamScorer;
  pipeline: IngestionPipeline;
  readiness: ReadinessScorer;
  retriever: Retriever;
  orchestrator: EmailOrchestrator;
  qa: KnowledgeQa;
  /** Effective configuration, for system_status */
  describe(): Record<string, unknown>;
  close(): void;
}

/**
 * Build every component from the environment
 *
 * @throws Error when a setting is invalid (missing API keys are warnings)
 */
export function createRuntime(env: EnvConfig = loadEnvConfig(), overrides: RuntimeOverrides = {}): OutreachRuntime {
  const retry = mergeDefined(DEFAULT_RETRY_CONFIG, env.retry);
  const embeddingConfig = mergeDefined({ ...DEFAULT_EMBEDDING_CONFIG, apiKey: '' }, env.voyage);
  const generationConfig = mergeDefined({ ...DEFAULT_GENERATION_CONFIG, apiKey: '' }, env.anthropic);
  const chunking = mergeDefined(DEFAULT_CHUNKING_CONFIG, env.chunking);
  const retrieval = mergeDefined(DEFAULT_RETRIEVAL_CONFIG, env.retrieval, { retry });
  const orchestration = mergeDefined(DEFAULT_ORCHESTRATOR_CONFIG, {
    spamThreshold: env.spam.threshold,
    maxPromptTokens: env.prompt.maxPromptTokens,
    generationTimeoutMs: generationConfig.timeoutMs,
    retry,
  });
  const cacheConfig = mergeDefined(DEFAULT_CACHE_CONFIG, env.cache);

  const warnings: string[] = [];
  const errors: string[] = [
    ...validateChunkingConfig(chunking),
    ...validateRetrievalConfig(retrieval),
    ...validateOrchestratorConfig(orchestration),
  ];
  // A missing key only matters once the upstream is called
  for (const problem of [...validateEmbeddingConfig(embeddingConfig), ...validateGenerationConfig(generationConfig)]) {
    (problem.endsWith('is required') ? warnings : errors).push(problem);
  }
  if (errors.length > 0) {
    throw new Error(`Invalid configuration: ${errors.join('; ')}`);
  }
  for (const warning of warnings) {
    logWarn('Configuration warning', { warning });
  }

  const embedder = overrides.embedder ?? new VoyageEmbeddingClient(embeddingConfig);
  const generator = overrides.generator ?? new AnthropicGenerationClient(generationConfig);
  const store =
    overrides.store ??
    (env.storage.vectorBackend === 'memory'
      ? new InMemoryVectorStore()
      : new QdrantVectorStore({
          ...DEFAULT_QDRANT_CONFIG,
          host: env.storage.qdrantHost,
          apiKey: env.storage.qdrantApiKey,
          collectionPrefix: env.storage.collectionPrefix,
          vectorSize: embedder.dimensions,
          timeoutMs: env.storage.qdrantTimeoutMs ?? DEFAULT_QDRANT_CONFIG.timeoutMs,
        }));
  const registry =
    overrides.registry ??
    (env.storage.registryBackend === 'memory'
      ? new InMemoryDocumentRegistry()
      : new SqliteDocumentRegistry({ ...DEFAULT_SQLITE_REGISTRY_CONFIG, databasePath: env.storage.registryPath }));
  const scorer = overrides.scorer ?? new SpamScorer(loadSpamRules(env.spam.rulesFile));
  const cache = new EmbeddingCache(cacheConfig);

  const embeddingLimiter = new ConcurrencyLimiter(env.voyage.concurrency ?? 4);
  const generationLimiter = new ConcurrencyLimiter(env.anthropic.concurrency ?? 2);

  const pipeline = new IngestionPipeline(
    { embedder, store, registry, limiter: embeddingLimiter },
    { chunking, retry, embedTimeoutMs: embeddingConfig.timeoutMs }
  );
  const readiness = new ReadinessScorer({ registry, store, rules: loadReadinessRules(env.readiness.rulesFile) });
  const retriever = new Retriever(
    { embedder, store, registry, cache, limiter: embeddingLimiter },
    { ...retrieval, embedTimeoutMs: embeddingConfig.timeoutMs }
  );
  const orchestrator = new EmailOrchestrator({ retriever, generator, scorer, limiter: generationLimiter }, orchestration);
  const qa = new KnowledgeQa(
    { retriever, generator, limiter: generationLimiter },
    { generationTimeoutMs: generationConfig.timeoutMs, retry }
  );

  logInfo('Runtime ready', {
    vector_backend: overrides.store ? 'injected' : env.storage.vectorBackend,
    registry_backend: overrides.registry ? 'injected' : env.storage.registryBackend,
    embedding_model: embedder.model,
    generation_model: generationConfig.model,
  });

  return {
    env,
    warnings,
    embedder,
    generator,
    store,
    registry,
    cache,
    scorer,
    pipeline,
    readiness,
    retriever,
    orchestrator,
    qa,
    describe: () => ({
      embedding: { model: embedder.model, dimensions: embedder.dimensions, max_input_tokens: embedder.maxInputTokens },
      generation: { model: generationConfig.model, max_tokens: generationConfig.maxTokens },
      storage: {
        vector_backend: env.storage.vectorBackend,
        registry_backend: env.storage.registryBackend,
      },
      chunking,
      retrieval: { k: retrieval.k, token_budget: retrieval.tokenBudget, min_similarity: retrieval.minSimilarity },
      orchestration: { spam_threshold: orchestration.spamThreshold, max_prompt_tokens: orchestration.maxPromptTokens },
      retry,
      cache: cacheConfig,
      warnings,
    }),
    close: () => registry.close(),
  };
}
