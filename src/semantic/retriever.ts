/**
 * Retriever
 *
 * Query text -> packed context for one tenant:
 *
 * 1. Embed the query (LRU-cached per tenant)
 * 2. Top-k candidates from the tenant's vector partition, restricted to
 *    documents the registry lists as "embedded"
 * 3. Assert every candidate belongs to the tenant
 * 4. Drop candidates whose document left "embedded" after step 2
 * 5. Drop candidates under the similarity threshold
 * 6. Pack greedily by descending score, stopping before the budget is exceeded
 *
 * "No relevant knowledge" is an empty context, not an error.
 */

import { mergeDefined } from '../common/constants.js';
import { EmbeddingUnavailable } from '../common/errors.js';
import { EmbeddingCache } from '../common/services/cache-service.js';
import type { ConcurrencyLimiter } from '../common/services/concurrency-limiter.js';
import type { DocumentRegistry } from '../common/services/document-registry.js';
import type { EmbeddingClient } from '../common/services/embedding-service.js';
import { generateRequestId, logInfo, type LogContext } from '../common/services/logger.js';
import { DEFAULT_RETRY_CONFIG, withRetry, withTimeout, type RetryConfig } from '../common/services/retry.js';
import { assertTenantOwnership, type VectorStore } from '../common/services/vector-store.js';
import { emptyContext, type RetrievedContext, type SourceType } from '../common/types.js';

// =============================================================================
// CONFIGURATION
// =============================================================================

export interface RetrievalConfig {
  k: number;
  tokenBudget: number;
  minSimilarity: number;
  /** Per-tenant threshold overrides */
  tenantMinSimilarity: Record<string, number>;
  retry: RetryConfig;
  embedTimeoutMs: number;
}

export const DEFAULT_RETRIEVAL_CONFIG: RetrievalConfig = {
  k: 5,
  tokenBudget: 1500,
  minSimilarity: 0.35,
  tenantMinSimilarity: {},
  retry: DEFAULT_RETRY_CONFIG,
  embedTimeoutMs: 30000,
};

export function validateRetrievalConfig(config: RetrievalConfig): string[] {
  const errors: string[] = [];
  if (!Number.isInteger(config.k) || config.k < 1) errors.push('RETRIEVAL_TOP_K must be an integer >= 1');
  if (config.tokenBudget < 1) errors.push('RETRIEVAL_TOKEN_BUDGET must be >= 1');
  if (config.minSimilarity < -1 || config.minSimilarity > 1) {
    errors.push('RETRIEVAL_MIN_SIMILARITY must be between -1 and 1');
  }
  return errors;
}

export interface RetrieveOptions {
  k?: number;
  tokenBudget?: number;
  minSimilarity?: number;
  sourceTypes?: SourceType[];
  requestId?: string;
}

export interface RetrieverDependencies {
  embedder: EmbeddingClient;
  store: VectorStore;
  registry: DocumentRegistry;
  cache?: EmbeddingCache;
  /** Shared cap on concurrent embedding calls */
  limiter?: ConcurrencyLimiter;
}

// =============================================================================
// RETRIEVER
// =============================================================================

export class Retriever {
  private readonly config: RetrievalConfig;

  constructor(
    private readonly deps: RetrieverDependencies,
    config: Partial<RetrievalConfig> = {}
  ) {
    this.config = mergeDefined(DEFAULT_RETRIEVAL_CONFIG, config);
  }

  /**
   * Threshold for a tenant: per-tenant override, else the default
   */
  thresholdFor(tenantId: string): number {
    return this.config.tenantMinSimilarity[tenantId] ?? this.config.minSimilarity;
  }

  async retrieve(tenantId: string, queryText: string, options: RetrieveOptions = {}): Promise<RetrievedContext> {
    const query = queryText.trim();
    const k = options.k ?? this.config.k;
    if (!query || k <= 0) {
      return emptyContext();
    }

    const startTime = Date.now();
    const tokenBudget = options.tokenBudget ?? this.config.tokenBudget;
    const minSimilarity = options.minSimilarity ?? this.thresholdFor(tenantId);
    const logCtx: LogContext = {
      request_id: options.requestId ?? generateRequestId('ret'),
      tenant_id: tenantId,
      step: 'retrieving',
    };

    const vector = await this.embedQuery(tenantId, query, logCtx);

    // Top-k runs over ready documents only, or a stale chunk could take a slot
    const readyDocuments = await this.deps.registry.list(tenantId, { status: 'embedded' });
    if (readyDocuments.length === 0) {
      logInfo('No embedded documents for tenant', { ...logCtx, duration_ms: Date.now() - startTime });
      return emptyContext();
    }
    const candidates = await this.deps.store.query(tenantId, vector, k, {
      sourceTypes: options.sourceTypes,
      documentIds: readyDocuments.map(document => document.documentId),
    });
    assertTenantOwnership(tenantId, candidates, 'Retriever.retrieve');

    const statuses = await this.deps.registry.getStatuses(
      tenantId,
      candidates.map(candidate => candidate.metadata.documentId)
    );
    const ready = candidates.filter(candidate => statuses.get(candidate.metadata.documentId) === 'embedded');
    const relevant = ready.filter(candidate => candidate.score >= minSimilarity);

    const context: RetrievedContext = {
      chunks: [],
      totalTokens: 0,
      candidates: candidates.length,
      notReady: candidates.length - ready.length,
      belowThreshold: ready.length - relevant.length,
      overBudget: 0,
    };

    // Candidates arrive sorted by score; stop at the first that does not fit
    for (let i = 0; i < relevant.length; i++) {
      const tokens = relevant[i].metadata.tokenCount;
      if (context.totalTokens + tokens > tokenBudget) {
        context.overBudget = relevant.length - i;
        break;
      }
      context.chunks.push(relevant[i]);
      context.totalTokens += tokens;
    }

    logInfo('Context retrieved', {
      ...logCtx,
      chunks: context.chunks.length,
      total_tokens: context.totalTokens,
      candidates: context.candidates,
      below_threshold: context.belowThreshold,
      not_ready: context.notReady,
      over_budget: context.overBudget,
      duration_ms: Date.now() - startTime,
    });
    return context;
  }

  private async embedQuery(tenantId: string, query: string, logCtx: LogContext): Promise<number[]> {
    const { embedder, cache, limiter } = this.deps;
    const cacheKey = EmbeddingCache.key(tenantId, embedder.model, query);
    const cached = cache?.get(cacheKey);
    if (cached) {
      return cached;
    }

    const timeoutMs = this.config.embedTimeoutMs;
    const call = () =>
      withTimeout(
        embedder.embed([query], 'query', logCtx),
        timeoutMs,
        () => new EmbeddingUnavailable(`Query embedding did not complete within ${timeoutMs}ms`)
      );
    const vectors = await withRetry(
      () => (limiter ? limiter.run(call) : call()),
      this.config.retry,
      { operation: 'embed_query', logContext: logCtx }
    );
    if (vectors.length !== 1) {
      throw new EmbeddingUnavailable(`Query embedding returned ${vectors.length} vectors`);
    }

    cache?.set(cacheKey, vectors[0]);
    return vectors[0];
  }
}

/**
 * Render context as numbered citation blocks
 *
 * [1] Pricing overview (product, score 0.812)
 * Our plans start at ...
 */
export function formatContext(context: RetrievedContext): string {
  return context.chunks
    .map((chunk, index) => {
      const { metadata } = chunk;
      const label = metadata.title ?? metadata.documentId;
      const header = `[${index + 1}] ${label} (${metadata.sourceType}, score ${chunk.score.toFixed(3)})`;
      const source = metadata.sourceUrl ? `\nSource: ${metadata.sourceUrl}` : '';
      return `${header}${source}\n${metadata.text}`;
    })
    .join('\n\n');
}
