/**
 * Embedding Service
 *
 * Turns text into fixed-dimension vectors using Voyage AI.
 * Batch-oriented and order-preserving: vector i belongs to text i.
 *
 * Oversized texts are rejected with InputTooLarge before any network call;
 * nothing is truncated here (the chunker owns chunk size). The adapter makes
 * exactly one attempt per call: callers wrap it in withRetry().
 */

import { VoyageAIClient, VoyageAIError, VoyageAITimeoutError } from 'voyageai';
import { EmbeddingRejected, EmbeddingUnavailable, InputTooLarge, errorMessage, isOutreachError } from '../errors.js';
import { upstreamBreaker, type CircuitBreaker } from './circuit-breaker.js';
import { logDebug, type LogContext } from './logger.js';
import { withTimeout } from './retry.js';
import { estimateTokens } from './token-estimator.js';

export type EmbeddingInputType = 'document' | 'query';

/**
 * Anything that can embed text: the Voyage adapter in production, a
 * deterministic in-process client in tests
 */
export interface EmbeddingClient {
  readonly model: string;
  readonly dimensions: number;
  readonly maxInputTokens: number;
  embed(texts: string[], inputType: EmbeddingInputType, context?: LogContext): Promise<number[][]>;
}

// =============================================================================
// CONFIGURATION
// =============================================================================

export interface EmbeddingConfig {
  apiKey: string;
  model: string;
  /** Expected vector length; responses of another length are rejected */
  dimensions: number;
  maxInputTokens: number;
  timeoutMs: number;
}

export const DEFAULT_EMBEDDING_CONFIG: Omit<EmbeddingConfig, 'apiKey'> = {
  model: 'voyage-3.5-lite',
  dimensions: 1024,
  maxInputTokens: 8000,
  timeoutMs: 30000,
};

export function validateEmbeddingConfig(config: EmbeddingConfig): string[] {
  const errors: string[] = [];
  if (!config.apiKey) errors.push('VOYAGE_API_KEY is required');
  if (!config.model) errors.push('EMBEDDING_MODEL must not be empty');
  if (config.dimensions < 1) errors.push('EMBEDDING_DIMENSIONS must be >= 1');
  if (config.maxInputTokens < 1) errors.push('EMBEDDING_MAX_INPUT_TOKENS must be >= 1');
  if (config.timeoutMs < 1) errors.push('EMBEDDING_TIMEOUT_MS must be >= 1');
  return errors;
}

// =============================================================================
// SHARED CHECKS
// =============================================================================

/**
 * Reject any text over the model's input limit
 *
 * @throws InputTooLarge naming the first offending index
 */
export function assertEmbeddable(texts: string[], maxInputTokens: number): void {
  texts.forEach((text, index) => {
    const tokens = estimateTokens(text);
    if (tokens > maxInputTokens) {
      throw new InputTooLarge(
        `Text at index ${index} is ~${tokens} tokens, over the embedding limit of ${maxInputTokens}`,
        tokens,
        maxInputTokens
      );
    }
  });
}

/**
 * Verify a response matches the request shape
 *
 * @throws EmbeddingUnavailable on a wrong count or dimension
 */
export function assertVectorShape(vectors: number[][], expectedCount: number, dimensions: number): void {
  if (vectors.length !== expectedCount) {
    throw new EmbeddingUnavailable(
      `Embedding response has ${vectors.length} vectors for ${expectedCount} inputs`,
      { expected: expectedCount, received: vectors.length }
    );
  }
  const bad = vectors.findIndex(vector => vector.length !== dimensions);
  if (bad !== -1) {
    throw new EmbeddingUnavailable(
      `Embedding at index ${bad} has dimension ${vectors[bad].length}, expected ${dimensions}`,
      { index: bad, expected: dimensions, received: vectors[bad].length }
    );
  }
}

// =============================================================================
// VOYAGE AI ADAPTER
// =============================================================================

export class VoyageEmbeddingClient implements EmbeddingClient {
  private readonly client: VoyageAIClient;
  readonly model: string;
  readonly dimensions: number;
  readonly maxInputTokens: number;

  constructor(
    private readonly config: EmbeddingConfig,
    private readonly breaker: CircuitBreaker = upstreamBreaker('voyage')
  ) {
    this.client = new VoyageAIClient({ apiKey: config.apiKey });
    this.model = config.model;
    this.dimensions = config.dimensions;
    this.maxInputTokens = config.maxInputTokens;
  }

  async embed(texts: string[], inputType: EmbeddingInputType, context?: LogContext): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }
    assertEmbeddable(texts, this.maxInputTokens);

    const startTime = Date.now();
    const vectors = await this.breaker.execute(() => this.request(texts, inputType), context);

    assertVectorShape(vectors, texts.length, this.dimensions);
    logDebug('Embedded batch', {
      ...context,
      texts: texts.length,
      input_type: inputType,
      model: this.model,
      duration_ms: Date.now() - startTime,
    });
    return vectors;
  }

  /**
   * One embed call with SDK errors mapped, so the breaker counts only
   * transient failures
   */
  private async request(texts: string[], inputType: EmbeddingInputType): Promise<number[][]> {
    const timeoutMs = this.config.timeoutMs;
    let response: Awaited<ReturnType<VoyageAIClient['embed']>>;
    try {
      response = await withTimeout(
        this.client.embed(
          { input: texts, model: this.model, inputType },
          { timeoutInSeconds: Math.ceil(timeoutMs / 1000), maxRetries: 0 }
        ),
        timeoutMs,
        () => new EmbeddingUnavailable(`Voyage AI did not answer within ${timeoutMs}ms`)
      );
    } catch (error) {
      throw toEmbeddingError(error);
    }

    const items = [...(response.data ?? [])].sort((a, b) => (a.index ?? 0) - (b.index ?? 0));
    return items.map((item, position) => {
      if (!item.embedding) {
        throw new EmbeddingUnavailable(`Embedding response item ${position} has no vector`);
      }
      return item.embedding;
    });
  }
}

/**
 * Map a Voyage SDK error to the embedding error kinds
 *
 * Timeouts, 408, 429 and 5xx are transient; any other status means the
 * request or the key is wrong and retrying cannot help.
 */
export function toEmbeddingError(error: unknown): Error {
  if (isOutreachError(error)) {
    return error;
  }
  if (error instanceof VoyageAITimeoutError) {
    return new EmbeddingUnavailable('Voyage AI request timed out', {}, error);
  }
  if (error instanceof VoyageAIError) {
    const status = error.statusCode;
    if (status === undefined || status === 408 || status === 429 || status >= 500) {
      return new EmbeddingUnavailable(
        `Voyage AI request failed${status ? ` (HTTP ${status})` : ''}: ${error.message}`,
        { status_code: status },
        error
      );
    }
    return new EmbeddingRejected(`Voyage AI rejected the request (HTTP ${status}): ${error.message}`, { status_code: status }, error);
  }
  return new EmbeddingUnavailable(`Voyage AI request failed: ${errorMessage(error)}`, {}, error);
}
