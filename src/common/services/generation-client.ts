/**
 * Generation Client
 *
 * Sends an assembled prompt to the Anthropic Messages API and returns the
 * draft text. Stateless; one attempt per call (the orchestrator retries).
 *
 * Error mapping:
 * - GenerationUnavailable (transient): connection errors, timeouts,
 *   HTTP 408 / 429 / 5xx, open circuit breaker
 * - GenerationRefused (final): stop_reason "refusal", empty output,
 *   any other 4xx rejection
 */

import Anthropic from '@anthropic-ai/sdk';
import { GenerationRefused, GenerationUnavailable, errorMessage } from '../errors.js';
import { upstreamBreaker, type CircuitBreaker } from './circuit-breaker.js';
import { logDebug, type LogContext } from './logger.js';
import { withTimeout } from './retry.js';

// =============================================================================
// TYPES
// =============================================================================

export interface GenerationPrompt {
  system: string;
  user: string;
}

export interface GenerationParams {
  maxTokens?: number;
  temperature?: number;
  /** Model override for this call */
  model?: string;
  timeoutMs?: number;
}

export interface GenerationClient {
  generate(prompt: GenerationPrompt, params?: GenerationParams, context?: LogContext): Promise<string>;
}

// =============================================================================
// CONFIGURATION
// =============================================================================

export interface GenerationConfig {
  apiKey: string;
  model: string;
  maxTokens: number;
  temperature: number;
  timeoutMs: number;
}

export const DEFAULT_GENERATION_CONFIG: Omit<GenerationConfig, 'apiKey'> = {
  model: 'claude-sonnet-4-20250514',
  maxTokens: 1024,
  temperature: 0.7,
  timeoutMs: 60000,
};

export function validateGenerationConfig(config: GenerationConfig): string[] {
  const errors: string[] = [];
  if (!config.apiKey) errors.push('ANTHROPIC_API_KEY is required');
  if (!config.model) errors.push('CLAUDE_MODEL must not be empty');
  if (config.maxTokens < 1) errors.push('GENERATION_MAX_TOKENS must be >= 1');
  if (config.temperature < 0 || config.temperature > 1) {
    errors.push('GENERATION_TEMPERATURE must be between 0 and 1');
  }
  if (config.timeoutMs < 1) errors.push('GENERATION_TIMEOUT_MS must be >= 1');
  return errors;
}

// =============================================================================
// ANTHROPIC ADAPTER
// =============================================================================

export class AnthropicGenerationClient implements GenerationClient {
  private readonly client: Anthropic;

  constructor(
    private readonly config: GenerationConfig,
    private readonly breaker: CircuitBreaker = upstreamBreaker('anthropic')
  ) {
    this.client = new Anthropic({ apiKey: config.apiKey, maxRetries: 0 });
  }

  async generate(prompt: GenerationPrompt, params: GenerationParams = {}, context?: LogContext): Promise<string> {
    const model = params.model ?? this.config.model;
    const timeoutMs = params.timeoutMs ?? this.config.timeoutMs;
    const startTime = Date.now();

    const text = await this.breaker.execute(
      () =>
        withTimeout(
          this.request(prompt, model, params, timeoutMs),
          timeoutMs,
          () => new GenerationUnavailable(`Anthropic did not answer within ${timeoutMs}ms`, { model })
        ),
      context
    );
    logDebug('Generation complete', {
      ...context,
      model,
      chars: text.length,
      duration_ms: Date.now() - startTime,
    });
    return text;
  }

  /**
   * One Messages API call, with SDK errors already mapped (so the breaker
   * only counts transient failures)
   */
  private async request(
    prompt: GenerationPrompt,
    model: string,
    params: GenerationParams,
    timeoutMs: number
  ): Promise<string> {
    let response: Anthropic.Message;
    try {
      response = await this.client.messages.create(
        {
          model,
          max_tokens: params.maxTokens ?? this.config.maxTokens,
          temperature: params.temperature ?? this.config.temperature,
          system: prompt.system,
          messages: [{ role: 'user', content: prompt.user }],
        },
        { timeout: timeoutMs }
      );
    } catch (error) {
      throw toGenerationError(error, model);
    }

    const stopReason: string | null = response.stop_reason;
    if (stopReason === 'refusal') {
      throw new GenerationRefused('The model declined to write this email', { model, stop_reason: stopReason });
    }

    const parts: string[] = [];
    for (const block of response.content) {
      if (block.type === 'text') {
        parts.push(block.text);
      }
    }
    const text = parts.join('\n').trim();
    if (!text) {
      throw new GenerationRefused('The model returned no text', { model, stop_reason: stopReason });
    }
    return text;
  }
}

/**
 * Map an Anthropic SDK error to the generation error kinds
 */
export function toGenerationError(error: unknown, model?: string): Error {
  if (error instanceof GenerationUnavailable || error instanceof GenerationRefused) {
    return error;
  }
  if (error instanceof Anthropic.APIConnectionError) {
    // Includes APIConnectionTimeoutError
    return new GenerationUnavailable(`Anthropic connection failed: ${error.message}`, { model }, error);
  }
  if (error instanceof Anthropic.APIError) {
    const status = error.status;
    if (status === undefined || status === 408 || status === 429 || status >= 500) {
      return new GenerationUnavailable(
        `Anthropic request failed${status ? ` (HTTP ${status})` : ''}: ${error.message}`,
        { model, status },
        error
      );
    }
    return new GenerationRefused(`Anthropic rejected the request (HTTP ${status}): ${error.message}`, { model, status }, error);
  }
  return new GenerationUnavailable(`Anthropic request failed: ${errorMessage(error)}`, { model }, error);
}
