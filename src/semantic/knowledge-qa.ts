/**
 * Knowledge Q&A
 *
 * Answers a free-form question from one tenant's knowledge base. The model
 * only sees retrieved context; with nothing relevant retrieved it is not
 * called at all.
 */

import { mergeDefined } from '../common/constants.js';
import { GenerationUnavailable } from '../common/errors.js';
import type { ConcurrencyLimiter } from '../common/services/concurrency-limiter.js';
import type { GenerationClient } from '../common/services/generation-client.js';
import { generateRequestId, logInfo, type LogContext } from '../common/services/logger.js';
import { DEFAULT_RETRY_CONFIG, withRetry, withTimeout, type RetryConfig } from '../common/services/retry.js';
import type { RetrievedContext, SourceType } from '../common/types.js';
import { formatContext, type Retriever } from './retriever.js';

export const NO_KNOWLEDGE_ANSWER = 'I could not find anything about that in the knowledge base.';

const SYSTEM_PROMPT = `You answer questions about our company using only the numbered knowledge excerpts provided.
- Be concise: two to five sentences.
- Cite excerpts by number in square brackets, e.g. [2].
- If the excerpts do not answer the question, say so plainly instead of guessing.`;

export interface AnswerOptions {
  sourceTypes?: SourceType[];
  k?: number;
  tokenBudget?: number;
  requestId?: string;
}

export interface KnowledgeAnswer {
  answer: string;
  context: RetrievedContext;
}

export interface KnowledgeQaDependencies {
  retriever: Retriever;
  generator: GenerationClient;
  limiter?: ConcurrencyLimiter;
}

export interface KnowledgeQaConfig {
  maxTokens: number;
  generationTimeoutMs: number;
  retry: RetryConfig;
}

export const DEFAULT_KNOWLEDGE_QA_CONFIG: KnowledgeQaConfig = {
  maxTokens: 512,
  generationTimeoutMs: 60000,
  retry: DEFAULT_RETRY_CONFIG,
};

export class KnowledgeQa {
  private readonly config: KnowledgeQaConfig;

  constructor(
    private readonly deps: KnowledgeQaDependencies,
    config: Partial<KnowledgeQaConfig> = {}
  ) {
    this.config = mergeDefined(DEFAULT_KNOWLEDGE_QA_CONFIG, config);
  }

  async answer(tenantId: string, question: string, options: AnswerOptions = {}): Promise<KnowledgeAnswer> {
    const requestId = options.requestId ?? generateRequestId('qa');
    const logCtx: LogContext = { request_id: requestId, tenant_id: tenantId };
    const context = await this.deps.retriever.retrieve(tenantId, question, {
      k: options.k,
      tokenBudget: options.tokenBudget,
      sourceTypes: options.sourceTypes,
      requestId,
    });

    if (context.chunks.length === 0) {
      logInfo('No knowledge for question', logCtx);
      return { answer: NO_KNOWLEDGE_ANSWER, context };
    }

    const user = `Knowledge excerpts:\n\n${formatContext(context)}\n\nQuestion: ${question.trim()}`;
    const { generator, limiter } = this.deps;
    const timeoutMs = this.config.generationTimeoutMs;
    const call = () =>
      withTimeout(
        generator.generate({ system: SYSTEM_PROMPT, user }, { maxTokens: this.config.maxTokens, temperature: 0 }, logCtx),
        timeoutMs,
        () => new GenerationUnavailable(`Answer generation did not complete within ${timeoutMs}ms`)
      );
    const text = await withRetry(() => (limiter ? limiter.run(call) : call()), this.config.retry, {
      operation: 'answer_question',
      logContext: logCtx,
    });

    logInfo('Question answered', { ...logCtx, context_chunks: context.chunks.length });
    return { answer: text.trim(), context };
  }
}
