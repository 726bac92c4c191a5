/**
 * Email Generation Orchestrator
 *
 * One request = one lead = one draft:
 *
 *   retrieving -> assembling -> generating -> scoring -> done
 *                      (any step) -> failed
 *
 * A draft over the spam threshold gets exactly one revision: the prompt is
 * re-assembled with the flagged phrases as avoidance instructions and the
 * model is called once more. A revision that is still over the threshold,
 * or that fails, returns the best draft so far with flaggedForReview set.
 *
 * Failures come back as a typed outcome, never as a throw, except for a
 * TenantIsolationViolation, which aborts the request.
 */

import { mergeDefined } from '../common/constants.js';
import {
  GenerationRefused,
  GenerationUnavailable,
  InvalidLead,
  TenantIsolationViolation,
  errorMessage,
  toFailure,
  type StepFailure,
} from '../common/errors.js';
import { formatIssues, LeadSchema } from '../common/schemas/index.js';
import type { ConcurrencyLimiter } from '../common/services/concurrency-limiter.js';
import type { GenerationClient, GenerationParams } from '../common/services/generation-client.js';
import { generateRequestId, logError, logInfo, logWarn, type LogContext } from '../common/services/logger.js';
import { recordGeneration } from '../common/services/metrics.js';
import { DEFAULT_RETRY_CONFIG, withRetry, withTimeout, type RetryConfig } from '../common/services/retry.js';
import type { DraftEmail, Lead, RetrievedContext, SpamScore } from '../common/types.js';
import type { Retriever, RetrieveOptions } from '../semantic/retriever.js';
import { assemblePrompt, DEFAULT_PROMPT_CONFIG, parseDraft, type AssembledPrompt } from './prompt-assembler.js';
import { DEFAULT_SPAM_THRESHOLD, type SpamScorer } from './spam-score.js';
import { getTemplate, type EmailTemplate } from './templates.js';

// =============================================================================
// TYPES
// =============================================================================

export type GenerationStep = 'retrieving' | 'assembling' | 'generating' | 'scoring';
export type GenerationState = GenerationStep | 'done' | 'failed';

export interface StateTransition {
  state: GenerationState;
  /** 0 for the first draft, 1 for the revision */
  revision: number;
  at: number;
}

export interface EmailGenerationRequest {
  tenantId: string;
  /** Raw lead record, validated here */
  lead: unknown;
  /** Template or built-in template id (default: cold_intro) */
  template?: EmailTemplate | string;
  retrieval?: RetrieveOptions;
  generation?: GenerationParams;
  requestId?: string;
}

export type EmailGenerationOutcome =
  | { ok: true; draft: DraftEmail; history: StateTransition[]; requestId: string }
  | { ok: false; failure: StepFailure<GenerationStep>; history: StateTransition[]; requestId: string };

export interface OrchestratorConfig {
  /** Drafts with risk strictly above this are revised once */
  spamThreshold: number;
  maxPromptTokens: number;
  generationTimeoutMs: number;
  retry: RetryConfig;
}

export const DEFAULT_ORCHESTRATOR_CONFIG: OrchestratorConfig = {
  spamThreshold: DEFAULT_SPAM_THRESHOLD,
  maxPromptTokens: DEFAULT_PROMPT_CONFIG.maxPromptTokens,
  generationTimeoutMs: 60000,
  retry: DEFAULT_RETRY_CONFIG,
};

export function validateOrchestratorConfig(config: OrchestratorConfig): string[] {
  const errors: string[] = [];
  if (config.spamThreshold < 0 || config.spamThreshold > 1) errors.push('SPAM_THRESHOLD must be between 0 and 1');
  if (config.maxPromptTokens < 1) errors.push('PROMPT_MAX_TOKENS must be >= 1');
  if (config.generationTimeoutMs < 1) errors.push('GENERATION_TIMEOUT_MS must be >= 1');
  return errors;
}

export interface OrchestratorDependencies {
  retriever: Retriever;
  generator: GenerationClient;
  scorer: SpamScorer;
  /** Shared cap on concurrent generation calls */
  limiter: ConcurrencyLimiter;
  clock?: () => number;
}

interface ScoredDraft {
  subject: string;
  body: string;
  spamScore: SpamScore;
  prompt: AssembledPrompt;
}

/**
 * Retrieval query for a lead: who they are and what they care about
 */
export function leadQuery(lead: Lead): string {
  return [lead.role, lead.company, lead.industry, ...lead.signals]
    .filter((part): part is string => typeof part === 'string' && part.length > 0)
    .join(' ');
}

// =============================================================================
// ORCHESTRATOR
// =============================================================================

export class EmailOrchestrator {
  private readonly config: OrchestratorConfig;
  private readonly clock: () => number;

  constructor(
    private readonly deps: OrchestratorDependencies,
    config: Partial<OrchestratorConfig> = {}
  ) {
    this.config = mergeDefined(DEFAULT_ORCHESTRATOR_CONFIG, config);
    this.clock = deps.clock ?? Date.now;
  }

  async generateEmail(request: EmailGenerationRequest): Promise<EmailGenerationOutcome> {
    const requestId = request.requestId ?? generateRequestId('email');
    const startTime = this.clock();
    const history: StateTransition[] = [];
    const logCtx: LogContext = { request_id: requestId, tenant_id: request.tenantId };
    let step: GenerationStep = 'retrieving';
    let revision = 0;

    const enter = (state: GenerationState) => {
      history.push({ state, revision, at: this.clock() });
      logInfo('Email generation state', { ...logCtx, state, revision });
    };

    try {
      enter('retrieving');
      const parsed = LeadSchema.safeParse(request.lead);
      if (!parsed.success) {
        // Nothing to retrieve for; the lead fails where its fields are used
        step = 'assembling';
        enter('assembling');
        throw new InvalidLead(formatIssues(parsed.error));
      }
      const lead: Lead = parsed.data;
      const context = await this.deps.retriever.retrieve(request.tenantId, leadQuery(lead), {
        ...request.retrieval,
        requestId,
      });

      step = 'assembling';
      enter('assembling');
      const template =
        typeof request.template === 'string' || request.template === undefined
          ? getTemplate(request.template)
          : request.template;
      const first = await this.draft(lead, context, template, [], request.generation, logCtx, state => {
        step = state;
        if (state !== 'assembling') enter(state);
      });

      let final = first;
      let revisions = 0;
      let flaggedForReview = false;

      if (first.spamScore.risk > this.config.spamThreshold) {
        logInfo('Draft over spam threshold, revising', {
          ...logCtx,
          risk: first.spamScore.risk,
          threshold: this.config.spamThreshold,
          flagged_phrases: first.spamScore.flaggedPhrases,
        });
        revision = 1;
        revisions = 1;
        try {
          final = await this.draft(
            lead,
            context,
            template,
            first.spamScore.flaggedPhrases,
            request.generation,
            logCtx,
            state => enter(state)
          );
          flaggedForReview = final.spamScore.risk > this.config.spamThreshold;
        } catch (error) {
          if (error instanceof TenantIsolationViolation) throw error;
          logWarn('Revision failed, returning first draft for review', {
            ...logCtx,
            error: errorMessage(error),
          });
          final = first;
          flaggedForReview = true;
        }
      }

      enter('done');
      const draft: DraftEmail = {
        subject: final.subject,
        body: final.body,
        context: final.prompt.contextChunks,
        spamScore: final.spamScore,
        flaggedForReview,
        revisions,
        promptTokens: final.prompt.tokenCount,
      };
      const durationMs = this.clock() - startTime;
      recordGeneration(request.tenantId, { ok: true, revisions, flaggedForReview }, durationMs);
      logInfo('Email draft ready', {
        ...logCtx,
        risk: draft.spamScore.risk,
        revisions,
        flagged_for_review: flaggedForReview,
        context_chunks: draft.context.length,
        prompt_tokens: draft.promptTokens,
        duration_ms: durationMs,
      });
      return { ok: true, draft, history, requestId };
    } catch (error) {
      if (error instanceof TenantIsolationViolation) {
        logError('Tenant isolation violated, aborting request', { ...logCtx, step, error: error.message });
        throw error;
      }
      const failure = toFailure(error, step);
      enter('failed');
      const durationMs = this.clock() - startTime;
      recordGeneration(request.tenantId, { ok: false, kind: failure.kind }, durationMs);
      logWarn('Email generation failed', {
        ...logCtx,
        step,
        kind: failure.kind,
        error: failure.message,
        duration_ms: durationMs,
      });
      return { ok: false, failure, history, requestId };
    }
  }

  /**
   * assembling -> generating -> scoring for one draft
   */
  private async draft(
    lead: Lead,
    context: RetrievedContext,
    template: EmailTemplate,
    avoidPhrases: string[],
    params: GenerationParams | undefined,
    logCtx: LogContext,
    onState: (state: GenerationStep) => void
  ): Promise<ScoredDraft> {
    onState('assembling');
    const prompt = assemblePrompt(lead, context.chunks, template, {
      avoidPhrases,
      maxPromptTokens: this.config.maxPromptTokens,
    });

    onState('generating');
    const text = await this.generate(prompt, params, logCtx);
    const { subject, body } = parseDraft(text);
    if (!body) {
      throw new GenerationRefused('Model returned no email body');
    }

    onState('scoring');
    const spamScore = this.deps.scorer.score(subject, body);
    return { subject, body, spamScore, prompt };
  }

  private generate(prompt: AssembledPrompt, params: GenerationParams | undefined, logCtx: LogContext): Promise<string> {
    const timeoutMs = params?.timeoutMs ?? this.config.generationTimeoutMs;
    const { generator, limiter } = this.deps;
    return withRetry(
      () =>
        limiter.run(() =>
          withTimeout(
            generator.generate({ system: prompt.system, user: prompt.user }, params, logCtx),
            timeoutMs,
            () => new GenerationUnavailable(`Generation did not complete within ${timeoutMs}ms`)
          )
        ),
      this.config.retry,
      { operation: 'generate_email', logContext: logCtx }
    );
  }
}

