/**
 * Outreach tools
 *
 * - score_email: spam risk of a subject and body
 * - generate_email: personalized draft for one lead, spam-checked
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { GenerateEmailSchema, ScoreEmailSchema } from '../../common/schemas/index.js';
import { errorResult, textResult } from '../../common/tools/tool-response.js';
import type { DraftEmail, SpamScore } from '../../common/types.js';
import type { EmailOrchestrator } from '../email-orchestrator.js';
import type { SpamScorer } from '../spam-score.js';

export function formatSpamScore(score: SpamScore): string {
  const lines = [`Spam risk: ${score.risk.toFixed(3)}`];
  if (score.flaggedPhrases.length > 0) {
    lines.push(`Flagged: ${score.flaggedPhrases.map(phrase => `"${phrase}"`).join(', ')}`);
  }
  if (score.signals.length > 0) {
    lines.push(`Signals: ${score.signals.join(', ')}`);
  }
  return lines.join('\n');
}

export function formatDraft(draft: DraftEmail): string {
  const review = draft.flaggedForReview ? '\n\n⚠️ Flagged for human review' : '';
  const sources = draft.context
    .map((chunk, index) => `[${index + 1}] ${chunk.metadata.title ?? chunk.metadata.documentId} (${chunk.score.toFixed(3)})`)
    .join('\n');
  return [
    `Subject: ${draft.subject}`,
    '',
    draft.body,
    '',
    '---',
    formatSpamScore(draft.spamScore),
    `Revisions: ${draft.revisions}, prompt tokens: ~${draft.promptTokens}`,
    sources ? `Knowledge used:\n${sources}` : 'Knowledge used: none',
  ].join('\n') + review;
}

export function registerOutreachTools(server: McpServer, orchestrator: EmailOrchestrator, scorer: SpamScorer): void {
  server.tool(
    'score_email',
    'Score an email for spam risk (0 to 1) and list the phrases and patterns that raised it.',
    ScoreEmailSchema.shape,
    async args => {
      try {
        const input = ScoreEmailSchema.parse(args);
        return textResult(formatSpamScore(scorer.score(input.subject, input.body)));
      } catch (error) {
        return errorResult('Scoring', error);
      }
    }
  );

  server.tool(
    'generate_email',
    `Write a personalized cold email for one lead from the tenant's knowledge base.

Drafts over the spam threshold are revised once; a draft that is still risky is
returned flagged for human review.`,
    GenerateEmailSchema.shape,
    async args => {
      try {
        const input = GenerateEmailSchema.parse(args);
        const outcome = await orchestrator.generateEmail({
          tenantId: input.tenant_id,
          lead: input.lead,
          template: input.template_id,
          retrieval: { k: input.k, tokenBudget: input.token_budget },
        });
        if (!outcome.ok) {
          const { failure } = outcome;
          const retry = failure.retryable ? '\n(transient, safe to retry)' : '';
          return {
            ...textResult(`❌ Email generation failed at ${failure.step} [${failure.kind}]: ${failure.message}${retry}`),
            isError: true,
          };
        }
        return textResult(formatDraft(outcome.draft));
      } catch (error) {
        return errorResult('Email generation', error);
      }
    }
  );
}
