/**
 * Prompt Assembler
 *
 * Lead fields + retrieved context + template -> bounded prompt.
 *
 * Budget rule: tokens(system) + tokens(user) <= maxPromptTokens. When over,
 * context chunks are dropped from the end (lowest score first). Instructions
 * and lead fields are never cut: if they alone exceed the budget the call
 * fails with InputTooLarge.
 */

import { InputTooLarge, TemplateFieldMissing } from '../common/errors.js';
import { estimateTokens } from '../common/services/token-estimator.js';
import type { Lead, ScoredChunk } from '../common/types.js';
import type { EmailTemplate } from './templates.js';

export interface PromptConfig {
  maxPromptTokens: number;
}

export const DEFAULT_PROMPT_CONFIG: PromptConfig = {
  maxPromptTokens: 6000,
};

export interface AssembleOptions {
  /** Phrases the model must avoid (revision after a spam flag) */
  avoidPhrases?: string[];
  maxPromptTokens?: number;
}

export interface AssembledPrompt {
  system: string;
  user: string;
  /** Context chunks kept, in the order they appear */
  contextChunks: ScoredChunk[];
  tokenCount: number;
  droppedChunks: number;
}

export const KNOWLEDGE_HEADING = '## Company knowledge';

export const OUTPUT_FORMAT_INSTRUCTION = `Reply with the email only, in exactly this format:
Subject: <subject line>

<email body>`;

const PLACEHOLDER = /\{\{\s*([A-Za-z_][\w.]*)\s*(\?)?\s*\}\}/g;

/**
 * Value of one template field, or undefined when the lead has none
 */
export function leadFieldValue(lead: Lead, field: string): string | undefined {
  let value: string | undefined;
  switch (field) {
    case 'name':
    case 'company':
    case 'role':
    case 'email':
    case 'industry':
    case 'location':
    case 'website':
      value = lead[field];
      break;
    case 'signals':
      value = lead.signals.join('; ');
      break;
    default: {
      const key = field.startsWith('custom.') ? field.slice('custom.'.length) : field;
      value = lead.custom[key];
    }
  }
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Names of required placeholders the lead cannot fill, sorted
 */
export function missingFields(template: EmailTemplate, lead: Lead): string[] {
  const missing = new Set<string>();
  for (const source of [template.instructions, template.body]) {
    for (const match of source.matchAll(PLACEHOLDER)) {
      const [, field, optional] = match;
      if (!optional && leadFieldValue(lead, field) === undefined) {
        missing.add(field);
      }
    }
  }
  return [...missing].sort();
}

/**
 * Substitute lead fields into a template string
 *
 * @throws TemplateFieldMissing naming every unfilled required field
 */
export function renderTemplate(source: string, lead: Lead): string {
  const missing = new Set<string>();
  const rendered = source.replace(PLACEHOLDER, (_match, field: string, optional: string | undefined) => {
    const value = leadFieldValue(lead, field);
    if (value === undefined) {
      if (!optional) missing.add(field);
      return '';
    }
    return value;
  });
  if (missing.size > 0) {
    throw new TemplateFieldMissing([...missing].sort());
  }
  return rendered;
}

export function avoidanceInstruction(phrases: string[]): string {
  const quoted = [...new Set(phrases)].sort().map(phrase => `"${phrase}"`).join(', ');
  return `This is a revision: the previous draft was flagged by a spam filter. Do not use any of these phrases or patterns: ${quoted}. Rephrase in a plain, specific, low-pressure way.`;
}

function knowledgeBlock(chunk: ScoredChunk, index: number): string {
  const label = chunk.metadata.title ?? chunk.metadata.sourceType;
  return `[${index + 1}] ${label}\n${chunk.metadata.text}`;
}

function buildUser(body: string, chunks: ScoredChunk[]): string {
  const sections = [body];
  if (chunks.length > 0) {
    sections.push(`${KNOWLEDGE_HEADING}\n\n${chunks.map(knowledgeBlock).join('\n\n')}`);
  }
  sections.push(OUTPUT_FORMAT_INSTRUCTION);
  return sections.join('\n\n');
}

/**
 * Build the prompt for one lead
 *
 * @param context - Chunks in priority order (highest score first)
 * @throws TemplateFieldMissing, InputTooLarge
 */
export function assemblePrompt(
  lead: Lead,
  context: ScoredChunk[],
  template: EmailTemplate,
  options: AssembleOptions = {}
): AssembledPrompt {
  const maxPromptTokens = options.maxPromptTokens ?? DEFAULT_PROMPT_CONFIG.maxPromptTokens;
  const missing = missingFields(template, lead);
  if (missing.length > 0) {
    throw new TemplateFieldMissing(missing);
  }

  const instructions = renderTemplate(template.instructions, lead).trim();
  const body = renderTemplate(template.body, lead).trim();
  const avoid = options.avoidPhrases ?? [];
  const system = avoid.length > 0 ? `${instructions}\n\n${avoidanceInstruction(avoid)}` : instructions;
  const systemTokens = estimateTokens(system);

  const fixedTokens = systemTokens + estimateTokens(buildUser(body, []));
  if (fixedTokens > maxPromptTokens) {
    throw new InputTooLarge(
      `Instructions and lead fields need ~${fixedTokens} tokens, over the prompt budget of ${maxPromptTokens}`,
      fixedTokens,
      maxPromptTokens
    );
  }

  let kept = context.length;
  let user = buildUser(body, context);
  while (kept > 0 && systemTokens + estimateTokens(user) > maxPromptTokens) {
    kept--;
    user = buildUser(body, context.slice(0, kept));
  }

  return {
    system,
    user,
    contextChunks: context.slice(0, kept),
    tokenCount: systemTokens + estimateTokens(user),
    droppedChunks: context.length - kept,
  };
}

export interface ParsedDraft {
  subject: string;
  body: string;
}

const SUBJECT_LINE = /^[ \t]*(?:\*\*)?subject(?:\*\*)?[ \t]*:[ \t]*(.*)$/im;

/**
 * Split model output into subject and body
 *
 * Without a "Subject:" line the subject is empty and the whole text is the body.
 */
export function parseDraft(text: string): ParsedDraft {
  const normalized = text.replace(/\r\n?/g, '\n').trim();
  const match = SUBJECT_LINE.exec(normalized);
  if (!match || match.index === undefined) {
    return { subject: '', body: normalized };
  }
  const subject = match[1].replace(/\*\*/g, '').trim();
  const body = normalized.slice(match.index + match[0].length).trim();
  return { subject, body };
}
