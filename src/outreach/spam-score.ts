/**
 * Spam Score Evaluator
 *
 * Pure lexical scoring of an email draft before it goes to dispatch.
 * Phrase categories and heuristic weights live in data/spam-rules.json so
 * they can be tuned without a release.
 *
 * risk = round3(min(1, sum of contributing weights))
 *
 * The score is advisory: it gates drafts for review, it does not predict
 * deliverability.
 */

import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import type { SpamScore } from '../common/types.js';
import { logInfo } from '../common/services/logger.js';

// =============================================================================
// RULES FILE
// =============================================================================

const weight = z.number().min(0).max(1);

const spamRulesSchema = z.object({
  version: z.number().int(),
  phraseCategories: z
    .array(
      z.object({
        name: z.string().min(1),
        weight,
        phrases: z
          .array(z.string().trim().min(1))
          .min(1)
          .transform(phrases => phrases.map(phrase => phrase.toLowerCase())),
      })
    )
    .min(1),
  heuristics: z.object({
    capsRatio: z.object({ minLetters: z.number().int().min(1), threshold: z.number().min(0).max(1), weight }),
    allCapsWords: z.object({
      minLength: z.number().int().min(2),
      minCount: z.number().int().min(1),
      weight,
      allow: z.array(z.string()).default([]),
    }),
    exclamation: z.object({
      runLength: z.number().int().min(2),
      runWeight: weight,
      maxCount: z.number().int().min(0),
      countWeight: weight,
    }),
    questionRun: z.object({ runLength: z.number().int().min(2), weight }),
    links: z.object({ maxPer100Words: z.number().min(0), weight }),
    subjectAllCaps: z.object({ minLetters: z.number().int().min(1), weight }),
  }),
});

export type SpamRules = z.infer<typeof spamRulesSchema>;

export const DEFAULT_SPAM_THRESHOLD = 0.5;

export function defaultRulesPath(): string {
  return join(process.cwd(), 'data', 'spam-rules.json');
}

/**
 * Read and validate a rules file
 *
 * @throws Error when the file is unreadable, not JSON, or fails validation
 */
export function loadSpamRules(filePath: string = defaultRulesPath()): SpamRules {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new Error(`Cannot read spam rules from ${filePath}`, { cause: error });
  }

  const parsed = spamRulesSchema.safeParse(raw);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new Error(`Invalid spam rules in ${filePath}: ${problems}`);
  }

  logInfo('Spam rules loaded', {
    path: filePath,
    version: parsed.data.version,
    categories: parsed.data.phraseCategories.length,
  });
  return parsed.data;
}

// =============================================================================
// SCORER
// =============================================================================

interface CompiledPhrase {
  category: string;
  weight: number;
  phrase: string;
  pattern: RegExp;
}

const NOT_WORD_BEFORE = '(?<![\\p{L}\\p{N}])';
const NOT_WORD_AFTER = '(?![\\p{L}\\p{N}])';
const LINK = /\bhttps?:\/\/[^\s<>()]+|\bwww\.[^\s<>()]+/gi;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
}

/**
 * "act now" -> /(?<![\p{L}\p{N}])act\s+now(?![\p{L}\p{N}])/iu
 */
export function phrasePattern(phrase: string): RegExp {
  const body = phrase
    .trim()
    .split(/\s+/)
    .map(escapeRegExp)
    .join('\\s+');
  return new RegExp(`${NOT_WORD_BEFORE}${body}${NOT_WORD_AFTER}`, 'iu');
}

function countMatches(text: string, pattern: RegExp): number {
  return text.match(pattern)?.length ?? 0;
}

function round3(value: number): number {
  return Math.round(value * 1000) / 1000;
}

export class SpamScorer {
  private readonly phrases: CompiledPhrase[];
  private readonly allCapsWord: RegExp;
  private readonly allowedCaps: Set<string>;
  private readonly exclamationRun: RegExp;
  private readonly questionRun: RegExp;

  constructor(private readonly rules: SpamRules) {
    this.phrases = rules.phraseCategories.flatMap(category =>
      [...new Set(category.phrases)].map(phrase => ({
        category: category.name,
        weight: category.weight,
        phrase,
        pattern: phrasePattern(phrase),
      }))
    );
    const { allCapsWords, exclamation, questionRun } = rules.heuristics;
    this.allCapsWord = new RegExp(`${NOT_WORD_BEFORE}\\p{Lu}{${allCapsWords.minLength},}${NOT_WORD_AFTER}`, 'gu');
    this.allowedCaps = new Set(allCapsWords.allow.map(word => word.toUpperCase()));
    this.exclamationRun = new RegExp(`!{${exclamation.runLength},}`);
    this.questionRun = new RegExp(`\\?{${questionRun.runLength},}`);
  }

  /**
   * Score a draft. Deterministic: same input, same output.
   */
  score(subject: string, body: string): SpamScore {
    const text = `${subject}\n${body}`;
    const heuristics = this.rules.heuristics;
    const flagged = new Set<string>();
    const signals: string[] = [];
    let total = 0;

    const add = (signal: string, amount: number, ...phrases: string[]) => {
      total += amount;
      signals.push(signal);
      for (const phrase of phrases) flagged.add(phrase);
    };

    // Phrase rules: each distinct phrase counts once
    for (const rule of this.phrases) {
      if (rule.pattern.test(text)) {
        add(`phrase:${rule.category}:${rule.phrase}`, rule.weight, rule.phrase);
      }
    }

    // Share of capital letters
    const letters = countMatches(text, /\p{L}/gu);
    const capitals = countMatches(text, /\p{Lu}/gu);
    if (letters >= heuristics.capsRatio.minLetters && capitals / letters > heuristics.capsRatio.threshold) {
      add('caps_ratio', heuristics.capsRatio.weight, 'excessive capitals');
    }

    // ALL-CAPS words, acronyms on the allow list excepted
    const capsWords = (text.match(this.allCapsWord) ?? []).filter(word => !this.allowedCaps.has(word));
    if (capsWords.length >= heuristics.allCapsWords.minCount) {
      add('all_caps_words', heuristics.allCapsWords.weight, ...capsWords);
    }

    // Punctuation
    const runPattern = '!'.repeat(heuristics.exclamation.runLength);
    if (this.exclamationRun.test(text)) {
      add('exclamation_run', heuristics.exclamation.runWeight, runPattern);
    }
    if (countMatches(text, /!/g) > heuristics.exclamation.maxCount) {
      add('exclamation_count', heuristics.exclamation.countWeight, 'too many exclamation marks');
    }
    if (this.questionRun.test(text)) {
      add('question_run', heuristics.questionRun.weight, '?'.repeat(heuristics.questionRun.runLength));
    }

    // Links per 100 body words
    const links = countMatches(body, LINK);
    const words = body.split(/\s+/).filter(word => word.length > 0).length;
    if (links > 0 && (links * 100) / Math.max(words, 1) > heuristics.links.maxPer100Words) {
      add('link_density', heuristics.links.weight, 'too many links');
    }

    // Shouted subject line
    const subjectLetters = countMatches(subject, /\p{L}/gu);
    if (subjectLetters >= heuristics.subjectAllCaps.minLetters && countMatches(subject, /\p{Ll}/gu) === 0) {
      add('subject_all_caps', heuristics.subjectAllCaps.weight, 'ALL-CAPS subject');
    }

    return {
      risk: round3(Math.min(1, total)),
      flaggedPhrases: [...flagged].sort(),
      signals,
    };
  }
}

let defaultScorer: SpamScorer | null = null;

/**
 * Scorer over the rules file in data/, loaded on first use
 */
export function getDefaultSpamScorer(): SpamScorer {
  if (!defaultScorer) {
    defaultScorer = new SpamScorer(loadSpamRules());
  }
  return defaultScorer;
}
