/**
 * Knowledge Readiness
 *
 * How well a tenant's knowledge base can support outreach, as a 0-100 score
 * over what is actually retrievable: chunks of documents in status
 * "embedded".
 *
 * Each chunk is assigned to every aspect whose keyword patterns it matches
 * (pricing, security, case studies, ...), or to the fallback aspect when it
 * matches none. Per aspect:
 *
 *   size        = min(5, floor(max(0, log10(max(10, words)) - 0.5)))
 *   structure   = min(5, [headings] + [Q&A pairs] + [links] + [numerics > 3] + [currency])
 *   specificity = min(5, [numerics > 5] + [currency] + [links > 1] + [words > 400] + [words > 800])
 *   detail      = round((size + structure + specificity) / 3), in 0..5
 *
 * Hygiene:
 *
 *   freshness = 100 * (1 - median age in days / horizon), newest document per source type
 *   volume    = 100 * log10(chunks) / 2, capped at 100 (100 chunks saturate)
 *   dedupe    = 100 * distinct chunk texts / chunks
 *
 * score = round(w.coverage * coverage% + w.detail * detail% + w.freshness * freshness
 *               + w.volume * volume + w.dedupe * dedupe)
 *
 * Keyword patterns and weights live in data/readiness-aspects.json.
 */

import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import type { DocumentRegistry } from '../common/services/document-registry.js';
import { generateRequestId, logInfo } from '../common/services/logger.js';
import type { VectorStore } from '../common/services/vector-store.js';
import type { DocumentRecord } from '../common/types.js';

// =============================================================================
// RULES FILE
// =============================================================================

function isValidPattern(pattern: string): boolean {
  try {
    new RegExp(pattern, 'i');
    return true;
  } catch {
    return false;
  }
}

const weight = z.number().min(0).max(1);

const readinessRulesSchema = z
  .object({
    version: z.number().int(),
    fallbackAspect: z.string().min(1),
    freshnessHorizonDays: z.number().positive(),
    weights: z.object({ coverage: weight, detail: weight, freshness: weight, volume: weight, dedupe: weight }),
    aspects: z
      .array(
        z.object({
          name: z.string().min(1),
          patterns: z.array(z.string().min(1).refine(isValidPattern, 'not a valid regular expression')).min(1),
        })
      )
      .min(1),
  })
  .refine(rules => rules.aspects.some(aspect => aspect.name === rules.fallbackAspect), {
    message: 'fallbackAspect must name one of the aspects',
    path: ['fallbackAspect'],
  });

export type ReadinessRules = z.infer<typeof readinessRulesSchema>;

export function defaultReadinessRulesPath(): string {
  return join(process.cwd(), 'data', 'readiness-aspects.json');
}

/**
 * @throws Error when the file is unreadable, not JSON, or fails validation
 */
export function loadReadinessRules(filePath: string = defaultReadinessRulesPath()): ReadinessRules {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new Error(`Cannot read readiness rules from ${filePath}`, { cause: error });
  }

  const parsed = readinessRulesSchema.safeParse(raw);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new Error(`Invalid readiness rules in ${filePath}: ${problems}`);
  }

  logInfo('Readiness rules loaded', { path: filePath, version: parsed.data.version, aspects: parsed.data.aspects.length });
  return parsed.data;
}

// =============================================================================
// ASPECTS
// =============================================================================

export interface AspectSignals {
  words: number;
  headings: number;
  qaPairs: number;
  numerics: number;
  currency: number;
  links: number;
}

export interface AspectScore {
  name: string;
  present: boolean;
  /** 0..5 */
  detail: number;
  chunks: number;
  signals: AspectSignals;
}

const WORD = /[\p{L}\p{N}_]+/gu;
const HEADING = /(^|\n)#{1,6}\s|\n[A-Z][A-Za-z ]{3,}\n[-=]{3,}/g;
const QA_PAIR = /\b(Q:|Question:)[\s\S]+?\b(A:|Answer:)/gi;
const NUMERIC = /\b\d[\d.,%]*\b/g;
const CURRENCY = /₹|\$|€|USD|INR/g;
const LINK = /https?:\/\//g;

const countMatches = (text: string, pattern: RegExp): number => (text.match(pattern) ?? []).length;

const flag = (condition: boolean): number => (condition ? 1 : 0);

/**
 * Detail score of the texts assigned to one aspect
 */
export function measureAspect(name: string, texts: string[]): AspectScore {
  const joined = texts.join('\n');
  const signals: AspectSignals = {
    words: countMatches(joined, WORD),
    headings: countMatches(joined, HEADING),
    qaPairs: countMatches(joined, QA_PAIR),
    numerics: countMatches(joined, NUMERIC),
    currency: countMatches(joined, CURRENCY),
    links: countMatches(joined, LINK),
  };
  if (texts.length === 0) {
    return { name, present: false, detail: 0, chunks: 0, signals };
  }

  const { words, headings, qaPairs, numerics, currency, links } = signals;
  const size = Math.min(5, Math.floor(Math.max(0, Math.log10(Math.max(10, words)) - 0.5)));
  const structure = Math.min(
    5,
    flag(headings > 0) + flag(qaPairs > 0) + flag(links > 0) + flag(numerics > 3) + flag(currency > 0)
  );
  const specificity = Math.min(
    5,
    flag(numerics > 5) + flag(currency > 0) + flag(links > 1) + flag(words > 400) + flag(words > 800)
  );
  const detail = Math.max(0, Math.min(5, Math.round((size + structure + specificity) / 3)));

  return { name, present: true, detail, chunks: texts.length, signals };
}

/**
 * Texts per aspect, in rules order; a text matching no aspect goes to the fallback
 */
export function assignAspects(texts: string[], rules: ReadinessRules): Map<string, string[]> {
  const compiled = rules.aspects.map(aspect => ({
    name: aspect.name,
    patterns: aspect.patterns.map(pattern => new RegExp(pattern, 'i')),
  }));
  const assigned = new Map<string, string[]>(rules.aspects.map(aspect => [aspect.name, []]));

  for (const text of texts) {
    let matched = false;
    for (const aspect of compiled) {
      if (aspect.patterns.some(pattern => pattern.test(text))) {
        assigned.get(aspect.name)?.push(text);
        matched = true;
      }
    }
    if (!matched) {
      assigned.get(rules.fallbackAspect)?.push(text);
    }
  }
  return assigned;
}

// =============================================================================
// HYGIENE
// =============================================================================

export interface HygieneSignals {
  freshness: number;
  volume: number;
  dedupe: number;
  documents: number;
  chunks: number;
  distinctChunks: number;
}

const DAY_MS = 24 * 60 * 60 * 1000;

const clamp = (value: number): number => Math.max(0, Math.min(100, value));

const normalizeChunkText = (text: string): string => text.trim().toLowerCase().replace(/\s+/g, ' ');

/**
 * Freshness, volume and duplication of the embedded knowledge
 *
 * @param documents - Embedded documents only
 */
export function hygieneSignals(
  documents: DocumentRecord[],
  chunkTexts: string[],
  now: number,
  horizonDays: number
): HygieneSignals {
  const newestBySource = new Map<string, number>();
  for (const document of documents) {
    const at = document.ingestedAt ?? document.updatedAt;
    newestBySource.set(document.sourceType, Math.max(newestBySource.get(document.sourceType) ?? at, at));
  }
  const ages = [...newestBySource.values()]
    .map(at => Math.max(0, Math.floor((now - at) / DAY_MS)))
    .sort((a, b) => a - b);
  const freshness = ages.length === 0 ? 0 : clamp(Math.trunc(100 * (1 - ages[Math.floor(ages.length / 2)] / horizonDays)));

  const chunks = chunkTexts.length;
  const distinctChunks = new Set(chunkTexts.map(normalizeChunkText)).size;
  const volume = chunks === 0 ? 0 : Math.trunc(Math.min(100, (Math.log10(Math.max(1, chunks)) / 2) * 100));
  const dedupe = chunks === 0 ? 0 : Math.trunc(clamp((distinctChunks / chunks) * 100));

  return { freshness, volume, dedupe, documents: documents.length, chunks, distinctChunks };
}

// =============================================================================
// SCORE
// =============================================================================

export interface ReadinessReport {
  tenantId: string;
  /** 0..100 */
  score: number;
  /** Fraction of aspects present, 0..1 */
  coverage: number;
  aspects: AspectScore[];
  missing: string[];
  hygiene: HygieneSignals;
  computedAt: number;
}

export function combineReadiness(aspects: AspectScore[], hygiene: HygieneSignals, weights: ReadinessRules['weights']): number {
  if (aspects.length === 0) return 0;
  const coverage = aspects.filter(aspect => aspect.present).length / aspects.length;
  const detail = aspects.reduce((sum, aspect) => sum + aspect.detail, 0) / (5 * aspects.length);
  return Math.round(
    weights.coverage * coverage * 100 +
      weights.detail * detail * 100 +
      weights.freshness * hygiene.freshness +
      weights.volume * hygiene.volume +
      weights.dedupe * hygiene.dedupe
  );
}

export interface ReadinessDependencies {
  registry: DocumentRegistry;
  store: VectorStore;
  rules?: ReadinessRules;
  clock?: () => number;
}

export class ReadinessScorer {
  private readonly rules: ReadinessRules;
  private readonly clock: () => number;

  constructor(private readonly deps: ReadinessDependencies) {
    this.rules = deps.rules ?? loadReadinessRules();
    this.clock = deps.clock ?? Date.now;
  }

  /**
   * Readiness of a tenant's retrievable knowledge
   *
   * A tenant without embedded documents scores 0 with every aspect missing.
   */
  async knowledgeReadiness(tenantId: string): Promise<ReadinessReport> {
    const startTime = this.clock();
    const documents = await this.deps.registry.list(tenantId, { status: 'embedded' });
    const chunks =
      documents.length === 0
        ? []
        : await this.deps.store.listChunks(tenantId, { documentIds: documents.map(document => document.documentId) });
    const texts = chunks.map(chunk => chunk.metadata.text);

    const assigned = assignAspects(texts, this.rules);
    const aspects = this.rules.aspects.map(aspect => measureAspect(aspect.name, assigned.get(aspect.name) ?? []));
    const hygiene = hygieneSignals(documents, texts, startTime, this.rules.freshnessHorizonDays);
    const present = aspects.filter(aspect => aspect.present).length;

    const report: ReadinessReport = {
      tenantId,
      score: combineReadiness(aspects, hygiene, this.rules.weights),
      coverage: present / aspects.length,
      aspects,
      missing: aspects.filter(aspect => !aspect.present).map(aspect => aspect.name),
      hygiene,
      computedAt: startTime,
    };

    logInfo('Knowledge readiness computed', {
      request_id: generateRequestId('rdy'),
      tenant_id: tenantId,
      score: report.score,
      aspects_present: present,
      documents: documents.length,
      chunks: chunks.length,
      duration_ms: this.clock() - startTime,
    });
    return report;
  }
}

/**
 * Markdown summary of a readiness report
 */
export function formatReadinessReport(report: ReadinessReport): string {
  const present = report.aspects.filter(aspect => aspect.present);
  const { hygiene } = report;
  const lines = [
    `## Knowledge readiness: ${report.score}/100`,
    '',
    `- Coverage: ${present.length}/${report.aspects.length} aspects`,
    `- Freshness: ${hygiene.freshness}`,
    `- Volume: ${hygiene.volume} (${hygiene.chunks} chunks from ${hygiene.documents} documents)`,
    `- Dedupe: ${hygiene.dedupe}`,
  ];
  if (present.length > 0) {
    lines.push('', '### Aspects', ...present.map(aspect => `- ${aspect.name}: detail ${aspect.detail}/5 (${aspect.chunks} chunks)`));
  }
  if (report.missing.length > 0) {
    lines.push('', `Missing: ${report.missing.join(', ')}`);
  }
  return lines.join('\n');
}
