/**
 * Jest Unit Tests for Knowledge Readiness
 *
 * Scores are traced against data/readiness-aspects.json.
 */

import { mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { InMemoryDocumentRegistry } from '../../common/services/document-registry.js';
import { InMemoryVectorStore } from '../../common/services/vector-store.js';
import type { DocumentRecord, DocumentStatus, SourceType } from '../../common/types.js';
import { chunkId } from '../chunker.js';
import {
  assignAspects,
  formatReadinessReport,
  hygieneSignals,
  loadReadinessRules,
  measureAspect,
  ReadinessScorer,
} from '../readiness.js';

const TENANT = 'tenant-a';
const DAY = 24 * 60 * 60 * 1000;
const NOW = 1_700_000_000_000;
const rules = loadReadinessRules();

function documentRecord(documentId: string, sourceType: SourceType, status: DocumentStatus, at: number): DocumentRecord {
  return {
    tenantId: TENANT,
    documentId,
    sourceType,
    contentHash: 'hash',
    status,
    chunkCount: 1,
    ingestedAt: at,
    updatedAt: at,
  };
}

async function setup(documents: Array<{ record: DocumentRecord; text: string }>) {
  const registry = new InMemoryDocumentRegistry();
  const store = new InMemoryVectorStore();
  for (const { record, text } of documents) {
    await registry.put(record);
    await store.upsert(TENANT, {
      tenantId: TENANT,
      chunkId: chunkId(record.documentId, 0),
      vector: [1, 0],
      metadata: {
        documentId: record.documentId,
        sourceType: record.sourceType,
        ordinal: 0,
        text,
        tokenCount: 10,
        ingestedAt: record.updatedAt,
      },
    });
  }
  return new ReadinessScorer({ registry, store, rules, clock: () => NOW });
}

describe('Knowledge readiness', () => {
  // ==========================================================================
  // ASPECTS
  // ==========================================================================

  describe('Aspects', () => {
    test('chunks go to every aspect they match, unmatched ones to the fallback', () => {
      const assigned = assignAspects(
        ['Our mission is simple.', 'Plans start at $49.', 'We offer an API and webhooks for support teams.', 'Nothing to see.'],
        rules
      );

      expect(assigned.get('about')).toEqual(['Our mission is simple.', 'Nothing to see.']);
      expect(assigned.get('pricing')).toEqual(['Plans start at $49.']);
      expect(assigned.get('integrations')).toEqual(['We offer an API and webhooks for support teams.']);
      expect(assigned.get('support')).toEqual(['We offer an API and webhooks for support teams.']);
      expect([...assigned].filter(([, texts]) => texts.length > 0).map(([name]) => name)).toEqual([
        'about',
        'pricing',
        'integrations',
        'support',
      ]);
    });

    test('detail combines size, structure and specificity', () => {
      expect(measureAspect('pricing', ['## Pricing\nPlans start at $49 per month. See https://example.com/pricing'])).toEqual({
        name: 'pricing',
        present: true,
        detail: 1,
        chunks: 1,
        signals: { words: 12, headings: 1, qaPairs: 0, numerics: 1, currency: 1, links: 1 },
      });
    });

    test('question and answer pairs are counted', () => {
      expect(measureAspect('support', ['Q: Do you support SSO?\nA: Yes, on every plan.']).signals.qaPairs).toBe(1);
    });

    test('an aspect without chunks is missing', () => {
      expect(measureAspect('legal', [])).toEqual({
        name: 'legal',
        present: false,
        detail: 0,
        chunks: 0,
        signals: { words: 0, headings: 0, qaPairs: 0, numerics: 0, currency: 0, links: 0 },
      });
    });
  });

  // ==========================================================================
  // HYGIENE
  // ==========================================================================

  describe('Hygiene', () => {
    test('freshness uses the median age of the newest document per source type', () => {
      const now = 200 * DAY;
      const documents = [
        documentRecord('a', 'product', 'embedded', now - 10 * DAY),
        documentRecord('b', 'product', 'embedded', now - 50 * DAY),
        documentRecord('c', 'website_content', 'embedded', now - 90 * DAY),
        documentRecord('d', 'company_profile', 'embedded', now - 30 * DAY),
      ];

      expect(hygieneSignals(documents, ['a', 'A ', 'b', 'c'], now, 180)).toEqual({
        freshness: 83,
        volume: 30,
        dedupe: 75,
        documents: 4,
        chunks: 4,
        distinctChunks: 3,
      });
    });

    test('no knowledge scores zero on every signal', () => {
      expect(hygieneSignals([], [], NOW, 180)).toEqual({
        freshness: 0,
        volume: 0,
        dedupe: 0,
        documents: 0,
        chunks: 0,
        distinctChunks: 0,
      });
    });
  });

  // ==========================================================================
  // REPORT
  // ==========================================================================

  describe('Report', () => {
    test('only chunks of embedded documents are scored', async () => {
      const scorer = await setup([
        { record: documentRecord('pricing', 'product', 'embedded', NOW), text: 'Plans start at $49 per month.' },
        { record: documentRecord('stale', 'company_profile', 'failed', NOW), text: 'Our mission is simple.' },
      ]);

      const report = await scorer.knowledgeReadiness(TENANT);

      expect(report.score).toBe(34);
      expect(report.coverage).toBeCloseTo(1 / 11, 10);
      expect(report.aspects.filter(aspect => aspect.present).map(aspect => [aspect.name, aspect.detail])).toEqual([
        ['pricing', 1],
      ]);
      expect(report.missing).toEqual([
        'about',
        'value_prop',
        'features',
        'integrations',
        'onboarding',
        'security',
        'support',
        'case_studies',
        'implementation',
        'legal',
      ]);
      expect(report.hygiene).toEqual({ freshness: 100, volume: 0, dedupe: 100, documents: 1, chunks: 1, distinctChunks: 1 });
      expect(report.computedAt).toBe(NOW);
    });

    test('a tenant without embedded documents scores 0', async () => {
      const scorer = await setup([]);

      const report = await scorer.knowledgeReadiness(TENANT);

      expect(report.score).toBe(0);
      expect(report.missing).toHaveLength(11);
    });

    test('another tenant is not counted', async () => {
      const scorer = await setup([
        { record: documentRecord('pricing', 'product', 'embedded', NOW), text: 'Plans start at $49 per month.' },
      ]);

      const report = await scorer.knowledgeReadiness('tenant-b');

      expect(report.score).toBe(0);
      expect(report.hygiene.chunks).toBe(0);
    });

    test('the summary lists present aspects and what is missing', async () => {
      const scorer = await setup([
        { record: documentRecord('pricing', 'product', 'embedded', NOW), text: 'Plans start at $49 per month.' },
      ]);

      expect(formatReadinessReport(await scorer.knowledgeReadiness(TENANT))).toBe(
        [
          '## Knowledge readiness: 34/100',
          '',
          '- Coverage: 1/11 aspects',
          '- Freshness: 100',
          '- Volume: 0 (1 chunks from 1 documents)',
          '- Dedupe: 100',
          '',
          '### Aspects',
          '- pricing: detail 1/5 (1 chunks)',
          '',
          'Missing: about, value_prop, features, integrations, onboarding, security, support, case_studies, implementation, legal',
        ].join('\n')
      );
    });
  });

  // ==========================================================================
  // RULES FILE
  // ==========================================================================

  describe('Rules file', () => {
    const writeRules = (content: unknown): string => {
      const path = join(mkdtempSync(join(tmpdir(), 'readiness-')), 'rules.json');
      writeFileSync(path, JSON.stringify(content));
      return path;
    };
    const base = {
      version: 1,
      fallbackAspect: 'about',
      freshnessHorizonDays: 180,
      weights: { coverage: 0.35, detail: 0.25, freshness: 0.2, volume: 0.1, dedupe: 0.1 },
      aspects: [{ name: 'about', patterns: ['\\bmission\\b'] }],
    };

    test('the fallback aspect must exist', () => {
      expect(() => loadReadinessRules(writeRules({ ...base, fallbackAspect: 'other' }))).toThrow(
        /fallbackAspect: fallbackAspect must name one of the aspects$/
      );
    });

    test('patterns must compile', () => {
      expect(() => loadReadinessRules(writeRules({ ...base, aspects: [{ name: 'about', patterns: ['('] }] }))).toThrow(
        /aspects\.0\.patterns\.0: not a valid regular expression$/
      );
    });

    test('a missing file is reported with its path', () => {
      expect(() => loadReadinessRules('/nonexistent/readiness.json')).toThrow(
        'Cannot read readiness rules from /nonexistent/readiness.json'
      );
    });
  });
});
