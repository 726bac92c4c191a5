/**
 * Jest Unit Tests for the Chunker
 */

import { chunkId, chunkText, validateChunkingConfig } from '../chunker.js';

const THREE_SENTENCES = 'Alpha beta gamma. Delta epsilon zeta. Eta theta iota.';

describe('Chunker', () => {
  // ==========================================================================
  // PACKING
  // ==========================================================================

  describe('Packing', () => {
    test('packs sentences greedily up to maxTokens', () => {
      const chunks = chunkText(THREE_SENTENCES, { maxTokens: 10, overlapTokens: 0 });

      expect(chunks.map(chunk => chunk.text)).toEqual(['Alpha beta gamma. Delta epsilon zeta.', 'Eta theta iota.']);
      expect(chunks.map(chunk => chunk.ordinal)).toEqual([0, 1]);
      expect(chunks.map(chunk => chunk.tokenCount)).toEqual([10, 4]);
    });

    test('keeps a paragraph break inside a chunk as a blank line', () => {
      const chunks = chunkText('First para here.\n\nSecond para.', { maxTokens: 50, overlapTokens: 0 });

      expect(chunks).toHaveLength(1);
      expect(chunks[0].text).toBe('First para here.\n\nSecond para.');
    });

    test('normalizes CRLF and collapses whitespace inside a paragraph', () => {
      const chunks = chunkText('One  two\r\nthree.\r\n\r\nFour.', { maxTokens: 50, overlapTokens: 0 });

      expect(chunks[0].text).toBe('One two three.\n\nFour.');
    });

    test('never exceeds maxTokens on long input', () => {
      const text = Array.from({ length: 120 }, (_, i) => `Sentence number ${i} talks about outreach topic ${i % 7}.`).join(' ');
      const chunks = chunkText(text, { maxTokens: 40, overlapTokens: 10 });

      expect(chunks.length).toBeGreaterThan(5);
      for (const chunk of chunks) {
        expect(chunk.tokenCount).toBeLessThanOrEqual(40);
        expect(chunk.text.length).toBeLessThanOrEqual(160);
      }
    });

    test('empty or whitespace-only text yields no chunks', () => {
      expect(chunkText('', { maxTokens: 10, overlapTokens: 0 })).toEqual([]);
      expect(chunkText('  \n\n\t ', { maxTokens: 10, overlapTokens: 0 })).toEqual([]);
    });
  });

  // ==========================================================================
  // OVERLAP
  // ==========================================================================

  describe('Overlap', () => {
    test('seeds the next chunk with the previous tail, snapped to a word', () => {
      const chunks = chunkText(THREE_SENTENCES, { maxTokens: 10, overlapTokens: 3 });

      expect(chunks[0].text).toBe('Alpha beta gamma. Delta epsilon zeta.');
      expect(chunks[1].text).toBe('zeta. Eta theta iota.');
    });
  });

  // ==========================================================================
  // OVERSIZE SENTENCES
  // ==========================================================================

  describe('Oversize Sentences', () => {
    test('cuts at the last space inside the window', () => {
      const chunks = chunkText('abcdefghij klmnopqrst uvw', { maxTokens: 3, overlapTokens: 0 });

      expect(chunks.map(chunk => chunk.text)).toEqual(['abcdefghij', 'klmnopqrst', 'uvw']);
    });

    test('cuts at maxTokens when a window has no space', () => {
      const chunks = chunkText('x'.repeat(30), { maxTokens: 3, overlapTokens: 0 });

      expect(chunks.map(chunk => chunk.text.length)).toEqual([12, 12, 6]);
    });
  });

  // ==========================================================================
  // DETERMINISM & VALIDATION
  // ==========================================================================

  describe('Determinism and Validation', () => {
    test('same input gives the same chunks', () => {
      const config = { maxTokens: 12, overlapTokens: 4 };
      const text = `${THREE_SENTENCES}\n\n${THREE_SENTENCES}`;

      expect(chunkText(text, config)).toEqual(chunkText(text, config));
    });

    test('rejects overlap >= maxTokens', () => {
      expect(() => chunkText('text', { maxTokens: 10, overlapTokens: 10 })).toThrow(RangeError);
      expect(validateChunkingConfig({ maxTokens: 10, overlapTokens: 10 })).toEqual([
        'overlapTokens (10) must be smaller than maxTokens (10)',
      ]);
    });

    test('rejects maxTokens below 1', () => {
      expect(() => chunkText('text', { maxTokens: 0, overlapTokens: 0 })).toThrow(RangeError);
    });
  });

  describe('chunkId', () => {
    test('is a stable UUID per (document, ordinal)', () => {
      const id = chunkId('pricing', 0);

      expect(id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/);
      expect(chunkId('pricing', 0)).toBe(id);
      expect(chunkId('pricing', 1)).not.toBe(id);
      expect(chunkId('pricing-v2', 0)).not.toBe(id);
    });
  });
});
