/**
 * Chunker
 *
 * Splits document text into bounded, overlapping chunks for embedding.
 *
 * Boundaries are semantic first: paragraphs (blank-line separated), then
 * sentences. Only a sentence longer than maxTokens is cut into hard windows.
 * Each chunk after the first is seeded with the tail of the previous one
 * (overlapTokens) so that context spanning a boundary is retrievable from
 * both sides.
 *
 * Deterministic: the same text and parameters always produce the same
 * chunks, which is what makes re-ingestion idempotent.
 */

import { createHash } from 'node:crypto';
import type { TextChunk } from '../common/types.js';
import { charsForTokens, estimateTokens } from '../common/services/token-estimator.js';

export interface ChunkingConfig {
  maxTokens: number;
  overlapTokens: number;
}

/** ~1000 characters per chunk with ~200 characters of overlap */
export const DEFAULT_CHUNKING_CONFIG: ChunkingConfig = {
  maxTokens: 250,
  overlapTokens: 50,
};

export function validateChunkingConfig(config: ChunkingConfig): string[] {
  const errors: string[] = [];
  if (!Number.isInteger(config.maxTokens) || config.maxTokens < 1) {
    errors.push(`maxTokens must be an integer >= 1 (got ${config.maxTokens})`);
  }
  if (!Number.isInteger(config.overlapTokens) || config.overlapTokens < 0) {
    errors.push(`overlapTokens must be an integer >= 0 (got ${config.overlapTokens})`);
  } else if (config.overlapTokens >= config.maxTokens) {
    errors.push(`overlapTokens (${config.overlapTokens}) must be smaller than maxTokens (${config.maxTokens})`);
  }
  return errors;
}

interface Unit {
  text: string;
  startsParagraph: boolean;
}

/**
 * Split text into chunks of at most maxTokens estimated tokens
 *
 * @throws RangeError for an invalid configuration
 */
export function chunkText(text: string, config: ChunkingConfig = DEFAULT_CHUNKING_CONFIG): TextChunk[] {
  const errors = validateChunkingConfig(config);
  if (errors.length > 0) {
    throw new RangeError(`Invalid chunking configuration: ${errors.join('; ')}`);
  }

  const normalized = text.replace(/\r\n?/g, '\n');
  if (normalized.trim().length === 0) {
    return [];
  }

  const maxChars = charsForTokens(config.maxTokens);
  const overlapChars = charsForTokens(config.overlapTokens);
  const units = splitUnits(normalized, maxChars);

  const chunks: string[] = [];
  let current = '';

  for (const unit of units) {
    const separator = unit.startsParagraph ? '\n\n' : ' ';
    if (current) {
      const candidate = current + separator + unit.text;
      if (candidate.length <= maxChars) {
        current = candidate;
        continue;
      }
      chunks.push(current);
    }

    const previous = chunks[chunks.length - 1];
    const seed = previous && overlapChars > 0 ? overlapTail(previous, overlapChars) : '';
    current = seed && seed.length + separator.length + unit.text.length <= maxChars
      ? seed + separator + unit.text
      : unit.text;
  }
  if (current) {
    chunks.push(current);
  }

  return chunks.map((chunk, ordinal) => ({
    ordinal,
    text: chunk,
    tokenCount: estimateTokens(chunk),
  }));
}

/**
 * Paragraphs, then sentences, then hard windows for oversize sentences
 */
function splitUnits(text: string, maxChars: number): Unit[] {
  const units: Unit[] = [];
  const paragraphs = text
    .split(/\n[ \t]*\n/)
    .map(paragraph => paragraph.replace(/\s+/g, ' ').trim())
    .filter(paragraph => paragraph.length > 0);

  for (const paragraph of paragraphs) {
    const sentences = paragraph.split(/(?<=[.!?])\s+/).filter(sentence => sentence.length > 0);
    sentences.forEach((sentence, sentenceIndex) => {
      const pieces = sentence.length > maxChars ? hardSplit(sentence, maxChars) : [sentence];
      pieces.forEach((piece, pieceIndex) => {
        units.push({ text: piece, startsParagraph: sentenceIndex === 0 && pieceIndex === 0 });
      });
    });
  }
  return units;
}

/**
 * Cut into windows of at most maxChars, ending at the last space when the
 * window has one
 */
function hardSplit(sentence: string, maxChars: number): string[] {
  const pieces: string[] = [];
  let rest = sentence;
  while (rest.length > maxChars) {
    const window = rest.slice(0, maxChars + 1);
    let cut = window.lastIndexOf(' ');
    if (cut <= 0) {
      cut = maxChars;
    }
    pieces.push(rest.slice(0, cut).trim());
    rest = rest.slice(cut).trim();
  }
  if (rest) {
    pieces.push(rest);
  }
  return pieces;
}

/**
 * Trailing overlapChars of a chunk, moved forward to the next word start
 */
function overlapTail(chunk: string, overlapChars: number): string {
  if (chunk.length <= overlapChars) {
    return chunk.trim();
  }
  const start = chunk.length - overlapChars;
  let tail = chunk.slice(start);
  if (!/\s/.test(chunk[start - 1])) {
    const firstSpace = tail.search(/\s/);
    tail = firstSpace === -1 ? '' : tail.slice(firstSpace);
  }
  return tail.trim();
}

/**
 * Stable chunk id: UUID-formatted sha256 of (documentId, ordinal)
 *
 * Qdrant only accepts unsigned integers or UUIDs as point ids.
 */
export function chunkId(documentId: string, ordinal: number): string {
  const hex = createHash('sha256').update(`${documentId}:${ordinal}`, 'utf8').digest('hex');
  return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20, 32)}`;
}
