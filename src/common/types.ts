/**
 * Type definitions for the outreach knowledge core
 *
 * Chunk ids are deterministic UUIDs derived from (document id, ordinal):
 *   sha256("<documentId>:<ordinal>") formatted as 8-4-4-4-12 hex
 */

// =============================================================================
// KNOWLEDGE SOURCES
// =============================================================================

export const SOURCE_TYPES = [
  'bulk_snippet',
  'company_profile',
  'company_qa',
  'knowledge_document',
  'product',
  'product_qa',
  'website_content',
  'scraped_profile',
  'uploaded_text',
  'url',
] as const;

export type SourceType = (typeof SOURCE_TYPES)[number];

export function isSourceType(value: string): value is SourceType {
  return SOURCE_TYPES.some(type => type === value);
}

/**
 * Plural and legacy names still sent by older upload paths
 */
export const SOURCE_TYPE_ALIASES: Readonly<Record<string, SourceType>> = {
  bulk_snippets: 'bulk_snippet',
  knowledge_documents: 'knowledge_document',
  products: 'product',
  company_profiles: 'company_profile',
  uploaded: 'uploaded_text',
  text: 'uploaded_text',
  website: 'website_content',
};

/**
 * Canonical source type for a raw name, or null when unknown
 */
export function canonicalSourceType(value: string): SourceType | null {
  const normalized = value.trim().toLowerCase().replace(/[\s-]+/g, '_');
  if (isSourceType(normalized)) return normalized;
  return SOURCE_TYPE_ALIASES[normalized] ?? null;
}

export type DocumentStatus ='pending' | 'chunked' | 'embedded' | 'failed';

/**
 * Validated document payload handed to the ingestion pipeline
 */
export interface DocumentInput {
  documentId: string;
  sourceType: SourceType;
  /** Plain text, or the labeled text composed from a structured record */
  text: string;
  title?: string;
  sourceUrl?: string;
}

/**
 * Registry row: persisted ingestion state of one document
 */
export interface DocumentRecord {
  tenantId: string;
  documentId: string;
  sourceType: SourceType;
  contentHash: string;
  status: DocumentStatus;
  chunkCount: number;
  title?: string;
  sourceUrl?: string;
  error?: {
    kind: string;
    step: string;
    message: string;
  };
  /** Epoch ms of the last successful ingestion */
  ingestedAt?: number;
  updatedAt: number;
}

// =============================================================================
// CHUNKS & VECTORS
// =============================================================================

export interface TextChunk {
  ordinal: number;
  text: string;
  tokenCount: number;
}

/**
 * Denormalized metadata stored with every vector, enough to cite the source
 */
export interface ChunkMetadata {
  documentId: string;
  sourceType: SourceType;
  ordinal: number;
  text: string;
  tokenCount: number;
  title?: string;
  sourceUrl?: string;
  ingestedAt: number;
}

export interface VectorRecord {
  tenantId: string;
  chunkId: string;
  vector: number[];
  metadata: ChunkMetadata;
}

/** A stored record without its vector */
export type StoredChunk = Omit<VectorRecord, 'vector'>;

export interface ScoredChunk {
  tenantId: string;
  chunkId: string;
  /** Cosine similarity in [-1, 1] */
  score: number;
  metadata: ChunkMetadata;
}

export interface VectorQueryFilters {
  sourceTypes?: SourceType[];
  documentIds?: string[];
}

// =============================================================================
// RETRIEVAL
// =============================================================================

export interface RetrievedContext {
  /** Packed chunks, descending by score */
  chunks: ScoredChunk[];
  totalTokens: number;
  /** Candidates returned by the vector store */
  candidates: number;
  belowThreshold: number;
  notReady: number;
  overBudget: number;
}

export function emptyContext(): RetrievedContext {
  return { chunks: [], totalTokens: 0, candidates: 0, belowThreshold: 0, notReady: 0, overBudget: 0 };
}

// =============================================================================
// LEADS & DRAFTS
// =============================================================================

export interface Lead {
  name: string;
  company: string;
  role?: string;
  email?: string;
  industry?: string;
  location?: string;
  website?: string;
  signals: string[];
  custom: Record<string, string>;
}

export interface SpamScore {
  /** Risk in [0, 1], rounded to 3 decimals */
  risk: number;
  /** De-duplicated, sorted */
  flaggedPhrases: string[];
  /** Every rule that contributed, e.g. "phrase:urgency:act now" or "caps_ratio" */
  signals: string[];
}

export interface DraftEmail {
  subject: string;
  body: string;
  context: ScoredChunk[];
  spamScore: SpamScore;
  flaggedForReview: boolean;
  revisions: number;
  promptTokens: number;
}
