/**
 * Zod validation schemas
 *
 * Two groups:
 * - Boundary payloads (documents, leads) arriving loosely typed from the CRUD
 *   layer, validated into the strict internal types
 * - MCP tool inputs (snake_case, as the tools expose them)
 */

import { z } from 'zod';
import { InvalidInput } from '../errors.js';
import { canonicalSourceType, SOURCE_TYPES, type SourceType } from '../types.js';

// =============================================================================
// SHARED PIECES
// =============================================================================

const sourceTypeField = z
  .string()
  .min(1, 'Source type is required')
  .transform((value, ctx): SourceType => {
    const canonical = canonicalSourceType(value);
    if (!canonical) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Unknown source type "${value}". Expected one of: ${SOURCE_TYPES.join(', ')}`,
      });
      return z.NEVER;
    }
    return canonical;
  });

/** Trimmed optional text; blank becomes undefined */
const optionalText = z
  .string()
  .optional()
  .transform(value => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

const fieldValue = z.union([z.string(), z.number(), z.boolean(), z.array(z.union([z.string(), z.number()]))]);

// =============================================================================
// DOCUMENT PAYLOAD
// =============================================================================

/**
 * A document as supplied by an upload, the scraper or the CRUD layer
 *
 * Plain-text sources send `text`; profile, product and Q&A records send
 * `fields`, composed into labeled text before chunking.
 */
export const DocumentPayloadSchema = z
  .object({
    documentId: z
      .string()
      .trim()
      .min(1, 'documentId is required')
      .max(256, 'documentId must be at most 256 characters'),
    sourceType: sourceTypeField,
    text: z.string().optional(),
    fields: z.record(fieldValue).optional(),
    title: optionalText,
    sourceUrl: z.string().url('sourceUrl must be a URL').optional(),
  })
  .refine(payload => payload.text !== undefined || payload.fields !== undefined, {
    message: 'Either text or fields is required',
    path: ['text'],
  });

export type DocumentPayload = z.infer<typeof DocumentPayloadSchema>;
export type DocumentFields = NonNullable<DocumentPayload['fields']>;

// =============================================================================
// LEAD
// =============================================================================

/**
 * Lead record from the lead store
 *
 * `signals` may arrive as one free-text string or a list; `custom` values
 * are stringified for template substitution.
 */
export const LeadSchema = z.object({
  name: z.string().trim().min(1, 'Lead name is required'),
  company: z.string().trim().min(1, 'Lead company is required'),
  role: optionalText,
  email: z.string().trim().email('Lead email must be an email address').optional(),
  industry: optionalText,
  location: optionalText,
  website: optionalText,
  signals: z
    .union([z.string(), z.array(z.string())])
    .optional()
    .transform(value => {
      const list = value === undefined ? [] : typeof value === 'string' ? [value] : value;
      return list.map(signal => signal.trim()).filter(signal => signal.length > 0);
    }),
  custom: z
    .record(z.union([z.string(), z.number(), z.boolean()]))
    .optional()
    .transform(value => {
      const custom: Record<string, string> = {};
      for (const [key, entry] of Object.entries(value ?? {})) {
        custom[key] = String(entry);
      }
      return custom;
    }),
});

export type LeadPayload = z.infer<typeof LeadSchema>;

/**
 * Flatten zod issues into "path: message" strings
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message));
}

/**
 * Canonicalize a source-type filter from a tool or CLI argument
 *
 * @throws InvalidInput naming every unknown value
 */
export function resolveSourceTypes(values: string[] | undefined): SourceType[] | undefined {
  if (!values || values.length === 0) return undefined;
  const resolved: SourceType[] = [];
  const unknown: string[] = [];
  for (const value of values) {
    const canonical = canonicalSourceType(value);
    if (canonical) {
      if (!resolved.includes(canonical)) resolved.push(canonical);
    } else {
      unknown.push(value);
    }
  }
  if (unknown.length > 0) {
    throw new InvalidInput(
      `Unknown source type(s): ${unknown.join(', ')}. Expected one of: ${SOURCE_TYPES.join(', ')}`,
      unknown.map(value => `source_types: unknown value "${value}"`)
    );
  }
  return resolved;
}

// =============================================================================
// MCP TOOL INPUTS
// =============================================================================

const tenantId = z
  .string()
  .trim()
  .min(1, 'tenant_id is required')
  .describe('Verified tenant id; every read and write is scoped to it');

const sourceTypesFilter = z
  .array(z.string())
  .optional()
  .describe(`Restrict to these knowledge sources: ${SOURCE_TYPES.join(', ')}`);

export const IngestDocumentSchema = z.object({
  tenant_id: tenantId,
  document_id: z.string().min(1).max(256).describe('Stable id of the document within the tenant'),
  source_type: z.string().min(1).describe(`Knowledge source: ${SOURCE_TYPES.join(', ')}`),
  text: z.string().optional().describe('Plain text content (uploads, scraped pages, snippets)'),
  fields: z
    .record(fieldValue)
    .optional()
    .describe('Structured record for company_profile, product, company_qa or product_qa sources'),
  title: z.string().optional().describe('Optional title shown in citations'),
  source_url: z.string().optional().describe('Optional source URL shown in citations'),
});

export const DocumentStatusSchema = z.object({
  tenant_id: tenantId,
  document_id: z.string().optional().describe('Document to inspect; omit to list all documents of the tenant'),
  status: z
    .enum(['pending', 'chunked', 'embedded', 'failed'])
    .optional()
    .describe('When listing, only show documents in this state'),
});

export const KnowledgeReadinessSchema = z.object({
  tenant_id: tenantId,
});

export const DeleteDocumentSchema = z.object({
  tenant_id: tenantId,
  document_id: z.string().min(1).describe('Document to remove with all its chunks'),
});

export const RetrieveContextSchema = z.object({
  tenant_id: tenantId,
  query: z
    .string()
    .max(2000, 'Query must be at most 2000 characters')
    .describe('What to look up, e.g. "pricing for mid-market SaaS"'),
  k: z.number().int().min(1).max(50).optional().describe('Candidates to fetch (default: 5)'),
  token_budget: z.number().int().min(1).optional().describe('Token budget for packed context (default: 1500)'),
  min_similarity: z.number().min(-1).max(1).optional().describe('Similarity threshold (default: 0.35)'),
  source_types: sourceTypesFilter,
});

export const AskKnowledgeBaseSchema = z.object({
  tenant_id: tenantId,
  question: z.string().min(1).max(2000).describe('Question to answer from the knowledge base'),
  k: z.number().int().min(1).max(50).optional(),
  source_types: sourceTypesFilter,
});

export const ScoreEmailSchema = z.object({
  subject: z.string().default('').describe('Email subject line'),
  body: z.string().describe('Email body'),
});

export const GenerateEmailSchema = z.object({
  tenant_id: tenantId,
  lead: z
    .record(z.unknown())
    .describe('Lead record: name and company required; role, email, industry, location, website, signals, custom optional'),
  template_id: z.string().optional().describe('Built-in template id (default: cold_intro)'),
  k: z.number().int().min(1).max(50).optional(),
  token_budget: z.number().int().min(1).optional(),
});

export const SystemStatusSchema = z.object({
  section: z
    .enum(['all', 'metrics', 'circuit_breakers', 'cache', 'config'])
    .default('all')
    .describe('Which part of the status to show'),
  reset_metrics: z.boolean().default(false).describe('Reset metrics counters after reading them'),
});

export type IngestDocumentInput = z.infer<typeof IngestDocumentSchema>;
export type DocumentStatusInput = z.infer<typeof DocumentStatusSchema>;
export type DeleteDocumentInput = z.infer<typeof DeleteDocumentSchema>;
export type KnowledgeReadinessInput = z.infer<typeof KnowledgeReadinessSchema>;
export type RetrieveContextInput = z.infer<typeof RetrieveContextSchema>;
export type AskKnowledgeBaseInput = z.infer<typeof AskKnowledgeBaseSchema>;
export type ScoreEmailInput = z.infer<typeof ScoreEmailSchema>;
export type GenerateEmailInput = z.infer<typeof GenerateEmailSchema>;
export type SystemStatusInput = z.infer<typeof SystemStatusSchema>;
