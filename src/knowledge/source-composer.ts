/**
 * Source Composer
 *
 * Company profiles, products and Q&A entries arrive from the CRUD layer as
 * records, not prose. They are rendered as labeled text in a fixed field
 * order before chunking, so the same record always yields the same text
 * (and the same content hash).
 */

import type { DocumentFields } from '../common/schemas/index.js';
import type { SourceType } from '../common/types.js';

type FieldValue = DocumentFields[string];

interface FieldLayout {
  /** [normalized key, label] in output order */
  fields: Array<[string, string]>;
  /** Q&A pairs read better as one block */
  separator: string;
}

const LAYOUTS: Partial<Record<SourceType, FieldLayout>> = {
  company_profile: {
    fields: [
      ['name', 'Company'],
      ['description', 'Description'],
      ['mission', 'Mission'],
      ['values', 'Values'],
      ['usp', 'Unique Selling Proposition'],
      ['history', 'History'],
      ['key_personnel', 'Key Personnel'],
      ['offering_description', 'Offering'],
      ['target_market', 'Target Market'],
    ],
    separator: '\n\n',
  },
  product: {
    fields: [
      ['name', 'Product'],
      ['category', 'Category'],
      ['description', 'Description'],
      ['features', 'Features'],
      ['benefits', 'Benefits'],
      ['pricing', 'Pricing'],
      ['target_audience', 'Target Audience'],
      ['use_cases', 'Use Cases'],
    ],
    separator: '\n\n',
  },
  company_qa: {
    fields: [
      ['category', 'Category'],
      ['question', 'Question'],
      ['answer', 'Answer'],
    ],
    separator: '\n',
  },
  product_qa: {
    fields: [
      ['product', 'Product'],
      ['question', 'Question'],
      ['answer', 'Answer'],
    ],
    separator: '\n',
  },
};

/**
 * keyPersonnel, Key-Personnel, key personnel -> key_personnel
 */
export function normalizeFieldKey(key: string): string {
  return key
    .trim()
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .replace(/[\s-]+/g, '_')
    .toLowerCase();
}

/**
 * key_personnel -> Key Personnel
 */
function humanize(key: string): string {
  return key
    .split('_')
    .filter(part => part.length > 0)
    .map(part => part.charAt(0).toUpperCase() + part.slice(1))
    .join(' ');
}

function formatValue(value: FieldValue): string {
  if (Array.isArray(value)) {
    return value
      .map(item => String(item).trim())
      .filter(item => item.length > 0)
      .join(', ');
  }
  return String(value).trim();
}

/**
 * Render a structured record as labeled text
 *
 * Known fields come first in the layout's order; any other non-empty field
 * follows in key order. Empty fields are skipped.
 */
export function composeDocumentText(sourceType: SourceType, fields: DocumentFields): string {
  const values = new Map<string, string>();
  for (const [key, value] of Object.entries(fields)) {
    const formatted = formatValue(value);
    if (formatted) {
      values.set(normalizeFieldKey(key), formatted);
    }
  }

  const layout = LAYOUTS[sourceType] ?? { fields: [], separator: '\n\n' };
  const parts: string[] = [];
  const used = new Set<string>();

  for (const [key, label] of layout.fields) {
    const value = values.get(key);
    if (value) {
      parts.push(`${label}: ${value}`);
      used.add(key);
    }
  }

  const remaining = [...values.keys()].filter(key => !used.has(key)).sort();
  for (const key of remaining) {
    parts.push(`${humanize(key)}: ${values.get(key)}`);
  }

  return parts.join(layout.separator);
}

/**
 * Full text of a document payload: composed fields, then free text
 */
export function resolveDocumentText(
  sourceType: SourceType,
  payload: { text?: string; fields?: DocumentFields }
): string {
  const parts: string[] = [];
  if (payload.fields) {
    const composed = composeDocumentText(sourceType, payload.fields);
    if (composed) parts.push(composed);
  }
  if (payload.text && payload.text.trim()) {
    parts.push(payload.text.trim());
  }
  return parts.join('\n\n');
}
