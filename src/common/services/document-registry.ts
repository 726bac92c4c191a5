/**
 * Document Registry
 *
 * Persisted ingestion state per (tenant, document): status, content hash,
 * chunk count, failure reason and ingestion time. The ingestion pipeline
 * writes every state transition here; the retriever reads it to serve only
 * documents whose status is "embedded".
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync, readFileSync, readdirSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { z } from 'zod';
import { SOURCE_TYPES, type DocumentRecord, type DocumentStatus } from '../types.js';
import { logInfo } from './logger.js';

export interface DocumentRegistry {
  get(tenantId: string, documentId: string): Promise<DocumentRecord | null>;

  /** Insert or replace the record for (tenantId, documentId) */
  put(record: DocumentRecord): Promise<void>;

  /** @returns true when a record was removed */
  delete(tenantId: string, documentId: string): Promise<boolean>;

  list(tenantId: string, options?: { status?: DocumentStatus }): Promise<DocumentRecord[]>;

  /** Status of each known document; unknown ids are absent from the map */
  getStatuses(tenantId: string, documentIds: string[]): Promise<Map<string, DocumentStatus>>;

  close(): void;
}

// =============================================================================
// IN-MEMORY BACKEND
// =============================================================================

export class InMemoryDocumentRegistry implements DocumentRegistry {
  private readonly tenants = new Map<string, Map<string, DocumentRecord>>();

  private partition(tenantId: string): Map<string, DocumentRecord> {
    let partition = this.tenants.get(tenantId);
    if (!partition) {
      partition = new Map();
      this.tenants.set(tenantId, partition);
    }
    return partition;
  }

  async get(tenantId: string, documentId: string): Promise<DocumentRecord | null> {
    const record = this.tenants.get(tenantId)?.get(documentId);
    return record ? copyRecord(record) : null;
  }

  async put(record: DocumentRecord): Promise<void> {
    this.partition(record.tenantId).set(record.documentId, copyRecord(record));
  }

  async delete(tenantId: string, documentId: string): Promise<boolean> {
    return this.tenants.get(tenantId)?.delete(documentId) ?? false;
  }

  async list(tenantId: string, options: { status?: DocumentStatus } = {}): Promise<DocumentRecord[]> {
    const records = [...(this.tenants.get(tenantId)?.values() ?? [])];
    return records
      .filter(record => !options.status || record.status === options.status)
      .sort((a, b) => a.documentId.localeCompare(b.documentId))
      .map(copyRecord);
  }

  async getStatuses(tenantId: string, documentIds: string[]): Promise<Map<string, DocumentStatus>> {
    const partition = this.tenants.get(tenantId);
    const statuses = new Map<string, DocumentStatus>();
    for (const documentId of documentIds) {
      const record = partition?.get(documentId);
      if (record) statuses.set(documentId, record.status);
    }
    return statuses;
  }

  close(): void {
    this.tenants.clear();
  }
}

function copyRecord(record: DocumentRecord): DocumentRecord {
  return { ...record, error: record.error ? { ...record.error } : undefined };
}

// =============================================================================
// SQLITE BACKEND
// =============================================================================

export interface SqliteRegistryConfig {
  /** File path, or ":memory:" */
  databasePath: string;
  migrationsDir: string;
}

export const DEFAULT_SQLITE_REGISTRY_CONFIG: SqliteRegistryConfig = {
  databasePath: './data/outreach.db',
  migrationsDir: join(process.cwd(), 'database', 'migrations'),
};

const documentRowSchema = z.object({
  tenant_id: z.string(),
  document_id: z.string(),
  source_type: z.enum(SOURCE_TYPES),
  content_hash: z.string(),
  status: z.enum(['pending', 'chunked', 'embedded', 'failed']),
  chunk_count: z.number().int(),
  title: z.string().nullable(),
  source_url: z.string().nullable(),
  error_kind: z.string().nullable(),
  error_step: z.string().nullable(),
  error_message: z.string().nullable(),
  ingested_at: z.number().nullable(),
  updated_at: z.number(),
});

type DocumentRow = z.infer<typeof documentRowSchema>;

function fromRow(row: unknown): DocumentRecord {
  const r: DocumentRow = documentRowSchema.parse(row);
  const record: DocumentRecord = {
    tenantId: r.tenant_id,
    documentId: r.document_id,
    sourceType: r.source_type,
    contentHash: r.content_hash,
    status: r.status,
    chunkCount: r.chunk_count,
    updatedAt: r.updated_at,
  };
  if (r.title !== null) record.title = r.title;
  if (r.source_url !== null) record.sourceUrl = r.source_url;
  if (r.ingested_at !== null) record.ingestedAt = r.ingested_at;
  if (r.error_kind !== null) {
    record.error = { kind: r.error_kind, step: r.error_step ?? '', message: r.error_message ?? '' };
  }
  return record;
}

function toRow(record: DocumentRecord): DocumentRow {
  return {
    tenant_id: record.tenantId,
    document_id: record.documentId,
    source_type: record.sourceType,
    content_hash: record.contentHash,
    status: record.status,
    chunk_count: record.chunkCount,
    title: record.title ?? null,
    source_url: record.sourceUrl ?? null,
    error_kind: record.error?.kind ?? null,
    error_step: record.error?.step ?? null,
    error_message: record.error?.message ?? null,
    ingested_at: record.ingestedAt ?? null,
    updated_at: record.updatedAt,
  };
}

const MIGRATIONS_TABLE = `
  CREATE TABLE IF NOT EXISTS migrations (
    id INTEGER PRIMARY KEY,
    name TEXT NOT NULL UNIQUE,
    applied_at TEXT NOT NULL DEFAULT (datetime('now'))
  )
`;

/**
 * Apply every *.sql file in migrationsDir not yet recorded, in name order
 *
 * @returns Names of the migrations applied by this call
 */
export function runMigrations(db: Database.Database, migrationsDir: string): string[] {
  db.exec(MIGRATIONS_TABLE);

  const appliedRows: unknown[] = db.prepare('SELECT name FROM migrations').all();
  const appliedNames = new Set(appliedRows.map(row => z.object({ name: z.string() }).parse(row).name));

  if (!existsSync(migrationsDir)) {
    throw new Error(`Migrations directory not found: ${migrationsDir}`);
  }

  const files = readdirSync(migrationsDir)
    .filter(file => file.endsWith('.sql'))
    .sort();

  const applied: string[] = [];
  for (const file of files) {
    if (appliedNames.has(file)) continue;

    const sql = readFileSync(join(migrationsDir, file), 'utf-8');
    db.transaction(() => {
      db.exec(sql);
      db.prepare('INSERT INTO migrations (name) VALUES (?)').run(file);
    })();
    applied.push(file);
    logInfo('Migration applied', { migration: file });
  }
  return applied;
}

export class SqliteDocumentRegistry implements DocumentRegistry {
  private readonly db: Database.Database;

  constructor(config: SqliteRegistryConfig = DEFAULT_SQLITE_REGISTRY_CONFIG) {
    if (config.databasePath !== ':memory:') {
      const dbDir = dirname(config.databasePath);
      if (!existsSync(dbDir)) {
        mkdirSync(dbDir, { recursive: true });
      }
    }

    this.db = new Database(config.databasePath);
    // WAL lets the CLI read while the MCP server writes
    this.db.pragma('journal_mode = WAL');
    runMigrations(this.db, config.migrationsDir);
  }

  async get(tenantId: string, documentId: string): Promise<DocumentRecord | null> {
    const row: unknown = this.db
      .prepare('SELECT * FROM documents WHERE tenant_id = ? AND document_id = ?')
      .get(tenantId, documentId);
    return row === undefined ? null : fromRow(row);
  }

  async put(record: DocumentRecord): Promise<void> {
    this.db
      .prepare(`
        INSERT INTO documents (
          tenant_id, document_id, source_type, content_hash, status, chunk_count,
          title, source_url, error_kind, error_step, error_message, ingested_at, updated_at
        ) VALUES (
          @tenant_id, @document_id, @source_type, @content_hash, @status, @chunk_count,
          @title, @source_url, @error_kind, @error_step, @error_message, @ingested_at, @updated_at
        )
        ON CONFLICT (tenant_id, document_id) DO UPDATE SET
          source_type = excluded.source_type,
          content_hash = excluded.content_hash,
          status = excluded.status,
          chunk_count = excluded.chunk_count,
          title = excluded.title,
          source_url = excluded.source_url,
          error_kind = excluded.error_kind,
          error_step = excluded.error_step,
          error_message = excluded.error_message,
          ingested_at = excluded.ingested_at,
          updated_at = excluded.updated_at
      `)
      .run(toRow(record));
  }

  async delete(tenantId: string, documentId: string): Promise<boolean> {
    const result = this.db
      .prepare('DELETE FROM documents WHERE tenant_id = ? AND document_id = ?')
      .run(tenantId, documentId);
    return result.changes > 0;
  }

  async list(tenantId: string, options: { status?: DocumentStatus } = {}): Promise<DocumentRecord[]> {
    const rows: unknown[] = options.status
      ? this.db
          .prepare('SELECT * FROM documents WHERE tenant_id = ? AND status = ? ORDER BY document_id')
          .all(tenantId, options.status)
      : this.db.prepare('SELECT * FROM documents WHERE tenant_id = ? ORDER BY document_id').all(tenantId);
    return rows.map(fromRow);
  }

  async getStatuses(tenantId: string, documentIds: string[]): Promise<Map<string, DocumentStatus>> {
    const statuses = new Map<string, DocumentStatus>();
    const unique = [...new Set(documentIds)];
    if (unique.length === 0) return statuses;

    const placeholders = unique.map(() => '?').join(', ');
    const rows: unknown[] = this.db
      .prepare(`SELECT * FROM documents WHERE tenant_id = ? AND document_id IN (${placeholders})`)
      .all(tenantId, ...unique);
    for (const row of rows) {
      const record = fromRow(row);
      statuses.set(record.documentId, record.status);
    }
    return statuses;
  }

  close(): void {
    this.db.close();
  }
}
