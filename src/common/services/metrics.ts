/**
 * Outreach Metrics Service
 *
 * Counters for ingestion and email generation. In-memory storage (resets on
 * restart), suitable for the MCP server lifecycle; surfaced by the
 * system_status tool.
 */

import { logDebug, logInfo } from './logger.js';

/**
 * Per-tenant counters
 */
interface TenantStats {
  documents_embedded: number;
  documents_failed: number;
  drafts: number;
  last_activity: string | null;
}

export interface OutreachMetrics {
  // Ingestion
  documents_embedded: number;
  documents_skipped: number;
  documents_failed: number;
  chunks_embedded: number;
  ingestion_duration_ms: number;

  // Generation
  generation_requests: number;
  drafts_returned: number;
  revisions: number;
  flagged_for_review: number;
  generation_failures: number;
  generation_duration_ms: number;

  failures_by_kind: Record<string, number>;

  first_event_timestamp: string | null;
  last_event_timestamp: string | null;

  by_tenant: Record<string, TenantStats>;
}

function emptyMetrics(): OutreachMetrics {
  return {
    documents_embedded: 0,
    documents_skipped: 0,
    documents_failed: 0,
    chunks_embedded: 0,
    ingestion_duration_ms: 0,
    generation_requests: 0,
    drafts_returned: 0,
    revisions: 0,
    flagged_for_review: 0,
    generation_failures: 0,
    generation_duration_ms: 0,
    failures_by_kind: {},
    first_event_timestamp: null,
    last_event_timestamp: null,
    by_tenant: {},
  };
}

let metrics: OutreachMetrics = emptyMetrics();

function touch(tenantId: string): TenantStats {
  const now = new Date().toISOString();
  metrics.last_event_timestamp = now;
  if (!metrics.first_event_timestamp) {
    metrics.first_event_timestamp = now;
  }

  let stats = metrics.by_tenant[tenantId];
  if (!stats) {
    stats = { documents_embedded: 0, documents_failed: 0, drafts: 0, last_activity: null };
    metrics.by_tenant[tenantId] = stats;
  }
  stats.last_activity = now;
  return stats;
}

function countFailure(kind: string): void {
  metrics.failures_by_kind[kind] = (metrics.failures_by_kind[kind] ?? 0) + 1;
}

export type IngestionResult =
  | { status: 'embedded'; chunks: number }
  | { status: 'skipped' }
  | { status: 'failed'; kind: string };

/**
 * Record the end of one document ingestion
 */
export function recordIngestion(tenantId: string, result: IngestionResult, durationMs: number): void {
  const tenant = touch(tenantId);
  metrics.ingestion_duration_ms += durationMs;

  switch (result.status) {
    case 'embedded':
      metrics.documents_embedded++;
      metrics.chunks_embedded += result.chunks;
      tenant.documents_embedded++;
      break;
    case 'skipped':
      metrics.documents_skipped++;
      break;
    case 'failed':
      metrics.documents_failed++;
      tenant.documents_failed++;
      countFailure(result.kind);
      break;
  }

  logDebug('Ingestion metrics recorded', {
    tenant_id: tenantId,
    status: result.status,
    duration_ms: durationMs,
  });
}

export type GenerationResult =
  | { ok: true; revisions: number; flaggedForReview: boolean }
  | { ok: false; kind: string };

/**
 * Record the end of one email generation request
 */
export function recordGeneration(tenantId: string, result: GenerationResult, durationMs: number): void {
  const tenant = touch(tenantId);
  metrics.generation_requests++;
  metrics.generation_duration_ms += durationMs;

  if (result.ok) {
    metrics.drafts_returned++;
    metrics.revisions += result.revisions;
    if (result.flaggedForReview) {
      metrics.flagged_for_review++;
    }
    tenant.drafts++;
  } else {
    metrics.generation_failures++;
    countFailure(result.kind);
  }
}

/**
 * Get current metrics
 *
 * Returns a copy to prevent external mutation.
 */
export function getOutreachMetrics(): OutreachMetrics {
  return {
    ...metrics,
    failures_by_kind: { ...metrics.failures_by_kind },
    by_tenant: Object.fromEntries(
      Object.entries(metrics.by_tenant).map(([tenant, stats]) => [tenant, { ...stats }])
    ),
  };
}

export function resetOutreachMetrics(): void {
  metrics = emptyMetrics();
  logInfo('Outreach metrics reset', {});
}

/**
 * Get formatted metrics summary string
 */
export function formatMetricsSummary(): string {
  const m = metrics;
  const lines: string[] = [];

  lines.push('Outreach Metrics Summary');
  lines.push('========================');
  lines.push('');

  lines.push('Ingestion:');
  lines.push(`  Documents Embedded: ${m.documents_embedded} (${m.documents_skipped} unchanged, ${m.documents_failed} failed)`);
  lines.push(`  Chunks Embedded: ${m.chunks_embedded.toLocaleString()}`);
  lines.push(`  Total Duration: ${formatDuration(m.ingestion_duration_ms)}`);
  lines.push('');

  const avgGeneration = m.generation_requests > 0
    ? Math.round(m.generation_duration_ms / m.generation_requests)
    : 0;
  lines.push('Generation:');
  lines.push(`  Requests: ${m.generation_requests} (${m.drafts_returned} drafts, ${m.generation_failures} failed)`);
  lines.push(`  Revisions: ${m.revisions}`);
  lines.push(`  Flagged For Review: ${m.flagged_for_review}`);
  lines.push(`  Avg Duration: ${formatDuration(avgGeneration)}`);
  lines.push('');

  const kinds = Object.entries(m.failures_by_kind);
  if (kinds.length > 0) {
    lines.push('Failures By Kind:');
    for (const [kind, count] of kinds.sort(([a], [b]) => a.localeCompare(b))) {
      lines.push(`  ${kind}: ${count}`);
    }
    lines.push('');
  }

  const tenants = Object.entries(m.by_tenant);
  if (tenants.length > 0) {
    lines.push('By Tenant:');
    for (const [tenant, stats] of tenants) {
      lines.push(`  ${tenant}:`);
      lines.push(`    Documents: ${stats.documents_embedded} (${stats.documents_failed} failed)`);
      lines.push(`    Drafts: ${stats.drafts}`);
      lines.push(`    Last Activity: ${stats.last_activity || 'Never'}`);
    }
  } else {
    lines.push('By Tenant: No activity recorded yet');
  }

  return lines.join('\n');
}

/**
 * Format milliseconds as human-readable duration
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  } else if (ms < 60000) {
    return `${(ms / 1000).toFixed(1)}s`;
  } else if (ms < 3600000) {
    const mins = Math.floor(ms / 60000);
    const secs = Math.round((ms % 60000) / 1000);
    return `${mins}m ${secs}s`;
  }
  const hours = Math.floor(ms / 3600000);
  const mins = Math.round((ms % 3600000) / 60000);
  return `${hours}h ${mins}m`;
}
