/**
 * System status tool
 *
 * Metrics, circuit breaker states, query-embedding cache and effective
 * configuration in one report.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { SystemStatusSchema } from '../schemas/index.js';
import type { EmbeddingCache } from '../services/cache-service.js';
import { getCircuitBreakerStates } from '../services/circuit-breaker.js';
import { formatMetricsSummary, resetOutreachMetrics } from '../services/metrics.js';
import { errorResult, textResult } from './tool-response.js';

export interface StatusSources {
  cache: EmbeddingCache;
  describeConfig: () => Record<string, unknown>;
}

export function registerSystemStatusTool(server: McpServer, sources: StatusSources): void {
  server.tool(
    'system_status',
    `Operational status of the outreach engine.

**SECTIONS:**
- all: Show everything (default)
- metrics: Ingestion and generation counters
- circuit_breakers: Voyage AI, Anthropic and Qdrant breaker states
- cache: Query-embedding cache hit rate
- config: Effective configuration (no secrets)`,
    SystemStatusSchema.shape,
    async args => {
      try {
        const input = SystemStatusSchema.parse(args);
        const section = input.section;
        const lines: string[] = ['System Status', '='.repeat(50)];

        if (section === 'all' || section === 'metrics') {
          lines.push('', '## Metrics', '─'.repeat(40), formatMetricsSummary());
          if (input.reset_metrics) {
            resetOutreachMetrics();
            lines.push('', 'Metrics have been reset.');
          }
        }

        if (section === 'all' || section === 'circuit_breakers') {
          lines.push('', '## Circuit Breakers', '─'.repeat(40));
          for (const [service, stats] of Object.entries(getCircuitBreakerStates())) {
            const icon = stats.state === 'closed' ? '[OK]' : stats.state === 'open' ? '[OPEN]' : '[TEST]';
            const lastFail = stats.lastFailureTime
              ? `${Math.round((Date.now() - stats.lastFailureTime) / 1000)}s ago`
              : 'never';
            lines.push(`${icon} ${service.toUpperCase()}: ${stats.state}`);
            lines.push(`    Failures: ${stats.consecutiveFailures}, Last: ${lastFail}`);
          }
        }

        if (section === 'all' || section === 'cache') {
          const stats = sources.cache.getStats();
          lines.push('', '## Query Embedding Cache', '─'.repeat(40));
          lines.push(`Enabled: ${stats.enabled ? 'Yes' : 'No'}`);
          lines.push(`Entries: ${stats.size}/${stats.maxSize}`);
          lines.push(`Hits: ${stats.hits}, Misses: ${stats.misses}, Hit rate: ${stats.hitRate}`);
        }

        if (section === 'all' || section === 'config') {
          lines.push('', '## Configuration', '─'.repeat(40));
          lines.push(JSON.stringify(sources.describeConfig(), null, 2));
        }

        return textResult(lines.join('\n'));
      } catch (error) {
        return errorResult('Status', error);
      }
    }
  );
}
