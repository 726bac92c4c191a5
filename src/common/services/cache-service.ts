/**
 * Cache Service - LRU cache for query embeddings
 *
 * Lead-driven retrieval repeats the same few queries ("VP Sales at Acme,
 * SaaS") across a campaign; caching the query vector saves one embedding
 * round-trip per repeat. Keys are scoped by tenant so two tenants never share
 * an entry, even for the same text.
 */

import { LRUCache } from 'lru-cache';
import { logDebug, logInfo } from './logger.js';

// =============================================================================
// CONFIGURATION
// =============================================================================

export interface EmbeddingCacheConfig {
  enabled: boolean;
  maxEntries: number;
  ttlMs: number;
}

export const DEFAULT_CACHE_CONFIG: EmbeddingCacheConfig = {
  enabled: true,
  maxEntries: 500,
  ttlMs: 1800000, // 30 min
};

export interface CacheStats {
  enabled: boolean;
  size: number;
  maxSize: number;
  hits: number;
  misses: number;
  hitRate: string;
  ttlMs: number;
}

// =============================================================================
// CACHE
// =============================================================================

export class EmbeddingCache {
  private readonly cache: LRUCache<string, number[]>;
  private hits = 0;
  private misses = 0;

  constructor(private readonly config: EmbeddingCacheConfig = DEFAULT_CACHE_CONFIG) {
    this.cache = new LRUCache<string, number[]>({
      max: Math.max(1, config.maxEntries),
      ttl: config.ttlMs,
    });
  }

  /**
   * Cache key: tenant + model + normalized query (case and whitespace folded)
   */
  static key(tenantId: string, model: string, query: string): string {
    return JSON.stringify({
      tenant: tenantId,
      model,
      query: query.toLowerCase().replace(/\s+/g, ' ').trim(),
    });
  }

  isEnabled(): boolean {
    return this.config.enabled;
  }

  /**
   * Returns undefined when disabled, missing or expired
   */
  get(key: string): number[] | undefined {
    if (!this.config.enabled) {
      return undefined;
    }

    const vector = this.cache.get(key);
    if (vector) {
      this.hits++;
      logDebug('Embedding cache hit', { hits: this.hits, misses: this.misses });
      return vector;
    }

    this.misses++;
    return undefined;
  }

  set(key: string, vector: number[]): void {
    if (!this.config.enabled) {
      return;
    }
    this.cache.set(key, vector);
  }

  clear(): void {
    const previousSize = this.cache.size;
    this.cache.clear();
    logInfo('Embedding cache cleared', { entries_removed: previousSize });
  }

  getStats(): CacheStats {
    return {
      enabled: this.config.enabled,
      size: this.cache.size,
      maxSize: this.config.maxEntries,
      hits: this.hits,
      misses: this.misses,
      hitRate: `${this.getHitRate()}%`,
      ttlMs: this.config.ttlMs,
    };
  }

  resetStats(): void {
    this.hits = 0;
    this.misses = 0;
  }

  private getHitRate(): string {
    const total = this.hits + this.misses;
    if (total === 0) return '0.0';
    return ((this.hits / total) * 100).toFixed(1);
  }
}
