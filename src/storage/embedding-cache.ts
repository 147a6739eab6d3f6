/**
 * Embedding cache for content-hash based caching.
 * Skips re-embedding unchanged content by caching dense vectors keyed by
 * content hash and model configuration.
 */

import { createHash } from 'node:crypto';
import type { Db } from './db.js';
import { serializeEmbedding, deserializeEmbedding } from '../utils/embedding-utils.js';

/** Maximum cache entries before eviction (~1.2GB for 3072-dim embeddings) */
const DEFAULT_MAX_ENTRIES = 100_000;

/** Extra entries to evict to avoid frequent evictions (at most 1% of capacity) */
const EVICTION_BUFFER = 1_000;

/**
 * Compute a SHA-256 hash of content for cache lookup.
 */
export function computeContentHash(content: string): string {
  return createHash('sha256').update(content).digest('hex');
}

/**
 * Cache key for a model configuration. Vectors from different dimensions
 * of the same model are never interchangeable.
 */
export function cacheModelKey(model: string, dimensions: number): string {
  return `${model}@${dimensions}`;
}

export interface CacheStats {
  entryCount: number;
  totalHits: number;
  avgHitCount: number;
}

/**
 * SQLite-backed dense embedding cache.
 */
export class EmbeddingCache {
  constructor(
    private readonly db: Db,
    private readonly maxEntries: number = DEFAULT_MAX_ENTRIES,
  ) {}

  /**
   * Get a cached embedding. Returns null if not found; bumps the hit count on a hit.
   */
  get(content: string, modelKey: string): number[] | null {
    const contentHash = computeContentHash(content);
    const row = this.db
      .prepare(
        `
      SELECT embedding FROM embedding_cache
      WHERE content_hash = ? AND model_id = ?
    `,
      )
      .get(contentHash, modelKey) as { embedding: Buffer } | undefined;

    if (!row) return null;

    this.db
      .prepare(
        `
      UPDATE embedding_cache SET hit_count = hit_count + 1
      WHERE content_hash = ? AND model_id = ?
    `,
      )
      .run(contentHash, modelKey);

    return deserializeEmbedding(row.embedding);
  }

  /**
   * Cache an embedding, then evict the oldest entries if over capacity.
   */
  set(content: string, modelKey: string, embedding: readonly number[]): void {
    this.db
      .prepare(
        `
      INSERT OR REPLACE INTO embedding_cache
      (content_hash, model_id, embedding, created_at, hit_count)
      VALUES (?, ?, ?, ?, 0)
    `,
      )
      .run(computeContentHash(content), modelKey, serializeEmbedding(embedding), new Date().toISOString());

    this.evictOldestIfNeeded();
  }

  /**
   * Evict oldest cache entries if the cache exceeds its maximum size.
   */
  evictOldestIfNeeded(): number {
    const { count } = this.db.prepare('SELECT COUNT(*) as count FROM embedding_cache').get() as {
      count: number;
    };

    if (count <= this.maxEntries) {
      return 0;
    }

    const toEvict = count - this.maxEntries + Math.min(EVICTION_BUFFER, Math.floor(this.maxEntries / 100));
    return this.db
      .prepare(
        `
      DELETE FROM embedding_cache WHERE rowid IN (
        SELECT rowid FROM embedding_cache
        ORDER BY created_at ASC, rowid ASC
        LIMIT ?
      )
    `,
      )
      .run(toEvict).changes;
  }

  stats(): CacheStats {
    const result = this.db
      .prepare(
        `
      SELECT COUNT(*) as count, COALESCE(SUM(hit_count), 0) as total_hits, COALESCE(AVG(hit_count), 0) as avg_hits
      FROM embedding_cache
    `,
      )
      .get() as { count: number; total_hits: number; avg_hits: number };

    return {
      entryCount: result.count,
      totalHits: result.total_hits,
      avgHitCount: result.avg_hits,
    };
  }

  /**
   * Clear the cache, or only the entries of one model key.
   */
  clear(modelKey?: string): void {
    if (modelKey) {
      this.db.prepare('DELETE FROM embedding_cache WHERE model_id = ?').run(modelKey);
    } else {
      this.db.prepare('DELETE FROM embedding_cache').run();
    }
  }
}
