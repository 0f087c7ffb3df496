/**
 * @fileoverview Embedding Cache
 *
 * LRU cache for embeddings to avoid redundant API calls when the same
 * rule chunk or query text is embedded twice in a process.
 * Uses content hash as cache key for deduplication.
 *
 * @module lib/cache/embedding-cache
 */

import { LRUCache } from "lru-cache"
import { createHash } from "crypto"

export type EmbeddingInputType = "document" | "query"

/**
 * Cached embedding entry.
 */
export interface CachedEmbedding {
  embedding: number[]
  tokens: number
  cachedAt: number
}

export interface EmbeddingCacheOptions {
  /** Maximum entries (default 10,000, ~40MB at 1024 dimensions) */
  max?: number
  /** Entry lifetime in ms (default 1 hour) */
  ttl?: number
}

/**
 * Generate cache key from text content.
 * Normalizes whitespace and case for better hit rate.
 */
export function getCacheKey(text: string, inputType: EmbeddingInputType): string {
  const normalized = text.trim().toLowerCase().replace(/\s+/g, " ")
  const hash = createHash("sha256").update(normalized).digest("hex").substring(0, 16)
  return `emb:${inputType}:${hash}`
}

/**
 * Per-client embedding cache. One instance is owned by each embedding client.
 */
export class EmbeddingCache {
  private readonly cache: LRUCache<string, CachedEmbedding>

  constructor(options: EmbeddingCacheOptions = {}) {
    this.cache = new LRUCache<string, CachedEmbedding>({
      max: options.max ?? 10_000,
      ttl: options.ttl ?? 1000 * 60 * 60,
    })
  }

  get(text: string, inputType: EmbeddingInputType): CachedEmbedding | null {
    return this.cache.get(getCacheKey(text, inputType)) ?? null
  }

  set(text: string, inputType: EmbeddingInputType, embedding: number[], tokens: number): void {
    this.cache.set(getCacheKey(text, inputType), {
      embedding,
      tokens,
      cachedAt: Date.now(),
    })
  }

  /**
   * Look up several texts at once.
   * Returns map of index -> cached embedding for hits.
   */
  getMany(texts: string[], inputType: EmbeddingInputType): Map<number, CachedEmbedding> {
    const results = new Map<number, CachedEmbedding>()

    for (let i = 0; i < texts.length; i++) {
      const cached = this.get(texts[i], inputType)
      if (cached) {
        results.set(i, cached)
      }
    }

    return results
  }
}
