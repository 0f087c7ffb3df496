/**
 * @fileoverview Cache Utilities Barrel Export
 *
 * @module lib/cache
 */

export {
  EmbeddingCache,
  getCacheKey,
  type CachedEmbedding,
  type EmbeddingCacheOptions,
  type EmbeddingInputType,
} from "./embedding-cache"
