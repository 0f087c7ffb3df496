/**
 * @fileoverview Rule vector store
 *
 * A named collection of rule chunks backed by Postgres + pgvector. Texts are
 * embedded on the way in (as documents) and on the way out (as queries), so
 * callers only deal in text.
 *
 * @module rules/vector-store
 */

import type { Database } from '@/db/client'
import {
  countRuleChunks,
  ensureRuleCollection,
  findNearestRuleChunks,
  insertRuleChunks,
  type NewRuleChunk,
} from '@/db/queries/rule-chunks'
import type { EmbeddingClient } from '@/lib/embeddings'
import { EmbeddingFailedError } from '@/lib/errors'
import type { RuleChunk, RuleMatch } from './types'

/** Chunks embedded per request during ingestion */
export const EMBEDDING_BATCH_SIZE = 50

export interface RuleVectorStoreOptions {
  db: Database
  embeddings: EmbeddingClient
  collection: string
  batchSize?: number
}

export class RuleVectorStore {
  readonly collection: string
  private readonly db: Database
  private readonly embeddings: EmbeddingClient
  private readonly batchSize: number

  constructor(options: RuleVectorStoreOptions) {
    this.db = options.db
    this.embeddings = options.embeddings
    this.collection = options.collection
    this.batchSize = Math.min(options.batchSize ?? EMBEDDING_BATCH_SIZE, options.embeddings.batchLimit)
  }

  async getOrCreateCollection(sourceUrl?: string): Promise<void> {
    await ensureRuleCollection(this.db, this.collection, sourceUrl)
  }

  async count(): Promise<number> {
    return countRuleChunks(this.db, this.collection)
  }

  /**
   * Embed every chunk, batch by batch, then insert them all at once. Nothing
   * is stored when any batch fails. Returns embedding tokens used.
   */
  async add(chunks: RuleChunk[]): Promise<{ added: number; tokens: number }> {
    let tokens = 0
    const startPosition = await this.count()
    const rows: NewRuleChunk[] = []

    for (let start = 0; start < chunks.length; start += this.batchSize) {
      const batch = chunks.slice(start, start + this.batchSize)
      const result = await this.embeddings.embedBatch(
        batch.map((chunk) => chunk.text),
        'document'
      )
      if (result.embeddings.length !== batch.length) {
        throw new EmbeddingFailedError(
          `Expected ${batch.length} embeddings, received ${result.embeddings.length}`
        )
      }
      tokens += result.totalTokens

      batch.forEach((chunk, i) => {
        rows.push({
          id: chunk.id,
          position: startPosition + start + i,
          content: chunk.text,
          embedding: result.embeddings[i],
        })
      })
    }

    await insertRuleChunks(this.db, this.collection, rows)
    return { added: chunks.length, tokens }
  }

  /**
   * The `k` chunks nearest to `text`, closest first.
   */
  async query(text: string, k: number): Promise<RuleMatch[]> {
    const { embeddings } = await this.embeddings.embedBatch([text], 'query')
    if (embeddings.length !== 1) {
      throw new EmbeddingFailedError('Query embedding missing from response')
    }

    const rows = await findNearestRuleChunks(this.db, this.collection, embeddings[0], k)
    return rows.map((row) => ({ id: row.id, text: row.content, similarity: row.similarity }))
  }
}
