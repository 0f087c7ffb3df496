/**
 * @fileoverview Rule chunk data access
 *
 * Nearest-neighbour lookups order by pgvector cosine distance
 * (`<=>`, 0 = identical) and report `similarity = 1 - distance`.
 *
 * @module db/queries/rule-chunks
 */

import { asc, cosineDistance, count, eq, sql } from "drizzle-orm"
import type { Database } from "../client"
import { ruleChunks, ruleCollections } from "../schema"

export interface NewRuleChunk {
  id: string
  position: number
  content: string
  embedding: number[]
}

export interface RuleChunkMatch {
  id: string
  content: string
  similarity: number
}

/**
 * Create the collection row if it does not exist yet.
 */
export async function ensureRuleCollection(
  db: Database,
  name: string,
  sourceUrl?: string
): Promise<void> {
  await db
    .insert(ruleCollections)
    .values({ name, sourceUrl: sourceUrl ?? null })
    .onConflictDoNothing({ target: ruleCollections.name })
}

export async function countRuleChunks(db: Database, collection: string): Promise<number> {
  const [row] = await db
    .select({ value: count() })
    .from(ruleChunks)
    .where(eq(ruleChunks.collection, collection))
  return row?.value ?? 0
}

/** Rows per INSERT statement */
export const INSERT_BATCH_SIZE = 100

/**
 * Insert every chunk in a single transaction. Either all rows land or none
 * do, so a non-empty collection is always a complete one.
 */
export async function insertRuleChunks(
  db: Database,
  collection: string,
  chunks: NewRuleChunk[]
): Promise<void> {
  if (chunks.length === 0) return
  await db.transaction(async (tx) => {
    for (let start = 0; start < chunks.length; start += INSERT_BATCH_SIZE) {
      const batch = chunks.slice(start, start + INSERT_BATCH_SIZE)
      await tx.insert(ruleChunks).values(batch.map((chunk) => ({ ...chunk, collection })))
    }
  })
}

export async function findNearestRuleChunks(
  db: Database,
  collection: string,
  embedding: number[],
  limit: number
): Promise<RuleChunkMatch[]> {
  const distance = cosineDistance(ruleChunks.embedding, embedding)

  const rows = await db
    .select({
      id: ruleChunks.id,
      content: ruleChunks.content,
      similarity: sql<number>`1 - (${distance})`,
    })
    .from(ruleChunks)
    .where(eq(ruleChunks.collection, collection))
    .orderBy(asc(distance), asc(ruleChunks.position))
    .limit(limit)

  return rows.map((row) => ({ ...row, similarity: Number(row.similarity) }))
}
