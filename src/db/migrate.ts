/**
 * @fileoverview Schema bootstrap
 *
 * The rule store is a local embedded database, so tables are created in place
 * on open rather than through a migration runner. Statements are idempotent.
 *
 * @module db/migrate
 */

import { sql } from "drizzle-orm"
import type { Database } from "./client"
import { RULE_EMBEDDING_DIMENSIONS } from "./schema"

export async function ensureSchema(db: Database): Promise<void> {
  await db.execute(sql`CREATE EXTENSION IF NOT EXISTS vector`)

  await db.execute(sql`
    CREATE TABLE IF NOT EXISTS rule_collections (
      name TEXT PRIMARY KEY,
      source_url TEXT,
      created_at TIMESTAMPTZ NOT NULL DEFAULT now()
    )
  `)

  await db.execute(
    sql.raw(`
    CREATE TABLE IF NOT EXISTS rule_chunks (
      collection TEXT NOT NULL REFERENCES rule_collections(name) ON DELETE CASCADE,
      id TEXT NOT NULL,
      position INTEGER NOT NULL,
      content TEXT NOT NULL,
      embedding vector(${RULE_EMBEDDING_DIMENSIONS}) NOT NULL,
      created_at TIMESTAMPTZ NOT NULL DEFAULT now(),
      PRIMARY KEY (collection, id)
    )
  `)
  )

  await db.execute(
    sql`CREATE INDEX IF NOT EXISTS idx_rule_chunks_collection ON rule_chunks (collection)`
  )
}
