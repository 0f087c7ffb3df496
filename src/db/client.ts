/**
 * Embedded Postgres client for the rule store.
 *
 * PGlite runs Postgres in-process (WASM) with the pgvector extension, so the
 * rule index persists in a plain directory and needs no server. Omitting
 * `dataDir` gives an in-memory database, which is what the tests use.
 *
 * @module db/client
 */

import { PGlite } from "@electric-sql/pglite"
import { vector } from "@electric-sql/pglite/vector"
import { drizzle } from "drizzle-orm/pglite"
import * as schema from "./schema"
import { ensureSchema } from "./migrate"

function connect(client: PGlite) {
  return drizzle(client, { schema })
}

/**
 * Drizzle client type for the rule store. Pass this into query functions
 * instead of importing a module-level instance.
 */
export type Database = ReturnType<typeof connect>

export interface RuleDatabase {
  db: Database
  close: () => Promise<void>
}

/**
 * Open (or create) the rule store and make sure its tables exist.
 *
 * @example
 * ```typescript
 * const { db, close } = await openRuleDatabase(".data/rules-db")
 * try {
 *   await countRuleChunks(db, "regulatory_rules")
 * } finally {
 *   await close()
 * }
 * ```
 */
export async function openRuleDatabase(dataDir?: string): Promise<RuleDatabase> {
  const client = new PGlite({ dataDir, extensions: { vector } })
  const db = connect(client)
  await ensureSchema(db)

  return {
    db,
    close: () => client.close(),
  }
}
