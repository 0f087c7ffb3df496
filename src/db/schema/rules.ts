// src/db/schema/rules.ts
// Regulatory rule chunks and their embeddings, grouped into named collections
import { pgTable, text, integer, index, primaryKey, vector } from "drizzle-orm/pg-core"
import { createdAt } from "../_columns"

/** Embedding width stored in `rule_chunks.embedding` (voyage-law-2) */
export const RULE_EMBEDDING_DIMENSIONS = 1024

/**
 * Named rule collections. A collection is populated once and never updated.
 */
export const ruleCollections = pgTable("rule_collections", {
  name: text("name").primaryKey(),
  sourceUrl: text("source_url"),
  ...createdAt,
})

/**
 * Fixed-size word windows of the rulebook with their embeddings.
 * `id` is `rule_<position>` and unique within a collection.
 */
export const ruleChunks = pgTable(
  "rule_chunks",
  {
    collection: text("collection")
      .notNull()
      .references(() => ruleCollections.name, { onDelete: "cascade" }),
    id: text("id").notNull(),
    position: integer("position").notNull(),
    content: text("content").notNull(),
    embedding: vector("embedding", { dimensions: RULE_EMBEDDING_DIMENSIONS }).notNull(),
    ...createdAt,
  },
  (table) => [
    primaryKey({ columns: [table.collection, table.id] }),
    index("idx_rule_chunks_collection").on(table.collection),
  ]
)
