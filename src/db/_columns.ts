/**
 * @fileoverview Reusable column helpers for Drizzle schema composition.
 *
 * @example
 * export const ruleCollections = pgTable("rule_collections", {
 *   name: text("name").primaryKey(),
 *   ...createdAt,
 * })
 *
 * @module db/_columns
 */

import { timestamp } from "drizzle-orm/pg-core"

/**
 * Insert timestamp. Rule data is append-only, so there is no `updatedAt`.
 */
export const createdAt = {
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
}
