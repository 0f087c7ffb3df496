/**
 * @fileoverview Rule store type definitions
 * @module rules/types
 */

/** A stored slice of the rulebook; immutable once written */
export interface RuleChunk {
  /** `rule_<n>`, sequential from 0 */
  id: string
  text: string
}

export interface RuleMatch {
  id: string
  text: string
  similarity: number
}

export type RuleIndexStatus =
  | { status: 'skipped'; count: number }
  | { status: 'ingested'; count: number; chunks: number; tokens: number }
