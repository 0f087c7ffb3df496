/**
 * @fileoverview Rule retrieval for red-flag detection
 * @module rules/retrieve
 */

import type { RuleVectorStore } from './vector-store'

export const DEFAULT_TOP_K = 5

/**
 * Embed `queryText`, fetch the `topK` nearest rule chunks and join their
 * texts with blank lines, closest first.
 */
export async function retrieveRules(
  store: RuleVectorStore,
  queryText: string,
  options: { topK?: number } = {}
): Promise<string> {
  const matches = await store.query(queryText, options.topK ?? DEFAULT_TOP_K)
  return matches.map((match) => match.text).join('\n\n')
}
