export { RuleVectorStore, EMBEDDING_BATCH_SIZE, type RuleVectorStoreOptions } from './vector-store'
export { ensureRuleIndex, toRuleChunks, type EnsureRuleIndexInput } from './ingest'
export { retrieveRules, DEFAULT_TOP_K } from './retrieve'
export type { RuleChunk, RuleMatch, RuleIndexStatus } from './types'
