/**
 * @fileoverview Rule index ingestion
 *
 * Idempotent: a collection that already holds any chunk is left untouched,
 * with no scrape and no embedding calls. Otherwise the rulebook page is
 * scraped, split into overlapping word windows, embedded in batches and
 * stored as `rule_0`, `rule_1`, ...
 *
 * @module rules/ingest
 */

import { chunkWords, DEFAULT_CHUNK_OVERLAP, DEFAULT_CHUNK_SIZE } from '@/lib/document-chunking/word-chunker'
import { ScrapeFailedError } from '@/lib/errors'
import { logger } from '@/lib/logger'
import { scrapePageText as defaultScrapePageText } from '@/lib/scraping'
import type { RuleChunk, RuleIndexStatus } from './types'
import type { RuleVectorStore } from './vector-store'

export interface EnsureRuleIndexInput {
  store: RuleVectorStore
  sourceUrl: string
  scrapePageText?: (url: string) => Promise<string>
  chunkSize?: number
  chunkOverlap?: number
}

export function toRuleChunks(text: string, size: number, overlap: number): RuleChunk[] {
  return chunkWords(text, { size, overlap }).map((chunk) => ({
    id: `rule_${chunk.index}`,
    text: chunk.text,
  }))
}

export async function ensureRuleIndex(input: EnsureRuleIndexInput): Promise<RuleIndexStatus> {
  const {
    store,
    sourceUrl,
    scrapePageText = defaultScrapePageText,
    chunkSize = DEFAULT_CHUNK_SIZE,
    chunkOverlap = DEFAULT_CHUNK_OVERLAP,
  } = input

  await store.getOrCreateCollection(sourceUrl)

  const existing = await store.count()
  if (existing > 0) {
    logger.info('Rule index already populated', { collection: store.collection, count: existing })
    return { status: 'skipped', count: existing }
  }

  const text = await scrapePageText(sourceUrl)
  const chunks = toRuleChunks(text, chunkSize, chunkOverlap)
  if (chunks.length === 0) {
    throw new ScrapeFailedError(sourceUrl, `Rule source ${sourceUrl} contained no text`)
  }

  const { tokens } = await store.add(chunks)
  const count = await store.count()

  logger.info('Rule index built', {
    collection: store.collection,
    sourceUrl,
    chunks: chunks.length,
    tokens,
  })

  return { status: 'ingested', count, chunks: chunks.length, tokens }
}
