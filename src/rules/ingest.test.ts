import { describe, it, expect, vi, beforeAll, beforeEach, afterAll } from 'vitest'
import { openRuleDatabase, type RuleDatabase } from '@/db/client'
import { ruleChunks, ruleCollections } from '@/db/schema'
import { ScrapeFailedError } from '@/lib/errors'
import { FakeEmbeddingClient } from '@/test/fake-embeddings'
import { ensureRuleIndex, toRuleChunks } from './ingest'
import { RuleVectorStore } from './vector-store'

const SOURCE_URL = 'https://rules.test/rulebook'

const RULEBOOK = 'one two three four five six seven eight nine ten eleven twelve'

describe('toRuleChunks', () => {
  it('numbers overlapping windows sequentially', () => {
    expect(toRuleChunks(RULEBOOK, 5, 1)).toEqual([
      { id: 'rule_0', text: 'one two three four five' },
      { id: 'rule_1', text: 'five six seven eight nine' },
      { id: 'rule_2', text: 'nine ten eleven twelve' },
    ])
  })

  it('returns nothing for blank text', () => {
    expect(toRuleChunks('  \n ', 5, 1)).toEqual([])
  })
})

describe('ensureRuleIndex', () => {
  let database: RuleDatabase
  let embeddings: FakeEmbeddingClient
  let store: RuleVectorStore

  beforeAll(async () => {
    database = await openRuleDatabase()
  })

  afterAll(async () => {
    await database.close()
  })

  beforeEach(async () => {
    await database.db.delete(ruleChunks)
    await database.db.delete(ruleCollections)
    embeddings = new FakeEmbeddingClient(['one', 'five', 'nine'])
    store = new RuleVectorStore({ db: database.db, embeddings, collection: 'regulatory_rules' })
  })

  it('scrapes, chunks and stores an empty collection', async () => {
    const scrapePageText = vi.fn().mockResolvedValue(RULEBOOK)

    const status = await ensureRuleIndex({
      store,
      sourceUrl: SOURCE_URL,
      scrapePageText,
      chunkSize: 5,
      chunkOverlap: 1,
    })

    expect(scrapePageText).toHaveBeenCalledWith(SOURCE_URL)
    expect(status).toEqual({ status: 'ingested', count: 3, chunks: 3, tokens: 3 })
    expect(await store.count()).toBe(3)

    const [nearest] = await store.query('five nine', 1)
    expect(nearest.id).toBe('rule_1')
  })

  it('skips a populated collection without scraping or embedding', async () => {
    await store.getOrCreateCollection(SOURCE_URL)
    await store.add([{ id: 'rule_0', text: 'existing rule' }])
    embeddings.calls.length = 0
    const scrapePageText = vi.fn()

    const status = await ensureRuleIndex({ store, sourceUrl: SOURCE_URL, scrapePageText })

    expect(status).toEqual({ status: 'skipped', count: 1 })
    expect(scrapePageText).not.toHaveBeenCalled()
    expect(embeddings.calls).toEqual([])
  })

  it('is idempotent across runs', async () => {
    const scrapePageText = vi.fn().mockResolvedValue(RULEBOOK)

    await ensureRuleIndex({ store, sourceUrl: SOURCE_URL, scrapePageText, chunkSize: 5, chunkOverlap: 1 })
    const second = await ensureRuleIndex({ store, sourceUrl: SOURCE_URL, scrapePageText })

    expect(second).toEqual({ status: 'skipped', count: 3 })
    expect(scrapePageText).toHaveBeenCalledTimes(1)
  })

  it('embeds in batches of 50', async () => {
    const words = Array.from({ length: 120 }, (_, i) => `w${i}`).join(' ')

    await ensureRuleIndex({
      store,
      sourceUrl: SOURCE_URL,
      scrapePageText: vi.fn().mockResolvedValue(words),
      chunkSize: 1,
      chunkOverlap: 0,
    })

    expect(embeddings.calls.map((call) => call.texts.length)).toEqual([50, 50, 20])
    expect(await store.count()).toBe(120)
  })

  it('stores nothing when embedding fails partway and rebuilds on the next run', async () => {
    const words = Array.from({ length: 120 }, (_, i) => `w${i}`).join(' ')
    const scrapePageText = vi.fn().mockResolvedValue(words)
    const failing = new RuleVectorStore({
      db: database.db,
      embeddings: new FakeEmbeddingClient([], { failOnCall: 2 }),
      collection: 'regulatory_rules',
    })

    await expect(
      ensureRuleIndex({ store: failing, sourceUrl: SOURCE_URL, scrapePageText, chunkSize: 1, chunkOverlap: 0 })
    ).rejects.toThrow('Embedding service unavailable')
    expect(await store.count()).toBe(0)

    const retry = await ensureRuleIndex({
      store,
      sourceUrl: SOURCE_URL,
      scrapePageText,
      chunkSize: 1,
      chunkOverlap: 0,
    })

    expect(retry).toEqual({ status: 'ingested', count: 120, chunks: 120, tokens: 120 })
    expect(scrapePageText).toHaveBeenCalledTimes(2)
  })

  it('fails when the source has no text', async () => {
    const promise = ensureRuleIndex({
      store,
      sourceUrl: SOURCE_URL,
      scrapePageText: vi.fn().mockResolvedValue(''),
    })

    await expect(promise).rejects.toBeInstanceOf(ScrapeFailedError)
    await expect(promise).rejects.toThrow(`Rule source ${SOURCE_URL} contained no text`)
    expect(await store.count()).toBe(0)
  })

  it('propagates scrape failures', async () => {
    const scrapePageText = vi.fn().mockRejectedValue(new ScrapeFailedError(SOURCE_URL))

    await expect(ensureRuleIndex({ store, sourceUrl: SOURCE_URL, scrapePageText })).rejects.toThrow(
      `Failed to fetch ${SOURCE_URL}`
    )
    expect(embeddings.calls).toEqual([])
  })
})
