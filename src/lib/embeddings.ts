/**
 * @fileoverview Voyage AI Embeddings Client
 *
 * Client for generating legal-specific embeddings using Voyage AI's
 * voyage-law-2 model with built-in caching. Rule chunks are embedded as
 * `document` inputs and the reviewed document text as a `query`.
 *
 * @module lib/embeddings
 */

import { z } from "zod"
import { EmbeddingFailedError } from "./errors"
import { EmbeddingCache, type EmbeddingInputType } from "./cache"

/**
 * Voyage AI configuration.
 */
export const VOYAGE_CONFIG = {
  model: "voyage-law-2",
  dimensions: 1024,
  maxInputTokens: 16_000,
  batchLimit: 128,
  baseUrl: "https://api.voyageai.com/v1",
} as const

/**
 * Batch embedding result.
 */
export interface BatchEmbeddingResult {
  embeddings: number[][]
  totalTokens: number
  cacheHits: number
}

/**
 * Anything that turns text into fixed-dimension vectors. The rule store only
 * depends on this, so tests can pass a deterministic fake.
 */
export interface EmbeddingClient {
  readonly dimensions: number
  readonly batchLimit: number
  embedBatch(texts: string[], inputType?: EmbeddingInputType): Promise<BatchEmbeddingResult>
}

/**
 * Voyage AI API response schema.
 */
const voyageResponseSchema = z.object({
  object: z.literal("list"),
  data: z.array(
    z.object({
      object: z.literal("embedding"),
      index: z.number(),
      embedding: z.array(z.number()),
    })
  ),
  model: z.string(),
  usage: z.object({
    total_tokens: z.number(),
  }),
})

export interface VoyageAIClientOptions {
  apiKey: string
  baseUrl?: string
  cache?: EmbeddingCache
}

/**
 * Voyage AI client class.
 */
export class VoyageAIClient implements EmbeddingClient {
  readonly dimensions = VOYAGE_CONFIG.dimensions
  readonly batchLimit = VOYAGE_CONFIG.batchLimit

  private readonly apiKey: string
  private readonly baseUrl: string
  private readonly cache: EmbeddingCache

  constructor(options: VoyageAIClientOptions) {
    if (!options.apiKey) {
      throw new EmbeddingFailedError("VOYAGE_API_KEY is required")
    }
    this.apiKey = options.apiKey
    this.baseUrl = options.baseUrl ?? VOYAGE_CONFIG.baseUrl
    this.cache = options.cache ?? new EmbeddingCache()
  }

  /**
   * Generate embeddings for multiple texts with caching.
   */
  async embedBatch(
    texts: string[],
    inputType: EmbeddingInputType = "document"
  ): Promise<BatchEmbeddingResult> {
    if (texts.length === 0) {
      return { embeddings: [], totalTokens: 0, cacheHits: 0 }
    }

    if (texts.length > this.batchLimit) {
      throw new EmbeddingFailedError(
        `Batch size ${texts.length} exceeds limit ${this.batchLimit}`
      )
    }

    const cached = this.cache.getMany(texts, inputType)
    const cacheHits = cached.size

    // Uncached texts, in original order
    const uncachedTexts = texts.filter((_, i) => !cached.has(i))

    let fresh: number[][] = []
    let freshTokens = 0
    if (uncachedTexts.length > 0) {
      const response = await this.request(uncachedTexts, inputType)
      fresh = response.embeddings
      freshTokens = response.totalTokens

      const tokensPerText = Math.floor(freshTokens / uncachedTexts.length)
      uncachedTexts.forEach((text, i) => {
        this.cache.set(text, inputType, fresh[i], tokensPerText)
      })
    }

    // Merge cached and new embeddings in original order
    const embeddings: number[][] = []
    let cachedTokens = 0
    let freshIdx = 0
    for (let i = 0; i < texts.length; i++) {
      const cachedEntry = cached.get(i)
      if (cachedEntry) {
        embeddings.push(cachedEntry.embedding)
        cachedTokens += cachedEntry.tokens
      } else {
        embeddings.push(fresh[freshIdx])
        freshIdx++
      }
    }

    return {
      embeddings,
      totalTokens: freshTokens + cachedTokens,
      cacheHits,
    }
  }

  private async request(
    input: string[],
    inputType: EmbeddingInputType
  ): Promise<{ embeddings: number[][]; totalTokens: number }> {
    const response = await fetch(`${this.baseUrl}/embeddings`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify({
        model: VOYAGE_CONFIG.model,
        input,
        input_type: inputType,
      }),
    })

    if (!response.ok) {
      const error = await response.text()
      throw new EmbeddingFailedError(`Voyage AI API error (${response.status}): ${error}`)
    }

    const parsed = voyageResponseSchema.safeParse(await response.json())
    if (!parsed.success) {
      throw new EmbeddingFailedError("Voyage AI returned an unexpected response shape")
    }
    if (parsed.data.data.length !== input.length) {
      throw new EmbeddingFailedError(
        `Voyage AI returned ${parsed.data.data.length} embeddings for ${input.length} inputs`
      )
    }

    // Sort by index to match input order
    const sorted = [...parsed.data.data].sort((a, b) => a.index - b.index)
    return {
      embeddings: sorted.map((d) => d.embedding),
      totalTokens: parsed.data.usage.total_tokens,
    }
  }
}
