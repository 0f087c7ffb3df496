/**
 * @fileoverview HTTP helpers for scraping
 *
 * Thin wrappers over global fetch with a per-request timeout. Non-2xx
 * responses and network failures both surface as ScrapeFailedError.
 *
 * @module lib/scraping/http
 */

import { ScrapeFailedError } from "@/lib/errors"

/** Per-request timeout for crawl and checklist downloads */
export const CRAWL_TIMEOUT_MS = 15_000

/** Per-request timeout for the rulebook page */
export const RULE_SOURCE_TIMEOUT_MS = 60_000

const USER_AGENT = "compliance-review/0.1 (+document checklist crawler)"

export type HtmlFetcher = (url: string) => Promise<string>
export type BinaryFetcher = (url: string) => Promise<Buffer>

export interface FetchOptions {
  timeoutMs?: number
}

async function request(url: string, accept: string, timeoutMs: number): Promise<Response> {
  let response: Response
  try {
    response = await fetch(url, {
      headers: { "User-Agent": USER_AGENT, Accept: accept },
      redirect: "follow",
      signal: AbortSignal.timeout(timeoutMs),
    })
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new ScrapeFailedError(url, `Request to ${url} failed: ${reason}`)
  }

  if (!response.ok) {
    throw new ScrapeFailedError(url, `HTTP ${response.status} fetching ${url}`)
  }
  return response
}

export async function fetchHtml(url: string, options: FetchOptions = {}): Promise<string> {
  const response = await request(
    url,
    "text/html,application/xhtml+xml;q=0.9,*/*;q=0.8",
    options.timeoutMs ?? CRAWL_TIMEOUT_MS
  )
  return response.text()
}

export async function fetchBinary(url: string, options: FetchOptions = {}): Promise<Buffer> {
  const response = await request(url, "*/*", options.timeoutMs ?? CRAWL_TIMEOUT_MS)
  return Buffer.from(await response.arrayBuffer())
}
