/**
 * @fileoverview Document-link crawler
 *
 * Level-order traversal from a start page, restricted to the start host,
 * collecting links that end in a document extension. Each page is fetched at
 * most once and nothing deeper than `maxDepth` is fetched. A page that fails
 * to load is logged and contributes no links.
 *
 * @module lib/scraping/crawler
 */

import { fetchHtml as defaultFetchHtml, type HtmlFetcher } from "./http"
import {
  dedupeByUrl,
  extractAnchors,
  hasDocumentExtension,
  linkTitle,
  resolveLink,
  withoutFragment,
} from "./document-links"
import type { CandidateDocument } from "./types"

export const DEFAULT_CRAWL_DEPTH = 2

export interface CrawlOptions {
  /** Maximum link distance from the start page (default 2) */
  maxDepth?: number
  fetchHtml?: HtmlFetcher
}

interface QueueEntry {
  url: string
  depth: number
}

/**
 * Crawl `startUrl` breadth-first and return the document links found,
 * deduplicated by URL.
 */
export async function crawlDocumentLinks(
  startUrl: string,
  options: CrawlOptions = {}
): Promise<CandidateDocument[]> {
  const { maxDepth = DEFAULT_CRAWL_DEPTH, fetchHtml = defaultFetchHtml } = options
  const startHost = new URL(startUrl).host

  // Same form as discovered links, so `https://host` and `https://host/` are one page
  const start = withoutFragment(new URL(startUrl).toString())
  const queue: QueueEntry[] = [{ url: start, depth: 0 }]
  // Every URL ever queued; a page is never queued twice
  const seen = new Set<string>([start])
  const found: CandidateDocument[] = []

  for (let head = 0; head < queue.length; head++) {
    const { url, depth } = queue[head]

    let html: string
    try {
      html = await fetchHtml(url)
    } catch (error) {
      console.warn("[Crawler] Page fetch failed", {
        url,
        depth,
        error: error instanceof Error ? error.message : String(error),
      })
      continue
    }

    for (const anchor of extractAnchors(html)) {
      const link = resolveLink(anchor.href, url)
      if (!link) continue

      if (hasDocumentExtension(link)) {
        found.push({ title: linkTitle(anchor.text, link), url: link })
        continue
      }

      const page = withoutFragment(link)
      if (depth + 1 > maxDepth || seen.has(page)) continue
      if (!new URL(page).host.includes(startHost)) continue

      seen.add(page)
      queue.push({ url: page, depth: depth + 1 })
    }
  }

  return dedupeByUrl(found)
}

/**
 * Scrape a single page for document links. Any failure yields an empty list.
 */
export async function scrapeDocumentLinks(
  url: string,
  options: Pick<CrawlOptions, "fetchHtml"> = {}
): Promise<CandidateDocument[]> {
  const { fetchHtml = defaultFetchHtml } = options

  let html: string
  try {
    html = await fetchHtml(url)
  } catch (error) {
    console.warn("[Crawler] Page fetch failed", {
      url,
      error: error instanceof Error ? error.message : String(error),
    })
    return []
  }

  const found: CandidateDocument[] = []
  for (const anchor of extractAnchors(html)) {
    if (!hasDocumentExtension(anchor.href.trim())) continue
    const link = resolveLink(anchor.href, url)
    if (link) {
      found.push({ title: linkTitle(anchor.text, link), url: link })
    }
  }
  return found
}
