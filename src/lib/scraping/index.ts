/**
 * @fileoverview Scraping barrel export
 * @module lib/scraping
 */

export { crawlDocumentLinks, scrapeDocumentLinks, DEFAULT_CRAWL_DEPTH, type CrawlOptions } from "./crawler"
export { extractPageText, scrapePageText } from "./page-text"
export {
  fetchHtml,
  fetchBinary,
  CRAWL_TIMEOUT_MS,
  RULE_SOURCE_TIMEOUT_MS,
  type HtmlFetcher,
  type BinaryFetcher,
} from "./http"
export { basenameOf, hasDocumentExtension, withoutQuery, dedupeByUrl } from "./document-links"
export type { CandidateDocument } from "./types"
