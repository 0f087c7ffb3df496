/**
 * @fileoverview Readable text from an HTML page
 * @module lib/scraping/page-text
 */

import * as cheerio from "cheerio"
import { hasChildren, isText, type AnyNode } from "domhandler"
import { fetchHtml as defaultFetchHtml, RULE_SOURCE_TIMEOUT_MS, type HtmlFetcher } from "./http"

const NON_CONTENT_TAGS = "script, style, header, footer, nav, aside"

function collectText(nodes: AnyNode[], pieces: string[]): void {
  for (const node of nodes) {
    if (isText(node)) {
      pieces.push(node.data)
    } else if (hasChildren(node)) {
      collectText(node.children, pieces)
    }
  }
}

/**
 * Strip page chrome and return the document text. Text nodes are joined with
 * newlines in document order, runs of blank lines collapse to one, and the
 * result is trimmed.
 */
export function extractPageText(html: string): string {
  const $ = cheerio.load(html)
  $(NON_CONTENT_TAGS).remove()

  const pieces: string[] = []
  collectText($.root().toArray(), pieces)

  return pieces
    .join("\n")
    .replace(/\n\s*\n+/g, "\n\n")
    .trim()
}

/**
 * Fetch a page and extract its text. Errors propagate.
 */
export async function scrapePageText(
  url: string,
  fetchHtml: HtmlFetcher = (target) => defaultFetchHtml(target, { timeoutMs: RULE_SOURCE_TIMEOUT_MS })
): Promise<string> {
  return extractPageText(await fetchHtml(url))
}
