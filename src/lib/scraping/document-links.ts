/**
 * @fileoverview Anchor extraction and document-link rules
 * @module lib/scraping/document-links
 */

import * as cheerio from "cheerio"
import { posix } from "node:path"
import type { Anchor } from "./types"

export const DOCUMENT_EXTENSIONS = [".pdf", ".doc", ".docx"] as const

/** True when the (lower-cased) string ends in a document extension */
export function hasDocumentExtension(value: string): boolean {
  const lower = value.toLowerCase()
  return DOCUMENT_EXTENSIONS.some((ext) => lower.endsWith(ext))
}

/** Strip the query string; used for titles and direct-file detection */
export function withoutQuery(url: string): string {
  return url.split("?")[0]
}

/** Last path segment of a URL or file path, ignoring any query string */
export function basenameOf(url: string): string {
  return posix.basename(withoutQuery(url))
}

/**
 * Resolve an href against the page it was found on. Absolute http(s) links
 * pass through; anything that is not http(s) once resolved yields null.
 */
export function resolveLink(href: string, baseUrl: string): string | null {
  const trimmed = href.trim()
  try {
    const resolved = trimmed.startsWith("http") ? new URL(trimmed) : new URL(trimmed, baseUrl)
    if (resolved.protocol !== "http:" && resolved.protocol !== "https:") {
      return null
    }
    return resolved.toString()
  } catch (error) {
    if (error instanceof TypeError) return null
    throw error
  }
}

/** Drop the fragment so `page#a` and `page#b` count as one page */
export function withoutFragment(url: string): string {
  const hash = url.indexOf("#")
  return hash === -1 ? url : url.slice(0, hash)
}

/** Anchor text with whitespace collapsed, or the URL basename */
export function linkTitle(text: string, url: string): string {
  const title = text.replace(/\s+/g, " ").trim()
  return title || basenameOf(url)
}

/** Every `<a href>` on the page, in document order */
export function extractAnchors(html: string): Anchor[] {
  const $ = cheerio.load(html)
  const anchors: Anchor[] = []

  $("a[href]").each((_, element) => {
    const href = $(element).attr("href")
    if (href) {
      anchors.push({ href, text: $(element).text() })
    }
  })

  return anchors
}

/**
 * Deduplicate by URL. The last-seen entry wins, keeping the position where
 * the URL first appeared.
 */
export function dedupeByUrl<T extends { url: string }>(links: T[]): T[] {
  const unique = new Map<string, T>()
  for (const link of links) {
    unique.set(link.url, link)
  }
  return Array.from(unique.values())
}
