/**
 * @fileoverview Scraping type definitions
 * @module lib/scraping/types
 */

/** A document link discovered on an official site */
export interface CandidateDocument {
  title: string
  url: string
}

export interface Anchor {
  href: string
  text: string
}
