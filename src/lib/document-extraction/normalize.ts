/**
 * Split raw extractor output into trimmed, non-blank paragraphs.
 */
export function toParagraphs(raw: string): string[] {
  return raw
    .normalize('NFC')
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
}

/**
 * Collapse every whitespace run to a single space.
 */
export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim()
}
