/**
 * @fileoverview Word-window chunking for rule ingestion.
 *
 * Splits text on whitespace and emits fixed-size windows of words, each
 * starting `size - overlap` words after the previous one. The last windows
 * may be shorter than `size`. Output depends only on the input text and the
 * two parameters.
 *
 * @module lib/document-chunking/word-chunker
 */

import { ValidationError } from "@/lib/errors"

export const DEFAULT_CHUNK_SIZE = 500
export const DEFAULT_CHUNK_OVERLAP = 50

export interface WordChunkOptions {
  /** Words per chunk (default 500) */
  size?: number
  /** Words shared with the previous chunk (default 50) */
  overlap?: number
}

export interface WordChunk {
  index: number
  /** Index of the first word in the source text */
  startWord: number
  wordCount: number
  text: string
}

/**
 * @throws ValidationError - size not a positive integer, or overlap outside [0, size)
 */
export function chunkWords(text: string, options: WordChunkOptions = {}): WordChunk[] {
  const { size = DEFAULT_CHUNK_SIZE, overlap = DEFAULT_CHUNK_OVERLAP } = options

  if (!Number.isInteger(size) || size <= 0) {
    throw new ValidationError("Invalid chunk size", [
      { field: "size", message: "Must be a positive integer" },
    ])
  }
  if (!Number.isInteger(overlap) || overlap < 0 || overlap >= size) {
    throw new ValidationError("Invalid chunk overlap", [
      { field: "overlap", message: "Must be a non-negative integer smaller than size" },
    ])
  }

  const words = text.split(/\s+/).filter((word) => word.length > 0)
  const step = size - overlap
  const chunks: WordChunk[] = []

  for (let start = 0; start < words.length; start += step) {
    const window = words.slice(start, start + size)
    chunks.push({
      index: chunks.length,
      startWord: start,
      wordCount: window.length,
      text: window.join(" "),
    })
  }

  return chunks
}
