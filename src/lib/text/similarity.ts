/**
 * @fileoverview Gestalt string similarity
 *
 * Ratcliff/Obershelp pattern matching: find the longest common substring,
 * recurse on the unmatched pieces either side, and score
 * `2 * matched / (len(a) + len(b))`. Used to snap free-text model answers
 * onto a closed label vocabulary.
 *
 * @module lib/text/similarity
 */

/** Default minimum ratio for a label to count as a match */
export const DEFAULT_MATCH_CUTOFF = 0.5

export interface ClosestMatch {
  label: string
  ratio: number
}

interface Block {
  i: number
  j: number
  size: number
}

function longestCommonBlock(
  a: string,
  b: string,
  alo: number,
  ahi: number,
  blo: number,
  bhi: number
): Block {
  let best: Block = { i: alo, j: blo, size: 0 }
  // Run length ending at (previous i, j)
  let previous = new Map<number, number>()

  for (let i = alo; i < ahi; i++) {
    const current = new Map<number, number>()
    for (let j = blo; j < bhi; j++) {
      if (a[i] !== b[j]) continue
      const size = (previous.get(j - 1) ?? 0) + 1
      current.set(j, size)
      if (size > best.size) {
        best = { i: i - size + 1, j: j - size + 1, size }
      }
    }
    previous = current
  }

  return best
}

function countMatches(
  a: string,
  b: string,
  alo: number,
  ahi: number,
  blo: number,
  bhi: number
): number {
  const block = longestCommonBlock(a, b, alo, ahi, blo, bhi)
  if (block.size === 0) return 0

  return (
    block.size +
    countMatches(a, b, alo, block.i, blo, block.j) +
    countMatches(a, b, block.i + block.size, ahi, block.j + block.size, bhi)
  )
}

/**
 * Similarity ratio in [0, 1]. Two empty strings are identical.
 */
export function similarityRatio(a: string, b: string): number {
  const total = a.length + b.length
  if (total === 0) return 1
  return (2 * countMatches(a, b, 0, a.length, 0, b.length)) / total
}

/**
 * Best single label for `text`, or null when nothing reaches `cutoff`.
 * Comparison ignores case and surrounding whitespace; ties keep the
 * earlier label.
 */
export function closestMatch(
  text: string,
  labels: readonly string[],
  cutoff = DEFAULT_MATCH_CUTOFF
): ClosestMatch | null {
  const needle = text.trim().toLowerCase()
  let best: ClosestMatch | null = null

  for (const label of labels) {
    const ratio = similarityRatio(label.toLowerCase(), needle)
    if (ratio >= cutoff && (best === null || ratio > best.ratio)) {
      best = { label, ratio }
    }
  }

  return best
}
