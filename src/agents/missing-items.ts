/**
 * @fileoverview Missing-Item Comparator Agent
 *
 * Compares the checklist text against the uploaded document and lists the
 * required items the document lacks.
 *
 * Two output modes:
 * - `structured` (default): schema-validated `{ summary, missingItems }`
 *   through structured output; a response that does not fit the schema is an
 *   `LlmOutputError`
 * - `text`: free-text answer scanned for a "MISSING DOCUMENTS" section,
 *   one `- item` per line
 *
 * @module agents/missing-items
 */

import { generateText, NoObjectGeneratedError, Output, type LanguageModel } from 'ai'
import { GENERATION_CONFIG } from '@/lib/ai/config'
import type { BudgetTracker } from '@/lib/ai/budget'
import type { ComparatorOutputMode } from '@/lib/config'
import { LlmFailedError, LlmOutputError } from '@/lib/errors'
import {
  createMissingItemsPrompt,
  MISSING_ITEMS_MARKER,
  MISSING_ITEMS_SYSTEM_PROMPT,
  MISSING_ITEMS_TEXT_FORMAT,
} from './prompts'
import { missingItemsSchema, type MissingItemsResult } from './types'

// ============================================================================
// Types
// ============================================================================

export interface MissingItemsInput {
  documentType: string
  checklistText: string
  uploadedText: string
  model: LanguageModel
  outputMode?: ComparatorOutputMode
  budgetTracker?: BudgetTracker
}

// ============================================================================
// Text-Mode Parsing
// ============================================================================

/**
 * Bullet lines after the first "MISSING DOCUMENTS" heading, with the bullet
 * dashes and surrounding spaces removed. No heading means no items.
 */
export function parseMissingItemsSection(text: string): string[] {
  const items: string[] = []
  let capturing = false

  for (const line of text.split(/\r?\n/)) {
    const trimmed = line.trim()
    if (!capturing) {
      capturing = trimmed.toUpperCase().startsWith(MISSING_ITEMS_MARKER)
      continue
    }
    if (trimmed.startsWith('-')) {
      const item = trimmed.replace(/^[-\s]+|[-\s]+$/g, '')
      if (item) items.push(item)
    }
  }

  return items
}

/** Text after "SUMMARY:" up to the missing-items heading */
export function parseSummarySection(text: string): string {
  const lines: string[] = []
  let capturing = false

  for (const line of text.split(/\r?\n/)) {
    const trimmed = line.trim()
    if (trimmed.toUpperCase().startsWith(MISSING_ITEMS_MARKER)) break
    if (!capturing && trimmed.toUpperCase().startsWith('SUMMARY')) {
      capturing = true
      lines.push(trimmed.replace(/^summary\s*:?/i, '').trim())
      continue
    }
    if (capturing) lines.push(trimmed)
  }

  return lines.filter(Boolean).join(' ')
}

// ============================================================================
// Comparator Agent
// ============================================================================

async function compareStructured(input: MissingItemsInput, prompt: string): Promise<MissingItemsResult> {
  const { model, budgetTracker } = input

  try {
    const { output, usage } = await generateText({
      model,
      system: MISSING_ITEMS_SYSTEM_PROMPT,
      prompt,
      output: Output.object({ schema: missingItemsSchema }),
      ...GENERATION_CONFIG,
    })
    budgetTracker?.record('missingItems', usage.inputTokens ?? 0, usage.outputTokens ?? 0)
    return output
  } catch (error) {
    if (NoObjectGeneratedError.isInstance(error)) {
      budgetTracker?.record(
        'missingItems',
        error.usage?.inputTokens ?? 0,
        error.usage?.outputTokens ?? 0
      )
      console.error('[MissingItems] Object generation failed', {
        documentType: input.documentType,
        cause: error.cause,
        text: error.text?.slice(0, 500),
      })
      throw new LlmOutputError(
        'Missing-item comparison returned an invalid response',
        error.text?.slice(0, 500)
      )
    }
    throw toLlmFailure(error)
  }
}

async function compareText(input: MissingItemsInput, prompt: string): Promise<MissingItemsResult> {
  const { model, budgetTracker } = input

  let text: string
  try {
    const result = await generateText({
      model,
      system: `${MISSING_ITEMS_SYSTEM_PROMPT}\n\n${MISSING_ITEMS_TEXT_FORMAT}`,
      prompt,
      ...GENERATION_CONFIG,
    })
    budgetTracker?.record('missingItems', result.usage.inputTokens ?? 0, result.usage.outputTokens ?? 0)
    text = result.text
  } catch (error) {
    throw toLlmFailure(error)
  }

  return { summary: parseSummarySection(text), missingItems: parseMissingItemsSection(text) }
}

function toLlmFailure(error: unknown): LlmFailedError {
  const reason = error instanceof Error ? error.message : String(error)
  console.error('[MissingItems] Model request failed', { error: reason })
  return new LlmFailedError(`Missing-item comparison request failed: ${reason}`)
}

/**
 * List checklist items absent from the uploaded document. Without checklist
 * text there is nothing to compare and no model call is made.
 */
export async function findMissingItems(input: MissingItemsInput): Promise<MissingItemsResult> {
  if (input.checklistText.trim() === '') {
    return { summary: '', missingItems: [] }
  }

  const prompt = createMissingItemsPrompt(input)
  return (input.outputMode ?? 'structured') === 'structured'
    ? compareStructured(input, prompt)
    : compareText(input, prompt)
}
