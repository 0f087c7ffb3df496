/**
 * @fileoverview Classifier Agent
 *
 * First model call of the review. Asks for one document type from the
 * mapping table vocabulary, then snaps the free-text answer onto that
 * vocabulary with a gestalt similarity ratio. Answers too far from every
 * label come back `unmatched` with the raw text preserved.
 *
 * @module agents/classifier
 */

import { generateText, type LanguageModel } from 'ai'
import { GENERATION_CONFIG } from '@/lib/ai/config'
import type { BudgetTracker } from '@/lib/ai/budget'
import { LlmFailedError } from '@/lib/errors'
import { closestMatch, DEFAULT_MATCH_CUTOFF } from '@/lib/text/similarity'
import { CLASSIFIER_SYSTEM_PROMPT, createClassifierPrompt } from './prompts'
import type { ClassificationResult } from './types'

// ============================================================================
// Types
// ============================================================================

export interface ClassifierInput {
  documentText: string
  /** Closed vocabulary, in mapping table order */
  documentTypes: readonly string[]
  model: LanguageModel
  budgetTracker?: BudgetTracker
}

// ============================================================================
// Label Resolution
// ============================================================================

/**
 * Best single label for a raw model answer. Ties keep the label listed first.
 */
export function resolveDocumentType(
  rawLabel: string,
  documentTypes: readonly string[],
  cutoff = DEFAULT_MATCH_CUTOFF
): ClassificationResult {
  const match = closestMatch(rawLabel, documentTypes, cutoff)
  if (!match) {
    return { kind: 'unmatched', rawLabel }
  }
  return { kind: 'matched', label: match.label, rawLabel, similarity: match.ratio }
}

// ============================================================================
// Classifier Agent
// ============================================================================

export async function runClassifierAgent(input: ClassifierInput): Promise<ClassificationResult> {
  const { documentText, documentTypes, model, budgetTracker } = input

  let text: string
  try {
    const result = await generateText({
      model,
      system: CLASSIFIER_SYSTEM_PROMPT,
      prompt: createClassifierPrompt(documentText, documentTypes),
      ...GENERATION_CONFIG,
    })
    budgetTracker?.record('classifier', result.usage.inputTokens ?? 0, result.usage.outputTokens ?? 0)
    text = result.text
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    console.error('[Classifier] Model request failed', { error: reason })
    throw new LlmFailedError(`Classification request failed: ${reason}`)
  }

  const classification = resolveDocumentType(text.trim(), documentTypes)
  if (classification.kind === 'unmatched') {
    console.warn('[Classifier] Answer matched no document type', {
      rawLabel: classification.rawLabel,
    })
  }
  return classification
}
