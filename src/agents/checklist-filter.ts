/**
 * @fileoverview Checklist Filter Agent
 *
 * Asks the model, one candidate at a time, whether a crawled document is a
 * checklist, guideline or procedure that helps verify the uploaded document.
 *
 * The filter is lenient: a failed request or an unparseable answer drops
 * the candidate instead of failing the review. Every dropped candidate is
 * returned with its reason.
 *
 * @module agents/checklist-filter
 */

import { generateText, type LanguageModel } from 'ai'
import { GENERATION_CONFIG } from '@/lib/ai/config'
import type { BudgetTracker } from '@/lib/ai/budget'
import { tryCatch } from '@/lib/result'
import type { CandidateDocument } from '@/lib/scraping'
import { parseJsonResponse } from './json-response'
import { CHECKLIST_FILTER_SYSTEM_PROMPT, createChecklistFilterPrompt } from './prompts'
import {
  checklistDecisionSchema,
  type ChecklistDocument,
  type RejectedCandidate,
} from './types'

export interface ChecklistFilterInput {
  candidates: CandidateDocument[]
  documentText: string
  model: LanguageModel
  budgetTracker?: BudgetTracker
}

export interface ChecklistFilterOutput {
  documents: ChecklistDocument[]
  rejected: RejectedCandidate[]
}

export async function runChecklistFilterAgent(
  input: ChecklistFilterInput
): Promise<ChecklistFilterOutput> {
  const { candidates, documentText, model, budgetTracker } = input
  const documents: ChecklistDocument[] = []
  const rejected: RejectedCandidate[] = []

  for (const candidate of candidates) {
    const response = await tryCatch(() =>
      generateText({
        model,
        system: CHECKLIST_FILTER_SYSTEM_PROMPT,
        prompt: createChecklistFilterPrompt(candidate, documentText),
        ...GENERATION_CONFIG,
      })
    )

    if (!response.ok) {
      console.warn('[ChecklistFilter] Request failed, excluding candidate', {
        url: candidate.url,
        error: response.error.message,
      })
      rejected.push({ ...candidate, reason: 'request_failed', detail: response.error.message })
      continue
    }

    const { text, usage } = response.value
    budgetTracker?.record('checklistFilter', usage.inputTokens ?? 0, usage.outputTokens ?? 0)

    const decision = parseJsonResponse(text, checklistDecisionSchema)
    if (!decision.ok) {
      console.warn('[ChecklistFilter] Unparseable decision, excluding candidate', {
        url: candidate.url,
        error: decision.error.message,
        text: decision.error.rawText,
      })
      rejected.push({ ...candidate, reason: 'unparseable', detail: decision.error.message })
      continue
    }

    if (decision.value.decision === 'include') {
      documents.push({ ...candidate, summary: decision.value.summary ?? '' })
    } else {
      rejected.push({ ...candidate, reason: 'excluded' })
    }
  }

  return { documents, rejected }
}
