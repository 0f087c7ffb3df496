/**
 * @fileoverview Red-Flag Detector Agent
 *
 * Reviews the document against the retrieved rule excerpts and returns the
 * compliance findings. The model answers in plain-text JSON. Unlike the
 * checklist filter this agent is strict: a response that cannot be parsed
 * or validated raises `LlmOutputError` and the review stops.
 *
 * @module agents/red-flag-detector
 */

import { generateText, type LanguageModel } from 'ai'
import { GENERATION_CONFIG } from '@/lib/ai/config'
import type { BudgetTracker } from '@/lib/ai/budget'
import { LlmFailedError } from '@/lib/errors'
import type { RedFlagReport } from '@/lib/reporting'
import { parseJsonResponse } from './json-response'
import { createRedFlagPrompt, RED_FLAG_SYSTEM_PROMPT } from './prompts'
import { redFlagReportSchema } from './types'

export interface RedFlagInput {
  /** Retrieved rule excerpts, closest first */
  rules: string
  documentText: string
  model: LanguageModel
  budgetTracker?: BudgetTracker
}

export async function runRedFlagAgent(input: RedFlagInput): Promise<RedFlagReport> {
  const { rules, documentText, model, budgetTracker } = input

  let text: string
  try {
    const result = await generateText({
      model,
      system: RED_FLAG_SYSTEM_PROMPT,
      prompt: createRedFlagPrompt(rules, documentText),
      ...GENERATION_CONFIG,
    })
    budgetTracker?.record('redFlagDetector', result.usage.inputTokens ?? 0, result.usage.outputTokens ?? 0)
    text = result.text
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    console.error('[RedFlagDetector] Model request failed', { error: reason })
    throw new LlmFailedError(`Red-flag detection request failed: ${reason}`)
  }

  const report = parseJsonResponse(text, redFlagReportSchema)
  if (!report.ok) {
    console.error('[RedFlagDetector] Invalid model response', {
      error: report.error.message,
      details: report.error.details,
      text: report.error.rawText,
    })
    throw report.error
  }

  return report.value
}
