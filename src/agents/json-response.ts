/**
 * @fileoverview JSON parsing for raw model responses
 *
 * Agents that ask for JSON in plain text (rather than through structured
 * output) share this: strip markdown fences, parse, validate with zod.
 *
 * @module agents/json-response
 */

import type { z } from 'zod'
import { LlmOutputError } from '@/lib/errors'
import { Err, Ok, type Result } from '@/lib/result'

/** Characters of raw response kept on parse errors */
const RAW_TEXT_LIMIT = 500

/**
 * Remove a leading ```/```json fence line and a trailing ``` fence.
 */
export function stripCodeFences(text: string): string {
  return text
    .trim()
    .replace(/^```[a-zA-Z]*\s*/, '')
    .replace(/\s*```$/, '')
    .trim()
}

export function parseJsonResponse<S extends z.ZodType>(
  text: string,
  schema: S
): Result<z.output<S>, LlmOutputError> {
  const cleaned = stripCodeFences(text)
  const rawText = text.slice(0, RAW_TEXT_LIMIT)

  let value: unknown
  try {
    value = JSON.parse(cleaned)
  } catch (error) {
    const reason = error instanceof SyntaxError ? error.message : String(error)
    return Err(new LlmOutputError(`Model response is not valid JSON: ${reason}`, rawText))
  }

  const parsed = schema.safeParse(value)
  if (!parsed.success) {
    return Err(
      new LlmOutputError(
        'Model response does not match the expected shape',
        rawText,
        parsed.error.issues.map((issue) => ({
          field: issue.path.map(String).join('.'),
          message: issue.message,
        }))
      )
    )
  }

  return Ok(parsed.data)
}
