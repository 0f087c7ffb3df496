import { describe, it, expect } from 'vitest'
import { z } from 'zod'
import { parseJsonResponse, stripCodeFences } from './json-response'

describe('stripCodeFences', () => {
  it('removes json fences', () => {
    expect(stripCodeFences('```json\n{"a": 1}\n```')).toBe('{"a": 1}')
  })

  it('removes a bare trailing fence', () => {
    expect(stripCodeFences('  {"a": 1}```  ')).toBe('{"a": 1}')
  })

  it('leaves unfenced text alone', () => {
    expect(stripCodeFences('{"a": "```"}')).toBe('{"a": "```"}')
  })
})

describe('parseJsonResponse', () => {
  const schema = z.object({ decision: z.enum(['include', 'exclude']) })

  it('returns the validated value', () => {
    expect(parseJsonResponse('{"decision": "include", "extra": true}', schema)).toEqual({
      ok: true,
      value: { decision: 'include' },
    })
  })

  it('fails on invalid JSON with the raw text kept', () => {
    const result = parseJsonResponse('include', schema)

    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.message).toMatch(/^Model response is not valid JSON: /)
      expect(result.error.rawText).toBe('include')
    }
  })

  it('fails on a schema mismatch with field details', () => {
    const result = parseJsonResponse('{"decision": 3}', schema)

    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.details).toEqual([{ field: 'decision', message: expect.any(String) }])
    }
  })
})
