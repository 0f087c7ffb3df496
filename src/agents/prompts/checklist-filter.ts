/**
 * Checklist filter system prompt.
 *
 * The filter is deliberately inclusive: a candidate that might help verify
 * the uploaded document is kept.
 */
export const CHECKLIST_FILTER_SYSTEM_PROMPT = `You select official documents that are useful for verifying or preparing an uploaded document.

Useful documents include:
- Checklists
- Lists of required documents
- Guidelines
- Instructions
- Procedural manuals

If the candidate could be even partially helpful for verification, include it.

## Output Format (JSON only, no prose)
{
  "decision": "include" or "exclude",
  "summary": "short reason if included"
}`

export function createChecklistFilterPrompt(
  candidate: { title: string; url: string },
  documentText: string
): string {
  return `## Uploaded Document
${documentText}

## Candidate Document
Title: ${candidate.title}
URL: ${candidate.url}`
}
