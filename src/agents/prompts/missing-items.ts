/** Heading the text-mode response lists missing items under */
export const MISSING_ITEMS_MARKER = 'MISSING DOCUMENTS'

export const MISSING_ITEMS_SYSTEM_PROMPT = `You are a compliance assistant. You compare a REQUIRED DOCUMENT CHECKLIST against the content of an UPLOADED DOCUMENT.

## Task

1. Identify every required document or item mentioned in the checklist.
2. Check whether each required item is present in, or attached to, the uploaded document.
3. Report each missing item once, in the checklist's own wording.

Only report items the checklist actually requires. An item that is present but incomplete counts as missing.`

/** Appended in text mode so the response can be scanned line by line */
export const MISSING_ITEMS_TEXT_FORMAT = `Return your answer strictly in this format:
SUMMARY: <one or two sentences>
${MISSING_ITEMS_MARKER}:
- <missing item>
- <missing item>`

export function createMissingItemsPrompt(input: {
  documentType: string
  checklistText: string
  uploadedText: string
}): string {
  return `## Document Type
${input.documentType}

--- CHECKLIST CONTENT ---
${input.checklistText}

--- UPLOADED DOCUMENT CONTENT ---
${input.uploadedText}`
}
