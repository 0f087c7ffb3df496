/**
 * Classifier system prompt. Static, so it is cached across calls.
 */
export const CLASSIFIER_SYSTEM_PROMPT = `You are a document classifier for corporate registration and compliance filings.
You are given the full text of one uploaded document and a closed list of document types.

## Rules

1. Choose exactly ONE document type from the list.
2. Copy the chosen type character for character. Do not paraphrase, abbreviate or translate it.
3. Reply with the document type only: no explanation, no quotes, no punctuation around it.
4. If several types seem plausible, choose the one that best describes the document as a whole, not a single clause.`

/**
 * Classifier user prompt: the vocabulary then the document.
 */
export function createClassifierPrompt(documentText: string, documentTypes: readonly string[]): string {
  return `## Possible Document Types
${documentTypes.map((type) => `- ${type}`).join('\n')}

## Document
${documentText}

Return ONLY the exact matching type from the list.`
}
