// ============================================================================
// Sample Document Text
// ============================================================================

export const SAMPLE_ARTICLES_TEXT =
  'ARTICLES OF ASSOCIATION OF TEST HOLDINGS LIMITED. ' +
  '1. The registered office of the Company is situated in Abu Dhabi Global Market. ' +
  '2. Any dispute shall be referred to the courts of the UAE Federal jurisdiction. ' +
  '3. The directors may, in their discretion, call a general meeting.'

export const SAMPLE_CHECKLIST_TEXT =
  'Company incorporation checklist: Articles of Association; Memorandum of Association; ' +
  'Board Resolution; Register of Members and Directors; UBO Declaration Form.'

export const DOCUMENT_TYPES = [
  'Articles of Association',
  'Memorandum of Association',
  'Board Resolution',
  'Shareholder Resolution',
] as const

// ============================================================================
// Sample Agent Outputs
// ============================================================================

export const SAMPLE_RED_FLAG_REPORT = {
  summary: 'The document names the wrong court and leaves meeting calls discretionary.',
  red_flags: [
    {
      issue: 'Disputes referred to UAE Federal courts instead of ADGM Courts',
      law_reference: 'ADGM Companies Regulations 2020, Art. 6',
      snippet: 'referred to the courts of the UAE Federal jurisdiction',
    },
    {
      issue: 'Ambiguous, non-binding language for calling meetings',
      law_reference: 'ADGM Model Articles, Art. 25',
      snippet: 'in their discretion',
    },
  ],
}
