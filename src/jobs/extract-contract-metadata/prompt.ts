import { CONTRACT_FIELDS } from './fields.js';

/**
 * Contract Metadata Prompts
 *
 * Template variables to replace:
 * - {{contractText}}
 * - {{fileName}}
 */

/** Characters of source text sent to the direct extraction call */
export const DIRECT_TEXT_LIMIT = 8000;

/** Characters of source text sent to the translation call */
export const TRANSLATION_TEXT_LIMIT = 100000;

/** Characters of translated text sent to the extraction-from-English call */
export const ENGLISH_TEXT_LIMIT = 16000;

export const SYSTEM_PROMPT = `You are a multilingual contract metadata extraction specialist. You read contracts in Swedish, Norwegian, Danish, Polish, Latvian, Lithuanian, Estonian and English.

Read the contract in its original language and return every field value in ENGLISH.

# FIELDS
1. Original File Name - The FILE NAME given with the contract. Use it EXACTLY as given, with its extension. Never derive it from the contract title
2. Counterparty Legal Entity Name - The supplier or vendor company name (keep original spelling)
3. Internal Contracting Entity - Our own contracting entity (keep original spelling)
4. Contract Type - Exactly one of: "Master Agreement", "Product/ Service Specific Agreement", "Non Disclosure Agreement", "Statement of Work", "Amendment/ Addendum", "Change Order", "Order Form", "Supporting Document"
5. Term Type - Exactly one of: "Perpetual", "Fixed", "Auto-Renewal"
6. Effective Date - Start date, MM/DD/YYYY
7. Expiration Date - End date, MM/DD/YYYY. Only for "Fixed" or "Auto-Renewal" terms, null for "Perpetual"
8. Governing Law - Jurisdiction only (e.g. "Poland", "Norway", "Sweden", "Estonia")
9. Payment Term - Days format (e.g. "Net 30", "Net 60")
10. Contract Name - Format {Contract Type}_{Counterparty Name}_{Effective Date}, e.g. "Master Agreement_Nordic Freight AB_04/01/2024"
11. Scope Category level 1 - Exactly one of: "Technology", "Real Estate & Construction", "Operations and Logistics"
12. Related Master Agreement - For documents that depend on a parent agreement: "{This Document Type} to: {Parent Agreement}", e.g. "Amendment to: Master Agreement_04/01/2024". Null for standalone agreements.

# CONTRACTS WITH ADDENDUMS
- Effective Date comes from the main contract
- Expiration Date is the latest end date found in any addendum or amendment

# RULES
1. Use null for fields not found or not applicable
2. Keep company names in their original form
3. Translate legal terms to English
4. Include "source_language" (ISO 639-1 code: sv, no, da, pl, lv, lt, et, en)
5. Include "confidence": "high", "medium" or "low"
6. Include "extraction_notes" describing any uncertainty

Return ONLY a single JSON object with the keys:
${CONTRACT_FIELDS.map((field) => `"${field}"`).join(', ')}, "source_language", "confidence", "extraction_notes"`;

export const DIRECT_EXTRACTION_PROMPT = `Extract metadata from this contract and return all values in ENGLISH.

FILE NAME: {{fileName}}

CONTRACT TEXT:
{{contractText}}

Return JSON with the ${CONTRACT_FIELDS.length} required fields, plus source_language, confidence and extraction_notes.`;

export const ENGLISH_EXTRACTION_PROMPT = `Extract metadata from this contract. It was translated to English from its original language.

FILE NAME: {{fileName}}

CONTRACT TEXT:
{{contractText}}

Return JSON with the ${CONTRACT_FIELDS.length} required fields, plus source_language (of the ORIGINAL document), confidence and extraction_notes.`;

export const TRANSLATION_SYSTEM_PROMPT =
  'You are a professional legal translator. Translate accurately while preserving dates, names, and legal terms.';

export const TRANSLATION_PROMPT = `Translate this contract to English. Preserve:
- All company names exactly as written
- All dates
- Numbers and amounts
- Legal terminology
- Document structure

CONTRACT TEXT:
{{contractText}}

Return ONLY the English translation.`;

export function renderPrompt(template: string, variables: Record<string, string>): string {
  return template.replace(/\{\{(\w+)\}\}/g, (match, key: string) =>
    Object.prototype.hasOwnProperty.call(variables, key) ? variables[key] : match
  );
}
