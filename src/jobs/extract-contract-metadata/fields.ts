/**
 * Contract metadata fields exported to the CLM import CSV.
 */
export const CONTRACT_FIELDS = [
  'Original File Name',
  'Counterparty Legal Entity Name',
  'Internal Contracting Entity',
  'Contract Type',
  'Term Type',
  'Effective Date',
  'Expiration Date',
  'Governing Law',
  'Payment Term',
  'Contract Name',
  'Scope Category level 1',
  'Related Master Agreement',
] as const;

export type ContractField = (typeof CONTRACT_FIELDS)[number];

/**
 * Fields that must never come back empty. A result missing any of them is
 * re-extracted from an English translation when the fallback is enabled.
 */
export const CRITICAL_FIELDS: readonly ContractField[] = [
  'Internal Contracting Entity',
  'Counterparty Legal Entity Name',
  'Effective Date',
  'Contract Type',
];

export type Confidence = 'high' | 'medium' | 'low';

export type ExtractionMethod = 'direct' | 'two_call_translation' | 'low_confidence_translation';

export type ContractFieldValues = Record<ContractField, string | null>;

/**
 * Payload produced by one successful extraction.
 */
export interface ContractMetadata {
  fields: ContractFieldValues;
  sourceLanguage: string;
  confidence: Confidence;
  notes: string;
  extractionTimestamp: string;
  extractionMethod: ExtractionMethod;
}

/**
 * Build a complete field record from a per-field reader
 */
export function fieldValuesFrom(read: (field: ContractField) => string | null): ContractFieldValues {
  return {
    'Original File Name': read('Original File Name'),
    'Counterparty Legal Entity Name': read('Counterparty Legal Entity Name'),
    'Internal Contracting Entity': read('Internal Contracting Entity'),
    'Contract Type': read('Contract Type'),
    'Term Type': read('Term Type'),
    'Effective Date': read('Effective Date'),
    'Expiration Date': read('Expiration Date'),
    'Governing Law': read('Governing Law'),
    'Payment Term': read('Payment Term'),
    'Contract Name': read('Contract Name'),
    'Scope Category level 1': read('Scope Category level 1'),
    'Related Master Agreement': read('Related Master Agreement'),
  };
}

export function isEmptyValue(value: string | null | undefined): boolean {
  return value === null || value === undefined || value.trim() === '' || value === 'null';
}

/**
 * Critical fields missing from an extraction
 */
export function validateCriticalFields(fields: ContractFieldValues): ContractField[] {
  return CRITICAL_FIELDS.filter((field) => isEmptyValue(fields[field]));
}

/**
 * Quality issues across all fields, formatted for the progress stream
 */
export function analyzeFieldQuality(fields: ContractFieldValues): string[] {
  return CONTRACT_FIELDS.filter((field) => isEmptyValue(fields[field])).map(
    (field) => `Missing: ${field}`
  );
}
