import { CONTRACT_FIELDS } from './fields.js';

/**
 * Contract Metadata Response Schema
 *
 * Shape of the JSON object the model returns. Field values are strings or
 * null; the quality indicators are optional and defaulted by the extractor.
 */

const fieldProperties = Object.fromEntries(
  CONTRACT_FIELDS.map((field) => [field, { type: ['string', 'null'] }])
);

export const contractMetadataSchema = {
  type: 'object',
  additionalProperties: true,
  properties: {
    ...fieldProperties,
    source_language: { type: ['string', 'null'] },
    confidence: { type: ['string', 'null'], enum: ['high', 'medium', 'low', null] },
    extraction_notes: { type: ['string', 'null'] },
  },
};

export const CONTRACT_METADATA_SCHEMA_ID = 'contract-metadata';
