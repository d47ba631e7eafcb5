import Ajv, { ValidateFunction, ErrorObject } from 'ajv';

/**
 * JSON Schema Validator
 *
 * Validates the JSON answers returned by the Azure OpenAI deployment
 */

const ajv = new Ajv({
  allErrors: true,
  strict: false, // Allow union types with enums
});

/**
 * Validation Result
 */
export interface ValidationResult {
  valid: boolean;
  errors?: ErrorObject[];
}

/**
 * Validator class for JSON schema validation
 */
export class SchemaValidator {
  private validators: Map<string, ValidateFunction> = new Map();

  /**
   * Compile and cache a schema validator
   * @param schemaId Unique identifier for the schema
   */
  compileSchema(schemaId: string, schema: object): ValidateFunction {
    const cached = this.validators.get(schemaId);
    if (cached) {
      return cached;
    }

    const compiled = ajv.compile(schema);
    this.validators.set(schemaId, compiled);
    return compiled;
  }

  /**
   * Validate data against a schema (compiled on first use)
   */
  validate(schemaId: string, schema: object, data: unknown): ValidationResult {
    const compiled = this.compileSchema(schemaId, schema);
    const valid = compiled(data);

    return {
      valid,
      errors: compiled.errors || undefined,
    };
  }

  /**
   * Format validation errors as a readable string
   */
  formatErrors(errors?: ErrorObject[]): string {
    if (!errors || errors.length === 0) {
      return 'No errors';
    }

    return errors
      .map((error) => {
        const path = error.instancePath || 'root';
        const message = error.message || 'validation failed';
        return `${path}: ${message}`;
      })
      .join('; ');
  }
}

/**
 * Global validator instance
 */
export const validator = new SchemaValidator();

/**
 * Extract and parse JSON content from model response
 * Handles cases where model returns markdown code blocks
 */
export function extractJsonFromResponse(content: string): unknown {
  const MAX_CONTENT_LENGTH = 100000;
  if (content.length > MAX_CONTENT_LENGTH) {
    throw new Error(
      `Response content too large (${content.length} chars, max ${MAX_CONTENT_LENGTH}). Likely truncated/malformed.`
    );
  }

  try {
    return JSON.parse(content);
  } catch {
    const jsonBlockMatch = content.match(/```(?:json)?\s*([\s\S]*?)\s*```/);
    if (jsonBlockMatch) {
      try {
        return JSON.parse(jsonBlockMatch[1]);
      } catch {
        // Fall through to the outermost-braces attempt
      }
    }

    const start = content.indexOf('{');
    const end = content.lastIndexOf('}');
    if (start >= 0 && end > start) {
      try {
        return JSON.parse(content.slice(start, end + 1));
      } catch {
        // Fall through
      }
    }

    throw new Error('Could not extract valid JSON from response content');
  }
}
