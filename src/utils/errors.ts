/**
 * Error types shared across the extraction pipeline.
 *
 * EnumerationError is the only one that aborts a whole batch; the others are
 * raised inside a single item's extraction and end up as failed rows.
 */

export class EnumerationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'EnumerationError';
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class DocumentReadError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DocumentReadError';
  }
}

export class ExtractionResponseError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ExtractionResponseError';
  }
}

export function readErrorProperty(error: unknown, key: string): unknown {
  if (typeof error === 'object' && error !== null) {
    return Reflect.get(error, key);
  }
  return undefined;
}

/**
 * Message of any thrown value. Errors from another realm (a vm context, a
 * worker) fail `instanceof Error`, so the `message` property is read directly.
 */
export function errorMessage(error: unknown): string {
  const message = readErrorProperty(error, 'message');
  return typeof message === 'string' ? message : String(error);
}

export function errorName(error: unknown): string | undefined {
  const name = readErrorProperty(error, 'name');
  return typeof name === 'string' ? name : undefined;
}

export function errorStack(error: unknown): string | undefined {
  const stack = readErrorProperty(error, 'stack');
  return typeof stack === 'string' ? stack : undefined;
}
