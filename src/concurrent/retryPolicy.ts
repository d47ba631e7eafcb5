import { errorMessage, errorName, readErrorProperty } from '../utils/errors.js';
import { fatal, FailureOutcome, retryable } from './types.js';

const RATE_LIMIT_PATTERN = /rate[\s_-]?limit|too many requests|\b429\b/i;
const TIMEOUT_PATTERN = /timed?[\s_-]?out|timeout/i;
const TIMEOUT_ERROR_NAMES = new Set(['APIConnectionTimeoutError', 'TimeoutError', 'AbortError']);

/**
 * Classify an error thrown by an extraction attempt.
 *
 * Retryable: HTTP 429 (status or statusCode), the rate_limit_exceeded code, request timeouts, or a
 * message that mentions rate limiting. Everything else is fatal.
 */
export function classifyFailure(error: unknown): FailureOutcome {
  const message = errorMessage(error);
  // openai errors carry `status`, Azure SDK RestErrors `statusCode`
  const status = readErrorProperty(error, 'status') ?? readErrorProperty(error, 'statusCode');
  const code = readErrorProperty(error, 'code');
  const name = errorName(error);

  if (status === 429 || code === 'rate_limit_exceeded' || RATE_LIMIT_PATTERN.test(message)) {
    return retryable(`${message} (Rate limit detected)`);
  }

  if ((name !== undefined && TIMEOUT_ERROR_NAMES.has(name)) || TIMEOUT_PATTERN.test(message)) {
    return retryable(`${message} (Request timed out)`);
  }

  return fatal(message);
}

/**
 * Backoff before the retry that follows attempt index `attempt` (0-based):
 * D, 2D, 4D, ...
 */
export function backoffDelay(baseDelayMs: number, attempt: number): number {
  return baseDelayMs * Math.pow(2, attempt);
}
