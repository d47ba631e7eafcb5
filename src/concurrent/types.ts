import type { WorkItem } from '../sources/types.js';

/**
 * Result of a single extraction attempt
 */
export type AttemptOutcome<T> =
  | { status: 'success'; payload: T }
  | { status: 'retryable'; reason: string }
  | { status: 'fatal'; reason: string };

export type FailureOutcome = Extract<AttemptOutcome<never>, { status: 'retryable' | 'fatal' }>;

/**
 * Final resolution of one work item after all attempts
 */
export type ExtractionResult<T> =
  | { status: 'succeeded'; item: WorkItem; payload: T; attempts: number }
  | { status: 'failed'; item: WorkItem; reason: string; attempts: number };

/**
 * Extraction operation driven by the runner. May return a tagged outcome or
 * throw; thrown errors are classified by classifyFailure().
 */
export type ExtractFn<T> = (item: WorkItem) => Promise<AttemptOutcome<T>>;

/**
 * Batch-wide counters
 */
export interface ProgressState {
  total: number;
  completed: number;
  succeeded: number;
  failed: number;
}

/**
 * Progress-stream rendering of a successful payload
 */
export interface PayloadSummary {
  /** Appended after the marker, e.g. "SV, high" */
  summary: string;
  /** Extra indented lines printed under the status line */
  details?: string[];
}

export function success<T>(payload: T): AttemptOutcome<T> {
  return { status: 'success', payload };
}

export function retryable(reason: string): FailureOutcome {
  return { status: 'retryable', reason };
}

export function fatal(reason: string): FailureOutcome {
  return { status: 'fatal', reason };
}
