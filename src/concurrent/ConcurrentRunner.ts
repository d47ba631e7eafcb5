import pLimit from 'p-limit';
import type { WorkItem } from '../sources/types.js';
import { errorMessage } from '../utils/errors.js';
import { BatchLogger } from '../utils/logger.js';
import { ProgressListener, ProgressTracker } from './ProgressTracker.js';
import { backoffDelay, classifyFailure } from './retryPolicy.js';
import {
  AttemptOutcome,
  ExtractFn,
  ExtractionResult,
  PayloadSummary,
  ProgressState,
} from './types.js';

/**
 * Concurrent Runner Options
 */
export interface ConcurrentOptions<T> {
  /** Workers running at once (W) */
  maxWorkers: number;
  /** Retries after the first attempt (R) */
  maxRetries: number;
  /** Base backoff in milliseconds (D) */
  retryDelayMs: number;
  /** When false, items run one at a time on a single track */
  parallel?: boolean;
  /** Renders the status suffix of a successful item */
  describe?: (payload: T) => PayloadSummary;
  /** Progress stream sink (one call per line) */
  output?: (line: string) => void;
  /** Observes counters after every completion */
  onProgress?: ProgressListener;
  sleep?: (ms: number) => Promise<void>;
  logger?: BatchLogger;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Concurrent Runner
 *
 * Drives every work item through extraction with at most `maxWorkers` items
 * in flight, retrying rate-limited attempts with exponential backoff. Per-item
 * failures are returned as data; run() only resolves once every item has a
 * final result.
 */
export class ConcurrentRunner<T> {
  private options: Required<Omit<ConcurrentOptions<T>, 'describe' | 'onProgress' | 'logger'>> &
    Pick<ConcurrentOptions<T>, 'describe' | 'onProgress'>;
  private logger: BatchLogger;

  constructor(options: ConcurrentOptions<T>) {
    if (!Number.isInteger(options.maxWorkers) || options.maxWorkers < 1) {
      throw new Error(`maxWorkers must be a positive integer (got ${options.maxWorkers})`);
    }
    if (!Number.isInteger(options.maxRetries) || options.maxRetries < 0) {
      throw new Error(`maxRetries must be a non-negative integer (got ${options.maxRetries})`);
    }

    this.options = {
      maxWorkers: options.maxWorkers,
      maxRetries: options.maxRetries,
      retryDelayMs: Math.max(0, options.retryDelayMs),
      parallel: options.parallel ?? true,
      describe: options.describe,
      output: options.output ?? ((line: string) => console.log(line)),
      onProgress: options.onProgress,
      sleep: options.sleep ?? defaultSleep,
    };
    this.logger = options.logger ?? new BatchLogger('batch', 'ConcurrentRunner');
  }

  /**
   * Run the batch
   *
   * @returns One result per input item, in completion order
   */
  async run(items: readonly WorkItem[], extract: ExtractFn<T>): Promise<ExtractionResult<T>[]> {
    const onProgress = this.options.onProgress;
    const tracker = new ProgressTracker(
      items.length,
      onProgress && ((state) => this.report('notify progress listener', () => onProgress(state)))
    );
    const results: ExtractionResult<T>[] = [];
    const parallel = this.options.parallel && items.length > 1;

    this.logger.info(`Processing ${items.length} items ${parallel ? 'in parallel' : 'sequentially'}`, {
      maxWorkers: parallel ? this.options.maxWorkers : 1,
      maxRetries: this.options.maxRetries,
      retryDelayMs: this.options.retryDelayMs,
    });

    if (parallel) {
      const limit = pLimit(this.options.maxWorkers);
      await Promise.all(
        items.map((item) => limit(() => this.processItem(item, extract, tracker, results)))
      );
    } else {
      for (const item of items) {
        await this.processItem(item, extract, tracker, results);
      }
    }

    const progress = tracker.snapshot();
    this.logger.info('All items resolved', { ...progress });
    return results;
  }

  /**
   * Retry loop for one item: Attempting → Succeeded | WaitingBackoff → Attempting | Failed
   */
  private async processItem(
    item: WorkItem,
    extract: ExtractFn<T>,
    tracker: ProgressTracker,
    results: ExtractionResult<T>[]
  ): Promise<void> {
    const maxAttempts = this.options.maxRetries + 1;
    let attempt = 0;

    while (true) {
      const outcome = await this.attempt(item, extract);
      const attemptsUsed = attempt + 1;

      if (outcome.status === 'success') {
        await this.resolve(
          { status: 'succeeded', item, payload: outcome.payload, attempts: attemptsUsed },
          tracker,
          results
        );
        return;
      }

      if (outcome.status === 'fatal' || attemptsUsed >= maxAttempts) {
        if (outcome.status === 'retryable') {
          this.logger.warn(`Retry budget exhausted for ${item.name}`, { attempts: attemptsUsed });
        }
        await this.resolve(
          { status: 'failed', item, reason: outcome.reason, attempts: attemptsUsed },
          tracker,
          results
        );
        return;
      }

      const waitMs = backoffDelay(this.options.retryDelayMs, attempt);
      await tracker.runExclusive((state) => {
        this.report(`print retry status for ${item.name}`, () =>
          this.options.output(
            `   [${state.completed}/${state.total}] ${item.name}: ⏸️ Rate limited, retrying in ${
              waitMs / 1000
            }s (attempt ${attemptsUsed}/${maxAttempts})`
          )
        );
      });
      this.logger.warn(`Retryable failure for ${item.name}, backing off`, {
        reason: outcome.reason,
        attempt: attemptsUsed,
        waitMs,
      });

      await this.options.sleep(waitMs);
      attempt++;
    }
  }

  private async attempt(item: WorkItem, extract: ExtractFn<T>): Promise<AttemptOutcome<T>> {
    try {
      return await extract(item);
    } catch (error) {
      this.logger.debug(`Extraction threw for ${item.name}`, {
        error: errorMessage(error),
      });
      return classifyFailure(error);
    }
  }

  /**
   * Record a final result: count it, store it and print its status line
   * inside one critical section.
   */
  private async resolve(
    result: ExtractionResult<T>,
    tracker: ProgressTracker,
    results: ExtractionResult<T>[]
  ): Promise<void> {
    await tracker.record(result.status === 'succeeded', (state) => {
      results.push(result);
      this.report(`print status for ${result.item.name}`, () => {
        for (const line of this.renderStatus(result, state)) {
          this.options.output(line);
        }
      });
    });

    if (result.status === 'failed') {
      this.logger.error(`Item failed: ${result.item.name}`, result.reason, {
        attempts: result.attempts,
      });
    }
  }

  /**
   * Progress output is best effort. Errors thrown while rendering or printing
   * are logged and never reach run().
   */
  private report(action: string, fn: () => void): void {
    try {
      fn();
    } catch (error) {
      this.logger.error(`Could not ${action}`, error);
    }
  }

  private renderStatus(result: ExtractionResult<T>, state: ProgressState): string[] {
    const position = `   [${state.completed}/${state.total}] ${result.item.name}:`;

    if (result.status === 'failed') {
      return [`${position} ❌ ${result.reason}`];
    }

    const summary = this.options.describe?.(result.payload);
    if (!summary) {
      return [`${position} ✅`];
    }

    const line = summary.summary ? `${position} ✅ ${summary.summary}` : `${position} ✅`;
    return [line, ...(summary.details ?? []).map((detail) => `      ${detail}`)];
  }
}
