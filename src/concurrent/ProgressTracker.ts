import { ProgressState } from './types.js';

export type ProgressListener = (state: Readonly<ProgressState>) => void;

/**
 * Progress Tracker
 *
 * Owns the counters of one batch. Every read-modify-write goes through a
 * promise-chain mutex, so printed positions are monotonic and never repeat
 * even when many workers finish at once.
 */
export class ProgressTracker {
  private state: ProgressState;
  private mutex: Promise<void> = Promise.resolve();
  private listener?: ProgressListener;

  constructor(total: number, listener?: ProgressListener) {
    this.state = { total, completed: 0, succeeded: 0, failed: 0 };
    this.listener = listener;
  }

  get total(): number {
    return this.state.total;
  }

  /**
   * Run `fn` while holding the lock. A rejected `fn` does not poison the chain.
   */
  runExclusive<T>(fn: (state: Readonly<ProgressState>) => T | Promise<T>): Promise<T> {
    const run = this.mutex.then(() => fn({ ...this.state }));
    this.mutex = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  /**
   * Count one finished item and, in the same critical section, hand the
   * post-increment counters to `onRecorded`.
   */
  record<T>(
    succeeded: boolean,
    onRecorded: (state: Readonly<ProgressState>) => T
  ): Promise<T> {
    return this.runExclusive(() => {
      if (this.state.completed >= this.state.total) {
        throw new Error(
          `Progress overflow: ${this.state.completed + 1} items completed out of ${this.state.total}`
        );
      }

      this.state.completed++;
      if (succeeded) {
        this.state.succeeded++;
      } else {
        this.state.failed++;
      }

      const snapshot = { ...this.state };
      this.listener?.(snapshot);
      return onRecorded(snapshot);
    });
  }

  snapshot(): ProgressState {
    return { ...this.state };
  }
}
