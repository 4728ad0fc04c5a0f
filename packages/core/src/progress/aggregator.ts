/** Point-in-time view of a run's counters. */
export interface ProgressState {
  readonly completed: number;
  readonly errors: number;
  /** Epoch milliseconds. */
  readonly startedAt: number;
}

export interface ProgressAggregatorOptions {
  /** Clock in epoch ms (default: Date.now) */
  now?: () => number;
}

/**
 * Shared completed/error counters for one run.
 *
 * Workers call `add()` once per finished work item. Updates are synchronous,
 * so no interleaving on the event loop can lose an increment. Counters only
 * grow. The aggregator never throttles readers; callers poll `snapshot()` at
 * their own cadence.
 */
export class ProgressAggregator {
  private completed = 0;
  private errors = 0;
  private readonly startedAt: number;
  private readonly now: () => number;

  constructor(options?: ProgressAggregatorOptions) {
    this.now = options?.now ?? Date.now;
    this.startedAt = this.now();
  }

  add(completed: number, errors: number): void {
    if (
      !Number.isInteger(completed) ||
      !Number.isInteger(errors) ||
      completed < 0 ||
      errors < 0
    ) {
      throw new RangeError(
        `Progress deltas must be non-negative integers (got ${completed}, ${errors})`,
      );
    }
    this.completed += completed;
    this.errors += errors;
  }

  snapshot(): ProgressState {
    return Object.freeze({
      completed: this.completed,
      errors: this.errors,
      startedAt: this.startedAt,
    });
  }

  /** Milliseconds since the aggregator was created. */
  elapsedMs(): number {
    return Math.max(0, this.now() - this.startedAt);
  }

  /** Processed items (completed + errors) per second. */
  rate(): number {
    const { completed, errors } = this.snapshot();
    const elapsedSeconds = this.elapsedMs() / 1000;
    if (elapsedSeconds === 0) return 0;
    return (completed + errors) / elapsedSeconds;
  }

  /**
   * Estimated milliseconds until `total` items are processed.
   * `null` while nothing has been processed yet.
   */
  eta(total: number): number | null {
    const { completed, errors } = this.snapshot();
    const remaining = total - (completed + errors);
    if (remaining <= 0) return 0;
    const rate = this.rate();
    if (rate === 0) return null;
    return Math.round((remaining / rate) * 1000);
  }
}
