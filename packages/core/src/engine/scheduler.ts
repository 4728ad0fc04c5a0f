import type { Logger } from "pino";
import {
  EngineOptionsSchema,
  type EngineOptions,
  type EngineOptionsInput,
} from "../schemas/engine-config.js";
import type {
  Batch,
  BatchResult,
  Summary,
  WorkItem,
} from "../schemas/work-item.js";
import { ConfigError, SchedulerStateError } from "../errors/catalog.js";
import { ProgressAggregator } from "../progress/aggregator.js";
import {
  SchedulerStateMachine,
  type SchedulerState,
  type StateChangeListener,
} from "../lifecycle/state-machine.js";
import {
  WorkerPool,
  defaultMaxWorkers,
  type AdmitDecision,
} from "./worker-pool.js";

export interface BatchContext {
  index: number;
  /** Child logger carrying the batch index. */
  logger: Logger;
  /** Count one finished item towards run progress. */
  record(created: boolean): void;
}

export type BatchProcessor = (
  batch: Batch,
  context: BatchContext,
) => Promise<BatchResult>;

export interface TaskSchedulerOptions {
  logger: Logger;
  /** Run counters; a fresh aggregator is created when omitted. */
  progress?: ProgressAggregator;
  /** Parallelism used when maxWorkers is not set (default: CPU count) */
  parallelism?: number;
}

/** Validate and default engine options. Throws ConfigError. */
export function parseEngineOptions(input: unknown): EngineOptions {
  const result = EngineOptionsSchema.safeParse(input ?? {});
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.map(String).join("."),
      message: issue.message,
    }));
    throw new ConfigError(
      `Invalid engine options: ${issues.map((i) => `${i.path || "(root)"}: ${i.message}`).join("; ")}`,
      { issues },
    );
  }
  return result.data;
}

/** Consecutive slices of `batchSize` items, in input order. */
export function splitIntoBatches(
  items: readonly WorkItem[],
  batchSize: number,
): Batch[] {
  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new ConfigError("batchSize must be a positive integer", { batchSize });
  }
  const batches: Batch[] = [];
  for (let start = 0; start < items.length; start += batchSize) {
    batches.push(items.slice(start, start + batchSize));
  }
  return batches;
}

/**
 * Runs a work list once: splits it into batches, feeds them to a bounded
 * worker pool behind the cap gate and folds the results into a Summary.
 *
 * Single-use. A second `execute` throws SchedulerStateError.
 */
export class TaskScheduler {
  readonly progress: ProgressAggregator;
  private readonly logger: Logger;
  private readonly parallelism: number | undefined;
  private readonly stateMachine = new SchedulerStateMachine();

  constructor(options: TaskSchedulerOptions) {
    this.logger = options.logger;
    this.progress = options.progress ?? new ProgressAggregator();
    this.parallelism = options.parallelism;
    this.stateMachine.onStateChange((event) => {
      this.logger.debug(
        { from: event.from, to: event.to, reason: event.reason },
        "Scheduler state changed",
      );
    });
  }

  getState(): SchedulerState {
    return this.stateMachine.getState();
  }

  onStateChange(listener: StateChangeListener): () => void {
    return this.stateMachine.onStateChange(listener);
  }

  async execute(
    items: readonly WorkItem[],
    options: EngineOptionsInput,
    process: BatchProcessor,
  ): Promise<Summary> {
    if (this.stateMachine.getState() !== "planned") {
      throw new SchedulerStateError(
        `Scheduler already used (state: ${this.stateMachine.getState()})`,
        { state: this.stateMachine.getState() },
      );
    }

    const { batchSize, maxWorkers: configuredWorkers, cap } =
      parseEngineOptions(options);
    const batches = splitIntoBatches(items, batchSize);
    const maxWorkers =
      configuredWorkers ??
      defaultMaxWorkers(items.length, batches.length, this.parallelism);

    this.logger.info(
      { items: items.length, batches: batches.length, batchSize, maxWorkers, cap },
      "Scheduling work",
    );

    const pool = new WorkerPool({ logger: this.logger });
    const baseline = this.progress.snapshot();
    let admittedItems = 0;

    const admit = (batch: Batch): AdmitDecision => {
      if (cap !== null) {
        const now = this.progress.snapshot();
        const completed = now.completed - baseline.completed;
        const counted = completed + (now.errors - baseline.errors);
        if (completed >= cap) return "stop";
        const pendingItems = admittedItems - counted;
        if (completed + pendingItems >= cap) return "wait";
      }
      admittedItems += batch.length;
      return "submit";
    };

    this.stateMachine.transition(
      "submitting",
      `${batches.length} batches planned`,
    );

    const results = await pool.run(batches, {
      maxWorkers,
      admit,
      onClosed: () => this.stateMachine.transition("draining"),
      process: (batch, index) => this.runBatch(batch, index, process),
    });

    const summary: Summary = {
      totalCreated: 0,
      totalErrors: 0,
      durationMs: this.progress.elapsedMs(),
      batchesPlanned: batches.length,
      batchesSubmitted: results.length,
      stoppedByCap: results.length < batches.length,
      identityFallbacks: 0,
    };
    for (const result of results) {
      summary.totalCreated += result.created;
      summary.totalErrors += result.errors;
    }

    this.stateMachine.transition("done");
    this.logger.info(summary, "Run finished");
    return summary;
  }

  /**
   * Hands one batch to the processor and settles its progress: items the
   * processor did not record are counted from its result, or as errors if
   * it threw. Items a panicked batch already recorded as created stay in
   * the progress counters (and count towards the cap), while its
   * BatchResult reports every item as an error.
   */
  private async runBatch(
    batch: Batch,
    index: number,
    process: BatchProcessor,
  ): Promise<BatchResult> {
    let created = 0;
    let errors = 0;
    let result: BatchResult | undefined;

    const context: BatchContext = {
      index,
      logger: this.logger.child({ batch: index }),
      record: (ok) => {
        if (ok) created++;
        else errors++;
        this.progress.add(ok ? 1 : 0, ok ? 0 : 1);
      },
    };

    try {
      result = await process(batch, context);
      return result;
    } finally {
      if (result) {
        this.progress.add(
          Math.max(0, result.created - created),
          Math.max(0, result.errors - errors),
        );
      } else {
        this.progress.add(0, Math.max(0, batch.length - created - errors));
        if (created > 0) {
          context.logger.warn(
            { batch: index, items: batch.length, recordedCreated: created },
            "Panicked batch had created items; progress keeps them, the summary counts the batch as failed",
          );
        }
      }
    }
  }
}
