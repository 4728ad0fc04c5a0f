import { availableParallelism } from "node:os";
import type { Logger } from "pino";
import type { Batch, BatchResult } from "../schemas/work-item.js";
import {
  BatchPanicError,
  ConfigError,
  errorMessage,
} from "../errors/catalog.js";

/**
 * Answer of the admission hook for the batch at the cursor.
 * - submit: hand it to the asking worker
 * - wait: ask again after some in-flight batch settles
 * - stop: close submission for the whole pool
 */
export type AdmitDecision = "submit" | "wait" | "stop";

export interface WorkerPoolRunOptions {
  maxWorkers: number;
  process: (batch: Batch, index: number) => Promise<BatchResult>;
  /** Called synchronously before each batch is handed out. */
  admit?: (batch: Batch, index: number) => AdmitDecision;
  /** Fires once, when no further batch will be handed out. */
  onClosed?: () => void;
}

export interface WorkerPoolOptions {
  logger: Logger;
}

/** Lists under this many items get at most two workers. */
const SMALL_LIST_ITEMS = 500;
const SMALL_LIST_WORKERS = 2;

export function defaultMaxWorkers(
  itemCount: number,
  batchCount: number,
  parallelism: number = availableParallelism(),
): number {
  let workers = Math.max(1, Math.min(batchCount, parallelism));
  if (itemCount < SMALL_LIST_ITEMS) {
    workers = Math.min(workers, SMALL_LIST_WORKERS);
  }
  return workers;
}

/**
 * Bounded pool of async workers pulling batches from a shared cursor.
 *
 * A batch whose `process` throws or rejects is counted as fully failed and
 * logged as a `BatchPanicError`; the other batches keep running.
 */
export class WorkerPool {
  private readonly logger: Logger;

  constructor(options: WorkerPoolOptions) {
    this.logger = options.logger;
  }

  /**
   * Run batches with at most `maxWorkers` in flight. Resolves once every
   * submitted batch has a result; results are in batch order and cover only
   * the submitted batches.
   */
  async run(
    batches: readonly Batch[],
    options: WorkerPoolRunOptions,
  ): Promise<BatchResult[]> {
    const { maxWorkers, process, admit, onClosed } = options;
    if (!Number.isInteger(maxWorkers) || maxWorkers < 1) {
      throw new ConfigError("maxWorkers must be a positive integer", {
        maxWorkers,
      });
    }

    const results: BatchResult[] = [];
    let cursor = 0;
    let inFlight = 0;
    let closed = false;
    let waiters: Array<() => void> = [];

    const wake = (): void => {
      const pending = waiters;
      waiters = [];
      for (const resolve of pending) resolve();
    };

    const close = (): void => {
      if (closed) return;
      closed = true;
      onClosed?.();
      wake();
    };

    const claim = async (): Promise<number | null> => {
      while (!closed && cursor < batches.length) {
        const index = cursor;
        const decision = admit ? admit(batches[index], index) : "submit";
        if (decision === "submit") {
          cursor++;
          inFlight++;
          if (cursor === batches.length) close();
          return index;
        }
        if (decision === "stop" || inFlight === 0) break;
        await new Promise<void>((resolve) => waiters.push(resolve));
      }
      close();
      return null;
    };

    const worker = async (): Promise<void> => {
      for (let index = await claim(); index !== null; index = await claim()) {
        results[index] = await this.runOne(batches[index], index, process);
        inFlight--;
        wake();
      }
    };

    const workerCount = Math.max(1, Math.min(maxWorkers, batches.length));
    await Promise.all(Array.from({ length: workerCount }, () => worker()));
    close();

    return results.slice(0, cursor);
  }

  private async runOne(
    batch: Batch,
    index: number,
    process: WorkerPoolRunOptions["process"],
  ): Promise<BatchResult> {
    try {
      return await process(batch, index);
    } catch (err) {
      const panic = new BatchPanicError(
        `Batch ${index} failed: ${errorMessage(err)}`,
        { batch: index, items: batch.length },
      );
      this.logger.error(panic.toJSON(), "Batch panicked");
      return { created: 0, errors: batch.length };
    }
  }
}
