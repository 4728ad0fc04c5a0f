import { describe, it, expect, vi } from "vitest";
import {
  TaskScheduler,
  parseEngineOptions,
  splitIntoBatches,
  type BatchProcessor,
} from "./scheduler.js";
import { createWorkItem, type WorkItem } from "../schemas/work-item.js";
import { ConfigError, SchedulerStateError } from "../errors/catalog.js";
import type { StateTransitionEvent } from "../lifecycle/state-machine.js";
import { makeMockLogger } from "../test-utils/index.js";

function makeItems(count: number): WorkItem[] {
  return Array.from({ length: count }, (_, i) =>
    createWorkItem(`/share/dept/file-${i}.docx`, 4, "Finance"),
  );
}

function yieldTurn(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

/** Records every item as created, one event-loop turn apart. */
const createAll: BatchProcessor = async (batch, context) => {
  for (let i = 0; i < batch.length; i++) {
    await yieldTurn();
    context.record(true);
  }
  return { created: batch.length, errors: 0 };
};

const failAll: BatchProcessor = async (batch, context) => {
  for (let i = 0; i < batch.length; i++) {
    await yieldTurn();
    context.record(false);
  }
  return { created: 0, errors: batch.length };
};

function makeScheduler() {
  const logger = makeMockLogger();
  return { scheduler: new TaskScheduler({ logger, parallelism: 8 }), logger };
}

describe("splitIntoBatches", () => {
  it("splits 237 items into four full batches and a remainder", () => {
    const batches = splitIntoBatches(makeItems(237), 50);
    expect(batches.map((b) => b.length)).toEqual([50, 50, 50, 50, 37]);
  });

  it("keeps input order across batches", () => {
    const items = makeItems(5);
    const batches = splitIntoBatches(items, 2);
    expect(batches.flat()).toEqual(items);
  });

  it("returns no batches for an empty list", () => {
    expect(splitIntoBatches([], 50)).toEqual([]);
  });
});

describe("parseEngineOptions", () => {
  it("fills defaults", () => {
    expect(parseEngineOptions({})).toEqual({ batchSize: 50, maxWorkers: null, cap: null });
  });

  it.each([
    [{ batchSize: 0 }, "batchSize"],
    [{ batchSize: 2.5 }, "batchSize"],
    [{ maxWorkers: 0 }, "maxWorkers"],
    [{ cap: -1 }, "cap"],
  ])("rejects %o", (input, path) => {
    try {
      parseEngineOptions(input);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      expect(err).toMatchObject({
        errorCode: "CONFIG_INVALID",
        details: { issues: [expect.objectContaining({ path })] },
      });
    }
  });
});

describe("TaskScheduler.execute", () => {
  it("processes 237 items in 5 batches with 4 workers", async () => {
    const { scheduler } = makeScheduler();
    const process = vi.fn(createAll);

    const summary = await scheduler.execute(
      makeItems(237),
      { batchSize: 50, maxWorkers: 4 },
      process,
    );

    expect(process).toHaveBeenCalledTimes(5);
    expect(process.mock.calls.map(([batch]) => batch.length).sort()).toEqual([37, 50, 50, 50, 50]);
    expect(summary).toMatchObject({
      totalCreated: 237,
      totalErrors: 0,
      batchesPlanned: 5,
      batchesSubmitted: 5,
      stoppedByCap: false,
    });
    expect(summary.totalCreated + summary.totalErrors).toBe(237);
    expect(scheduler.progress.snapshot()).toMatchObject({ completed: 237, errors: 0 });
  });

  it("stops submitting once the cap is reached", async () => {
    const { scheduler } = makeScheduler();

    const summary = await scheduler.execute(
      makeItems(1000),
      { batchSize: 50, maxWorkers: 4, cap: 100 },
      createAll,
    );

    const processed = summary.totalCreated + summary.totalErrors;
    expect(processed).toBeGreaterThanOrEqual(100);
    expect(processed).toBeLessThanOrEqual(149);
    expect(summary.stoppedByCap).toBe(true);
    expect(summary.batchesPlanned).toBe(20);
    expect(summary.batchesSubmitted).toBeLessThan(20);
  });

  it("submits nothing with a cap of zero", async () => {
    const { scheduler } = makeScheduler();
    const process = vi.fn(createAll);

    const summary = await scheduler.execute(makeItems(10), { batchSize: 5, cap: 0 }, process);

    expect(process).not.toHaveBeenCalled();
    expect(summary).toMatchObject({
      totalCreated: 0,
      totalErrors: 0,
      batchesSubmitted: 0,
      stoppedByCap: true,
    });
  });

  it("does not count failed items towards the cap", async () => {
    const { scheduler } = makeScheduler();

    const summary = await scheduler.execute(
      makeItems(100),
      { batchSize: 10, maxWorkers: 2, cap: 10 },
      failAll,
    );

    expect(summary).toMatchObject({
      totalCreated: 0,
      totalErrors: 100,
      batchesSubmitted: 10,
      stoppedByCap: false,
    });
  });

  it("isolates a throwing batch", async () => {
    const { scheduler, logger } = makeScheduler();
    const process: BatchProcessor = async (batch, context) => {
      if (context.index === 1) {
        context.record(true);
        context.record(true);
        throw new Error("share went away");
      }
      return createAll(batch, context);
    };

    const summary = await scheduler.execute(
      makeItems(15),
      { batchSize: 5, maxWorkers: 2 },
      process,
    );

    expect(summary).toMatchObject({ totalCreated: 10, totalErrors: 5 });
    expect(scheduler.progress.snapshot()).toMatchObject({ completed: 12, errors: 3 });
    expect(logger.error).toHaveBeenCalledWith(
      expect.objectContaining({
        error: expect.objectContaining({ errorCode: "BATCH_PANIC" }),
      }),
      "Batch panicked",
    );
  });

  it("logs created items that a throwing batch leaves behind in progress", async () => {
    const { scheduler, logger } = makeScheduler();
    const process: BatchProcessor = async (_batch, context) => {
      context.record(true);
      context.record(true);
      context.record(true);
      throw new Error("lost the share");
    };

    const summary = await scheduler.execute(makeItems(4), { batchSize: 4 }, process);

    expect(summary).toMatchObject({ totalCreated: 0, totalErrors: 4 });
    expect(scheduler.progress.snapshot()).toMatchObject({ completed: 3, errors: 1 });
    expect(logger.warn).toHaveBeenCalledWith(
      { batch: 0, items: 4, recordedCreated: 3 },
      "Panicked batch had created items; progress keeps them, the summary counts the batch as failed",
    );
  });

  it("does not warn when a throwing batch recorded nothing", async () => {
    const { scheduler, logger } = makeScheduler();

    await scheduler.execute(makeItems(2), {}, async () => {
      throw new Error("no share");
    });

    expect(logger.warn).not.toHaveBeenCalled();
  });

  it("counts progress from the result when the processor records nothing", async () => {
    const { scheduler } = makeScheduler();

    await scheduler.execute(makeItems(7), { batchSize: 3 }, async (batch) => ({
      created: batch.length - 1,
      errors: 1,
    }));

    expect(scheduler.progress.snapshot()).toMatchObject({ completed: 4, errors: 3 });
  });

  it("gives each batch a child logger tagged with its index", async () => {
    const { scheduler, logger } = makeScheduler();

    await scheduler.execute(makeItems(4), { batchSize: 2 }, createAll);

    expect(logger.child).toHaveBeenCalledWith({ batch: 0 });
    expect(logger.child).toHaveBeenCalledWith({ batch: 1 });
  });

  it("never runs more batches at once than maxWorkers", async () => {
    const { scheduler } = makeScheduler();
    let inFlight = 0;
    let peak = 0;

    await scheduler.execute(makeItems(40), { batchSize: 2, maxWorkers: 3 }, async (batch, context) => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      const result = await createAll(batch, context);
      inFlight--;
      return result;
    });

    expect(peak).toBe(3);
  });

  it("walks planned → submitting → draining → done", async () => {
    const { scheduler } = makeScheduler();
    const events: StateTransitionEvent[] = [];
    scheduler.onStateChange((event) => events.push(event));

    await scheduler.execute(makeItems(3), { batchSize: 1 }, createAll);

    expect(events.map((e) => `${e.from}->${e.to}`)).toEqual([
      "planned->submitting",
      "submitting->draining",
      "draining->done",
    ]);
    expect(scheduler.getState()).toBe("done");
  });

  it("handles an empty work list", async () => {
    const { scheduler } = makeScheduler();

    const summary = await scheduler.execute([], {}, createAll);

    expect(summary).toMatchObject({
      totalCreated: 0,
      totalErrors: 0,
      batchesPlanned: 0,
      batchesSubmitted: 0,
      stoppedByCap: false,
    });
    expect(scheduler.getState()).toBe("done");
  });

  it("throws ConfigError before doing any work", async () => {
    const { scheduler } = makeScheduler();
    const process = vi.fn(createAll);

    await expect(
      scheduler.execute(makeItems(10), { batchSize: 0 }, process),
    ).rejects.toBeInstanceOf(ConfigError);

    expect(process).not.toHaveBeenCalled();
    expect(scheduler.getState()).toBe("planned");
  });

  it("refuses to run twice", async () => {
    const { scheduler } = makeScheduler();
    await scheduler.execute(makeItems(2), {}, createAll);

    await expect(
      scheduler.execute(makeItems(2), {}, createAll),
    ).rejects.toBeInstanceOf(SchedulerStateError);
  });
});
