import type { Logger } from "pino";
import type { EngineConfig } from "../schemas/engine-config.js";
import type { Summary, WorkItem } from "../schemas/work-item.js";
import type { DirectoryProvider } from "../directory/types.js";
import type { FileSystem } from "../storage/filesystem/interface.js";
import type { OwnershipApplier } from "../ownership/manifest.js";
import { BulkFileBuilder } from "../builder/bulk-file-builder.js";
import {
  createContentStubProvider,
  type ContentStubProvider,
} from "../content/stubs.js";
import { DirectoryCache } from "../directory/cache.js";
import { IdentityResolver } from "../identity/resolver.js";
import { ProgressAggregator } from "../progress/aggregator.js";
import {
  startProgressReporter,
  type ProgressReport,
} from "../progress/reporter.js";
import { errorMessage } from "../errors/catalog.js";
import { createBatchPipeline } from "./batch-pipeline.js";
import { TaskScheduler, parseEngineOptions } from "./scheduler.js";

export interface SeedingRunOptions {
  items: readonly WorkItem[];
  config: EngineConfig;
  provider: DirectoryProvider;
  fs: FileSystem;
  ownership: OwnershipApplier;
  logger: Logger;
  stubs?: ContentStubProvider;
  onReport?: (report: ProgressReport) => void;
  /** Parallelism used when maxWorkers is not set (default: CPU count) */
  parallelism?: number;
  /** Clock in epoch ms, shared by the cache and progress (default: Date.now) */
  now?: () => number;
  random?: () => number;
}

/**
 * Seed one share from a work list.
 *
 * Warms the directory cache up front; a directory that cannot be reached is
 * logged and the run continues on stale or fallback owners.
 */
export async function runSeeding(options: SeedingRunOptions): Promise<Summary> {
  const { items, config, logger } = options;
  const engine = parseEngineOptions(config.engine);

  const cache = new DirectoryCache({
    provider: options.provider,
    logger: logger.child({ component: "directory" }),
    ttlSeconds: config.directory.cacheTtlSeconds,
    groupKeys: config.directory.groups,
    now: options.now,
    random: options.random,
  });
  const identity = new IdentityResolver({
    cache,
    policy: config.identity,
    logger: logger.child({ component: "identity" }),
  });
  cache.track(new Set(items.map((item) => identity.groupFor(item.tag))));

  try {
    await cache.warm();
  } catch (err) {
    logger.warn(
      { error: errorMessage(err), groups: cache.trackedKeys },
      "Directory warm failed, continuing with cached or fallback owners",
    );
  }

  const pipeline = createBatchPipeline({
    builder: new BulkFileBuilder({
      fs: options.fs,
      stubs: options.stubs ?? createContentStubProvider(),
      logger: logger.child({ component: "builder" }),
    }),
    identity,
    ownership: options.ownership,
  });

  const progress = new ProgressAggregator({ now: options.now });
  const total =
    engine.cap === null ? items.length : Math.min(items.length, engine.cap);
  const reporter = startProgressReporter({
    progress,
    total,
    intervalMs: config.progress.intervalMs,
    logger,
    onReport: options.onReport,
  });

  const scheduler = new TaskScheduler({
    logger,
    progress,
    parallelism: options.parallelism,
  });

  let summary: Summary;
  try {
    summary = await scheduler.execute(items, engine, pipeline);
  } finally {
    reporter.stop();
  }

  return { ...summary, identityFallbacks: identity.getStats().fallback };
}
