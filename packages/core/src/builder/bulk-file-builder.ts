import { dirname, extname } from "node:path";
import type { Logger } from "pino";
import type { FileSystem } from "../storage/filesystem/interface.js";
import type { ContentStubProvider } from "../content/stubs.js";
import type { Batch, WorkItem } from "../schemas/work-item.js";
import { kindFromPath } from "../content/stubs.js";
import {
  ItemError,
  errnoCode,
  errorMessage,
} from "../errors/catalog.js";

export interface BulkFileBuilderDeps {
  fs: FileSystem;
  stubs: ContentStubProvider;
  logger: Logger;
  /** Suffixed names tried after the original path is taken (default: 100) */
  maxCollisionAttempts?: number;
}

export interface CreatedFile {
  /** Final path; differs from `targetPath` when the builder renamed. */
  path: string;
  renamed: boolean;
}

export type ItemOutcome =
  | { item: WorkItem; ok: true; path: string; renamed: boolean }
  | { item: WorkItem; ok: false; error: ItemError };

export type OutcomeListener = (
  outcome: ItemOutcome,
  index: number,
) => void | Promise<void>;

const DEFAULT_MAX_COLLISION_ATTEMPTS = 100;

/** "/s/Q3 report.pdf", 2 → "/s/Q3 report (2).pdf" */
export function withCollisionSuffix(path: string, attempt: number): string {
  const ext = extname(path);
  const stem = path.slice(0, path.length - ext.length);
  return `${stem} (${attempt})${ext}`;
}

/**
 * Groups batch positions by parent directory, keeping first-seen order of
 * directories and input order within each directory.
 */
export function groupByDirectory(batch: Batch): Map<string, number[]> {
  const groups = new Map<string, number[]>();
  batch.forEach((item, index) => {
    const dir = dirname(item.targetPath);
    const positions = groups.get(dir);
    if (positions) {
      positions.push(index);
    } else {
      groups.set(dir, [index]);
    }
  });
  return groups;
}

function toItemError(item: WorkItem, err: unknown): ItemError {
  if (err instanceof ItemError) return err;
  return new ItemError(errorMessage(err), {
    targetPath: item.targetPath,
    code: errnoCode(err),
  });
}

export class BulkFileBuilder {
  private readonly fs: FileSystem;
  private readonly stubs: ContentStubProvider;
  private readonly logger: Logger;
  private readonly maxCollisionAttempts: number;

  constructor(deps: BulkFileBuilderDeps) {
    this.fs = deps.fs;
    this.stubs = deps.stubs;
    this.logger = deps.logger;
    this.maxCollisionAttempts =
      deps.maxCollisionAttempts ?? DEFAULT_MAX_COLLISION_ATTEMPTS;
  }

  /**
   * Create one file: ensure its directory, allocate it sparse, write the stub.
   * Safe to call without `buildBatch`. Rejects with ItemError.
   */
  async createSparse(item: WorkItem): Promise<CreatedFile> {
    try {
      await this.fs.ensureDir(dirname(item.targetPath));
      return await this.allocate(item);
    } catch (err) {
      throw toItemError(item, err);
    }
  }

  /**
   * Create every item of a batch, checking each directory once.
   * Outcomes are returned in input order; failures never abort the batch.
   */
  async buildBatch(
    batch: Batch,
    onOutcome?: OutcomeListener,
  ): Promise<ItemOutcome[]> {
    const outcomes: ItemOutcome[] = [];

    for (const [dir, positions] of groupByDirectory(batch)) {
      let dirError: ItemError | null = null;
      try {
        await this.fs.ensureDir(dir);
      } catch (err) {
        dirError = new ItemError(`Cannot create directory: ${errorMessage(err)}`, {
          dir,
          code: errnoCode(err),
        });
        this.logger.warn(
          { dir, items: positions.length, error: dirError.message },
          "Directory creation failed",
        );
      }

      for (const index of positions) {
        const item = batch[index];
        const outcome: ItemOutcome = dirError
          ? { item, ok: false, error: dirError }
          : await this.tryAllocate(item);
        outcomes[index] = outcome;
        await onOutcome?.(outcome, index);
      }
    }

    return outcomes;
  }

  private async tryAllocate(item: WorkItem): Promise<ItemOutcome> {
    try {
      const created = await this.allocate(item);
      return { item, ok: true, ...created };
    } catch (err) {
      const error = toItemError(item, err);
      this.logger.warn(
        { targetPath: item.targetPath, error: error.message },
        "Item failed",
      );
      return { item, ok: false, error };
    }
  }

  private async allocate(item: WorkItem): Promise<CreatedFile> {
    const bytes = item.sizeKB * 1024;

    for (let attempt = 0; attempt <= this.maxCollisionAttempts; attempt++) {
      const candidate =
        attempt === 0
          ? item.targetPath
          : withCollisionSuffix(item.targetPath, attempt);

      try {
        await this.fs.allocateSparse(candidate, bytes);
      } catch (err) {
        if (errnoCode(err) === "EEXIST") continue;
        throw err;
      }

      if (item.kind === "file" && bytes > 0) {
        const stub = this.stubs.stubFor(kindFromPath(candidate));
        if (stub.byteLength > 0) {
          await this.fs.writeStub(candidate, stub.subarray(0, bytes));
        }
      }

      if (attempt > 0) {
        this.logger.debug(
          { targetPath: item.targetPath, path: candidate },
          "Renamed on collision",
        );
      }
      return { path: candidate, renamed: attempt > 0 };
    }

    throw new ItemError(
      `No free name after ${this.maxCollisionAttempts} collision renames`,
      { targetPath: item.targetPath },
    );
  }
}
