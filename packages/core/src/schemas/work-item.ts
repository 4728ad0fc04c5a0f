import { z } from "zod";

export const WorkItemKind = z.enum(["file", "clutter"]);

export const WorkItemSchema = z.object({
  targetPath: z.string().min(1),
  sizeKB: z.number().int().nonnegative(),
  tag: z.string(),
  kind: WorkItemKind.default("file"),
});

export type WorkItemKind = z.infer<typeof WorkItemKind>;

/** One planned file. Fully resolved before scheduling; never mutated. */
export type WorkItem = Readonly<z.infer<typeof WorkItemSchema>>;

/** Ordered slice of the work list handed to a single worker. */
export type Batch = readonly WorkItem[];

/** Invariant: `created + errors === batch.length`. */
export interface BatchResult {
  created: number;
  errors: number;
}

/**
 * Totals are folded from BatchResults. A batch that threw counts every item
 * as an error, so live progress may show more created items than
 * `totalCreated` when such a batch had already created files.
 */
export interface Summary {
  totalCreated: number;
  totalErrors: number;
  durationMs: number;
  batchesPlanned: number;
  batchesSubmitted: number;
  /** True when the cap gate stopped submission before every batch ran. */
  stoppedByCap: boolean;
  /** Items whose owner came from the fallback identity. */
  identityFallbacks: number;
}

export function createWorkItem(
  targetPath: string,
  sizeKB: number,
  tag: string,
  kind: WorkItemKind = "file",
): WorkItem {
  return Object.freeze(WorkItemSchema.parse({ targetPath, sizeKB, tag, kind }));
}
