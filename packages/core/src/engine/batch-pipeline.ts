import type { BulkFileBuilder, ItemOutcome } from "../builder/bulk-file-builder.js";
import type { IdentityResolver } from "../identity/resolver.js";
import type { OwnershipApplier } from "../ownership/manifest.js";
import { ItemError, errorMessage } from "../errors/catalog.js";
import type { BatchContext, BatchProcessor } from "./scheduler.js";

export interface BatchPipelineDeps {
  builder: BulkFileBuilder;
  identity: IdentityResolver;
  ownership: OwnershipApplier;
}

/**
 * Batch processor for a seeding run: create every file of the batch, then
 * give each created file an owner. A file whose owner cannot be applied
 * counts as an item error.
 */
export function createBatchPipeline(deps: BatchPipelineDeps): BatchProcessor {
  const { builder, identity, ownership } = deps;

  return async (batch, context) => {
    let created = 0;
    let errors = 0;

    const settle = async (outcome: ItemOutcome): Promise<void> => {
      if (!outcome.ok) {
        errors++;
        context.record(false);
        return;
      }
      if (await assignOwner(outcome.path, outcome.item.tag, context)) {
        created++;
        context.record(true);
      } else {
        errors++;
        context.record(false);
      }
    };

    await builder.buildBatch(batch, settle);
    return { created, errors };
  };

  async function assignOwner(
    path: string,
    tag: string,
    context: BatchContext,
  ): Promise<boolean> {
    const { owner, source } = identity.resolve(tag);
    try {
      await ownership.applyOwner(path, owner, source);
      return true;
    } catch (err) {
      const error = new ItemError(`Cannot apply owner: ${errorMessage(err)}`, {
        targetPath: path,
        owner,
      });
      context.logger.warn(error.toJSON(), "Item failed");
      return false;
    }
  }
}
