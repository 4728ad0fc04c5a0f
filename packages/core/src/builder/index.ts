export {
  BulkFileBuilder,
  groupByDirectory,
  withCollisionSuffix,
  type BulkFileBuilderDeps,
  type CreatedFile,
  type ItemOutcome,
  type OutcomeListener,
} from "./bulk-file-builder.js";
