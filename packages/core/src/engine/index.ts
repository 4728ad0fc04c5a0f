export {
  WorkerPool,
  defaultMaxWorkers,
  type AdmitDecision,
  type WorkerPoolOptions,
  type WorkerPoolRunOptions,
} from "./worker-pool.js";
export {
  TaskScheduler,
  parseEngineOptions,
  splitIntoBatches,
  type BatchContext,
  type BatchProcessor,
  type TaskSchedulerOptions,
} from "./scheduler.js";
export { createBatchPipeline, type BatchPipelineDeps } from "./batch-pipeline.js";
export { runSeeding, type SeedingRunOptions } from "./seeding-run.js";
