export {
  ProgressAggregator,
  type ProgressState,
  type ProgressAggregatorOptions,
} from "./aggregator.js";
export {
  startProgressReporter,
  type ProgressReport,
  type ProgressReporter,
  type ProgressReporterOptions,
} from "./reporter.js";
