export {
  EngineError,
  ItemError,
  BatchPanicError,
  CacheUnavailableError,
  DirectoryUnavailableError,
  ConfigError,
  SchedulerStateError,
  PlanError,
  errorMessage,
  errnoCode,
} from "./catalog.js";
