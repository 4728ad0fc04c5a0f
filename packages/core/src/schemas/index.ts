export {
  DEFAULTS,
  EngineConfigSchema,
  EngineOptionsSchema,
  type EngineConfig,
  type EngineOptions,
  type EngineOptionsInput,
  type DirectoryConfig,
  type IdentityConfig,
  type LoggingConfig,
} from "./engine-config.js";
export {
  WorkItemKind,
  WorkItemSchema,
  createWorkItem,
  type WorkItem,
  type Batch,
  type BatchResult,
  type Summary,
} from "./work-item.js";
