import { z } from "zod";

const NO_GROUPS: string[] = [];

export const DEFAULTS = {
  engine: {
    batchSize: 50,
    maxWorkers: null,
    cap: null,
  },
  directory: {
    cacheTtlSeconds: 300,
    groups: NO_GROUPS,
    groupsFile: null,
  },
  identity: {
    groupPattern: "{tag}",
    fallbackOwner: "AllEmployees",
    domain: null,
  },
  output: {
    rootDir: "~/share-seeder/share",
  },
  progress: {
    intervalMs: 2_000,
  },
  logging: {
    level: "info" as const,
    pretty: false,
  },
};

export const EngineOptionsSchema = z.object({
  batchSize: z.number().int().positive().default(DEFAULTS.engine.batchSize),
  maxWorkers: z
    .number()
    .int()
    .positive()
    .nullable()
    .default(DEFAULTS.engine.maxWorkers)
    .describe("Concurrent batches; null derives it from CPU count and list size"),
  cap: z
    .number()
    .int()
    .nonnegative()
    .nullable()
    .default(DEFAULTS.engine.cap)
    .describe("Stop submitting batches once this many items were created"),
});

export const EngineConfigSchema = z.object({
  engine: EngineOptionsSchema.default(DEFAULTS.engine),
  directory: z
    .object({
      cacheTtlSeconds: z
        .number()
        .int()
        .positive()
        .default(DEFAULTS.directory.cacheTtlSeconds),
      groups: z.array(z.string().min(1)).default(DEFAULTS.directory.groups),
      groupsFile: z
        .string()
        .nullable()
        .default(DEFAULTS.directory.groupsFile)
        .describe("JSON file backing the static directory provider"),
    })
    .default(DEFAULTS.directory),
  identity: z
    .object({
      groupPattern: z
        .string()
        .includes("{tag}")
        .default(DEFAULTS.identity.groupPattern),
      fallbackOwner: z.string().min(1).default(DEFAULTS.identity.fallbackOwner),
      domain: z.string().min(1).nullable().default(DEFAULTS.identity.domain),
    })
    .default(DEFAULTS.identity),
  output: z
    .object({
      rootDir: z.string().min(1).default(DEFAULTS.output.rootDir),
    })
    .default(DEFAULTS.output),
  progress: z
    .object({
      intervalMs: z.number().int().min(100).default(DEFAULTS.progress.intervalMs),
    })
    .default(DEFAULTS.progress),
  logging: z
    .object({
      level: z
        .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
        .default(DEFAULTS.logging.level),
      pretty: z.boolean().default(DEFAULTS.logging.pretty),
    })
    .default(DEFAULTS.logging),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type EngineOptions = z.infer<typeof EngineOptionsSchema>;
export type EngineOptionsInput = z.input<typeof EngineOptionsSchema>;
export type DirectoryConfig = EngineConfig["directory"];
export type IdentityConfig = EngineConfig["identity"];
export type LoggingConfig = EngineConfig["logging"];
