import { resolve } from "node:path";
import type { Logger } from "pino";
import {
  ROOT_PATH_ENV,
  loadConfig,
  resolveFrom,
  resolveRootPath,
} from "@share-seeder/core/config";
import {
  createStaticDirectoryProvider,
  loadDirectoryFile,
  type DirectoryProvider,
} from "@share-seeder/core/directory";
import { runSeeding } from "@share-seeder/core/engine";
import { ConfigError, errorMessage } from "@share-seeder/core/errors";
import { createLogger } from "@share-seeder/core/logger";
import { createOwnershipManifest } from "@share-seeder/core/ownership";
import { loadPlan } from "@share-seeder/core/plan";
import type { EngineConfig, Summary } from "@share-seeder/core/schemas";
import {
  createNodeFileSystem,
  type FileSystem,
} from "@share-seeder/core/storage";
import type { SeedArgs } from "./args.js";

export {
  createSeedProgram,
  parseSeedArgs,
  type ParsedCommand,
  type SeedArgs,
} from "./args.js";

export interface SeedCommandDeps {
  logger?: Logger;
  fs?: FileSystem;
  env?: NodeJS.ProcessEnv;
  /** Parallelism used when maxWorkers is not set (default: CPU count) */
  parallelism?: number;
}

function applyOverrides(config: EngineConfig, args: SeedArgs): EngineConfig {
  return {
    ...config,
    engine: {
      batchSize: args.batchSize ?? config.engine.batchSize,
      maxWorkers: args.maxWorkers ?? config.engine.maxWorkers,
      cap: args.cap ?? config.engine.cap,
    },
  };
}

async function openDirectory(
  groupsPath: string | null,
): Promise<DirectoryProvider> {
  if (groupsPath === null) {
    return createStaticDirectoryProvider({ groups: {} });
  }
  try {
    return await loadDirectoryFile(groupsPath);
  } catch (err) {
    throw new ConfigError(`Cannot load groups file: ${errorMessage(err)}`, {
      path: groupsPath,
    });
  }
}

/**
 * `share-seeder` command: load config, plan and directory, seed the share
 * and optionally write the ownership manifest.
 */
export async function runSeedCommand(
  args: SeedArgs,
  deps: SeedCommandDeps = {},
): Promise<Summary> {
  const env = deps.env ?? process.env;
  const rootPath = resolveRootPath(args.root ?? env[ROOT_PATH_ENV]);

  let loaded: EngineConfig;
  try {
    loaded = await loadConfig({ configPath: args.config, rootPath });
  } catch (err) {
    throw new ConfigError(`Cannot load config: ${errorMessage(err)}`, {
      rootPath,
      configPath: args.config,
    });
  }
  const config = applyOverrides(loaded, args);
  const logger = deps.logger ?? createLogger(config.logging);

  const outputRoot = resolveFrom(rootPath, config.output.rootDir);
  const items = await loadPlan(resolve(args.plan), { baseDir: outputRoot });

  // --groups is relative to the working directory, directory.groupsFile to the root
  const { groupsFile } = config.directory;
  const groupsPath = args.groups
    ? resolve(args.groups)
    : groupsFile === null
      ? null
      : resolveFrom(rootPath, groupsFile);
  const provider = await openDirectory(groupsPath);
  if (groupsPath === null) {
    logger.warn("No groups file configured, every file gets the fallback owner");
  }

  logger.info(
    { plan: args.plan, items: items.length, outputRoot, engine: config.engine },
    "Seeding share",
  );

  const manifest = createOwnershipManifest();
  const summary = await runSeeding({
    items,
    config,
    provider,
    fs: deps.fs ?? createNodeFileSystem(),
    ownership: manifest,
    logger,
    parallelism: deps.parallelism,
  });

  if (args.manifest) {
    const manifestPath = resolve(args.manifest);
    await manifest.writeTo(manifestPath);
    logger.info(
      { path: manifestPath, owners: manifest.countsByOwner().length },
      "Ownership manifest written",
    );
  }

  logger.info(summary, "Seeding complete");
  return summary;
}
