import { join } from "node:path";
import { homedir } from "node:os";

export const DEFAULT_ROOT_PATH = join(homedir(), "share-seeder");
export const DEFAULT_CONFIG_PATH = join(DEFAULT_ROOT_PATH, "config.json");

/** Environment variable that overrides the root path for the CLI. */
export const ROOT_PATH_ENV = "SHARE_SEEDER_ROOT_PATH";
