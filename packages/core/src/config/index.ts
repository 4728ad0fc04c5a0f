export {
  DEFAULT_ROOT_PATH,
  DEFAULT_CONFIG_PATH,
  ROOT_PATH_ENV,
} from "./defaults.js";
export { loadConfig, saveConfig, type LoadConfigOptions } from "./loader.js";
export { expandHomePath, resolveRootPath, resolveFrom } from "./paths.js";
