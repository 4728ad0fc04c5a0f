export { DirectoryCache, type DirectoryCacheOptions } from "./cache.js";
export {
  createStaticDirectoryProvider,
  loadDirectoryFile,
  GroupsFileSchema,
  type GroupsFile,
} from "./static-provider.js";
export type { DirectoryProvider, DirectoryCacheEntry } from "./types.js";
