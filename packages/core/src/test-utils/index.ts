export { makeMockLogger, type MockLogger } from "./logger.js";
export {
  createMemoryFileSystem,
  type MemoryFile,
  type MemoryFileSystem,
  type MemoryFileSystemOptions,
} from "./memory-fs.js";
