export { createNodeFileSystem, type FileSystem } from "./filesystem/index.js";
