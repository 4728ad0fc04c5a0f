export type { FileSystem } from "./interface.js";
export { createNodeFileSystem } from "./node.js";
