import { mkdir, open, rm } from "node:fs/promises";
import type { FileSystem } from "./interface.js";

/** `FileSystem` on node:fs. Extension via ftruncate leaves holes on filesystems that support them. */
export function createNodeFileSystem(): FileSystem {
  return {
    async ensureDir(path) {
      await mkdir(path, { recursive: true });
    },

    async allocateSparse(path, bytes) {
      // "wx" fails with EEXIST instead of truncating someone else's file
      const handle = await open(path, "wx");
      try {
        await handle.truncate(bytes);
      } catch (err) {
        await handle.close();
        await rm(path, { force: true });
        throw err;
      }
      await handle.close();
    },

    async writeStub(path, stub) {
      if (stub.byteLength === 0) return;
      const handle = await open(path, "r+");
      try {
        await handle.write(stub, 0, stub.byteLength, 0);
      } finally {
        await handle.close();
      }
    },
  };
}
