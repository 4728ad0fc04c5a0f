import { dirname } from "node:path";
import type { FileSystem } from "../storage/filesystem/interface.js";

export interface MemoryFile {
  size: number;
  stub: Uint8Array;
}

export interface MemoryFileSystemOptions {
  /** Return true to make `allocateSparse` reject for this path. */
  failAllocate?: (path: string) => boolean;
  /** Return true to make `ensureDir` reject for this path. */
  failEnsureDir?: (path: string) => boolean;
}

export interface MemoryFileSystem extends FileSystem {
  readonly files: Map<string, MemoryFile>;
  readonly dirs: Set<string>;
  /** Every path passed to `ensureDir`, in call order. */
  readonly ensureDirCalls: string[];
}

function errno(code: string, syscall: string, path: string): NodeJS.ErrnoException {
  return Object.assign(new Error(`${code}: ${syscall} '${path}'`), {
    code,
    syscall,
    path,
  });
}

/** Yield to the event loop so concurrent callers interleave like real I/O. */
const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

export function createMemoryFileSystem(
  options: MemoryFileSystemOptions = {},
): MemoryFileSystem {
  const files = new Map<string, MemoryFile>();
  const dirs = new Set<string>(["/", "."]);
  const ensureDirCalls: string[] = [];

  return {
    files,
    dirs,
    ensureDirCalls,

    async ensureDir(path) {
      ensureDirCalls.push(path);
      await tick();
      if (options.failEnsureDir?.(path)) {
        throw errno("EACCES", "mkdir", path);
      }
      let current = path;
      while (!dirs.has(current)) {
        dirs.add(current);
        current = dirname(current);
      }
    },

    async allocateSparse(path, bytes) {
      await tick();
      if (!dirs.has(dirname(path))) {
        throw errno("ENOENT", "open", path);
      }
      if (files.has(path)) {
        throw errno("EEXIST", "open", path);
      }
      if (options.failAllocate?.(path)) {
        throw errno("EOPNOTSUPP", "ftruncate", path);
      }
      files.set(path, { size: bytes, stub: new Uint8Array(0) });
    },

    async writeStub(path, stub) {
      await tick();
      const file = files.get(path);
      if (!file) {
        throw errno("ENOENT", "open", path);
      }
      file.stub = stub;
      file.size = Math.max(file.size, stub.byteLength);
    },
  };
}
