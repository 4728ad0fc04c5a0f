/**
 * Storage primitives the builder orchestrates.
 * Paths are absolute; sizes are in bytes.
 */
export interface FileSystem {
  /**
   * Create a directory and its parents. No-op if it already exists.
   */
  ensureDir(path: string): Promise<void>;

  /**
   * Exclusively create `path` and extend it to `bytes` without writing data.
   * @throws an errno error with code `EEXIST` if `path` already exists
   */
  allocateSparse(path: string, bytes: number): Promise<void>;

  /**
   * Write placeholder bytes at offset 0 of an allocated file without
   * changing its length when the stub fits.
   */
  writeStub(path: string, stub: Uint8Array): Promise<void>;
}
