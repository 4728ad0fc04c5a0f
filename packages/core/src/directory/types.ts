/** Upstream identity service. Calls may block on the network. */
export interface DirectoryProvider {
  /** Members of a directory group. Rejects when the service is unavailable. */
  fetchGroup(key: string): Promise<string[]>;

  /** Current domain (e.g. NetBIOS name), if the provider can resolve one. */
  resolveDomain?(): Promise<string>;
}

export interface DirectoryCacheEntry {
  readonly key: string;
  readonly members: readonly string[];
  /** Epoch milliseconds; the entry is stale from this instant on. */
  readonly expiresAt: number;
}
