import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import type { IdentitySource } from "../identity/resolver.js";

/** Owner/ACL primitive for a created file. */
export interface OwnershipApplier {
  applyOwner(path: string, owner: string, source: IdentitySource): Promise<void>;
}

export interface OwnershipRecord {
  path: string;
  owner: string;
  source: IdentitySource;
}

export interface OwnershipManifest extends OwnershipApplier {
  entries(): readonly OwnershipRecord[];
  /** Owners by number of files, most frequent first. */
  countsByOwner(): Array<{ owner: string; files: number }>;
  /** Write all records as pretty JSON, creating parent directories. */
  writeTo(filePath: string): Promise<void>;
}

/**
 * Applier that records intended ownership instead of changing ACLs, for
 * hosts without an ACL backend or for dry runs. The manifest can be replayed
 * by an external ACL tool.
 */
export function createOwnershipManifest(): OwnershipManifest {
  const records: OwnershipRecord[] = [];

  return {
    async applyOwner(path, owner, source) {
      records.push({ path, owner, source });
    },

    entries() {
      return [...records];
    },

    countsByOwner() {
      const counts = new Map<string, number>();
      for (const { owner } of records) {
        counts.set(owner, (counts.get(owner) ?? 0) + 1);
      }
      return [...counts]
        .map(([owner, files]) => ({ owner, files }))
        .sort((a, b) => b.files - a.files || a.owner.localeCompare(b.owner));
    },

    async writeTo(filePath) {
      await mkdir(dirname(filePath), { recursive: true });
      const sorted = [...records].sort((a, b) => a.path.localeCompare(b.path));
      await writeFile(filePath, JSON.stringify(sorted, null, 2) + "\n", "utf-8");
    },
  };
}
