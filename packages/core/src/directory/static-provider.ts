import { readFile } from "node:fs/promises";
import { z } from "zod";
import type { DirectoryProvider } from "./types.js";
import { DirectoryUnavailableError } from "../errors/catalog.js";

export const GroupsFileSchema = z.object({
  domain: z.string().min(1).optional(),
  groups: z.record(z.string(), z.array(z.string().min(1))),
});

export type GroupsFile = z.infer<typeof GroupsFileSchema>;

/**
 * Provider over a fixed group table. Unknown groups reject the same way an
 * unreachable directory would.
 */
export function createStaticDirectoryProvider(data: GroupsFile): DirectoryProvider {
  const groups = new Map(Object.entries(data.groups));
  const { domain } = data;

  return {
    async fetchGroup(key) {
      const members = groups.get(key);
      if (!members) {
        throw new DirectoryUnavailableError(`Unknown directory group: ${key}`, {
          group: key,
        });
      }
      return [...members];
    },

    ...(domain !== undefined && {
      async resolveDomain() {
        return domain;
      },
    }),
  };
}

/** Load a groups JSON file (`{ domain?, groups: { key: members[] } }`). */
export async function loadDirectoryFile(path: string): Promise<DirectoryProvider> {
  const raw = await readFile(path, "utf-8");
  return createStaticDirectoryProvider(GroupsFileSchema.parse(JSON.parse(raw)));
}
