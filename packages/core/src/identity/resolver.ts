import type { Logger } from "pino";
import type { DirectoryCache } from "../directory/cache.js";
import type { IdentityConfig } from "../schemas/engine-config.js";
import { CacheUnavailableError } from "../errors/catalog.js";

export type IdentitySource = "directory" | "stale" | "fallback";

export interface ResolvedIdentity {
  /** Owner principal, `DOMAIN\name` when a domain is known. */
  owner: string;
  source: IdentitySource;
  group: string;
}

export interface IdentityResolverOptions {
  cache: DirectoryCache;
  policy: IdentityConfig;
  logger: Logger;
}

export interface IdentityStats {
  directory: number;
  stale: number;
  fallback: number;
}

/** "GRP-{tag}-Users", "Finance" → "GRP-Finance-Users" */
export function groupKeyFor(pattern: string, tag: string): string {
  return pattern.split("{tag}").join(tag);
}

/**
 * Picks an owner for a created file from the directory cache. Never waits on
 * the directory service: a miss falls back to the last known (stale) group,
 * then to the configured fallback principal, and asks the cache to refresh
 * in the background.
 */
export class IdentityResolver {
  private readonly cache: DirectoryCache;
  private readonly policy: IdentityConfig;
  private readonly logger: Logger;
  private readonly stats: IdentityStats = { directory: 0, stale: 0, fallback: 0 };

  constructor(options: IdentityResolverOptions) {
    this.cache = options.cache;
    this.policy = options.policy;
    this.logger = options.logger;
  }

  groupFor(tag: string): string {
    return groupKeyFor(this.policy.groupPattern, tag);
  }

  resolve(tag: string): ResolvedIdentity {
    const group = this.groupFor(tag);

    const fresh = this.cache.resolveRandomMember(group);
    if (fresh !== undefined) {
      this.stats.directory++;
      return { owner: this.qualify(fresh), source: "directory", group };
    }

    this.cache.refreshInBackground();

    const staleEntry = this.cache.lookupStale(group);
    const stale = staleEntry ? this.cache.pick(staleEntry) : undefined;
    if (stale !== undefined) {
      this.stats.stale++;
      return { owner: this.qualify(stale), source: "stale", group };
    }

    this.stats.fallback++;
    this.logger.debug(
      new CacheUnavailableError({ group, tag }).toJSON(),
      "Using fallback identity",
    );
    return {
      owner: this.qualify(this.policy.fallbackOwner),
      source: "fallback",
      group,
    };
  }

  getStats(): IdentityStats {
    return { ...this.stats };
  }

  private qualify(name: string): string {
    if (name.includes("\\")) return name;
    const domain = this.policy.domain ?? this.cache.getDomain();
    return domain ? `${domain}\\${name}` : name;
  }
}
