import type { Logger } from "pino";
import type { DirectoryCacheEntry, DirectoryProvider } from "./types.js";
import {
  DirectoryUnavailableError,
  errorMessage,
} from "../errors/catalog.js";

export interface DirectoryCacheOptions {
  provider: DirectoryProvider;
  logger: Logger;
  /** Entry lifetime in seconds (default: 300) */
  ttlSeconds?: number;
  /** Group keys to fetch on every warm */
  groupKeys?: Iterable<string>;
  /** Minimum gap between background refresh attempts in ms (default: 30_000) */
  backgroundRetryMs?: number;
  /** Clock in epoch ms (default: Date.now) */
  now?: () => number;
  /** Uniform source in [0, 1) (default: Math.random) */
  random?: () => number;
}

const DOMAIN_KEY = "<domain>";

/**
 * Read-mostly cache of directory groups and the current domain.
 *
 * Entries are only written by the warm routine. Concurrent `warm()` calls
 * share one in-flight refresh, and that refresh fetches one key at a time,
 * so the provider never sees more than one request from this cache at once.
 * A failed fetch keeps the previous entry.
 */
export class DirectoryCache {
  private readonly provider: DirectoryProvider;
  private readonly logger: Logger;
  private readonly ttlMs: number;
  private readonly backgroundRetryMs: number;
  private readonly now: () => number;
  private readonly random: () => number;

  private readonly entries = new Map<string, DirectoryCacheEntry>();
  private readonly keys = new Set<string>();
  private domain: string | undefined;
  private domainExpiresAt = 0;
  private warmInFlight: Promise<void> | null = null;
  private lastWarmStartedAt: number | null = null;

  constructor(options: DirectoryCacheOptions) {
    this.provider = options.provider;
    this.logger = options.logger;
    this.ttlMs = (options.ttlSeconds ?? 300) * 1000;
    this.backgroundRetryMs = options.backgroundRetryMs ?? 30_000;
    this.now = options.now ?? Date.now;
    this.random = options.random ?? Math.random;
    this.track(options.groupKeys ?? []);
  }

  /** Add group keys to the warm set. */
  track(keys: Iterable<string>): void {
    for (const key of keys) {
      this.keys.add(key);
    }
  }

  get trackedKeys(): readonly string[] {
    return [...this.keys];
  }

  /**
   * Fetch every tracked group that is missing or stale (all of them when
   * `force` is set). Rejects with `DirectoryUnavailableError` if any fetch
   * failed; entries that did refresh are kept either way.
   */
  warm(force = false): Promise<void> {
    if (this.warmInFlight) {
      return this.warmInFlight;
    }

    this.lastWarmStartedAt = this.now();
    this.warmInFlight = this.refresh(force).finally(() => {
      this.warmInFlight = null;
    });
    return this.warmInFlight;
  }

  /**
   * Start a warm without waiting for it, at most once per
   * `backgroundRetryMs`. Failures are logged, not thrown.
   */
  refreshInBackground(): void {
    if (this.warmInFlight) return;
    if (
      this.lastWarmStartedAt !== null &&
      this.now() - this.lastWarmStartedAt < this.backgroundRetryMs
    ) {
      return;
    }

    this.warm().catch((err: unknown) => {
      this.logger.debug(
        { error: errorMessage(err) },
        "Background directory refresh failed",
      );
    });
  }

  /** Fresh entry for `key`, or undefined. Never contacts the provider. */
  lookup(key: string): DirectoryCacheEntry | undefined {
    const entry = this.entries.get(key);
    if (!entry || entry.expiresAt <= this.now()) {
      return undefined;
    }
    return entry;
  }

  /** Last fetched entry for `key`, even if it has expired. */
  lookupStale(key: string): DirectoryCacheEntry | undefined {
    return this.entries.get(key);
  }

  /** Pseudo-random member of a fresh, non-empty group. */
  resolveRandomMember(groupKey: string): string | undefined {
    const entry = this.lookup(groupKey);
    return entry ? this.pick(entry) : undefined;
  }

  pick(entry: DirectoryCacheEntry): string | undefined {
    const { members } = entry;
    if (members.length === 0) return undefined;
    const index = Math.min(
      members.length - 1,
      Math.floor(this.random() * members.length),
    );
    return members[index];
  }

  /** Last resolved domain; kept after expiry until a refresh replaces it. */
  getDomain(): string | undefined {
    return this.domain;
  }

  /** Drop one entry, or every entry and the domain. */
  invalidate(key?: string): void {
    if (key !== undefined) {
      this.entries.delete(key);
      return;
    }
    this.entries.clear();
    this.domain = undefined;
    this.domainExpiresAt = 0;
  }

  private async refresh(force: boolean): Promise<void> {
    const startedAt = this.now();
    const due = [...this.keys].filter(
      (key) => force || this.lookup(key) === undefined,
    );
    const failed: Array<{ key: string; error: string }> = [];

    for (const key of due) {
      try {
        const members = await this.provider.fetchGroup(key);
        this.entries.set(key, {
          key,
          members: Object.freeze([...members]),
          expiresAt: this.now() + this.ttlMs,
        });
      } catch (err) {
        failed.push({ key, error: errorMessage(err) });
        this.logger.warn(
          { group: key, error: errorMessage(err), retained: this.entries.has(key) },
          "Directory group fetch failed",
        );
      }
    }

    let domainRefreshed = false;
    if (
      this.provider.resolveDomain &&
      (force || this.domainExpiresAt <= this.now())
    ) {
      try {
        this.domain = await this.provider.resolveDomain();
        this.domainExpiresAt = this.now() + this.ttlMs;
        domainRefreshed = true;
      } catch (err) {
        failed.push({ key: DOMAIN_KEY, error: errorMessage(err) });
        this.logger.warn(
          { error: errorMessage(err), retained: this.domain !== undefined },
          "Domain resolution failed",
        );
      }
    }

    this.logger.debug(
      {
        refreshed: due.length - failed.filter((f) => f.key !== DOMAIN_KEY).length,
        failed: failed.length,
        domainRefreshed,
        durationMs: this.now() - startedAt,
      },
      "Directory cache warmed",
    );

    if (failed.length > 0) {
      throw new DirectoryUnavailableError(
        `Directory refresh failed for ${failed.length} lookup(s)`,
        { failed },
      );
    }
  }
}
