/**
 * Time-bounded user identity cache with batched fills.
 *
 * Misses are looked up in chunks of at most `maxIdsPerRequest` ids. While a
 * lookup for an id is in flight, other resolve() calls wait on it instead of
 * issuing their own request.
 */

import { PartialResolutionError, RemoteError } from "../errors";
import { chunk, mapWithConcurrency } from "../pool";
import type { UserIdentity } from "../zendesk/users";

export interface CacheEntry {
  user: UserIdentity;
  fetchedAt: number;
}

export type UserLookup = (ids: number[]) => Promise<UserIdentity[]>;

export interface UserCacheOptions {
  ttlMs: number;
  maxIdsPerRequest: number;
  /** Parallel lookups when misses span several chunks. */
  concurrency?: number;
  /** Treat every id as a miss (--no-cache). Results are still written back. */
  bypass?: boolean;
  now?: () => number;
  signal?: AbortSignal;
}

export interface ResolveResult {
  users: Map<number, UserIdentity>;
  hits: number;
  fetched: number;
  error: PartialResolutionError | null;
}

export interface CacheStats {
  entries: number;
  oldestFetchedAt: number | null;
}

export const UNKNOWN_USER_NAME = "Unknown User";
export const UNKNOWN_USER_EMAIL = "unknown@example.com";

export function unknownUser(id: number): UserIdentity {
  return { id, name: UNKNOWN_USER_NAME, email: UNKNOWN_USER_EMAIL };
}

export function isFresh(entry: CacheEntry, now: number, ttlMs: number): boolean {
  return now - entry.fetchedAt < ttlMs;
}

interface ChunkOutcome {
  found: UserIdentity[];
  error: RemoteError | null;
}

interface BatchOutcome {
  found: Map<number, UserIdentity>;
  error: RemoteError | null;
}

export class UserCache {
  private readonly entries = new Map<number, CacheEntry>();
  private readonly inFlight = new Map<number, Promise<UserIdentity | null>>();
  private readonly now: () => number;

  constructor(private readonly lookup: UserLookup, private readonly opts: UserCacheOptions) {
    if (opts.maxIdsPerRequest < 1) {
      throw new RangeError("maxIdsPerRequest must be at least 1");
    }
    this.now = opts.now ?? Date.now;
  }

  /**
   * Load persisted entries. Stale ones are dropped on the way in.
   */
  seed(entries: Iterable<CacheEntry>): number {
    const now = this.now();
    let loaded = 0;
    for (const entry of entries) {
      if (!isFresh(entry, now, this.opts.ttlMs)) continue;
      this.entries.set(entry.user.id, entry);
      loaded++;
    }
    return loaded;
  }

  /** Fresh entries, for persisting. */
  snapshot(): CacheEntry[] {
    const now = this.now();
    return [...this.entries.values()].filter((e) => isFresh(e, now, this.opts.ttlMs));
  }

  stats(): CacheStats {
    const fresh = this.snapshot();
    return {
      entries: fresh.length,
      oldestFetchedAt: fresh.length > 0 ? Math.min(...fresh.map((e) => e.fetchedAt)) : null,
    };
  }

  get size(): number {
    return this.entries.size;
  }

  async resolve(ids: Iterable<number>): Promise<ResolveResult> {
    const wanted = [...new Set(ids)];
    const now = this.now();
    const users = new Map<number, UserIdentity>();
    const pending = new Map<number, Promise<UserIdentity | null>>();
    const missing: number[] = [];
    let hits = 0;

    for (const id of wanted) {
      const entry = this.entries.get(id);
      if (!this.opts.bypass && entry && isFresh(entry, now, this.opts.ttlMs)) {
        users.set(id, entry.user);
        hits++;
        continue;
      }
      const inFlight = this.inFlight.get(id);
      if (inFlight) {
        pending.set(id, inFlight);
      } else {
        missing.push(id);
      }
    }

    let failure: RemoteError | null = null;
    let fetched = 0;

    if (missing.length > 0) {
      const batch = this.fetchMissing(missing);
      for (const id of missing) {
        // Waiters only need the value; a rejected batch is rethrown below
        const forId = batch.then((b) => b.found.get(id) ?? null, () => null);
        this.inFlight.set(id, forId);
        pending.set(id, forId);
      }
      try {
        const outcome = await batch;
        failure = outcome.error;
        fetched = outcome.found.size;
      } finally {
        for (const id of missing) this.inFlight.delete(id);
      }
    }

    const unresolved: number[] = [];
    for (const [id, promise] of pending) {
      const user = await promise;
      if (user) {
        users.set(id, user);
      } else {
        users.set(id, unknownUser(id));
        unresolved.push(id);
      }
    }

    unresolved.sort((a, b) => a - b);
    return {
      users,
      hits,
      fetched,
      error: unresolved.length > 0 ? new PartialResolutionError(unresolved, { cause: failure ?? undefined }) : null,
    };
  }

  private async fetchMissing(ids: number[]): Promise<BatchOutcome> {
    const chunks = chunk(ids, this.opts.maxIdsPerRequest);
    const outcomes = await mapWithConcurrency(
      chunks,
      this.opts.concurrency ?? 1,
      (c) => this.fetchChunk(c),
      { signal: this.opts.signal }
    );

    const found = new Map<number, UserIdentity>();
    let error: RemoteError | null = null;
    for (const outcome of outcomes) {
      for (const user of outcome.found) found.set(user.id, user);
      error ??= outcome.error;
    }
    return { found, error };
  }

  private async fetchChunk(ids: number[]): Promise<ChunkOutcome> {
    try {
      const requested = new Set(ids);
      const found = (await this.lookup(ids)).filter((u) => requested.has(u.id));
      const fetchedAt = this.now();
      for (const user of found) {
        this.entries.set(user.id, { user, fetchedAt });
      }
      return { found, error: null };
    } catch (err) {
      if (err instanceof RemoteError) {
        console.warn(`  Users: lookup of ${ids.length} id(s) failed (${err.message})`);
        return { found: [], error: err };
      }
      throw err;
    }
  }
}
