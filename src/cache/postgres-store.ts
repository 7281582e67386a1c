/**
 * Postgres persistence for the user cache (cache.backend = "postgres").
 */

import { deleteCachedUsersOlderThan, getCachedUsers, upsertCachedUsers } from "../db/queries";
import type { CacheEntry } from "./user-cache";
import type { UserCacheStore } from "./store";

export class PostgresUserCacheStore implements UserCacheStore {
  readonly description = "postgres table cached_users";

  constructor(private readonly ttlMs: number, private readonly now: () => number = Date.now) {}

  async load(): Promise<CacheEntry[]> {
    return getCachedUsers();
  }

  async save(entries: CacheEntry[]): Promise<void> {
    await upsertCachedUsers(entries);
    await deleteCachedUsersOlderThan(new Date(this.now() - this.ttlMs));
  }
}
