import type { CacheEntry } from "./user-cache";

/**
 * Where cached user identities live between runs.
 */
export interface UserCacheStore {
  readonly description: string;
  load(): Promise<CacheEntry[]>;
  save(entries: CacheEntry[]): Promise<void>;
}
