export { UserCache, isFresh, unknownUser, UNKNOWN_USER_NAME, UNKNOWN_USER_EMAIL, type CacheEntry, type UserLookup, type UserCacheOptions, type ResolveResult, type CacheStats } from "./user-cache";
export { FileUserCacheStore, parseCacheFile } from "./file-store";
export { PostgresUserCacheStore } from "./postgres-store";
export type { UserCacheStore } from "./store";
