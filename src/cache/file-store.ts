/**
 * JSON file persistence for the user cache.
 * Writes go to a temp file that is renamed over the target, so a crash or
 * interrupt leaves either the old file or the new one.
 */

import { mkdir, readFile, rename, writeFile } from "fs/promises";
import { dirname, resolve } from "path";
import type { CacheEntry } from "./user-cache";
import type { UserCacheStore } from "./store";

interface CacheFile {
  version: 1;
  entries: CacheEntry[];
}

export function parseCacheFile(raw: string): CacheEntry[] {
  const data: unknown = JSON.parse(raw);
  if (typeof data !== "object" || data === null || !("entries" in data) || !Array.isArray(data.entries)) {
    throw new Error("user cache file has no entries array");
  }

  const entries: CacheEntry[] = [];
  for (const item of data.entries) {
    const entry = toEntry(item);
    if (entry) entries.push(entry);
  }
  return entries;
}

function toEntry(item: unknown): CacheEntry | null {
  if (typeof item !== "object" || item === null) return null;
  if (!("user" in item) || !("fetchedAt" in item)) return null;
  const { user, fetchedAt } = item;
  if (typeof fetchedAt !== "number" || typeof user !== "object" || user === null) return null;
  if (!("id" in user) || !("name" in user) || !("email" in user)) return null;
  const { id, name, email } = user;
  if (typeof id !== "number" || typeof name !== "string" || typeof email !== "string") return null;
  return { user: { id, name, email }, fetchedAt };
}

export class FileUserCacheStore implements UserCacheStore {
  readonly description: string;
  private readonly path: string;

  constructor(path: string) {
    this.path = resolve(path);
    this.description = `file ${this.path}`;
  }

  async load(): Promise<CacheEntry[]> {
    let raw: string;
    try {
      raw = await readFile(this.path, "utf-8");
    } catch (err) {
      if (isNotFound(err)) return [];
      throw err;
    }

    try {
      return parseCacheFile(raw);
    } catch (err) {
      console.warn(`  User cache: ignoring unreadable ${this.path} (${err instanceof Error ? err.message : String(err)})`);
      return [];
    }
  }

  async save(entries: CacheEntry[]): Promise<void> {
    const body: CacheFile = { version: 1, entries };
    const tmp = `${this.path}.${process.pid}.tmp`;
    await mkdir(dirname(this.path), { recursive: true });
    await writeFile(tmp, JSON.stringify(body, null, 2), "utf-8");
    await rename(tmp, this.path);
  }
}

function isNotFound(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}
