import { eq, lt, sql } from "drizzle-orm";
import { getDb } from "./index";
import { cachedUsers, exportRuns } from "./schema";
import type { CacheEntry } from "../cache/user-cache";
import type { UsageSummary } from "../monitor/usage";

const CHUNK_SIZE = 500;

// ── Cached Users ─────────────────────────────────────────────────────────────

export async function getCachedUsers(): Promise<CacheEntry[]> {
  const db = getDb();
  const rows = await db.select().from(cachedUsers);
  return rows.map((r) => ({
    user: { id: r.userId, name: r.name, email: r.email },
    fetchedAt: Date.parse(r.fetchedAt),
  }));
}

export async function upsertCachedUsers(entries: CacheEntry[]): Promise<void> {
  if (entries.length === 0) return;
  const db = getDb();

  const values = entries.map((e) => ({
    userId: e.user.id,
    name: e.user.name,
    email: e.user.email,
    fetchedAt: new Date(e.fetchedAt).toISOString(),
  }));

  for (let i = 0; i < values.length; i += CHUNK_SIZE) {
    const chunk = values.slice(i, i + CHUNK_SIZE);
    await db.insert(cachedUsers).values(chunk).onConflictDoUpdate({
      target: cachedUsers.userId,
      set: {
        name: sql`excluded.name`,
        email: sql`excluded.email`,
        fetchedAt: sql`excluded.fetched_at`,
      },
    });
  }
}

export async function deleteCachedUsersOlderThan(cutoff: Date): Promise<void> {
  const db = getDb();
  await db.delete(cachedUsers).where(lt(cachedUsers.fetchedAt, cutoff.toISOString()));
}

// ── Export Runs ──────────────────────────────────────────────────────────────

export interface StartRunParams {
  mode: string;
  variant: string;
  windowStart: Date;
  windowEnd: Date;
}

export async function startExportRun(params: StartRunParams): Promise<number> {
  const db = getDb();
  const [result] = await db
    .insert(exportRuns)
    .values({
      startedAt: new Date().toISOString(),
      mode: params.mode,
      variant: params.variant,
      windowStart: params.windowStart.toISOString(),
      windowEnd: params.windowEnd.toISOString(),
    })
    .returning({ id: exportRuns.id });
  if (!result) throw new Error("export_runs insert returned no id");
  return result.id;
}

export interface CompleteRunParams {
  ticketCount: number;
  rowCount: number;
  failedTickets: number;
  outputPath: string | null;
  usage: UsageSummary;
}

export async function completeExportRun(runId: number, params: CompleteRunParams): Promise<void> {
  const db = getDb();
  await db.update(exportRuns)
    .set({
      completedAt: new Date().toISOString(),
      ticketCount: params.ticketCount,
      rowCount: params.rowCount,
      failedTickets: params.failedTickets,
      totalCalls: params.usage.totalCalls,
      outputPath: params.outputPath,
      usageJson: JSON.stringify(params.usage),
    })
    .where(eq(exportRuns.id, runId));
}
