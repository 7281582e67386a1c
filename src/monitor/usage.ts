/**
 * Per-run record of every outbound API call.
 * One instance is created per run and handed to each call site.
 */

export type CallCategory = "authentication" | "ticket_listing" | "ticket_comments" | "users" | "other";

export const CALL_CATEGORIES: readonly CallCategory[] = [
  "authentication",
  "ticket_listing",
  "ticket_comments",
  "users",
  "other",
];

export type CallOutcome = "success" | "failure";

export interface CallRecord {
  category: CallCategory;
  startedAt: number;
  durationMs: number;
  outcome: CallOutcome;
}

export interface CategoryStats {
  count: number;
  failures: number;
  totalMs: number;
  averageMs: number;
  minMs: number;
  maxMs: number;
}

export interface UsageSummary {
  categories: Record<CallCategory, CategoryStats>;
  totalCalls: number;
  totalFailures: number;
  totalMs: number;
  averageMs: number;
  generatedAt: string;
}

export class UsageMonitor {
  private readonly records: CallRecord[] = [];

  constructor(private readonly now: () => number = Date.now) {}

  /**
   * Run `fn` and append a CallRecord whether it resolves or throws.
   * The result or error is passed through unchanged.
   */
  async record<T>(category: CallCategory, fn: () => Promise<T>): Promise<T> {
    const startedAt = this.now();
    let outcome: CallOutcome = "failure";
    try {
      const result = await fn();
      outcome = "success";
      return result;
    } finally {
      // One complete record per call, pushed once the outcome is known
      this.records.push({ category, startedAt, durationMs: Math.max(0, this.now() - startedAt), outcome });
    }
  }

  getRecords(): readonly CallRecord[] {
    return this.records;
  }

  count(category?: CallCategory): number {
    if (!category) return this.records.length;
    return this.records.filter((r) => r.category === category).length;
  }

  summary(): UsageSummary {
    const of = (category: CallCategory) => summarize(this.records.filter((r) => r.category === category));
    const categories: Record<CallCategory, CategoryStats> = {
      authentication: of("authentication"),
      ticket_listing: of("ticket_listing"),
      ticket_comments: of("ticket_comments"),
      users: of("users"),
      other: of("other"),
    };
    const overall = summarize(this.records);

    return {
      categories,
      totalCalls: overall.count,
      totalFailures: overall.failures,
      totalMs: overall.totalMs,
      averageMs: overall.averageMs,
      generatedAt: new Date(this.now()).toISOString(),
    };
  }
}

function summarize(records: CallRecord[]): CategoryStats {
  if (records.length === 0) {
    return { count: 0, failures: 0, totalMs: 0, averageMs: 0, minMs: 0, maxMs: 0 };
  }
  const durations = records.map((r) => r.durationMs);
  const totalMs = durations.reduce((sum, d) => sum + d, 0);
  return {
    count: records.length,
    failures: records.filter((r) => r.outcome === "failure").length,
    totalMs,
    averageMs: totalMs / records.length,
    minMs: Math.min(...durations),
    maxMs: Math.max(...durations),
  };
}
