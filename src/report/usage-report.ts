/**
 * Plain-text API usage report printed at the end of a run.
 */

import type { CacheStats } from "../cache/user-cache";
import { CALL_CATEGORIES, type CallCategory, type UsageSummary } from "../monitor/usage";

const RULE = "=".repeat(60);

function titleCase(category: CallCategory): string {
  return category
    .split("_")
    .map((w) => (w[0]?.toUpperCase() ?? "") + w.slice(1))
    .join(" ");
}

function seconds(ms: number, digits: number): string {
  return `${(ms / 1000).toFixed(digits)}s`;
}

export interface UsageReportOptions {
  cache?: CacheStats | null;
  ttlMs?: number;
  now?: number;
}

export function formatUsageReport(summary: UsageSummary, opts: UsageReportOptions = {}): string {
  const lines: string[] = [];

  lines.push(RULE);
  lines.push("ZENDESK API USAGE REPORT");
  lines.push(RULE);
  lines.push("");

  lines.push("API CALLS BY CATEGORY:");
  for (const category of CALL_CATEGORIES) {
    const stats = summary.categories[category];
    if (stats.count === 0) continue;
    const failed = stats.failures > 0 ? ` (${stats.failures} failed)` : "";
    lines.push(`  - ${titleCase(category)}: ${stats.count} calls${failed}`);
  }
  lines.push(`  TOTAL: ${summary.totalCalls} calls`);
  lines.push("");

  lines.push("TIMING INFORMATION (seconds):");
  for (const category of CALL_CATEGORIES) {
    const stats = summary.categories[category];
    if (stats.count === 0) continue;
    lines.push(`  - ${titleCase(category)}:`);
    lines.push(`    * Total: ${seconds(stats.totalMs, 2)}`);
    lines.push(`    * Average: ${seconds(stats.averageMs, 4)}`);
    lines.push(`    * Range: ${seconds(stats.minMs, 4)} - ${seconds(stats.maxMs, 4)}`);
  }
  lines.push("");
  lines.push(`TIME SPENT IN API CALLS: ${seconds(summary.totalMs, 2)}`);
  lines.push(`AVERAGE TIME PER API CALL: ${seconds(summary.averageMs, 4)}`);

  const cache = opts.cache;
  if (cache && cache.entries > 0 && cache.oldestFetchedAt !== null) {
    const now = opts.now ?? Date.now();
    const ageHours = (now - cache.oldestFetchedAt) / 3_600_000;
    lines.push("");
    lines.push("USER CACHE:");
    lines.push(`  - Entries: ${cache.entries} users`);
    lines.push(`  - Oldest entry age: ${ageHours.toFixed(1)} hours`);
    if (opts.ttlMs !== undefined) {
      lines.push(`  - Oldest entry expires in: ${((opts.ttlMs / 3_600_000) - ageHours).toFixed(1)} hours`);
    }
  } else {
    lines.push("");
    lines.push("USER CACHE: Not used");
  }

  lines.push(RULE);
  return lines.join("\n");
}
