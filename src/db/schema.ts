import { pgTable, text, integer, bigint, serial, index } from "drizzle-orm/pg-core";

// ── Cached Users ─────────────────────────────────────────────────────────────
export const cachedUsers = pgTable(
  "cached_users",
  {
    // Zendesk ids outgrow a 4-byte int; mode "number" stays exact below 2^53
    userId: bigint("user_id", { mode: "number" }).primaryKey(),
    name: text("name").notNull(),
    email: text("email").notNull(),
    fetchedAt: text("fetched_at").notNull(),
  },
  (table) => [
    index("idx_cached_users_fetched_at").on(table.fetchedAt),
  ]
);

// ── Export Runs ──────────────────────────────────────────────────────────────
export const exportRuns = pgTable(
  "export_runs",
  {
    id: serial("id").primaryKey(),
    startedAt: text("started_at").notNull(),
    completedAt: text("completed_at"),
    mode: text("mode").notNull(),
    variant: text("variant").notNull(),
    windowStart: text("window_start").notNull(),
    windowEnd: text("window_end").notNull(),
    ticketCount: integer("ticket_count"),
    rowCount: integer("row_count"),
    failedTickets: integer("failed_tickets"),
    totalCalls: integer("total_calls"),
    outputPath: text("output_path"),
    usageJson: text("usage_json"),
  },
  (table) => [
    index("idx_export_runs_started_at").on(table.startedAt),
  ]
);
