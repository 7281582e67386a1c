/**
 * Export run orchestrator.
 *
 * Idle → FetchingTickets → FetchingComments → ResolvingUsers → Joining → Done,
 * with Failed reachable from any stage. No stage is retried here; retries
 * happen per request inside the client.
 */

import type { UserCache } from "../cache/user-cache";
import type { PartialResolutionError } from "../errors";
import type { UsageSummary } from "../monitor/usage";
import { fetchAllComments, indexByTicket, type CommentFetchResult } from "../zendesk/comments";
import { fetchTickets, type Ticket } from "../zendesk/tickets";
import type { ZendeskSession } from "../zendesk/client";
import { computeWindow, type DateWindow, type WindowMode } from "../window";
import { buildExportRows, collectUserIds, type ExportRow } from "./rows";

export type ExportState =
  | "idle"
  | "fetching_tickets"
  | "fetching_comments"
  | "resolving_users"
  | "joining"
  | "done"
  | "failed";

const NEXT_STATE: Record<ExportState, ExportState | null> = {
  idle: "fetching_tickets",
  fetching_tickets: "fetching_comments",
  fetching_comments: "resolving_users",
  resolving_users: "joining",
  joining: "done",
  done: null,
  failed: null,
};

export interface TicketFailure {
  ticketId: number;
  message: string;
}

export interface ExportResult {
  window: DateWindow;
  tickets: Ticket[];
  rows: ExportRow[];
  failures: TicketFailure[];
  unresolvedUserIds: number[];
  summary: UsageSummary;
}

export interface OrchestratorOptions {
  session: ZendeskSession;
  userCache: UserCache;
  /** 1 runs the baseline sequential pipeline. */
  concurrency: number;
  pageSize?: number;
  onStateChange?: (from: ExportState, to: ExportState) => void;
}

export class ExportOrchestrator {
  private current: ExportState = "idle";
  private readonly history: ExportState[] = ["idle"];
  private result: ExportResult | null = null;
  private failure: unknown = null;

  constructor(private readonly opts: OrchestratorOptions) {}

  get state(): ExportState {
    return this.current;
  }

  get transitions(): readonly ExportState[] {
    return this.history;
  }

  /** Set once the run reaches Done. */
  get output(): ExportResult | null {
    return this.result;
  }

  get error(): unknown {
    return this.failure;
  }

  async run(mode: WindowMode, now: Date = new Date()): Promise<ExportResult> {
    if (this.current !== "idle") {
      throw new Error(`Export already ${this.current}; create a new orchestrator per run`);
    }

    try {
      this.advance("fetching_tickets");
      const window = computeWindow(mode, now);
      const tickets = await this.fetchTicketsStage(window);

      this.advance("fetching_comments");
      const commentResults = await this.fetchCommentsStage(tickets);

      this.advance("resolving_users");
      const resolution = await this.opts.userCache.resolve(collectUserIds(tickets, commentResults));
      this.reportPartial(resolution.error, resolution.hits, resolution.fetched);

      this.advance("joining");
      const rows = buildExportRows(tickets, indexByTicket(commentResults), resolution.users);
      const failures = commentResults.flatMap((r) => (r.ok ? [] : [{ ticketId: r.ticketId, message: r.error.message }]));

      this.result = {
        window,
        tickets,
        rows,
        failures,
        unresolvedUserIds: resolution.error?.missingIds ?? [],
        summary: this.opts.session.monitor.summary(),
      };
      this.advance("done");
      return this.result;
    } catch (err) {
      this.failure = err;
      this.moveTo("failed");
      throw err;
    }
  }

  private async fetchTicketsStage(window: DateWindow): Promise<Ticket[]> {
    console.log(`Retrieving tickets from ${window.description}...`);
    console.log(`  Date range: ${window.start.toISOString()} to ${window.end.toISOString()} (exclusive)`);
    const tickets = await fetchTickets(this.opts.session, window, { pageSize: this.opts.pageSize });
    console.log(`  Retrieved ${tickets.length} tickets`);
    return tickets;
  }

  private async fetchCommentsStage(tickets: Ticket[]): Promise<CommentFetchResult[]> {
    const { concurrency } = this.opts;
    const modeLabel = concurrency > 1 ? `up to ${concurrency} concurrent requests` : "sequentially";
    console.log(`Fetching comments for ${tickets.length} tickets (${modeLabel})...`);

    const results = await fetchAllComments(
      this.opts.session,
      tickets.map((t) => t.id),
      {
        concurrency,
        pageSize: this.opts.pageSize,
        onProgress: (done, total) => {
          if (done % 10 === 0 || done === total) {
            console.log(`  Progress: ${done}/${total} tickets`);
          }
        },
      }
    );

    const failed = results.filter((r) => !r.ok).length;
    if (failed > 0) {
      console.warn(`  ${failed} ticket(s) exported with an error marker instead of comments`);
    }
    return results;
  }

  private reportPartial(error: PartialResolutionError | null, hits: number, fetched: number): void {
    console.log(`  Users: ${hits} from cache, ${fetched} fetched`);
    if (error) {
      console.warn(`  ${error.message} (shown as unknown users)`);
    }
  }

  private advance(to: ExportState): void {
    const expected = NEXT_STATE[this.current];
    if (expected !== to) {
      throw new Error(`Invalid export transition ${this.current} → ${to}`);
    }
    this.moveTo(to);
  }

  private moveTo(to: ExportState): void {
    const from = this.current;
    this.current = to;
    this.history.push(to);
    this.opts.onStateChange?.(from, to);
  }
}
