/**
 * In-process stand-in for the Zendesk API. Implements the endpoints the
 * exporter uses and records every request it receives.
 */
import { UsageMonitor } from "../../src/monitor/usage";
import { createSession, type ZendeskSession } from "../../src/zendesk/client";
import type { RetrySettings } from "../../src/config";
import { testClientConfig } from "./config";
import type { RawComment, RawTicket, RawUser } from "./zendesk-responses";

export interface FakeZendeskData {
  tickets: RawTicket[];
  comments: Map<number, RawComment[]>;
  users: RawUser[];
}

export interface FakeZendeskOptions {
  ticketPageSize?: number;
  commentPageSize?: number;
  /** ticket id → status returned for every comments request of that ticket. */
  failingComments?: Map<number, number>;
  /** ticket id → number of 503s served before comments succeed. */
  flakyComments?: Map<number, number>;
  /** Status returned for users/show_many (every request). */
  usersStatus?: number;
  /** Status returned for every request (e.g. 401). */
  globalStatus?: number;
  /** Artificial latency per comments request, to shuffle completion order. */
  commentDelayMs?: (ticketId: number) => number;
  me?: RawUser | { id: null; name: string };
}

export const FAKE_BASE_URL = "https://example.zendesk.com";

export class FakeZendesk {
  readonly requests: string[] = [];
  private inFlightComments = 0;
  maxInFlightComments = 0;
  private readonly flakyRemaining: Map<number, number>;

  constructor(private readonly data: FakeZendeskData, private readonly opts: FakeZendeskOptions = {}) {
    this.flakyRemaining = new Map(opts.flakyComments ?? []);
  }

  count(pathPrefix: string): number {
    return this.requests.filter((r) => new URL(r).pathname.startsWith(pathPrefix)).length;
  }

  commentRequestsFor(ticketId: number): number {
    return this.count(`/api/v2/tickets/${ticketId}/comments.json`);
  }

  readonly fetch = async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const url = new URL(typeof input === "string" ? input : input instanceof URL ? input.href : input.url);
    this.requests.push(url.href);

    if (this.opts.globalStatus) {
      return json({ error: "Couldn't authenticate you" }, this.opts.globalStatus);
    }

    if (url.pathname === "/api/v2/users/me.json") {
      return json({ user: this.opts.me ?? { id: 99, name: "Export Agent", email: "agent@example.com" } });
    }

    if (url.pathname === "/api/v2/search/export.json") {
      return json(this.searchExportPage(url));
    }

    if (url.pathname === "/api/v2/search.json") {
      return this.searchPage(url);
    }

    if (url.pathname === "/api/v2/users/show_many.json") {
      if (this.opts.usersStatus) return json({ error: "unavailable" }, this.opts.usersStatus);
      const ids = new Set((url.searchParams.get("ids") ?? "").split(",").map(Number));
      return json({ users: this.data.users.filter((u) => ids.has(u.id)) });
    }

    const commentsMatch = /^\/api\/v2\/tickets\/(\d+)\/comments\.json$/.exec(url.pathname);
    if (commentsMatch) {
      return this.commentsResponse(Number(commentsMatch[1]), url, init?.signal ?? undefined);
    }

    return json({ error: "RecordNotFound" }, 404);
  };

  /** Cursor pagination: page[after] is the offset of the next page. */
  private searchExportPage(url: URL) {
    const pageSize = this.opts.ticketPageSize ?? Number(url.searchParams.get("page[size]") ?? 100);
    const offset = Number(url.searchParams.get("page[after]") ?? 0);
    const results = this.data.tickets.slice(offset, offset + pageSize);
    const hasMore = offset + pageSize < this.data.tickets.length;

    const next = new URL(url.href);
    next.searchParams.set("page[after]", String(offset + pageSize));
    return {
      results,
      meta: { has_more: hasMore, after_cursor: hasMore ? String(offset + pageSize) : null },
      links: { next: hasMore ? next.href : null },
    };
  }

  /** Offset search, with Zendesk's 1000-result ceiling. */
  private searchPage(url: URL): Response {
    const pageSize = Number(url.searchParams.get("per_page") ?? 100);
    const page = Number(url.searchParams.get("page") ?? 1);
    if (page * pageSize > 1000) {
      return json({ error: "invalid", description: `Requesting page ${page} exceeds the limit` }, 422);
    }
    const results = this.data.tickets.slice((page - 1) * pageSize, page * pageSize);
    const next = new URL(url.href);
    next.searchParams.set("page", String(page + 1));
    return json({
      results,
      count: this.data.tickets.length,
      next_page: page * pageSize < this.data.tickets.length ? next.href : null,
    });
  }

  private async commentsResponse(ticketId: number, url: URL, signal?: AbortSignal): Promise<Response> {
    this.inFlightComments++;
    this.maxInFlightComments = Math.max(this.maxInFlightComments, this.inFlightComments);
    try {
      const delay = this.opts.commentDelayMs?.(ticketId) ?? 0;
      if (delay > 0) await abortableDelay(delay, signal);

      const failing = this.opts.failingComments?.get(ticketId);
      if (failing) return json({ error: "InternalError" }, failing);

      const flaky = this.flakyRemaining.get(ticketId) ?? 0;
      if (flaky > 0) {
        this.flakyRemaining.set(ticketId, flaky - 1);
        return json({ error: "ServiceUnavailable" }, 503);
      }

      const all = this.data.comments.get(ticketId) ?? [];
      const pageSize = this.opts.commentPageSize ?? Number(url.searchParams.get("per_page") ?? 100);
      const page = Number(url.searchParams.get("page") ?? 1);
      const next = new URL(url.href);
      next.searchParams.set("page", String(page + 1));

      return json({
        comments: all.slice((page - 1) * pageSize, page * pageSize),
        next_page: page * pageSize < all.length ? next.href : null,
      });
    } finally {
      this.inFlightComments--;
    }
  }
}

/** Rejects with the signal's reason, the way fetch does when aborted mid-request. */
function abortableDelay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const timer = setTimeout(resolve, ms);
    signal?.addEventListener("abort", () => {
      clearTimeout(timer);
      reject(signal.reason);
    }, { once: true });
  });
}

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

export const testRetry: RetrySettings = { max_attempts: 3, base_delay_ms: 500, max_delay_ms: 8000 };

/**
 * Session wired to a fake; backoff sleeps are recorded instead of waited.
 */
export function makeFakeSession(
  fake: FakeZendesk,
  overrides: { retry?: RetrySettings; monitor?: UsageMonitor; signal?: AbortSignal } = {}
): { session: ZendeskSession; monitor: UsageMonitor; sleeps: number[] } {
  const monitor = overrides.monitor ?? new UsageMonitor();
  const sleeps: number[] = [];
  const session = createSession({
    config: testClientConfig,
    monitor,
    retry: overrides.retry ?? testRetry,
    fetch: fake.fetch,
    sleep: async (ms) => {
      sleeps.push(ms);
    },
    signal: overrides.signal,
  });
  return { session, monitor, sleeps };
}
