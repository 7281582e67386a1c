/**
 * Per-ticket comment retrieval, sequential or under a concurrency cap.
 */

import { zendeskFetch, isRecord, type ZendeskSession } from "./client";
import { RemoteError } from "../errors";
import { mapWithConcurrency } from "../pool";

export interface Comment {
  id: number;
  ticketId: number;
  authorId: number | null;
  body: string;
  isPublic: boolean;
  createdAt: string;
}

export type CommentFetchResult =
  | { ok: true; ticketId: number; comments: Comment[] }
  | { ok: false; ticketId: number; error: RemoteError };

export interface FetchAllCommentsOptions {
  /** 1 = sequential, in ticket order. */
  concurrency: number;
  pageSize?: number;
  onProgress?: (done: number, total: number) => void;
}

export function mapComment(ticketId: number, raw: unknown): Comment | null {
  if (!isRecord(raw) || typeof raw.id !== "number") return null;

  return {
    id: raw.id,
    ticketId,
    authorId: typeof raw.author_id === "number" ? raw.author_id : null,
    body: typeof raw.body === "string" ? raw.body : typeof raw.plain_body === "string" ? raw.plain_body : "",
    isPublic: raw.public !== false,
    createdAt: typeof raw.created_at === "string" ? raw.created_at : "",
  };
}

/**
 * Fetch all comments of one ticket, oldest first, across every page.
 */
export async function fetchComments(session: ZendeskSession, ticketId: number, pageSize = 100): Promise<Comment[]> {
  const comments: Comment[] = [];
  let nextUrl: string | null = `/api/v2/tickets/${ticketId}/comments.json?sort_order=asc&per_page=${pageSize}`;

  while (nextUrl) {
    const data = await zendeskFetch(session, nextUrl, "ticket_comments");
    const page = isRecord(data) ? data : {};
    const values = Array.isArray(page.comments) ? page.comments : [];

    for (const raw of values) {
      const comment = mapComment(ticketId, raw);
      if (comment) comments.push(comment);
    }

    nextUrl = typeof page.next_page === "string" && page.next_page ? page.next_page : null;
  }

  return comments;
}

/**
 * Fetch comments for many tickets. A RemoteError on one ticket is captured in
 * that ticket's result; AuthError (and aborts) still stop the whole batch.
 * Results are returned in the order of `ticketIds`.
 */
export async function fetchAllComments(
  session: ZendeskSession,
  ticketIds: number[],
  opts: FetchAllCommentsOptions
): Promise<CommentFetchResult[]> {
  let done = 0;

  const fetchOne = async (ticketId: number): Promise<CommentFetchResult> => {
    try {
      const comments = await fetchComments(session, ticketId, opts.pageSize);
      return { ok: true, ticketId, comments };
    } catch (err) {
      if (err instanceof RemoteError) {
        console.warn(`  Comments: ticket #${ticketId} failed (${err.message})`);
        return { ok: false, ticketId, error: err };
      }
      throw err;
    } finally {
      done++;
      opts.onProgress?.(done, ticketIds.length);
    }
  };

  if (opts.concurrency <= 1) {
    const results: CommentFetchResult[] = [];
    for (const ticketId of ticketIds) {
      session.signal?.throwIfAborted();
      results.push(await fetchOne(ticketId));
    }
    return results;
  }

  return mapWithConcurrency(ticketIds, opts.concurrency, fetchOne, { signal: session.signal });
}

/**
 * Index results by ticket id.
 */
export function indexByTicket(results: CommentFetchResult[]): Map<number, CommentFetchResult> {
  return new Map(results.map((r) => [r.ticketId, r]));
}
