/**
 * Join tickets, comments and user identities into flat export rows.
 */

import { unknownUser } from "../cache/user-cache";
import type { Comment, CommentFetchResult } from "../zendesk/comments";
import type { Ticket } from "../zendesk/tickets";
import type { UserIdentity } from "../zendesk/users";

export type CommentVisibility = "public" | "internal" | "";

export interface ExportRow {
  ticketId: number;
  subject: string;
  status: string;
  priority: string;
  type: string;
  tags: string;
  createdAt: string;
  updatedAt: string;
  requesterName: string;
  requesterEmail: string;
  assigneeName: string;
  assigneeEmail: string;
  commentId: number | null;
  commentAuthorName: string;
  commentAuthorEmail: string;
  commentBody: string;
  commentVisibility: CommentVisibility;
  commentCreatedAt: string;
  error: string;
  /** Non-empty ticket custom fields by field id. */
  customFields: ReadonlyMap<number, string>;
}

export const UNASSIGNED_NAME = "Unassigned";

/**
 * Every user id referenced by the tickets (requester, assignee) and by the
 * comments that were fetched successfully.
 */
export function collectUserIds(tickets: Ticket[], results: Iterable<CommentFetchResult>): Set<number> {
  const ids = new Set<number>();
  for (const t of tickets) {
    if (t.requesterId !== null) ids.add(t.requesterId);
    if (t.assigneeId !== null) ids.add(t.assigneeId);
  }
  for (const r of results) {
    if (!r.ok) continue;
    for (const c of r.comments) {
      if (c.authorId !== null) ids.add(c.authorId);
    }
  }
  return ids;
}

function lookup(users: Map<number, UserIdentity>, id: number | null): UserIdentity | null {
  if (id === null) return null;
  return users.get(id) ?? unknownUser(id);
}

function ticketColumns(ticket: Ticket, users: Map<number, UserIdentity>) {
  const requester = lookup(users, ticket.requesterId) ?? unknownUser(0);
  const assignee = lookup(users, ticket.assigneeId);
  return {
    ticketId: ticket.id,
    subject: ticket.subject,
    status: ticket.status,
    priority: ticket.priority ?? "",
    type: ticket.type ?? "",
    tags: ticket.tags.join(", "),
    createdAt: ticket.createdAt,
    updatedAt: ticket.updatedAt,
    requesterName: requester.name,
    requesterEmail: requester.email,
    assigneeName: assignee?.name ?? UNASSIGNED_NAME,
    assigneeEmail: assignee?.email ?? "",
    customFields: new Map<number, string>(ticket.customFields.map((f) => [f.id, f.value])),
  };
}

const EMPTY_COMMENT = {
  commentId: null,
  commentAuthorName: "",
  commentAuthorEmail: "",
  commentBody: "",
  commentVisibility: "",
  commentCreatedAt: "",
} as const;

function commentColumns(comment: Comment, users: Map<number, UserIdentity>) {
  const author = lookup(users, comment.authorId) ?? unknownUser(0);
  return {
    commentId: comment.id,
    commentAuthorName: author.name,
    commentAuthorEmail: author.email,
    commentBody: comment.body.trim(),
    commentVisibility: comment.isPublic ? "public" : "internal",
    commentCreatedAt: comment.createdAt,
  } as const;
}

/**
 * Rows for one ticket: one per comment, a single empty-comment row when the
 * ticket has none, or a single row carrying the error when fetching failed.
 */
export function buildTicketRows(
  ticket: Ticket,
  result: CommentFetchResult | undefined,
  users: Map<number, UserIdentity>
): ExportRow[] {
  const base = ticketColumns(ticket, users);

  if (!result) {
    return [{ ...base, ...EMPTY_COMMENT, error: "comments not fetched" }];
  }
  if (!result.ok) {
    return [{ ...base, ...EMPTY_COMMENT, error: `comment fetch failed: ${result.error.message}` }];
  }
  if (result.comments.length === 0) {
    return [{ ...base, ...EMPTY_COMMENT, error: "" }];
  }
  return result.comments.map((c) => ({ ...base, ...commentColumns(c, users), error: "" }));
}

/**
 * Rows in ticket-list order, whatever order the comment results arrived in.
 */
export function buildExportRows(
  tickets: Ticket[],
  commentsByTicket: Map<number, CommentFetchResult>,
  users: Map<number, UserIdentity>
): ExportRow[] {
  return tickets.flatMap((t) => buildTicketRows(t, commentsByTicket.get(t.id), users));
}
