/**
 * Ticket listing for an export window and response mapping.
 */

import { zendeskFetch, isRecord, type ZendeskSession } from "./client";
import { isWithinWindow, type DateWindow } from "../window";

export interface CustomFieldValue {
  id: number;
  value: string;
}

export interface Ticket {
  id: number;
  subject: string;
  status: string;
  priority: string | null;
  type: string | null;
  tags: string[];
  requesterId: number | null;
  assigneeId: number | null;
  createdAt: string;
  updatedAt: string;
  /** Only fields with a non-empty value. */
  customFields: CustomFieldValue[];
}

export interface FetchTicketsOptions {
  pageSize?: number;
}

export function mapTicket(raw: unknown): Ticket | null {
  if (!isRecord(raw) || typeof raw.id !== "number") return null;

  return {
    id: raw.id,
    subject: typeof raw.subject === "string" ? raw.subject : "",
    status: typeof raw.status === "string" ? raw.status : "unknown",
    priority: typeof raw.priority === "string" ? raw.priority : null,
    type: typeof raw.type === "string" ? raw.type : null,
    tags: Array.isArray(raw.tags) ? raw.tags.filter((t): t is string => typeof t === "string") : [],
    requesterId: typeof raw.requester_id === "number" ? raw.requester_id : null,
    assigneeId: typeof raw.assignee_id === "number" ? raw.assignee_id : null,
    createdAt: typeof raw.created_at === "string" ? raw.created_at : "",
    updatedAt: typeof raw.updated_at === "string" ? raw.updated_at : "",
    customFields: Array.isArray(raw.custom_fields) ? raw.custom_fields.flatMap(mapCustomField) : [],
  };
}

function mapCustomField(raw: unknown): CustomFieldValue[] {
  if (!isRecord(raw) || typeof raw.id !== "number") return [];
  const value = customFieldText(raw.value);
  return value ? [{ id: raw.id, value }] : [];
}

// Multi-select fields come back as arrays of option tags
function customFieldText(value: unknown): string {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return value ? String(value) : "";
  if (Array.isArray(value)) return value.filter((v) => typeof v === "string" || typeof v === "number").join(", ");
  return "";
}

/**
 * Build the search export URL for tickets created in [start, end).
 * search/export is cursor paginated and has no 1000-result ceiling, unlike
 * search.json; it takes no sort order, so fetchTickets sorts.
 */
export function buildTicketSearchPath(window: DateWindow, pageSize: number): string {
  const query = `created>=${window.start.toISOString()} created<${window.end.toISOString()}`;
  const params = new URLSearchParams({
    query,
    "filter[type]": "ticket",
    "page[size]": String(pageSize),
  });
  return `/api/v2/search/export.json?${params}`;
}

function nextCursorUrl(page: Record<string, unknown>): string | null {
  const meta = isRecord(page.meta) ? page.meta : {};
  const links = isRecord(page.links) ? page.links : {};
  if (meta.has_more !== true) return null;
  return typeof links.next === "string" && links.next ? links.next : null;
}

function byCreation(a: Ticket, b: Ticket): number {
  const diff = (Date.parse(a.createdAt) || 0) - (Date.parse(b.createdAt) || 0);
  return diff !== 0 ? diff : a.id - b.id;
}

/**
 * Fetch every ticket created inside the window, following links.next while
 * meta.has_more is set. The window is re-applied client side because search
 * matches on whole days for some query forms. Tickets come back oldest first.
 */
export async function fetchTickets(
  session: ZendeskSession,
  window: DateWindow,
  opts?: FetchTicketsOptions
): Promise<Ticket[]> {
  const pageSize = opts?.pageSize ?? 100;
  const seen = new Set<number>();
  const tickets: Ticket[] = [];
  let nextUrl: string | null = buildTicketSearchPath(window, pageSize);

  while (nextUrl) {
    const data = await zendeskFetch(session, nextUrl, "ticket_listing");
    const page = isRecord(data) ? data : {};
    const results = Array.isArray(page.results) ? page.results : [];

    for (const raw of results) {
      const ticket = mapTicket(raw);
      if (!ticket || seen.has(ticket.id)) continue;
      if (!isWithinWindow(window, ticket.createdAt)) continue;
      seen.add(ticket.id);
      tickets.push(ticket);
    }

    nextUrl = nextCursorUrl(page);
  }

  return tickets.sort(byCreation);
}

/**
 * Ticket counts keyed by status, in first-seen order.
 */
export function countByStatus(tickets: Ticket[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const t of tickets) {
    counts.set(t.status, (counts.get(t.status) ?? 0) + 1);
  }
  return counts;
}
