import { describe, it, expect } from "vitest";
import { computeWindow } from "../../src/window";
import { buildTicketSearchPath, countByStatus, fetchTickets, mapTicket } from "../../src/zendesk/tickets";
import { FakeZendesk, makeFakeSession } from "../fixtures/fake-zendesk";
import { makeDataset, makeRawTicket } from "../fixtures/zendesk-responses";

const october = computeWindow("lastmonth", new Date("2026-11-05T12:00:00Z"));

describe("mapTicket", () => {
  it("maps the raw API shape", () => {
    // Act
    const ticket = mapTicket(makeRawTicket());

    // Assert
    expect(ticket).toEqual({
      id: 101,
      subject: "Printer on floor 2 is offline",
      status: "open",
      priority: "normal",
      type: "incident",
      tags: ["hardware", "printer"],
      requesterId: 1,
      assigneeId: 2,
      createdAt: "2026-10-10T09:00:00Z",
      updatedAt: "2026-10-11T15:30:00Z",
      customFields: [],
    });
  });

  it("keeps custom fields that carry a value", () => {
    // Arrange
    const raw = makeRawTicket({
      custom_fields: [
        { id: 360001, value: "premium" },
        { id: 360002, value: null },
        { id: 360003, value: "" },
        { id: 360004, value: ["billing", "refund"] },
        { id: 360005, value: true },
        { id: 360006, value: false },
        { id: 360007, value: 42 },
      ],
    });

    // Act
    const ticket = mapTicket(raw);

    // Assert
    expect(ticket?.customFields).toEqual([
      { id: 360001, value: "premium" },
      { id: 360004, value: "billing, refund" },
      { id: 360005, value: "true" },
      { id: 360007, value: "42" },
    ]);
  });

  it("keeps null priority, type and assignee", () => {
    // Act
    const ticket = mapTicket(makeRawTicket({ priority: null, type: null, assignee_id: null }));

    // Assert
    expect(ticket).toMatchObject({ priority: null, type: null, assigneeId: null });
  });

  it("returns null without a numeric id", () => {
    // Act & Assert
    expect(mapTicket({ subject: "no id" })).toBeNull();
    expect(mapTicket("nope")).toBeNull();
  });
});

describe("buildTicketSearchPath", () => {
  it("queries the cursor-paginated export endpoint for the window", () => {
    // Act
    const url = new URL(buildTicketSearchPath(october, 50), "https://example.zendesk.com");

    // Assert
    expect(url.pathname).toBe("/api/v2/search/export.json");
    expect(url.searchParams.get("query")).toBe("created>=2026-10-01T00:00:00.000Z created<2026-11-01T00:00:00.000Z");
    expect(url.searchParams.get("filter[type]")).toBe("ticket");
    expect(url.searchParams.get("page[size]")).toBe("50");
  });
});

describe("fetchTickets", () => {
  it("follows links.next until has_more is false", async () => {
    // Arrange
    const data = makeDataset({ ticketCount: 5, commentsPerTicket: 0, userCount: 2, start: "2026-10-02T00:00:00Z" });
    const fake = new FakeZendesk(data, { ticketPageSize: 2 });
    const { session, monitor } = makeFakeSession(fake);

    // Act
    const tickets = await fetchTickets(session, october);

    // Assert
    expect(tickets.map((t) => t.id)).toEqual([1000, 1001, 1002, 1003, 1004]);
    expect(fake.count("/api/v2/search/export.json")).toBe(3);
    expect(monitor.count("ticket_listing")).toBe(3);
  });

  it("drops tickets created outside the window", async () => {
    // Arrange
    const data = makeDataset({ ticketCount: 5, commentsPerTicket: 0, userCount: 2, start: "2026-09-30T22:00:00Z" });
    const fake = new FakeZendesk(data);
    const { session } = makeFakeSession(fake);

    // Act
    const tickets = await fetchTickets(session, october);

    // Assert
    expect(tickets.map((t) => t.id)).toEqual([1002, 1003, 1004]);
  });

  it("skips a ticket repeated across pages", async () => {
    // Arrange
    const first = makeRawTicket({ id: 1, created_at: "2026-10-03T00:00:00Z" });
    const second = makeRawTicket({ id: 2, created_at: "2026-10-04T00:00:00Z" });
    const fake = new FakeZendesk({ tickets: [first, second, second], comments: new Map(), users: [] }, { ticketPageSize: 2 });
    const { session } = makeFakeSession(fake);

    // Act
    const tickets = await fetchTickets(session, october);

    // Assert
    expect(tickets.map((t) => t.id)).toEqual([1, 2]);
  });

  it("returns an empty list for an empty window", async () => {
    // Arrange
    const fake = new FakeZendesk({ tickets: [], comments: new Map(), users: [] });
    const { session } = makeFakeSession(fake);

    // Act
    const tickets = await fetchTickets(session, october);

    // Assert
    expect(tickets).toEqual([]);
    expect(fake.count("/api/v2/search/export.json")).toBe(1);
  });

  it("returns windows of more than 1000 tickets without hitting the offset search ceiling", async () => {
    // Arrange
    const start = Date.parse("2026-10-05T00:00:00Z");
    const raw = Array.from({ length: 1050 }, (_, i) =>
      makeRawTicket({ id: i + 1, created_at: new Date(start + i * 60_000).toISOString() })
    );
    const fake = new FakeZendesk({ tickets: raw, comments: new Map(), users: [] });
    const { session, monitor } = makeFakeSession(fake);

    // Act
    const tickets = await fetchTickets(session, october, { pageSize: 100 });

    // Assert
    expect(tickets).toHaveLength(1050);
    expect(tickets[1049]?.id).toBe(1050);
    expect(monitor.count("ticket_listing")).toBe(11);
    expect(fake.count("/api/v2/search.json")).toBe(0);
  });

  it("sorts tickets by creation time when the API returns them unordered", async () => {
    // Arrange
    const raw = [
      makeRawTicket({ id: 3, created_at: "2026-10-09T00:00:00Z" }),
      makeRawTicket({ id: 1, created_at: "2026-10-02T00:00:00Z" }),
      makeRawTicket({ id: 2, created_at: "2026-10-09T00:00:00Z" }),
    ];
    const fake = new FakeZendesk({ tickets: raw, comments: new Map(), users: [] });
    const { session } = makeFakeSession(fake);

    // Act
    const tickets = await fetchTickets(session, october);

    // Assert
    expect(tickets.map((t) => t.id)).toEqual([1, 2, 3]);
  });
});

describe("countByStatus", () => {
  it("counts in first-seen order", () => {
    // Arrange
    const tickets = [
      makeRawTicket({ id: 1, status: "open" }),
      makeRawTicket({ id: 2, status: "solved" }),
      makeRawTicket({ id: 3, status: "open" }),
    ].flatMap((raw) => mapTicket(raw) ?? []);

    // Act
    const counts = countByStatus(tickets);

    // Assert
    expect([...counts]).toEqual([["open", 2], ["solved", 1]]);
  });
});
