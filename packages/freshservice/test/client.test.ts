import { describe, expect, it, vi } from "vitest";
import {
  FreshserviceClient,
  FreshserviceError,
  parseRetryAfter,
  RateLimitError,
  statusFilterQuery,
} from "@deskwatch/freshservice";

function json(body: unknown, init: ResponseInit = {}): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { "Content-Type": "application/json" },
    ...init,
  });
}

function setup(overrides: { perPage?: number; maxPages?: number } = {}) {
  const fetch = vi.fn<typeof globalThis.fetch>();
  const sleep = vi.fn(async (_ms: number, _signal?: AbortSignal) => {});
  const client = new FreshserviceClient({
    domain: "example.freshservice.com",
    apiKey: "test-key",
    perPage: overrides.perPage ?? 2,
    maxPages: overrides.maxPages,
    fetch,
    sleep,
  });
  return { client, fetch, sleep };
}

function calledUrl(fetch: ReturnType<typeof setup>["fetch"], index: number) {
  return new URL(String(fetch.mock.calls[index][0]));
}

describe("statusFilterQuery", () => {
  it("joins status clauses inside a quoted group", () => {
    expect(statusFilterQuery([2, 3, 26])).toBe(
      '"(status:2 OR status:3 OR status:26)"',
    );
  });
});

describe("parseRetryAfter", () => {
  it("converts seconds to milliseconds", () => {
    expect(parseRetryAfter("3")).toBe(3000);
    expect(parseRetryAfter(" 0 ")).toBe(0);
  });

  it("ignores missing or unparsable values", () => {
    expect(parseRetryAfter(null)).toBeUndefined();
    expect(parseRetryAfter("")).toBeUndefined();
    expect(parseRetryAfter("soon")).toBeUndefined();
    expect(parseRetryAfter("-4")).toBeUndefined();
  });
});

describe("FreshserviceClient", () => {
  describe("listTickets", () => {
    it("walks pages until a short page", async () => {
      const { client, fetch } = setup();
      fetch
        .mockResolvedValueOnce(json({ tickets: [{ id: 1 }, { id: 2 }] }))
        .mockResolvedValueOnce(json({ tickets: [{ id: 3 }] }));

      const listing = await client.listTickets([2, 3]);

      expect(listing.tickets.map((t) => t.id)).toEqual([1, 2, 3]);
      expect(listing.pages).toBe(2);
      expect(listing.truncated).toBe(false);
      expect(fetch).toHaveBeenCalledTimes(2);

      const first = calledUrl(fetch, 0);
      expect(first.origin).toBe("https://example.freshservice.com");
      expect(first.pathname).toBe("/api/v2/tickets/filter");
      expect(first.searchParams.get("query")).toBe(
        '"(status:2 OR status:3)"',
      );
      expect(first.searchParams.get("page")).toBe("1");
      expect(first.searchParams.get("per_page")).toBe("2");
      expect(calledUrl(fetch, 1).searchParams.get("page")).toBe("2");
    });

    it("stops on an empty page", async () => {
      const { client, fetch } = setup();
      fetch
        .mockResolvedValueOnce(json({ tickets: [{ id: 1 }, { id: 2 }] }))
        .mockResolvedValueOnce(json({ tickets: [] }));

      const listing = await client.listTickets([2]);
      expect(listing.tickets).toHaveLength(2);
      expect(listing.pages).toBe(1);
    });

    it("drops duplicates and entries without an id", async () => {
      const { client, fetch } = setup();
      fetch
        .mockResolvedValueOnce(json({ tickets: [{ id: 1 }, { id: 2 }] }))
        .mockResolvedValueOnce(
          json({ tickets: [{ id: 2 }, { subject: "no id" }] }),
        )
        .mockResolvedValueOnce(json({ tickets: [] }));

      const listing = await client.listTickets([2]);
      expect(listing.tickets.map((t) => t.id)).toEqual([1, 2]);
    });

    it("reports truncation at the page cap", async () => {
      const { client, fetch } = setup({ perPage: 1, maxPages: 2 });
      fetch
        .mockResolvedValueOnce(json({ tickets: [{ id: 1 }] }))
        .mockResolvedValueOnce(json({ tickets: [{ id: 2 }] }));

      const listing = await client.listTickets([2]);
      expect(listing.truncated).toBe(true);
      expect(listing.pages).toBe(2);
      expect(fetch).toHaveBeenCalledTimes(2);
    });

    it("waits for Retry-After on 429 and then succeeds", async () => {
      const { client, fetch, sleep } = setup();
      fetch
        .mockResolvedValueOnce(
          new Response("slow down", {
            status: 429,
            headers: { "Retry-After": "3" },
          }),
        )
        .mockResolvedValueOnce(json({ tickets: [{ id: 7 }] }));

      const listing = await client.listTickets([2]);

      expect(listing.tickets.map((t) => t.id)).toEqual([7]);
      expect(listing.retries).toBe(1);
      expect(fetch).toHaveBeenCalledTimes(2);
      expect(sleep).toHaveBeenCalledTimes(1);
      expect(sleep.mock.calls[0][0]).toBe(3000);
    });

    it("falls back to the retry delay without Retry-After", async () => {
      const { client, fetch, sleep } = setup();
      fetch
        .mockResolvedValueOnce(new Response("", { status: 429 }))
        .mockResolvedValueOnce(json({ tickets: [] }));

      await client.listTickets([2]);
      expect(sleep.mock.calls[0][0]).toBe(5000);
    });

    it("gives up after the retry budget on persistent 429", async () => {
      const { client, fetch, sleep } = setup();
      fetch.mockImplementation(async () =>
        new Response("", { status: 429, headers: { "Retry-After": "1" } })
      );

      await expect(client.listTickets([2])).rejects.toBeInstanceOf(
        RateLimitError,
      );
      expect(fetch).toHaveBeenCalledTimes(4);
      expect(sleep).toHaveBeenCalledTimes(3);
    });

    it("retries network failures with a fixed delay, then throws", async () => {
      const { client, fetch, sleep } = setup();
      fetch.mockRejectedValue(new TypeError("fetch failed"));

      await expect(client.listTickets([2])).rejects.toThrow(
        "list page 1 failed after 3 retries: fetch failed",
      );
      expect(fetch).toHaveBeenCalledTimes(4);
      expect(sleep.mock.calls.map((call) => call[0])).toEqual([
        5000,
        5000,
        5000,
      ]);
    });

    it("fails immediately on 400", async () => {
      const { client, fetch, sleep } = setup();
      fetch.mockResolvedValueOnce(
        new Response("bad query", { status: 400 }),
      );

      await expect(client.listTickets([2])).rejects.toMatchObject({
        name: "FreshserviceError",
        status: 400,
      });
      expect(fetch).toHaveBeenCalledTimes(1);
      expect(sleep).not.toHaveBeenCalled();
    });

    it("sends basic auth built from the API key", async () => {
      const { client, fetch } = setup();
      fetch.mockResolvedValueOnce(json({ tickets: [] }));

      await client.listTickets([2]);
      const headers = new Headers(fetch.mock.calls[0][1]?.headers);
      expect(headers.get("Authorization")).toBe(
        `Basic ${Buffer.from("test-key:X").toString("base64")}`,
      );
    });
  });

  describe("getTicket", () => {
    it("returns the ticket with stats and keeps unknown fields", async () => {
      const { client, fetch } = setup();
      fetch.mockResolvedValueOnce(json({
        ticket: {
          id: 42,
          subject: "Printer offline",
          status: 2,
          priority: 3,
          custom_fields: { site: "north" },
          stats: { first_responded_at: null },
        },
      }));

      const ticket = await client.getTicket(42);

      expect(ticket).toEqual({
        id: 42,
        subject: "Printer offline",
        status: 2,
        priority: 3,
        custom_fields: { site: "north" },
        stats: { first_responded_at: null },
      });
      const url = calledUrl(fetch, 0);
      expect(url.pathname).toBe("/api/v2/tickets/42");
      expect(url.searchParams.get("include")).toBe("stats");
    });

    it("resolves null on 404", async () => {
      const { client, fetch } = setup();
      fetch.mockResolvedValueOnce(new Response("", { status: 404 }));
      await expect(client.getTicket(5)).resolves.toBeNull();
    });

    it("retries server errors with the detail delay", async () => {
      const { client, fetch, sleep } = setup();
      fetch
        .mockResolvedValueOnce(new Response("", { status: 502 }))
        .mockResolvedValueOnce(json({ ticket: { id: 9 } }));

      await expect(client.getTicket(9)).resolves.toEqual({ id: 9 });
      expect(sleep.mock.calls[0][0]).toBe(10_000);
    });

    it("releases the body of a response it retries", async () => {
      const { client, fetch } = setup();
      const unavailable = new Response("upstream busy", { status: 503 });
      const limited = new Response("slow down", {
        status: 429,
        headers: { "Retry-After": "1" },
      });
      fetch
        .mockResolvedValueOnce(unavailable)
        .mockResolvedValueOnce(limited)
        .mockResolvedValueOnce(json({ ticket: { id: 9 } }));

      await expect(client.getTicket(9)).resolves.toEqual({ id: 9 });
      expect(unavailable.bodyUsed).toBe(true);
      expect(limited.bodyUsed).toBe(true);
    });

    it("fails on undecodable JSON without retrying", async () => {
      const { client, fetch } = setup();
      fetch.mockResolvedValueOnce(new Response("<html>", { status: 200 }));

      await expect(client.getTicket(9)).rejects.toBeInstanceOf(
        FreshserviceError,
      );
      expect(fetch).toHaveBeenCalledTimes(1);
    });

    it("accepts a bare ticket object", async () => {
      const { client, fetch } = setup();
      fetch.mockResolvedValueOnce(json({ id: 11, status: 3 }));
      await expect(client.getTicket(11)).resolves.toEqual({ id: 11, status: 3 });
    });
  });

  describe("people", () => {
    it("pages through requesters", async () => {
      const { client, fetch } = setup();
      const fullPage = Array.from({ length: 100 }, (_, i) => ({
        id: i + 1,
        first_name: "R",
        last_name: String(i + 1),
      }));
      fetch
        .mockResolvedValueOnce(json({ requesters: fullPage }))
        .mockResolvedValueOnce(
          json({ requesters: [{ id: 101, first_name: "Last" }] }),
        );

      const people = await client.listRequesters();
      expect(people).toHaveLength(101);
      expect(calledUrl(fetch, 1).searchParams.get("per_page")).toBe("100");
      expect(calledUrl(fetch, 1).pathname).toBe("/api/v2/requesters");
    });

    it("reads agents", async () => {
      const { client, fetch } = setup();
      fetch.mockResolvedValueOnce(
        json({ agents: [{ id: 3, first_name: "Ada", last_name: "Byron" }] }),
      );
      const agents = await client.listAgents();
      expect(agents[0].id).toBe(3);
      expect(calledUrl(fetch, 0).pathname).toBe("/api/v2/agents");
    });
  });

  it("builds agent-facing ticket links", () => {
    const { client } = setup();
    expect(client.ticketUrl(12)).toBe(
      "https://example.freshservice.com/a/tickets/12",
    );
  });
});
