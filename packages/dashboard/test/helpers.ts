import { PeopleDirectory, staticNameSource } from "@deskwatch/directory";
import type { Ticket } from "@deskwatch/freshservice";
import {
  createDashboardApp,
  freshserviceLinks,
  TicketBoard,
  type TicketSource,
} from "@deskwatch/dashboard";

export const NOW = new Date("2026-03-10T12:00:00Z");
export const HOUR = 3_600_000;
export const PS_GROUP = 900;

export const iso = (offsetMs: number) =>
  new Date(NOW.getTime() + offsetMs).toISOString();

export function staticSource(
  tickets: Ticket[],
  syncedAt: string | null = null,
): TicketSource {
  return {
    name: "static",
    load: () => Promise.resolve({ tickets, syncedAt }),
    check: () => Promise.resolve(),
  };
}

/** A source whose loads and checks all fail with `message`. */
export function brokenSource(message: string): TicketSource {
  return {
    name: "broken",
    load: () => Promise.reject(new Error(message)),
    check: () => Promise.reject(new Error(message)),
  };
}

export function testBoard(source: TicketSource) {
  const directory = new PeopleDirectory({
    agents: staticNameSource("agents", [[7, "Grace Hopper"], [8, "Alan Turing"]]),
    requesters: staticNameSource("requesters", [[50, "Dana Scully"]]),
  });
  return new TicketBoard({
    source,
    directory,
    links: freshserviceLinks("example.freshservice.com"),
    professionalServicesGroupId: PS_GROUP,
    now: () => NOW,
  });
}

export function testApp(source: TicketSource, env = "test") {
  return createDashboardApp({
    board: testBoard(source),
    settings: { env, autoRefreshSeconds: 60 },
  });
}

const responded = { first_responded_at: iso(-24 * HOUR) };

/** One ticket per bucket in the helpdesk view, plus one professional-services ticket. */
export const SAMPLE: Ticket[] = [
  {
    id: 1,
    subject: "Laptop will not boot",
    status: 2,
    priority: 3,
    requester_id: 50,
    responder_id: 7,
    fr_due_by: iso(-2 * HOUR),
    updated_at: iso(-HOUR),
    stats: { first_responded_at: null },
  },
  {
    id: 2,
    subject: "Re: printer queue",
    status: 26,
    priority: 2,
    responder_id: 8,
    updated_at: iso(-HOUR),
    stats: responded,
  },
  {
    id: 3,
    subject: "Server down",
    status: 13,
    priority: 4,
    responder_id: 7,
    updated_at: iso(-3 * HOUR),
    stats: responded,
  },
  {
    id: 4,
    subject: "Waiting on vendor",
    status: 23,
    priority: 1,
    updated_at: iso(-HOUR),
    stats: responded,
  },
  {
    id: 5,
    subject: "Network redesign",
    status: 2,
    priority: 2,
    group_id: PS_GROUP,
    fr_due_by: iso(20 * HOUR),
    updated_at: iso(-HOUR),
  },
];
