import type { Bucket } from "./config.ts";
import type { EnrichedTicket } from "./classify.ts";

export type GroupedTickets = Record<Bucket, EnrichedTicket[]>;

/**
 * Lexicographic comparison; a shorter key sorts first when it is a prefix.
 */
export function compareSortKeys(
  a: readonly number[],
  b: readonly number[],
): number {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    if (a[i] !== b[i]) return a[i] < b[i] ? -1 : 1;
  }
  return a.length - b.length;
}

export function compareTickets(a: EnrichedTicket, b: EnrichedTicket): number {
  return compareSortKeys(a.sortKey, b.sortKey) || a.id - b.id;
}

export function groupTickets(
  tickets: Iterable<EnrichedTicket>,
): GroupedTickets {
  const groups: GroupedTickets = {
    firstResponse: [],
    customerReplied: [],
    updateOverdue: [],
    otherActive: [],
  };
  for (const ticket of tickets) groups[ticket.bucket].push(ticket);
  for (const list of Object.values(groups)) list.sort(compareTickets);
  return groups;
}

export function totalTickets(groups: GroupedTickets): number {
  return Object.values(groups).reduce((sum, list) => sum + list.length, 0);
}
