import { DEFAULT_STATUS_IDS, parseTimestamp } from "@deskwatch/classifier";
import type { TicketStore } from "@deskwatch/ticket-cache";
import type { Logger } from "@deskwatch/utils/logger";

export interface TicketStates {
  open: number;
  waitingAgent: number;
  /** Open tickets past their first-response due date without a response. */
  frOverdue: number;
  /** Unreadable cache files; 1 when the cache directory is missing. */
  error: number;
}

export interface CountOptions {
  openStatus?: number;
  waitingOnAgentStatus?: number;
  logger?: Logger;
}

export async function countTicketStates(
  store: TicketStore,
  now: Date,
  options: CountOptions = {},
): Promise<TicketStates> {
  const openStatus = options.openStatus ?? DEFAULT_STATUS_IDS.open;
  const waitingStatus = options.waitingOnAgentStatus ??
    DEFAULT_STATUS_IDS.waitingOnAgent;
  const states: TicketStates = {
    open: 0,
    waitingAgent: 0,
    frOverdue: 0,
    error: 0,
  };

  if (!await store.exists()) {
    options.logger?.error({ dir: store.dir }, "ticket directory not found");
    states.error = 1;
    return states;
  }

  const { tickets, errors } = await store.readAll();
  for (const error of errors) {
    options.logger?.error(
      { ticket: error.id, err: error.message },
      "could not read ticket file",
    );
  }
  states.error = errors.length;

  for (const ticket of tickets) {
    if (ticket.status === openStatus) {
      states.open++;
      const responded = parseTimestamp(ticket.stats?.first_responded_at);
      const due = parseTimestamp(ticket.fr_due_by);
      if (!responded && due && due.getTime() < now.getTime()) {
        states.frOverdue++;
      }
    } else if (ticket.status === waitingStatus) {
      states.waitingAgent++;
    }
  }
  return states;
}
