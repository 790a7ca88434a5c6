import type {
  FreshserviceClient,
  Ticket,
  TicketListing,
} from "@deskwatch/freshservice";
import type { TicketStore } from "@deskwatch/ticket-cache";
import { getLogger, type Logger } from "@deskwatch/utils/logger";
import { sleep as defaultSleep, type Sleep } from "@deskwatch/utils/sleep";
import { errorMessage } from "@deskwatch/utils/types";

export type TicketApi = Pick<FreshserviceClient, "listTickets" | "getTicket">;

export interface TicketPollerOptions {
  client: TicketApi;
  store: TicketStore;
  statusIds: readonly number[];
  /** Allowed `type` values; empty keeps every type. */
  ticketTypes?: readonly string[];
  intervalMs?: number;
  /** Pause between consecutive detail requests. */
  detailDelayMs?: number;
  sleep?: Sleep;
  now?: () => Date;
  logger?: Logger;
}

export interface CycleReport {
  /** Ids returned by the list query. */
  listed: number;
  /** Tickets that passed the detail fetch and the type filter. */
  active: number;
  written: number;
  archived: number;
  /** Active ids with no cache file before this cycle. */
  added: number;
  detailFailures: number;
  durationMs: number;
  ok: boolean;
  error?: string;
}

const DEFAULT_TICKET_TYPES = ["Incident", "Service Request"];

/**
 * Keeps the ticket cache in step with Freshservice: each cycle lists the
 * active tickets, fetches every detail one at a time, rewrites their files
 * and archives the files of tickets that are no longer active.
 */
export class TicketPoller {
  private readonly client: TicketApi;
  private readonly store: TicketStore;
  private readonly statusIds: readonly number[];
  private readonly ticketTypes: ReadonlySet<string>;
  private readonly intervalMs: number;
  private readonly detailDelayMs: number;
  private readonly sleep: Sleep;
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(options: TicketPollerOptions) {
    this.client = options.client;
    this.store = options.store;
    this.statusIds = options.statusIds;
    this.ticketTypes = new Set(options.ticketTypes ?? DEFAULT_TICKET_TYPES);
    this.intervalMs = options.intervalMs ?? 120_000;
    this.detailDelayMs = options.detailDelayMs ?? 750;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? getLogger("poller");
  }

  /**
   * Runs cycles until `signal` aborts. A failed cycle is logged and the loop
   * carries on at the next interval.
   */
  async run(signal?: AbortSignal): Promise<void> {
    this.logger.info(
      {
        intervalMs: this.intervalMs,
        statusIds: this.statusIds,
        ticketTypes: [...this.ticketTypes],
      },
      "poller started",
    );
    await this.store.ensureDirs();

    while (!signal?.aborted) {
      let report: CycleReport;
      try {
        report = await this.runCycle(signal);
      } catch (error) {
        // Cache I/O failures end up here; the next cycle starts over.
        this.logger.error({ err: errorMessage(error) }, "poll cycle crashed");
        report = { ...emptyReport(), ok: false, error: errorMessage(error) };
      }
      if (signal?.aborted) break;

      const wait = Math.max(0, this.intervalMs - report.durationMs);
      if (wait === 0) {
        this.logger.warn(
          { durationMs: report.durationMs, intervalMs: this.intervalMs },
          "poll cycle overran its interval",
        );
      } else {
        this.logger.debug({ waitMs: wait }, "sleeping until next cycle");
      }
      await this.sleep(wait, signal);
    }
    this.logger.info("poller stopped");
  }

  async runCycle(signal?: AbortSignal): Promise<CycleReport> {
    const started = this.now().getTime();
    const report = emptyReport();
    const finish = (ok: boolean, error?: string): CycleReport => {
      report.ok = ok;
      report.durationMs = this.now().getTime() - started;
      if (error !== undefined) report.error = error;
      this.logger.info({ ...report }, "poll cycle finished");
      return report;
    };

    this.logger.info("poll cycle start");

    let listing: TicketListing;
    try {
      listing = await this.client.listTickets(this.statusIds);
    } catch (error) {
      this.logger.error(
        { err: errorMessage(error) },
        "ticket list fetch failed, retrying next cycle",
      );
      return finish(false, errorMessage(error));
    }
    report.listed = listing.tickets.length;

    const active: Ticket[] = [];
    // Listed tickets whose detail failed for a transient reason keep their
    // cached file until a later cycle can refresh it.
    const kept = new Set<number>();

    for (const [index, basic] of listing.tickets.entries()) {
      if (signal?.aborted) return finish(false, "aborted");
      try {
        const ticket = await this.client.getTicket(basic.id);
        if (ticket === null) {
          report.detailFailures++;
        } else if (this.acceptsType(ticket)) {
          active.push(ticket);
        } else {
          this.logger.debug(
            { ticket: ticket.id, type: ticket.type },
            "ticket type not tracked",
          );
        }
      } catch (error) {
        report.detailFailures++;
        kept.add(basic.id);
        this.logger.error(
          { ticket: basic.id, err: errorMessage(error) },
          "ticket detail fetch failed, excluding it this cycle",
        );
      }
      if (index < listing.tickets.length - 1 && this.detailDelayMs > 0) {
        await this.sleep(this.detailDelayMs, signal);
      }
    }
    report.active = active.length;

    const before = await this.store.listIds();
    for (const ticket of active) {
      await this.store.write(ticket);
      report.written++;
      if (!before.has(ticket.id)) report.added++;
    }

    if (listing.truncated) {
      this.logger.warn(
        "ticket list was truncated at the page cap, skipping archive step",
      );
      return finish(true);
    }

    const activeIds = new Set(active.map((ticket) => ticket.id));
    const archiveDate = new Date(started);
    for (const id of before) {
      if (activeIds.has(id) || kept.has(id)) continue;
      const moved = await this.store.archive(id, archiveDate);
      if (moved) {
        report.archived++;
        this.logger.info({ ticket: id, to: moved }, "archived ticket");
      }
    }

    return finish(true);
  }

  private acceptsType(ticket: Ticket): boolean {
    if (this.ticketTypes.size === 0) return true;
    return typeof ticket.type === "string" && this.ticketTypes.has(ticket.type);
  }
}

function emptyReport(): CycleReport {
  return {
    listed: 0,
    active: 0,
    written: 0,
    archived: 0,
    added: 0,
    detailFailures: 0,
    durationMs: 0,
    ok: false,
  };
}
