import { z } from "zod";
import { type Ticket, TicketSchema } from "@deskwatch/freshservice";
import type { TicketStore } from "@deskwatch/ticket-cache";
import type { NameSource } from "@deskwatch/directory";
import { getLogger, type Logger } from "@deskwatch/utils/logger";
import type { ServiceClient } from "./service-client.ts";

export interface TicketSnapshot {
  tickets: Ticket[];
  /** When the upstream copy was last refreshed, if the source knows. */
  syncedAt: string | null;
}

/**
 * Where the dashboard gets the active ticket set from.
 */
export interface TicketSource {
  readonly name: string;
  load(): Promise<TicketSnapshot>;
  /** Rejects when the source cannot serve tickets right now. */
  check(): Promise<void>;
}

/**
 * The poller's cache directory. Unreadable files are logged and left out.
 */
export class FileTicketSource implements TicketSource {
  readonly name = "files";
  private readonly logger: Logger;

  constructor(private readonly store: TicketStore, logger?: Logger) {
    this.logger = logger ?? getLogger("dashboard");
  }

  async load(): Promise<TicketSnapshot> {
    const { tickets, errors } = await this.store.readAll();
    for (const error of errors) {
      this.logger.error(
        { ticket: error.id, file: error.file, err: error.message },
        "skipping unreadable ticket file",
      );
    }
    return { tickets, syncedAt: null };
  }

  async check(): Promise<void> {
    if (!await this.store.exists()) {
      throw new Error(`Ticket directory ${this.store.dir} not found`);
    }
  }
}

export const SYNC_SERVICE = "codex";

const ActiveTicketsResponseSchema = z.object({
  section1: z.array(z.unknown()).default([]),
  section2: z.array(z.unknown()).default([]),
  section3: z.array(z.unknown()).default([]),
  section4: z.array(z.unknown()).default([]),
  tickets: z.array(z.unknown()).default([]),
  last_sync_time: z.string().nullable().optional(),
}).passthrough();

/**
 * The ticket-sync service's active set. Its own sectioning is ignored; the
 * tickets are classified again here so both sources render the same way.
 */
export class SyncServiceTicketSource implements TicketSource {
  readonly name = "sync";
  private readonly logger: Logger;

  constructor(
    private readonly client: Pick<ServiceClient, "getJson">,
    logger?: Logger,
  ) {
    this.logger = logger ?? getLogger("dashboard");
  }

  async load(): Promise<TicketSnapshot> {
    const body = ActiveTicketsResponseSchema.parse(
      await this.client.getJson(SYNC_SERVICE, "/api/tickets/active"),
    );
    const seen = new Set<number>();
    const tickets: Ticket[] = [];
    const entries = [
      ...body.section1,
      ...body.section2,
      ...body.section3,
      ...body.section4,
      ...body.tickets,
    ];
    let skipped = 0;
    for (const entry of entries) {
      const parsed = TicketSchema.safeParse(entry);
      if (!parsed.success) {
        skipped++;
        continue;
      }
      if (seen.has(parsed.data.id)) continue;
      seen.add(parsed.data.id);
      tickets.push(parsed.data);
    }
    if (skipped > 0) {
      this.logger.warn({ skipped }, "sync service returned unusable tickets");
    }
    return { tickets, syncedAt: body.last_sync_time || null };
  }

  // Needs a token from core as well as a reachable sync service.
  async check(): Promise<void> {
    await this.client.getJson(SYNC_SERVICE, "/api/health");
  }
}

const SyncAgentSchema = z.object({
  external_id: z.coerce.number().int(),
  name: z.string(),
  active: z.boolean().default(true),
}).passthrough();

/**
 * Active agents as listed by the ticket-sync service, keyed by their
 * Freshservice id.
 */
export class SyncServiceAgentSource implements NameSource {
  readonly name = "sync:agents";

  constructor(private readonly client: Pick<ServiceClient, "getJson">) {}

  async load(): Promise<Map<number, string>> {
    const agents = z.array(SyncAgentSchema).parse(
      await this.client.getJson(SYNC_SERVICE, "/api/psa/agents"),
    );
    return new Map(
      agents
        .filter((agent) => agent.active)
        .map((agent) => [agent.external_id, agent.name] as const),
    );
  }
}
