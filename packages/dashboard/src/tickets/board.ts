import {
  type Bucket,
  type ClassifierConfig,
  classifyTicket,
  DEFAULT_CLASSIFIER_CONFIG,
  type EnrichedTicket,
  groupTickets,
  type NameLookup,
} from "@deskwatch/classifier";
import type { Ticket } from "@deskwatch/freshservice";
import { getLogger, type Logger } from "@deskwatch/utils/logger";
import { errorMessage } from "@deskwatch/utils/types";
import type { TicketLinks } from "./links.ts";
import type { TicketSource } from "./sources.ts";
import {
  assignedTo,
  inView,
  SECTION_BUCKETS,
  sectionName,
  VIEWS,
  type ViewSlug,
} from "./views.ts";

export interface BoardItem extends EnrichedTicket {
  url: string | null;
}

export interface BoardSection {
  bucket: Bucket;
  name: string;
  items: BoardItem[];
}

export interface Board {
  view: ViewSlug;
  viewName: string;
  sections: BoardSection[];
  total: number;
  generatedAt: string;
  ticketBaseUrl: string | null;
  agents: Array<{ id: number; name: string }>;
  selectedAgentId: number | null;
  /** Set when the ticket source failed and the board is empty because of it. */
  sourceError: string | null;
}

/**
 * The directory as the board needs it: names plus the agent list for the
 * filter menu.
 */
export interface BoardDirectory extends NameLookup {
  ensureLoaded(): Promise<void>;
  agents(): ReadonlyMap<number, string>;
}

export interface SourceCheck {
  name: string;
  ok: boolean;
  error: string | null;
}

export interface TicketBoardOptions {
  source: TicketSource;
  directory: BoardDirectory;
  links: TicketLinks;
  config?: ClassifierConfig;
  professionalServicesGroupId?: number;
  now?: () => Date;
  logger?: Logger;
}

/**
 * Builds one view of the dashboard: load, filter, classify, group.
 */
export class TicketBoard {
  private readonly source: TicketSource;
  private readonly directory: BoardDirectory;
  private readonly links: TicketLinks;
  private readonly config: ClassifierConfig;
  private readonly professionalServicesGroupId?: number;
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(options: TicketBoardOptions) {
    this.source = options.source;
    this.directory = options.directory;
    this.links = options.links;
    this.config = options.config ?? DEFAULT_CLASSIFIER_CONFIG;
    this.professionalServicesGroupId = options.professionalServicesGroupId;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? getLogger("dashboard");
  }

  async checkSource(): Promise<SourceCheck> {
    try {
      await this.source.check();
      return { name: this.source.name, ok: true, error: null };
    } catch (error) {
      const message = errorMessage(error);
      this.logger.warn(
        { source: this.source.name, err: message },
        "ticket source check failed",
      );
      return { name: this.source.name, ok: false, error: message };
    }
  }

  async build(view: ViewSlug, agentId?: number): Promise<Board> {
    const now = this.now();
    await this.directory.ensureLoaded();

    let tickets: Ticket[] = [];
    let syncedAt: string | null = null;
    let sourceError: string | null = null;
    try {
      ({ tickets, syncedAt } = await this.source.load());
    } catch (error) {
      sourceError = errorMessage(error);
      this.logger.error(
        { source: this.source.name, err: sourceError },
        "could not load tickets",
      );
    }

    const enriched = tickets
      .filter((ticket) =>
        inView(ticket, view, this.professionalServicesGroupId) &&
        assignedTo(ticket, agentId)
      )
      .map((ticket) =>
        classifyTicket(ticket, {
          now,
          config: this.config,
          directory: this.directory,
        })
      );
    const groups = groupTickets(enriched);
    const base = await this.links.baseUrl();

    const sections = SECTION_BUCKETS.map((bucket): BoardSection => ({
      bucket,
      name: sectionName(bucket, view),
      items: groups[bucket].map((ticket) => ({
        ...ticket,
        url: base ? `${base}${ticket.id}` : null,
      })),
    }));

    this.logger.debug(
      { view, agentId, total: enriched.length },
      "board built",
    );

    return {
      view,
      viewName: VIEWS[view],
      sections,
      total: enriched.length,
      generatedAt: syncedAt ?? now.toISOString(),
      ticketBaseUrl: base,
      agents: [...this.directory.agents()]
        .map(([id, name]) => ({ id, name }))
        .sort((a, b) => a.name.localeCompare(b.name)),
      selectedAgentId: agentId ?? null,
      sourceError,
    };
  }
}
