import { getLogger, type Logger } from "@deskwatch/utils/logger";
import { sleep as defaultSleep, type Sleep } from "@deskwatch/utils/sleep";
import { errorMessage } from "@deskwatch/utils/types";
import {
  FreshserviceError,
  NotFoundError,
  RateLimitError,
} from "./errors.ts";
import {
  AgentListResponseSchema,
  type BasicTicket,
  BasicTicketSchema,
  type Person,
  RequesterListResponseSchema,
  type Ticket,
  TicketDetailResponseSchema,
  TicketListResponseSchema,
  TicketSchema,
} from "./schema.ts";

export interface FreshserviceClientOptions {
  /** `acme.freshservice.com` or a full base URL. */
  domain: string;
  apiKey: string;
  perPage?: number;
  maxPages?: number;
  maxRetries?: number;
  /** Wait after a failed list request, and the 429 fallback. */
  retryDelayMs?: number;
  /** Wait after a failed detail request, and the 429 fallback. */
  detailRetryDelayMs?: number;
  listTimeoutMs?: number;
  detailTimeoutMs?: number;
  fetch?: typeof fetch;
  sleep?: Sleep;
  signal?: AbortSignal;
  logger?: Logger;
}

export interface TicketListing {
  tickets: BasicTicket[];
  pages: number;
  retries: number;
  /** True when the page cap stopped the walk before the last page. */
  truncated: boolean;
}

interface RetryPolicy {
  label: string;
  timeoutMs: number;
  retryDelayMs: number;
}

interface Attempted {
  response: Response;
  retries: number;
}

export const DEFAULT_PER_PAGE = 30;
export const DEFAULT_MAX_PAGES = 50;
export const DEFAULT_MAX_RETRIES = 3;
const PEOPLE_PER_PAGE = 100;

/**
 * Builds the filter query matching any of the given status ids, quoted the
 * way the `/tickets/filter` endpoint expects.
 */
export function statusFilterQuery(statusIds: readonly number[]): string {
  const clauses = statusIds.map((status) => `status:${status}`);
  return `"(${clauses.join(" OR ")})"`;
}

/**
 * Seconds from a `Retry-After` header, as milliseconds.
 */
export function parseRetryAfter(value: string | null): number | undefined {
  if (value === null || value.trim() === "") return undefined;
  const seconds = Number(value.trim());
  if (!Number.isInteger(seconds) || seconds < 0) return undefined;
  return seconds * 1000;
}

// Releases the connection of a response that is about to be retried.
async function discardBody(response: Response): Promise<void> {
  await response.body?.cancel();
}

export function baseUrlFor(domain: string): string {
  const trimmed = domain.trim().replace(/\/+$/, "");
  return /^https?:\/\//.test(trimmed) ? trimmed : `https://${trimmed}`;
}

/**
 * Read-only client for the Freshservice v2 REST API.
 *
 * Every request is awaited on its own; rate limits (429) wait for the
 * server's `Retry-After`, while timeouts, network failures and 5xx wait a
 * fixed delay. Both count against `maxRetries`.
 */
export class FreshserviceClient {
  readonly baseUrl: string;
  private readonly authorization: string;
  private readonly perPage: number;
  private readonly maxPages: number;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly detailRetryDelayMs: number;
  private readonly listTimeoutMs: number;
  private readonly detailTimeoutMs: number;
  private readonly fetchFn: typeof fetch;
  private readonly sleep: Sleep;
  private readonly signal?: AbortSignal;
  private readonly logger: Logger;

  constructor(options: FreshserviceClientOptions) {
    this.baseUrl = baseUrlFor(options.domain);
    this.authorization = `Basic ${
      Buffer.from(`${options.apiKey}:X`).toString("base64")
    }`;
    this.perPage = options.perPage ?? DEFAULT_PER_PAGE;
    this.maxPages = options.maxPages ?? DEFAULT_MAX_PAGES;
    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.retryDelayMs = options.retryDelayMs ?? 5_000;
    this.detailRetryDelayMs = options.detailRetryDelayMs ?? 10_000;
    this.listTimeoutMs = options.listTimeoutMs ?? 30_000;
    this.detailTimeoutMs = options.detailTimeoutMs ?? 20_000;
    this.fetchFn = options.fetch ?? globalThis.fetch;
    this.sleep = options.sleep ?? defaultSleep;
    this.signal = options.signal;
    this.logger = options.logger ?? getLogger("freshservice");
  }

  /** Agent-facing URL of a ticket. */
  ticketUrl(id: number): string {
    return `${this.baseUrl}/a/tickets/${id}`;
  }

  /**
   * Walks every page of tickets whose status is in `statusIds`.
   * Throws when a page cannot be fetched, so a partial listing is never
   * mistaken for the full active set.
   */
  async listTickets(statusIds: readonly number[]): Promise<TicketListing> {
    const query = statusFilterQuery(statusIds);
    const seen = new Set<number>();
    const tickets: BasicTicket[] = [];
    let retries = 0;

    this.logger.info({ query }, "fetching filtered ticket list");

    for (let page = 1; page <= this.maxPages; page++) {
      const url = this.url("/api/v2/tickets/filter", {
        query,
        page: String(page),
        per_page: String(this.perPage),
      });
      const attempt = await this.request(url, {
        label: `list page ${page}`,
        timeoutMs: this.listTimeoutMs,
        retryDelayMs: this.retryDelayMs,
      });
      retries += attempt.retries;
      const body = TicketListResponseSchema.parse(
        await this.readJson(attempt.response, url),
      );

      if (body.tickets.length === 0) {
        return { tickets, pages: page - 1, retries, truncated: false };
      }

      let added = 0;
      for (const entry of body.tickets) {
        const parsed = BasicTicketSchema.safeParse(entry);
        if (!parsed.success || seen.has(parsed.data.id)) continue;
        seen.add(parsed.data.id);
        tickets.push(parsed.data);
        added++;
      }
      this.logger.debug(
        { page, items: body.tickets.length, added, total: tickets.length },
        "list page fetched",
      );

      if (body.tickets.length < this.perPage) {
        return { tickets, pages: page, retries, truncated: false };
      }
    }

    this.logger.warn(
      { maxPages: this.maxPages, perPage: this.perPage },
      "list fetch reached the page cap, some tickets may be missing",
    );
    return { tickets, pages: this.maxPages, retries, truncated: true };
  }

  /**
   * Full ticket detail including `stats`. Resolves `null` when the ticket no
   * longer exists (it may have been deleted since the list fetch).
   */
  async getTicket(id: number): Promise<Ticket | null> {
    const url = this.url(`/api/v2/tickets/${id}`, { include: "stats" });
    let attempt: Attempted;
    try {
      attempt = await this.request(url, {
        label: `ticket ${id}`,
        timeoutMs: this.detailTimeoutMs,
        retryDelayMs: this.detailRetryDelayMs,
      });
    } catch (error) {
      if (error instanceof NotFoundError) {
        this.logger.warn({ ticket: id }, "ticket not found (404)");
        return null;
      }
      throw error;
    }

    const body = await this.readJson(attempt.response, url);
    const wrapped = TicketDetailResponseSchema.safeParse(body);
    if (wrapped.success) return wrapped.data.ticket;

    // Some proxies unwrap the envelope; accept a bare ticket object.
    const bare = TicketSchema.safeParse(body);
    if (bare.success) {
      this.logger.warn({ ticket: id }, "detail response missing 'ticket' key");
      return bare.data;
    }
    throw new FreshserviceError(
      `Unexpected detail response for ticket ${id}: ${wrapped.error.message}`,
      { url: url.toString() },
    );
  }

  listRequesters(): Promise<Person[]> {
    return this.listPeople(
      "/api/v2/requesters",
      (body) => RequesterListResponseSchema.parse(body).requesters,
    );
  }

  listAgents(): Promise<Person[]> {
    return this.listPeople(
      "/api/v2/agents",
      (body) => AgentListResponseSchema.parse(body).agents,
    );
  }

  private async listPeople(
    path: string,
    extract: (body: unknown) => Person[],
  ): Promise<Person[]> {
    const people: Person[] = [];
    for (let page = 1; page <= this.maxPages; page++) {
      const url = this.url(path, {
        page: String(page),
        per_page: String(PEOPLE_PER_PAGE),
      });
      const { response } = await this.request(url, {
        label: `${path} page ${page}`,
        timeoutMs: this.listTimeoutMs,
        retryDelayMs: this.retryDelayMs,
      });
      const batch = extract(await this.readJson(response, url));
      people.push(...batch);
      if (batch.length < PEOPLE_PER_PAGE) break;
    }
    return people;
  }

  private url(path: string, params: Record<string, string>): URL {
    const url = new URL(path, this.baseUrl);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }
    return url;
  }

  private async readJson(response: Response, url: URL): Promise<unknown> {
    try {
      return await response.json();
    } catch (error) {
      throw new FreshserviceError(
        `Invalid JSON from ${url.pathname}: ${errorMessage(error)}`,
        { status: response.status, url: url.toString(), cause: error },
      );
    }
  }

  private async request(url: URL, policy: RetryPolicy): Promise<Attempted> {
    let retries = 0;
    const href = url.toString();

    for (;;) {
      if (this.signal?.aborted) {
        throw new FreshserviceError(`${policy.label}: aborted`, { url: href });
      }

      let response: Response;
      try {
        const timeout = AbortSignal.timeout(policy.timeoutMs);
        response = await this.fetchFn(href, {
          method: "GET",
          headers: {
            "Content-Type": "application/json",
            "Accept": "application/json",
            "Authorization": this.authorization,
          },
          signal: this.signal ? AbortSignal.any([this.signal, timeout]) : timeout,
        });
      } catch (error) {
        if (retries >= this.maxRetries) {
          throw new FreshserviceError(
            `${policy.label} failed after ${retries} retries: ${
              errorMessage(error)
            }`,
            { url: href, cause: error },
          );
        }
        retries++;
        this.logger.warn(
          { err: errorMessage(error), retry: retries, of: this.maxRetries },
          `${policy.label}: request failed, retrying`,
        );
        await this.sleep(policy.retryDelayMs, this.signal);
        continue;
      }

      if (response.ok) return { response, retries };

      if (response.status === 429) {
        if (retries >= this.maxRetries) {
          throw new RateLimitError(
            `${policy.label}: rate limit exceeded after ${retries} retries`,
            { url: href },
          );
        }
        const wait = parseRetryAfter(response.headers.get("Retry-After")) ??
          policy.retryDelayMs;
        retries++;
        this.logger.warn(
          { waitMs: wait, retry: retries, of: this.maxRetries },
          `${policy.label}: rate limited`,
        );
        await discardBody(response);
        await this.sleep(wait, this.signal);
        continue;
      }

      if (response.status >= 500) {
        if (retries >= this.maxRetries) {
          throw new FreshserviceError(
            `${policy.label}: HTTP ${response.status} after ${retries} retries`,
            { status: response.status, url: href },
          );
        }
        retries++;
        this.logger.warn(
          { status: response.status, retry: retries, of: this.maxRetries },
          `${policy.label}: server error, retrying`,
        );
        await discardBody(response);
        await this.sleep(policy.retryDelayMs, this.signal);
        continue;
      }

      const detail = await response.text().catch(() => "");
      if (response.status === 404) {
        throw new NotFoundError(`${policy.label}: not found`, { url: href });
      }
      throw new FreshserviceError(
        `${policy.label}: HTTP ${response.status}${
          detail ? ` ${detail.slice(0, 200)}` : ""
        }`,
        { status: response.status, url: href },
      );
    }
  }
}
