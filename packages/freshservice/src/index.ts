export {
  baseUrlFor,
  DEFAULT_MAX_PAGES,
  DEFAULT_MAX_RETRIES,
  DEFAULT_PER_PAGE,
  FreshserviceClient,
  type FreshserviceClientOptions,
  parseRetryAfter,
  statusFilterQuery,
  type TicketListing,
} from "./client.ts";
export {
  FreshserviceError,
  type FreshserviceErrorOptions,
  NotFoundError,
  RateLimitError,
} from "./errors.ts";
export {
  type BasicTicket,
  type Person,
  PersonSchema,
  personDisplayName,
  type Ticket,
  TicketSchema,
  type TicketStats,
  TicketStatsSchema,
} from "./schema.ts";
