import { z } from "zod";
import { baseUrlFor } from "@deskwatch/freshservice";
import { getLogger, type Logger } from "@deskwatch/utils/logger";
import { errorMessage } from "@deskwatch/utils/types";
import type { ServiceClient } from "./service-client.ts";
import { SYNC_SERVICE } from "./sources.ts";

/**
 * Where ticket ids link to. `null` means links cannot be built.
 */
export interface TicketLinks {
  baseUrl(): Promise<string | null>;
}

export function freshserviceLinks(domain: string): TicketLinks {
  const base = domain.trim() ? `${baseUrlFor(domain)}/a/tickets/` : null;
  return { baseUrl: () => Promise.resolve(base) };
}

const PsaConfigSchema = z.object({
  default_provider: z.string().nullable().optional(),
  providers: z.record(
    z.object({ ticket_url_template: z.string().optional() }).passthrough(),
  ).default({}),
}).passthrough();

/**
 * Link base from the ticket-sync service's PSA configuration, e.g. a template
 * of `https://example.freshservice.com/a/tickets/{ticket_id}`. Remembered
 * once found; retried on every call until then.
 */
export class PsaTicketLinks implements TicketLinks {
  private cached: string | null = null;
  private readonly logger: Logger;

  constructor(
    private readonly client: Pick<ServiceClient, "getJson">,
    logger?: Logger,
  ) {
    this.logger = logger ?? getLogger("dashboard");
  }

  async baseUrl(): Promise<string | null> {
    if (this.cached) return this.cached;
    try {
      const config = PsaConfigSchema.parse(
        await this.client.getJson(SYNC_SERVICE, "/api/psa/config"),
      );
      const provider = config.default_provider
        ? config.providers[config.default_provider]
        : undefined;
      const template = provider?.ticket_url_template;
      if (template) {
        this.cached = template.replace("{ticket_id}", "");
        return this.cached;
      }
    } catch (error) {
      this.logger.error({ err: errorMessage(error) }, "could not load PSA config");
      return null;
    }
    this.logger.warn("no PSA provider configured, ticket links disabled");
    return null;
  }
}
