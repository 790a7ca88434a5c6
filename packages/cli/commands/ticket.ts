import { Command, InvalidArgumentError } from "commander";
import { classifyTicket, type EnrichedTicket } from "@deskwatch/classifier";
import type { FreshserviceClient, Ticket } from "@deskwatch/freshservice";
import { loadPollerEnv } from "@deskwatch/poller";
import type { CliContext } from "../lib/context.ts";
import { createClient } from "../lib/freshservice.ts";
import { handleCommand, type VerboseFlag } from "../lib/handler.ts";

interface TicketOptions {
  classify?: boolean;
}

export function parseTicketId(value: string): number {
  const id = Number(value);
  if (!/^\d+$/.test(value) || id === 0) {
    throw new InvalidArgumentError("Ticket ID must be a positive integer.");
  }
  return id;
}

/**
 * The live detail record of one ticket, or how the dashboard would
 * classify it right now.
 */
export async function showTicket(
  client: Pick<FreshserviceClient, "getTicket">,
  id: number,
  options: TicketOptions = {},
  now: Date = new Date(),
): Promise<Ticket | EnrichedTicket> {
  const ticket = await client.getTicket(id);
  if (!ticket) throw new Error(`Ticket ${id} not found`);
  return options.classify ? classifyTicket(ticket, { now }) : ticket;
}

export function ticketCommand(context: CliContext): Command {
  return new Command("ticket")
    .description("Dump one ticket as returned by the Freshservice API.")
    .argument("<id>", "ticket id", parseTicketId)
    .option("--classify", "print the classified record instead")
    .action((id: number, options: TicketOptions, command: Command) =>
      handleCommand(
        (async () => {
          const client = await createClient(loadPollerEnv(context.env));
          return showTicket(client, id, options);
        })(),
        context,
        command.optsWithGlobals<VerboseFlag>(),
      )
    );
}
