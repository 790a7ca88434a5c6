import { Command } from "commander";
import {
  loadStatusLightEnv,
  LuxaforDevice,
  StatusLight,
} from "@deskwatch/status-light";
import { TicketStore } from "@deskwatch/ticket-cache";
import type { CliContext } from "../lib/context.ts";
import { handleCommand, type VerboseFlag } from "../lib/handler.ts";
import { shutdownSignal } from "../lib/signals.ts";

export async function light(context: CliContext): Promise<void> {
  const env = loadStatusLightEnv(context.env);
  const daemon = new StatusLight({
    store: new TicketStore({ dir: env.TICKETS_DIR }),
    connect: () => LuxaforDevice.open(),
    intervalMs: env.LIGHT_INTERVAL_MS,
  });
  await daemon.run(shutdownSignal());
}

export function lightCommand(context: CliContext): Command {
  return new Command("light")
    .description("Show the ticket cache state on a Luxafor USB light.")
    .action((_options: unknown, command: Command) =>
      handleCommand(
        light(context),
        context,
        command.optsWithGlobals<VerboseFlag>(),
      )
    );
}
