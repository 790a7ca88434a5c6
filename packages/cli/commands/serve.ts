import { Command } from "commander";
import { loadDashboardEnv, startDashboard } from "@deskwatch/dashboard";
import type { CliContext } from "../lib/context.ts";
import { handleCommand, type VerboseFlag } from "../lib/handler.ts";
import { shutdownSignal, untilAborted } from "../lib/signals.ts";

export async function serve(context: CliContext): Promise<void> {
  const env = loadDashboardEnv(context.env);
  const signal = shutdownSignal();
  const dashboard = await startDashboard(env);
  await untilAborted(signal);
  await dashboard.close();
}

export function serveCommand(context: CliContext): Command {
  return new Command("serve")
    .description("Serve the ticket dashboard and its JSON API.")
    .action((_options: unknown, command: Command) =>
      handleCommand(
        serve(context),
        context,
        command.optsWithGlobals<VerboseFlag>(),
      )
    );
}
