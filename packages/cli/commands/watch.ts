import { Command } from "commander";
import {
  type CycleReport,
  loadPollerEnv,
  TicketPoller,
} from "@deskwatch/poller";
import { acquirePollerLock, TicketStore } from "@deskwatch/ticket-cache";
import { ConfigError } from "@deskwatch/utils/errors";
import { errorMessage } from "@deskwatch/utils/types";
import type { CliContext } from "../lib/context.ts";
import { createClient } from "../lib/freshservice.ts";
import { handleCommand, type VerboseFlag } from "../lib/handler.ts";
import { shutdownSignal } from "../lib/signals.ts";

interface WatchOptions {
  once?: boolean;
}

export async function prepareCache(store: TicketStore): Promise<void> {
  try {
    await store.ensureDirs();
  } catch (error) {
    throw new ConfigError(
      `Ticket directory ${store.dir} is not writable: ${errorMessage(error)}`,
    );
  }
}

export async function watch(
  context: CliContext,
  options: WatchOptions,
): Promise<CycleReport | undefined> {
  const env = loadPollerEnv(context.env);
  const store = new TicketStore({ dir: env.TICKETS_DIR });
  await prepareCache(store);
  const release = await acquirePollerLock(env.TICKETS_DIR);
  try {
    const signal = options.once ? undefined : shutdownSignal();
    const poller = new TicketPoller({
      client: await createClient(env, signal),
      store,
      statusIds: env.STATUS_IDS,
      ticketTypes: env.TICKET_TYPES,
      intervalMs: env.POLL_INTERVAL_MS,
      detailDelayMs: env.DETAIL_DELAY_MS,
    });
    if (options.once) {
      const report = await poller.runCycle();
      if (!report.ok) {
        throw new Error(`Poll cycle failed: ${report.error ?? "unknown"}`);
      }
      return report;
    }
    await poller.run(signal);
    return undefined;
  } finally {
    await release();
  }
}

export function watchCommand(context: CliContext): Command {
  return new Command("watch")
    .description("Poll Freshservice and keep the ticket cache current.")
    .option("--once", "run a single poll cycle, print its report and exit")
    .action((options: WatchOptions, command: Command) =>
      handleCommand(
        watch(context, options),
        context,
        command.optsWithGlobals<VerboseFlag>(),
      )
    );
}
