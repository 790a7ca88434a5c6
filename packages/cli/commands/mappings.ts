import { Command } from "commander";
import { peopleToMapping, writeMappingFile } from "@deskwatch/directory";
import type { FreshserviceClient } from "@deskwatch/freshservice";
import { loadPollerEnv } from "@deskwatch/poller";
import type { CliContext } from "../lib/context.ts";
import { createClient } from "../lib/freshservice.ts";
import { handleCommand, type VerboseFlag } from "../lib/handler.ts";

export interface MappingFiles {
  agents: string;
  requesters: string;
}

/**
 * Writes the agent and requester `id: name` files the dashboard reads.
 */
export async function exportMappings(
  client: Pick<FreshserviceClient, "listAgents" | "listRequesters">,
  files: MappingFiles,
): Promise<string> {
  const agents = peopleToMapping(await client.listAgents());
  await writeMappingFile(files.agents, agents);
  const requesters = peopleToMapping(await client.listRequesters());
  await writeMappingFile(files.requesters, requesters);
  return [
    `Wrote ${agents.size} agents to ${files.agents}`,
    `Wrote ${requesters.size} requesters to ${files.requesters}`,
  ].join("\n");
}

export function mappingsCommand(context: CliContext): Command {
  return new Command("mappings")
    .description("Download agent and requester names for the dashboard.")
    .option("--agents <file>", "agents output file", "./agents.txt")
    .option("--requesters <file>", "requesters output file", "./requesters.txt")
    .action((files: MappingFiles, command: Command) =>
      handleCommand(
        (async () => {
          const client = await createClient(loadPollerEnv(context.env));
          return exportMappings(client, files);
        })(),
        context,
        command.optsWithGlobals<VerboseFlag>(),
      )
    );
}
