import { Command } from "commander";
import { config as loadDotenv } from "dotenv";
import pc from "picocolors";
import { resetRootLogger, setLogLevel } from "@deskwatch/utils/logger";
import { type CliContext, processContext } from "../lib/context.ts";
import { lightCommand } from "./light.ts";
import { mappingsCommand } from "./mappings.ts";
import { serveCommand } from "./serve.ts";
import { ticketCommand } from "./ticket.ts";
import { watchCommand } from "./watch.ts";

type GlobalOptions = {
  envFile: string;
  verbose?: boolean;
};

export function createProgram(context: CliContext = processContext()): Command {
  const program = new Command()
    .name("deskwatch")
    .description("Freshservice ticket poller, dashboard and status light.")
    .version("0.1.0")
    .option("--env-file <path>", "read environment variables from a file", ".env")
    .option("-v, --verbose", "debug logging and stack traces on failure")
    .configureOutput({
      writeOut: (text) => context.stdout.write(text),
      writeErr: (text) => context.stderr.write(text),
      outputError: (text, write) => write(pc.red(text)),
    })
    .hook("preAction", (root) => {
      const { envFile, verbose } = root.opts<GlobalOptions>();
      loadDotenv({ path: envFile });
      resetRootLogger();
      if (verbose) setLogLevel("debug");
    });

  const commands = [
    watchCommand(context),
    serveCommand(context),
    lightCommand(context),
    ticketCommand(context),
    mappingsCommand(context),
  ];
  for (const command of commands) {
    program.addCommand(command.copyInheritedSettings(program));
  }
  return program;
}
