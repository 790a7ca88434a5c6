import pc from "picocolors";
import type { CliContext, Writer } from "./context.ts";

export type VerboseFlag = {
  verbose?: boolean;
};

// The primary handler wrapping every command action: renders the resolved
// value to stdout, or the rejection in red to stderr, and sets the exit code.
export async function handleCommand(
  promise: unknown,
  context: CliContext,
  opts: VerboseFlag = {},
): Promise<void> {
  try {
    const value = await promise;
    render(value, context.stdout);
    context.setExitCode(0);
  } catch (e: unknown) {
    renderError(e, context.stderr, opts);
    context.setExitCode(1);
  }
}

export function stringify(value: unknown): string {
  switch (typeof value) {
    case "object": {
      if (!value) return "null";
      return JSON.stringify(value, null, 2);
    }
    case "function":
      throw new Error("Function could not be stringified");
    case "undefined":
      return "";
    default:
      return String(value);
  }
}

function render(value: unknown, writer: Writer) {
  if (typeof value === "undefined") return;
  // Trailing newline for TTY legibility and unix file compatibility.
  writer.write(`${stringify(value)}\n`);
}

function renderError(value: unknown, writer: Writer, opts: VerboseFlag) {
  let message: string;
  let stack: string | undefined;
  if (value instanceof Error) {
    message = value.message;
    stack = value.stack;
  } else {
    message = String(value);
  }
  writer.write(`${pc.red(message)}\n`);
  if (opts.verbose && stack) {
    writer.write(`${pc.red(stack)}\n`);
  }
}
