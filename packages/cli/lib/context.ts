import type { EnvSource } from "@deskwatch/utils/env";

export interface Writer {
  write(chunk: string): unknown;
}

/**
 * What a command needs from the process it runs in.
 */
export interface CliContext {
  stdout: Writer;
  stderr: Writer;
  env: EnvSource;
  setExitCode(code: number): void;
}

export function processContext(): CliContext {
  return {
    stdout: process.stdout,
    stderr: process.stderr,
    env: process.env,
    setExitCode: (code) => {
      process.exitCode = code;
    },
  };
}
