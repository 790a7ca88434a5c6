import type { CliContext } from "../lib/context.ts";
import type { EnvSource } from "@deskwatch/utils/env";

export function captureContext(env: EnvSource = {}) {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const codes: number[] = [];
  const context: CliContext = {
    stdout: { write: (chunk) => stdout.push(chunk) },
    stderr: { write: (chunk) => stderr.push(chunk) },
    env,
    setExitCode: (code) => {
      codes.push(code);
    },
  };
  return { context, stdout, stderr, codes };
}
