import { z } from "zod";
import { type EnvSource, parseEnv } from "@deskwatch/utils/env";

export const StatusLightEnvSchema = z.object({
  TICKETS_DIR: z.string().default("./tickets"),
  LIGHT_INTERVAL_MS: z.coerce.number().int().positive().default(10_000),
});

export type StatusLightEnv = z.infer<typeof StatusLightEnvSchema>;

export function loadStatusLightEnv(
  source: EnvSource = process.env,
): StatusLightEnv {
  return parseEnv(StatusLightEnvSchema, source);
}
