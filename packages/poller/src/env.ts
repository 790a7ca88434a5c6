import { readFile } from "node:fs/promises";
import { z } from "zod";
import { envIntegerList, type EnvSource, parseEnv } from "@deskwatch/utils/env";
import { ConfigError } from "@deskwatch/utils/errors";
import { isMissing, splitList } from "@deskwatch/utils/types";

const positiveInt = (value: number) =>
  z.coerce.number().int().positive().default(value);
const nonNegative = (value: number) =>
  z.coerce.number().int().nonnegative().default(value);

// NOTE: Poller environment variables and their defaults.
export const PollerEnvSchema = z.object({
  FRESHSERVICE_DOMAIN: z.string({
    required_error: "FRESHSERVICE_DOMAIN is required",
  }).min(1, "FRESHSERVICE_DOMAIN is required"),
  FRESHSERVICE_API_KEY: z.string().default(""),
  FRESHSERVICE_API_KEY_FILE: z.string().default("./token.txt"),
  TICKETS_DIR: z.string().default("./tickets"),

  POLL_INTERVAL_MS: positiveInt(120_000),
  STATUS_IDS: envIntegerList("2,3,8,9,10,13,19,23,26,27"),
  // An empty value turns the type filter off.
  TICKET_TYPES: z.string().default("Incident,Service Request").transform(
    splitList,
  ),

  PER_PAGE: z.coerce.number().int().min(1).max(100).default(30),
  MAX_PAGES: positiveInt(50),
  MAX_RETRIES: nonNegative(3),
  RETRY_DELAY_MS: nonNegative(5_000),
  DETAIL_RETRY_DELAY_MS: nonNegative(10_000),
  DETAIL_DELAY_MS: nonNegative(750),
  LIST_TIMEOUT_MS: positiveInt(30_000),
  DETAIL_TIMEOUT_MS: positiveInt(20_000),
});

export type PollerEnv = z.infer<typeof PollerEnvSchema>;

export function loadPollerEnv(source: EnvSource = process.env): PollerEnv {
  return parseEnv(PollerEnvSchema, source);
}

/**
 * The API key from `FRESHSERVICE_API_KEY`, else the first line of
 * `FRESHSERVICE_API_KEY_FILE`.
 */
export async function resolveApiKey(
  env: Pick<PollerEnv, "FRESHSERVICE_API_KEY" | "FRESHSERVICE_API_KEY_FILE">,
): Promise<string> {
  if (env.FRESHSERVICE_API_KEY.trim()) return env.FRESHSERVICE_API_KEY.trim();

  const file = env.FRESHSERVICE_API_KEY_FILE;
  let text: string;
  try {
    text = await readFile(file, "utf-8");
  } catch (error) {
    if (isMissing(error)) {
      throw new ConfigError(
        `No API key: set FRESHSERVICE_API_KEY or create ${file}`,
      );
    }
    throw error;
  }
  const key = text.split(/\r?\n/, 1)[0].trim();
  if (!key) throw new ConfigError(`API key file ${file} is empty`);
  return key;
}
