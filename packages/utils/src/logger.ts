/**
 * Process-wide logging built on pino.
 *
 * @module
 * Every long-running process (poller, dashboard, status light) logs through
 * module-tagged child loggers of a single root logger:
 * - Level comes from `LOG_LEVEL` (default `info`)
 * - Human-readable `pino-pretty` output unless `ENV=production`
 * - `DISABLE_LOGGING=1` silences everything (used by the test runner)
 *
 * Nothing is written to files; rotation belongs to whatever supervises the
 * process.
 *
 * @example Module-tagged logging
 * ```typescript
 * import { getLogger } from "@deskwatch/utils/logger";
 *
 * const logger = getLogger("poller");
 * logger.info({ listed: 12 }, "list fetch complete");
 * logger.warn("cycle overran its interval");
 * logger.error({ err }, "detail fetch failed");
 * ```
 *
 * @example Per-logger level
 * ```typescript
 * const verbose = getLogger("freshservice", { level: "debug" });
 * verbose.debug({ url }, "GET");
 * ```
 */

import { type LevelWithSilent, type Logger, pino } from "pino";
import pretty from "pino-pretty";

export type { Logger };

export type LogLevel = LevelWithSilent;

const LEVELS: readonly LogLevel[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
];

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" &&
    (LEVELS as readonly string[]).includes(value);
}

/**
 * Options for creating a logger
 */
export interface GetLoggerOptions {
  /**
   * The minimum log level for this logger.
   * If not specified, inherits the root level.
   */
  level?: LogLevel;
}

let root: Logger | undefined;

function createRootLogger(): Logger {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  const level = isLogLevel(envLevel) ? envLevel : "info";
  if (process.env.DISABLE_LOGGING === "1") {
    // Lines are dropped, the level still applies
    return pino({ level }, { write() {} });
  }
  return pino(
    { level },
    process.env.ENV === "production" ? undefined : pretty({ colorize: true }),
  );
}

/**
 * The shared root logger, created on first use.
 */
export function getRootLogger(): Logger {
  root ??= createRootLogger();
  return root;
}

/**
 * Replace the root logger, e.g. to inject a destination in tests.
 * Loggers created earlier keep writing to the previous root.
 */
export function setRootLogger(logger: Logger): void {
  root = logger;
}

/**
 * Forget the root logger so the next use reads `LOG_LEVEL`, `ENV` and
 * `DISABLE_LOGGING` again, e.g. after loading an env file.
 */
export function resetRootLogger(): void {
  root = undefined;
}

/**
 * Returns a child logger whose lines carry `{ module }`.
 */
export function getLogger(
  module: string,
  options: GetLoggerOptions = {},
): Logger {
  const parent = getRootLogger();
  return options.level
    ? parent.child({ module }, { level: options.level })
    : parent.child({ module });
}

export function setLogLevel(level: LogLevel): void {
  getRootLogger().level = level;
}

export function getLogLevel(): string {
  return getRootLogger().level;
}
